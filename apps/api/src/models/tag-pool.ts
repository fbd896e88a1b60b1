import { Tag } from "./tag.js";

export const VLAN_MIN = 1;
export const VLAN_MAX = 4095;

/**
 * Tags not yet assigned on one interface.
 *
 * The pool is a stack: it is seeded in ascending order and allocateNext()
 * pops from the end, so a fresh pool hands out VLAN 4095 first. Released tags
 * are pushed back on top and are the next ones handed out.
 *
 * Every operation is check-then-act with no locking; callers must serialize
 * mutations per interface.
 */
export class TagPool {
  private tags: Tag[] = [];
  private keys = new Set<string>();

  constructor(initial?: Iterable<Tag>) {
    if (initial) {
      for (const tag of initial) {
        this.release(tag);
      }
    }
  }

  /**
   * Pool holding every VLAN id from VLAN_MIN to VLAN_MAX inclusive
   */
  static forVlans(): TagPool {
    const pool = new TagPool();
    for (let value = VLAN_MIN; value <= VLAN_MAX; value++) {
      pool.release(Tag.vlan(value));
    }
    return pool;
  }

  get size(): number {
    return this.tags.length;
  }

  isAvailable(tag: Tag): boolean {
    return this.keys.has(tag.key);
  }

  /**
   * Take a specific tag out of the pool. Returns false if it is not available.
   */
  reserve(tag: Tag): boolean {
    if (!this.isAvailable(tag)) {
      return false;
    }
    const index = this.tags.findIndex((t) => t.equals(tag));
    this.tags.splice(index, 1);
    this.keys.delete(tag.key);
    return true;
  }

  /**
   * Pop the most recently inserted tag, or null when the pool is exhausted
   */
  allocateNext(): Tag | null {
    const tag = this.tags.pop();
    if (!tag) {
      return null;
    }
    this.keys.delete(tag.key);
    return tag;
  }

  /**
   * Return a tag to the pool. Returns false if it was already available.
   */
  release(tag: Tag): boolean {
    if (this.isAvailable(tag)) {
      return false;
    }
    this.tags.push(tag);
    this.keys.add(tag.key);
    return true;
  }

  toArray(): Tag[] {
    return [...this.tags];
  }
}
