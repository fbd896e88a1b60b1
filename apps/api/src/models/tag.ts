import { TagType, type TagRecord } from "@sdn-port-manager/shared";

/**
 * A tag value of a given type. Two tags are equal when both type and value match.
 */
export class Tag {
  readonly type: TagType;
  readonly value: number;

  constructor(type: TagType, value: number) {
    this.type = type;
    this.value = value;
    Object.freeze(this);
  }

  static vlan(value: number): Tag {
    return new Tag(TagType.VLAN, value);
  }

  static fromRecord(record: TagRecord): Tag {
    return new Tag(record.tag_type, record.value);
  }

  /**
   * Key used for set membership
   */
  get key(): string {
    return `${this.type}:${this.value}`;
  }

  equals(other: Tag): boolean {
    return this.type === other.type && this.value === other.value;
  }

  toRecord(): TagRecord {
    return { tag_type: this.type, value: this.value };
  }
}
