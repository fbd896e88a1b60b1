import type { Metadata, MetadataValue } from "@sdn-port-manager/shared";

/**
 * Metadata and administrative state carried by network entities
 */
export class EntityState {
  private data = new Map<string, MetadataValue>();
  private enabledFlag = false;
  private activeFlag = true;

  get metadata(): Metadata {
    return Object.fromEntries(this.data);
  }

  get enabled(): boolean {
    return this.enabledFlag;
  }

  get active(): boolean {
    return this.activeFlag;
  }

  enable(): void {
    this.enabledFlag = true;
  }

  disable(): void {
    this.enabledFlag = false;
  }

  activate(): void {
    this.activeFlag = true;
  }

  deactivate(): void {
    this.activeFlag = false;
  }

  getMetadata(key: string): MetadataValue | undefined {
    return this.data.get(key);
  }

  /**
   * Add a key without overwriting. Returns false if the key already exists.
   */
  addMetadata(key: string, value: MetadataValue): boolean {
    if (this.data.has(key)) {
      return false;
    }
    this.data.set(key, value);
    return true;
  }

  updateMetadata(key: string, value: MetadataValue): void {
    this.data.set(key, value);
  }

  /**
   * Merge a map into the metadata. Existing keys are only replaced when force is set.
   */
  extendMetadata(metadata: Metadata, force = true): void {
    for (const [key, value] of Object.entries(metadata)) {
      if (force) {
        this.updateMetadata(key, value);
      } else {
        this.addMetadata(key, value);
      }
    }
  }

  removeMetadata(key: string): boolean {
    return this.data.delete(key);
  }

  clearMetadata(): void {
    this.data.clear();
  }
}

/**
 * Anything that exposes an EntityState
 */
export interface EntityCapable {
  readonly entity: EntityState;
}
