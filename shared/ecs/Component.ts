// ============================================
// Component Store
// ============================================

import type { EntityId, ComponentType } from './types';

/**
 * ComponentStore - the data for one component type, keyed by entity.
 *
 * Generic parameter T is the component data shape (e.g., AnatomyComponent).
 * The store knows its own type so missing-component errors can name it.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  constructor(readonly type: ComponentType) {}

  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  /**
   * Get component data, throwing if the entity lacks it.
   * Use where a missing component means a bug, not a normal state.
   */
  require(entity: EntityId): T {
    const value = this.data.get(entity);
    if (value === undefined) {
      throw new Error(`EntityMissingComponent: ${this.type} missing on entity ${entity}`);
    }
    return value;
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  entries(): IterableIterator<[EntityId, T]> {
    return this.data.entries();
  }

  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
