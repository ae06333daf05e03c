// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { ComponentMap, ResourceMap } from './components';
import type { EntityId, ComponentType, ResourceKey, Tag } from './types';

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy)
 * - Component storage, typed by component key
 * - Queries (find entities with specific components)
 * - Tags (lightweight entity classification)
 * - Resources (turn counter, random source)
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores = new Map<ComponentType, ComponentStore<unknown>>();
  private entityTags = new Map<EntityId, Set<Tag>>();
  private resources = new Map<ResourceKey, unknown>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity and all its components.
   * Removes from all component stores and clears tags.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    this.entities.delete(id);
    for (const store of this.stores.values()) {
      store.delete(id);
    }
    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Register a component store.
   * Must be called before using a component type.
   */
  registerStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> {
    const store = new ComponentStore<ComponentMap[K]>(type);
    this.stores.set(type, store as ComponentStore<unknown>);
    return store;
  }

  /**
   * Get a component store by type.
   * Throws if not registered (world setup bug).
   */
  getStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> {
    const store = this.stores.get(type) as ComponentStore<ComponentMap[K]> | undefined;
    if (!store) {
      throw new Error(`Component type not registered: ${type}. Call world.registerStore() first.`);
    }
    return store;
  }

  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    this.getStore(type).set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    const store = this.stores.get(type) as ComponentStore<ComponentMap[K]> | undefined;
    return store?.get(entity);
  }

  /**
   * Get a component, throwing if missing (invariant violation).
   */
  requireComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] {
    return this.getStore(type).require(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores.get(type)?.has(entity) ?? false;
  }

  removeComponent(entity: EntityId, type: ComponentType): void {
    this.stores.get(type)?.delete(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: get all entities with ALL specified components, in creation order.
   *
   * Example: world.query(Components.Anatomy, Components.DamageIntent)
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];
    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }
    return result;
  }

  // ============================================
  // Tags (lightweight entity classification)
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  removeTag(entity: EntityId, tag: Tag): void {
    this.entityTags.get(entity)?.delete(tag);
  }

  hasTag(entity: EntityId, tag: Tag): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    this.forEachWithTag(tag, (entity) => result.push(entity));
    return result;
  }

  /**
   * Iterate entities with tag via callback (avoids allocation).
   */
  forEachWithTag(tag: Tag, callback: (entity: EntityId) => void): void {
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        callback(entity);
      }
    }
  }

  /**
   * Remove a tag from all entities that have it.
   * Used for clearing transient per-turn tags.
   */
  clearTagFromAll(tag: Tag): void {
    for (const tags of this.entityTags.values()) {
      tags.delete(tag);
    }
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  setResource<K extends ResourceKey>(key: K, value: ResourceMap[K]): void {
    this.resources.set(key, value);
  }

  getResource<K extends ResourceKey>(key: K): ResourceMap[K] | undefined {
    return this.resources.get(key) as ResourceMap[K] | undefined;
  }

  hasResource(key: ResourceKey): boolean {
    return this.resources.has(key);
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Clear all entities and components.
   * Keeps component stores registered.
   */
  clear(): void {
    this.entities.clear();
    this.entityTags.clear();
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.resources.clear();
    this.nextEntityId = 1;
  }

  /**
   * Debug: get stats about the world.
   */
  getStats(): {
    entities: number;
    stores: Record<string, number>;
    resources: string[];
  } {
    const stores: Record<string, number> = {};
    for (const [type, store] of this.stores) {
      stores[type] = store.size;
    }
    return {
      entities: this.entities.size,
      stores,
      resources: Array.from(this.resources.keys()),
    };
  }
}
