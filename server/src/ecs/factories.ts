// ============================================
// ECS Entity Factories
// Functions to create creatures with proper components
// ============================================

import {
  World,
  Components,
  Tags,
  Resources,
  BodyPartRegistry,
  assertAmount,
} from '#shared';
import type {
  AnatomyVariant,
  EntityId,
  Rng,
  HitWeights,
  EquipmentDefinition,
  PendingHit,
  CreatureComponent,
  MovementComponent,
  EquipmentComponent,
  DamageTrackingComponent,
} from '#shared';
import { getConfig } from '../config';
import { logCreatureSpawned } from '../logger';

// ============================================
// World Setup
// ============================================

/**
 * Create and configure an ECS World with all component stores registered.
 * The random source defaults to Math.random; simulations install a seeded one.
 */
export function createWorld(rng: Rng = Math.random): World {
  const world = new World();

  world.registerStore(Components.Creature);
  world.registerStore(Components.Anatomy);
  world.registerStore(Components.Movement);
  world.registerStore(Components.Equipment);
  world.registerStore(Components.DamageTracking);

  // Deferred actions
  world.registerStore(Components.DamageIntent);
  world.registerStore(Components.EquipIntent);
  world.registerStore(Components.Death);

  world.setResource(Resources.Rng, rng);
  world.setResource(Resources.Turn, 0);

  return world;
}

/**
 * Current turn number (0 before the first step).
 */
export function getTurn(world: World): number {
  return world.getResource(Resources.Turn) ?? 0;
}

export function getWorldRng(world: World): Rng {
  return world.getResource(Resources.Rng) ?? Math.random;
}

// ============================================
// Lookup Tables
// Maps between EntityId and creature string ids
// ============================================

const entityToCreatureId = new Map<EntityId, string>();
const creatureIdToEntity = new Map<string, EntityId>();

export function getEntityByCreatureId(creatureId: string): EntityId | undefined {
  return creatureIdToEntity.get(creatureId);
}

export function getCreatureIdByEntity(entity: EntityId): string | undefined {
  return entityToCreatureId.get(entity);
}

/**
 * Clear all lookup tables (tests, world reset).
 */
export function clearLookups(): void {
  entityToCreatureId.clear();
  creatureIdToEntity.clear();
}

// ============================================
// Creature Factory
// ============================================

export interface CreatureOptions {
  id: string;
  name?: string;
  variant: AnatomyVariant;
  totalHp: number;
  baseSpeed?: number;
  /** Per-creature random source; hits resolved by systems use the world's */
  rng?: Rng;
}

/**
 * Hit weights as currently tuned.
 */
export function getHitWeights(): HitWeights {
  return {
    torso: getConfig('HIT_WEIGHT_TORSO'),
    head: getConfig('HIT_WEIGHT_HEAD'),
    limb: getConfig('HIT_WEIGHT_LIMB'),
    other: getConfig('HIT_WEIGHT_OTHER'),
  };
}

/**
 * Spawn a creature: identity, anatomy, movement, equipment, damage tracking.
 * Throws on a duplicate id or an invalid anatomy (nothing is created).
 */
export function createCreature(world: World, options: CreatureOptions): EntityId {
  if (creatureIdToEntity.has(options.id)) {
    throw new Error(`DuplicateCreatureId: ${options.id} already exists`);
  }

  // Build first so an invalid anatomy leaves no half-made entity behind
  const registry = new BodyPartRegistry(options.variant, options.totalHp, {
    rng: options.rng,
    hitWeights: getHitWeights(),
  });

  const baseSpeed = options.baseSpeed ?? getConfig('CREATURE_BASE_SPEED');
  const entity = world.createEntity();

  world.addComponent(entity, Components.Creature, {
    id: options.id,
    name: options.name ?? options.id,
  });
  world.addComponent(entity, Components.Anatomy, { registry });
  world.addComponent(entity, Components.Movement, { baseSpeed, speed: baseSpeed });
  world.addComponent(entity, Components.Equipment, { equipped: [] });
  world.addComponent(entity, Components.DamageTracking, { recentHits: [], totalDamageTaken: 0 });
  world.addTag(entity, Tags.Creature);

  entityToCreatureId.set(entity, options.id);
  creatureIdToEntity.set(options.id, entity);

  logCreatureSpawned(options.id, options.variant, options.totalHp);
  return entity;
}

/**
 * Remove a creature and its lookups.
 */
export function destroyCreature(world: World, entity: EntityId): void {
  const creatureId = entityToCreatureId.get(entity);
  if (creatureId !== undefined) {
    creatureIdToEntity.delete(creatureId);
    entityToCreatureId.delete(entity);
  }
  world.destroyEntity(entity);
}

// ============================================
// Component Access
// ============================================

export function getAnatomy(world: World, entity: EntityId): BodyPartRegistry | undefined {
  return world.getComponent(entity, Components.Anatomy)?.registry;
}

export function getMovement(world: World, entity: EntityId): MovementComponent | undefined {
  return world.getComponent(entity, Components.Movement);
}

export function getEquipment(world: World, entity: EntityId): EquipmentComponent | undefined {
  return world.getComponent(entity, Components.Equipment);
}

export function getDamageTracking(world: World, entity: EntityId): DamageTrackingComponent | undefined {
  return world.getComponent(entity, Components.DamageTracking);
}

// ============================================
// Throwing Component Access (for invariant enforcement)
// Use these in systems where missing components indicate bugs
// ============================================

export function requireAnatomy(world: World, entity: EntityId): BodyPartRegistry {
  return world.requireComponent(entity, Components.Anatomy).registry;
}

export function requireCreature(world: World, entity: EntityId): CreatureComponent {
  return world.requireComponent(entity, Components.Creature);
}

export function requireMovement(world: World, entity: EntityId): MovementComponent {
  return world.requireComponent(entity, Components.Movement);
}

export function requireEquipment(world: World, entity: EntityId): EquipmentComponent {
  return world.requireComponent(entity, Components.Equipment);
}

export function requireDamageTracking(world: World, entity: EntityId): DamageTrackingComponent {
  return world.requireComponent(entity, Components.DamageTracking);
}

// ============================================
// Iteration Helpers
// ============================================

/**
 * Iterate over all creatures with their string ids.
 */
export function forEachCreature(
  world: World,
  callback: (entity: EntityId, creatureId: string) => void
): void {
  world.forEachWithTag(Tags.Creature, (entity) => {
    const creatureId = entityToCreatureId.get(entity);
    if (creatureId === undefined) return;
    callback(entity, creatureId);
  });
}

/**
 * Creatures not yet marked dead by DeathSystem.
 * A creature can be dying (vital part destroyed) and still be visited here
 * until DeathSystem runs; check the registry when that matters.
 */
export function forEachLivingCreature(
  world: World,
  callback: (entity: EntityId, creatureId: string) => void
): void {
  forEachCreature(world, (entity, creatureId) => {
    if (world.hasTag(entity, Tags.Dead)) return;
    callback(entity, creatureId);
  });
}

export function isDead(world: World, entity: EntityId): boolean {
  return world.hasTag(entity, Tags.Dead);
}

// ============================================
// Intents
// ============================================

/**
 * Queue a hit for DamageSystem. Hits accumulate until the next turn.
 * Invalid amounts throw here, at the caller, rather than inside a system.
 */
export function queueDamage(world: World, entity: EntityId, hit: PendingHit): void {
  assertAmount(hit.amount, 'damage');
  const intent = world.getComponent(entity, Components.DamageIntent);
  if (intent) {
    intent.hits.push(hit);
    return;
  }
  world.addComponent(entity, Components.DamageIntent, { hits: [hit] });
}

/**
 * Queue an equip request for EquipmentSystem.
 */
export function queueEquip(world: World, entity: EntityId, item: EquipmentDefinition): void {
  const intent = world.getComponent(entity, Components.EquipIntent);
  if (intent) {
    intent.items.push(item);
    return;
  }
  world.addComponent(entity, Components.EquipIntent, { items: [item] });
}
