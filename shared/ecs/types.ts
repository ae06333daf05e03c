// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  // Identity and anatomy (every creature)
  Creature: 'Creature',
  Anatomy: 'Anatomy',
  Movement: 'Movement',
  Equipment: 'Equipment',
  DamageTracking: 'DamageTracking',

  // Deferred actions, consumed by systems on the next turn
  DamageIntent: 'DamageIntent',
  EquipIntent: 'EquipIntent',

  // Set once by DeathSystem
  Death: 'Death',
} as const;

/**
 * Component type identifier - one of the Components values.
 */
export type ComponentType = (typeof Components)[keyof typeof Components];

/**
 * Entity tags for quick classification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  Creature: 'creature',
  Dead: 'dead',
  Immobile: 'immobile',

  // Transient per-turn tags (cleared at end of each turn)
  // Used for cross-system communication within a single turn
  DamagedThisTurn: 'damaged_this_turn',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];

// Tags the SystemRunner clears after every turn
export const TRANSIENT_TAGS: readonly Tag[] = [Tags.DamagedThisTurn];

// ============================================
// Resource Keys
// ============================================

/**
 * Standard resource keys for world.getResource/setResource.
 * Resources are singleton data not tied to entities.
 */
export const Resources = {
  Rng: 'rng',
  Turn: 'turn',
} as const;

export type ResourceKey = (typeof Resources)[keyof typeof Resources];
