// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export {
  World,
  ComponentStore,
  Components,
  Tags,
  Resources,
} from '#shared';
export type {
  EntityId,
  ComponentType,
  // Component interfaces
  CreatureComponent,
  AnatomyComponent,
  MovementComponent,
  EquipmentComponent,
  EquippedItem,
  DamageTrackingComponent,
  HitRecord,
  DamageIntentComponent,
  PendingHit,
  EquipIntentComponent,
  DeathComponent,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  createCreature,
  destroyCreature,
  clearLookups,
  getEntityByCreatureId,
  getCreatureIdByEntity,
  getTurn,
  getWorldRng,
  getHitWeights,
  // Component access
  getAnatomy,
  getMovement,
  getEquipment,
  getDamageTracking,
  requireAnatomy,
  requireCreature,
  requireMovement,
  requireEquipment,
  requireDamageTracking,
  // Query helpers
  forEachCreature,
  forEachLivingCreature,
  isDead,
  // Intents
  queueDamage,
  queueEquip,
} from './factories';
export type { CreatureOptions } from './factories';

// Systems
export * from './systems';
