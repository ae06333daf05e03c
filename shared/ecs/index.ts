// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags, Resources, TRANSIENT_TAGS } from './types';
export type { EntityId, ComponentType, Tag, ResourceKey } from './types';

// Component interfaces
export type {
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
  ComponentMap,
  ResourceMap,
} from './components';
