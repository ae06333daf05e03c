// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Combat Systems
export { DamageSystem } from './DamageSystem';
export { EquipmentSystem } from './EquipmentSystem';

// Recovery and derived state
export { RegenerationSystem } from './RegenerationSystem';
export { MovementSystem } from './MovementSystem';

// Lifecycle Systems
export { DeathSystem } from './DeathSystem';
