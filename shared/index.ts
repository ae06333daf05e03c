// ============================================
// Shared Types & Constants
// Anatomy core and ECS primitives used by the simulation
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Anatomy core - body parts, templates, registry, equipment eligibility
export * from './anatomy';

// Seedable random source and weighted choice
export * from './rng';

// Tunables (ANATOMY_CONFIG, DEV_TUNABLE_CONFIGS)
export * from './constants';

// Type definitions (BodyPartKind, AnatomyVariant, EquipmentDefinition...)
export * from './types';
