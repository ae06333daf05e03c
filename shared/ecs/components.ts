// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { BodyPartRegistry } from '../anatomy/BodyPartRegistry';
import type { Rng } from '../rng';
import type { BodyPartKind, EquipmentDefinition } from '../types';

// ============================================
// Creature Components
// ============================================

/**
 * Creature identity - stable string id for lookups and logs.
 */
export interface CreatureComponent {
  id: string;
  name: string;
}

/**
 * Anatomy - the creature's body part registry.
 * The registry is the source of truth for life status; nothing else
 * caches "is alive".
 */
export interface AnatomyComponent {
  registry: BodyPartRegistry;
}

/**
 * Movement - speed after locomotion damage.
 * Units: tiles per turn.
 */
export interface MovementComponent {
  baseSpeed: number;
  speed: number; // Recomputed by MovementSystem every turn
}

/**
 * An item and the part hosting it.
 */
export interface EquippedItem {
  item: EquipmentDefinition;
  part: BodyPartKind;
}

/**
 * Equipment - what is worn/wielded and where.
 * One item per part; a destroyed part drops its item.
 */
export interface EquipmentComponent {
  equipped: EquippedItem[];
}

/**
 * One resolved hit, kept for UI/log feedback.
 */
export interface HitRecord {
  turn: number;
  part: BodyPartKind;
  amount: number; // HP actually removed
  source: string;
  destroyedPart: boolean;
}

/**
 * DamageTracking - recent hits and running totals.
 */
export interface DamageTrackingComponent {
  recentHits: HitRecord[]; // Hits resolved on the latest damaged turn
  totalDamageTaken: number;
  lastDamageSource?: string;
}

// ============================================
// Deferred Action Components
// ============================================

/**
 * A hit already assigned to this creature by the combat layer.
 * No target means "anywhere" (weighted random part).
 */
export interface PendingHit {
  amount: number;
  target?: BodyPartKind;
  source?: string;
}

export interface DamageIntentComponent {
  hits: PendingHit[];
}

export interface EquipIntentComponent {
  items: EquipmentDefinition[];
}

/**
 * Death - when and why the creature died.
 */
export interface DeathComponent {
  turn: number;
  destroyedVitals: BodyPartKind[];
  cause?: string;
}

// ============================================
// Type Maps
// ============================================

/**
 * Component key -> data shape, used by World to type its accessors.
 * Keys mirror the Components constant values.
 */
export interface ComponentMap {
  Creature: CreatureComponent;
  Anatomy: AnatomyComponent;
  Movement: MovementComponent;
  Equipment: EquipmentComponent;
  DamageTracking: DamageTrackingComponent;
  DamageIntent: DamageIntentComponent;
  EquipIntent: EquipIntentComponent;
  Death: DeathComponent;
}

/**
 * Resource key -> value shape.
 */
export interface ResourceMap {
  rng: Rng;
  turn: number;
}
