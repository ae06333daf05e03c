// ============================================
// ECS System Types
// ============================================

import type { World } from '#shared';

/**
 * Base System interface
 * All simulation systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called once per turn
   * @param world The ECS World containing all entities and components
   * @param turn Turn number being processed (1-based)
   */
  update(world: World, turn: number): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * Turn order:
 * 1. Damage (resolve queued hits)
 * 2. Equipment (drop items from destroyed parts, then equip requests)
 * 3. Regeneration (skips creatures hit this turn)
 * 4. Movement (speed from locomotion damage)
 * 5. Death (vital part destroyed)
 */
export const SystemPriority = {
  // Combat - resolve intents first
  DAMAGE: 100,
  EQUIPMENT: 200,

  // Recovery
  REGENERATION: 300,

  // Derived state
  MOVEMENT: 500,

  // Life cycle - runs last
  DEATH: 700,
} as const;
