// ============================================
// Telemetry Module
// Functions for calculating aggregate simulation statistics
// ============================================

import { forEachCreature, requireAnatomy, type World } from './ecs';
import { Tags } from '#shared';

/**
 * Aggregate statistics about the simulation state
 */
export interface AggregateStats {
  totalCreatures: number;
  aliveCreatures: number;
  deadCreatures: number;
  immobileCreatures: number;
  destroyedParts: number;
  avgMovementPenalty: number; // Over living creatures, 0 when none
  variantDistribution: Record<string, number>;
}

/**
 * Calculate aggregate statistics about the simulation state.
 * Life status comes from each registry, not from the Dead tag, so a
 * creature that died this turn counts as dead before DeathSystem runs.
 */
export function calculateAggregateStats(world: World): AggregateStats {
  const stats: AggregateStats = {
    totalCreatures: 0,
    aliveCreatures: 0,
    deadCreatures: 0,
    immobileCreatures: 0,
    destroyedParts: 0,
    avgMovementPenalty: 0,
    variantDistribution: {},
  };
  let totalPenalty = 0;

  forEachCreature(world, (entity) => {
    const registry = requireAnatomy(world, entity);

    stats.totalCreatures++;
    stats.destroyedParts += registry.destroyedParts().length;
    stats.variantDistribution[registry.variant] = (stats.variantDistribution[registry.variant] ?? 0) + 1;
    if (world.hasTag(entity, Tags.Immobile)) stats.immobileCreatures++;

    if (registry.isAlive()) {
      stats.aliveCreatures++;
      totalPenalty += registry.movementPenalty();
    } else {
      stats.deadCreatures++;
    }
  });

  stats.avgMovementPenalty = stats.aliveCreatures > 0 ? totalPenalty / stats.aliveCreatures : 0;
  return stats;
}
