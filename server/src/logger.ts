import pino from 'pino';
import type { AnatomyVariant, BodyPartKind, DamageTier } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'sim.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Simulation events (spawns, injuries, deaths, equipment)
export const logger = createLogger('sim.log', 'sim');

// Turn timing and aggregate stats
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Simulation Events
// ============================================

export function logSimulationStarted(seed: string | number) {
  logger.info({ seed, event: 'simulation_started' }, `Simulation started (seed ${seed})`);
}

export function logCreatureSpawned(creatureId: string, variant: AnatomyVariant, totalHp: number) {
  logger.info(
    { creatureId, variant, totalHp, event: 'creature_spawned' },
    `Spawned ${variant} ${creatureId} (${totalHp} hp)`
  );
}

/**
 * Log a hit that landed on a part (debug - one per hit)
 */
export function logPartHit(creatureId: string, part: BodyPartKind, amount: number, tier: DamageTier) {
  logger.debug(
    { creatureId, part, amount, tier, event: 'part_hit' },
    `${creatureId} ${part} took ${amount} (${tier})`
  );
}

export function logPartDestroyed(creatureId: string, part: BodyPartKind, source: string) {
  logger.info({ creatureId, part, source, event: 'part_destroyed' }, `${creatureId} lost ${part} to ${source}`);
}

export function logCreatureDeath(creatureId: string, destroyedVitals: BodyPartKind[], cause?: string) {
  logger.info(
    { creatureId, destroyedVitals, cause, event: 'creature_died' },
    `Creature died: ${destroyedVitals.join(', ')} destroyed`
  );
}

export function logItemEquipped(creatureId: string, itemId: string, part: BodyPartKind) {
  logger.info({ creatureId, itemId, part, event: 'item_equipped' }, `${creatureId} equipped ${itemId} on ${part}`);
}

export function logEquipRejected(creatureId: string, itemId: string, reason: string) {
  logger.info({ creatureId, itemId, reason, event: 'equip_rejected' }, `${creatureId} cannot equip ${itemId}: ${reason}`);
}

export function logItemDropped(creatureId: string, itemId: string, part: BodyPartKind) {
  logger.info({ creatureId, itemId, part, event: 'item_dropped' }, `${creatureId} dropped ${itemId} (${part} destroyed)`);
}

// ============================================
// Simulation State Logging
// ============================================

/**
 * Log aggregate simulation statistics (lightweight, periodic)
 */
export function logAggregateStats(stats: {
  turn: number;
  totalCreatures: number;
  aliveCreatures: number;
  deadCreatures: number;
  immobileCreatures: number;
  destroyedParts: number;
  avgMovementPenalty: number;
  variantDistribution: Record<string, number>;
}) {
  perfLogger.info(
    {
      ...stats,
      event: 'aggregate_stats',
    },
    `Turn ${stats.turn}: ${stats.aliveCreatures}/${stats.totalCreatures} creatures alive, ${stats.destroyedParts} parts destroyed, avg movement penalty: ${stats.avgMovementPenalty.toFixed(2)}`
  );
}
