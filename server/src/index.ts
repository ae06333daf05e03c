// ============================================
// Simulation Entry
// Wires world, seeded random source and systems into a turn loop
// ============================================

import { createRng, Resources, type World } from '#shared';
import {
  createWorld,
  createCreature,
  clearLookups,
  getTurn,
  SystemRunner,
  SystemPriority,
  DamageSystem,
  EquipmentSystem,
  RegenerationSystem,
  MovementSystem,
  DeathSystem,
  type CreatureOptions,
  type EntityId,
} from './ecs';
import { getConfig } from './config';
import { logAggregateStats, logSimulationStarted } from './logger';
import { calculateAggregateStats } from './telemetry';

export interface SimulationOptions {
  /** Same seed, same inputs: same hits on the same parts */
  seed: string | number;
}

export interface Simulation {
  readonly world: World;
  readonly runner: SystemRunner;
  readonly seed: string | number;
  /** Last completed turn (0 before the first step) */
  readonly turn: number;
  spawn(options: CreatureOptions): EntityId;
  /** Advance one turn; returns the turn number just processed */
  step(): number;
  run(turns: number): number;
}

/**
 * Create a simulation with every system registered.
 * Creature id lookups are process-wide, so creating a simulation resets them.
 */
export function createSimulation(options: SimulationOptions): Simulation {
  clearLookups();

  const world = createWorld(createRng(options.seed));
  const runner = new SystemRunner();

  runner.register(new DamageSystem(), SystemPriority.DAMAGE);
  runner.register(new EquipmentSystem(), SystemPriority.EQUIPMENT);
  runner.register(new RegenerationSystem(), SystemPriority.REGENERATION);
  runner.register(new MovementSystem(), SystemPriority.MOVEMENT);
  runner.register(new DeathSystem(), SystemPriority.DEATH);

  logSimulationStarted(options.seed);

  const step = (): number => {
    const turn = getTurn(world) + 1;
    world.setResource(Resources.Turn, turn);
    runner.update(world, turn);

    const interval = getConfig('TELEMETRY_INTERVAL_TURNS');
    if (interval > 0 && turn % interval === 0) {
      logAggregateStats({ turn, ...calculateAggregateStats(world) });
    }
    return turn;
  };

  return {
    world,
    runner,
    seed: options.seed,
    get turn() {
      return getTurn(world);
    },
    spawn: (creature) => createCreature(world, creature),
    step,
    run(turns: number): number {
      let last = getTurn(world);
      for (let i = 0; i < turns; i++) {
        last = step();
      }
      return last;
    },
  };
}

export { calculateAggregateStats } from './telemetry';
export type { AggregateStats } from './telemetry';
export { getConfig, setConfigOverride, clearConfigOverrides, getConfigOverrides } from './config';
export * from './ecs';
