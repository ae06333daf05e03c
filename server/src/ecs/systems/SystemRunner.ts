// ============================================
// ECS System Runner
// Manages and executes all simulation systems in priority order
// ============================================

import { TRANSIENT_TAGS, type World } from '#shared';
import type { System } from './types';
import { logger, perfLogger } from '../../logger';
import { getConfig } from '../../config';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all simulation systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Registration order breaks ties.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority (Array.prototype.sort is stable)
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order, then clear transient tags.
   * Tracks per-system timing and logs when the turn is slow.
   */
  update(world: World, turn: number): void {
    const turnStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, turn);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          turn,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Continue with next system - one bad system must not stop the turn
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    for (const tag of TRANSIENT_TAGS) {
      world.clearTagFromAll(tag);
    }

    const totalMs = performance.now() - turnStart;
    if (totalMs > getConfig('SLOW_TURN_THRESHOLD_MS')) {
      // Slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5)
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_turn_breakdown',
        turn,
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow turn ${turn} ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
