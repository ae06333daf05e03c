// ============================================
// Damage System
// Resolves queued hits against body parts
// ============================================

import { Components, Tags, type World, type BodyPart, type BodyPartRegistry, type HitRecord } from '#shared';
import type { System } from './types';
import {
  getCreatureIdByEntity,
  getHitWeights,
  getWorldRng,
  requireAnatomy,
  requireDamageTracking,
} from '../factories';
import { logPartDestroyed, logPartHit } from '../../logger';

const UNKNOWN_SOURCE = 'unknown';

function totalCurrentHp(registry: BodyPartRegistry): number {
  let total = 0;
  for (const part of registry.all().values()) {
    total += part.currentHp;
  }
  return total;
}

/**
 * DamageSystem - Applies DamageIntent hits to creature anatomy
 *
 * Handles:
 * - Targeted hits on a named part
 * - Untargeted hits (and targets that are missing or already destroyed)
 *   go to a weighted random intact part using the world's random source
 *   and the hit weights as currently tuned
 * - Damage tracking (per-turn hit records, running totals, last source)
 * - DamagedThisTurn tag for later systems in the same turn
 *
 * Intents on dead creatures are discarded.
 */
export class DamageSystem implements System {
  readonly name = 'DamageSystem';

  update(world: World, turn: number): void {
    const rng = getWorldRng(world);
    const weights = getHitWeights();

    for (const entity of world.query(Components.DamageIntent)) {
      const intent = world.requireComponent(entity, Components.DamageIntent);
      world.removeComponent(entity, Components.DamageIntent);
      if (world.hasTag(entity, Tags.Dead)) continue;

      const registry = requireAnatomy(world, entity);
      const tracking = requireDamageTracking(world, entity);
      const creatureId = getCreatureIdByEntity(entity) ?? String(entity);
      const records: HitRecord[] = [];

      for (const hit of intent.hits) {
        if (hit.amount === 0) continue;
        const source = hit.source ?? UNKNOWN_SOURCE;

        let struck: BodyPart | undefined;
        let removed = 0;
        const target = hit.target !== undefined ? registry.get(hit.target) : undefined;
        if (target && !target.isDestroyed) {
          removed = registry.applyDamage(target.kind, hit.amount);
          struck = target;
        } else {
          const before = totalCurrentHp(registry);
          struck = registry.applyDamageRandom(hit.amount, rng, weights);
          removed = before - totalCurrentHp(registry);
        }
        if (!struck || removed === 0) continue;

        records.push({ turn, part: struck.kind, amount: removed, source, destroyedPart: struck.isDestroyed });
        tracking.totalDamageTaken += removed;
        tracking.lastDamageSource = source;

        logPartHit(creatureId, struck.kind, removed, struck.damageTier);
        if (struck.isDestroyed) {
          logPartDestroyed(creatureId, struck.kind, source);
        }
      }

      if (records.length > 0) {
        tracking.recentHits = records;
        world.addTag(entity, Tags.DamagedThisTurn);
      }
    }
  }
}
