// ============================================
// Death System
// Marks creatures whose vital parts are gone
// ============================================

import { Components, Tags, type World } from '#shared';
import type { System } from './types';
import { forEachLivingCreature, getDamageTracking, requireAnatomy } from '../factories';
import { logCreatureDeath } from '../../logger';

/**
 * DeathSystem - Checks for and processes creature deaths
 *
 * Handles:
 * - Death detection (registry reports a destroyed vital part)
 * - Death record (turn, destroyed vitals, last damage source)
 * - Dead tag, added once; dead creatures are skipped afterwards
 */
export class DeathSystem implements System {
  readonly name = 'DeathSystem';

  update(world: World, turn: number): void {
    forEachLivingCreature(world, (entity, creatureId) => {
      const registry = requireAnatomy(world, entity);
      if (registry.isAlive()) return;

      const destroyedVitals = registry
        .vitalParts()
        .filter((part) => part.isDestroyed)
        .map((part) => part.kind);
      const cause = getDamageTracking(world, entity)?.lastDamageSource;

      world.addComponent(entity, Components.Death, { turn, destroyedVitals, cause });
      world.addTag(entity, Tags.Dead);
      logCreatureDeath(creatureId, destroyedVitals, cause);
    });
  }
}
