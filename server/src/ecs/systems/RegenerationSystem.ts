// ============================================
// Regeneration System
// Slow natural healing of injured parts
// ============================================

import { Tags, type World } from '#shared';
import type { System } from './types';
import { forEachLivingCreature, requireAnatomy } from '../factories';
import { getConfig } from '../../config';

/**
 * RegenerationSystem - Heals living creatures a little every turn
 *
 * Every damaged but intact part heals REGEN_PER_TURN (capped at max).
 * Destroyed parts stay destroyed and creatures hit this turn do not heal.
 */
export class RegenerationSystem implements System {
  readonly name = 'RegenerationSystem';

  update(world: World, _turn: number): void {
    // Overrides may be fractional; healing is whole HP
    const amount = Math.floor(getConfig('REGEN_PER_TURN'));
    if (amount <= 0) return;

    forEachLivingCreature(world, (entity) => {
      if (world.hasTag(entity, Tags.DamagedThisTurn)) return;

      const registry = requireAnatomy(world, entity);
      if (!registry.isAlive()) return;

      for (const part of registry.damagedParts()) {
        if (part.isDestroyed) continue;
        registry.heal(part.kind, amount);
      }
    });
  }
}
