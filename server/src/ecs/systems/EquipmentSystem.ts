// ============================================
// Equipment System
// Drops items from destroyed parts, resolves equip requests
// ============================================

import { Components, Tags, resolveEquipTarget, canEquipItem, type World } from '#shared';
import type { System } from './types';
import {
  forEachCreature,
  getCreatureIdByEntity,
  requireAnatomy,
  requireEquipment,
} from '../factories';
import { getConfig } from '../../config';
import { logEquipRejected, logItemDropped, logItemEquipped } from '../../logger';

/**
 * EquipmentSystem - Keeps equipment consistent with anatomy
 *
 * Handles:
 * - Dropping items whose host part was destroyed
 * - EquipIntent requests: one item per part, target part chosen by the
 *   configured policy among intact parts carrying the item's required tags
 *
 * Rejections (dead creature, no eligible part, every candidate occupied)
 * are logged and the item is discarded.
 */
export class EquipmentSystem implements System {
  readonly name = 'EquipmentSystem';

  update(world: World, _turn: number): void {
    forEachCreature(world, (entity, creatureId) => {
      const registry = requireAnatomy(world, entity);
      const equipment = requireEquipment(world, entity);

      const kept = equipment.equipped.filter((entry) => {
        if (!registry.get(entry.part)?.isDestroyed) return true;
        logItemDropped(creatureId, entry.item.id, entry.part);
        return false;
      });
      if (kept.length !== equipment.equipped.length) {
        equipment.equipped = kept;
      }
    });

    const policy = getConfig('EQUIP_TARGET_POLICY');

    for (const entity of world.query(Components.EquipIntent)) {
      const intent = world.requireComponent(entity, Components.EquipIntent);
      world.removeComponent(entity, Components.EquipIntent);

      const creatureId = getCreatureIdByEntity(entity) ?? String(entity);
      const registry = requireAnatomy(world, entity);
      const equipment = requireEquipment(world, entity);
      const dead = world.hasTag(entity, Tags.Dead) || !registry.isAlive();

      for (const item of intent.items) {
        if (dead) {
          logEquipRejected(creatureId, item.id, 'dead');
          continue;
        }
        if (!canEquipItem(registry, item)) {
          logEquipRejected(creatureId, item.id, 'no_eligible_part');
          continue;
        }

        const occupied = new Set(equipment.equipped.map((entry) => entry.part));
        const target = resolveEquipTarget(registry, item, policy, occupied);
        if (!target) {
          logEquipRejected(creatureId, item.id, 'all_candidates_occupied');
          continue;
        }

        equipment.equipped.push({ item, part: target.kind });
        logItemEquipped(creatureId, item.id, target.kind);
      }
    }
  }
}
