// ============================================
// Movement System
// Derives creature speed from locomotion damage
// ============================================

import { Tags, type World } from '#shared';
import type { System } from './types';
import { forEachCreature, requireAnatomy, requireMovement } from '../factories';

/**
 * MovementSystem - Recomputes speed every turn
 *
 * speed = baseSpeed * (1 - movementPenalty) while the creature can move,
 * 0 otherwise. Creatures that cannot move (or are dead) carry the
 * Immobile tag.
 */
export class MovementSystem implements System {
  readonly name = 'MovementSystem';

  update(world: World, _turn: number): void {
    forEachCreature(world, (entity) => {
      const registry = requireAnatomy(world, entity);
      const movement = requireMovement(world, entity);

      const mobile = registry.isAlive() && registry.canMove();
      movement.speed = mobile ? movement.baseSpeed * (1 - registry.movementPenalty()) : 0;

      if (mobile) {
        world.removeTag(entity, Tags.Immobile);
      } else {
        world.addTag(entity, Tags.Immobile);
      }
    });
  }
}
