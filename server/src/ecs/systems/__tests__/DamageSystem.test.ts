// ============================================
// DamageSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BodyPartKind, Components, Resources, Tags } from '#shared';
import { DamageSystem } from '../DamageSystem';
import { createTestWorld, createTestCreature, clearLookups } from './testUtils';
import { queueDamage, requireAnatomy, requireDamageTracking } from '../../factories';
import { logPartDestroyed } from '../../../logger';
import { clearConfigOverrides, setConfigOverride } from '../../../config';

describe('DamageSystem', () => {
  let world: ReturnType<typeof createTestWorld>;
  let system: DamageSystem;

  beforeEach(() => {
    vi.clearAllMocks();
    world = createTestWorld();
    system = new DamageSystem();
  });

  afterEach(() => {
    clearLookups();
    clearConfigOverrides();
  });

  describe('targeted hits', () => {
    it('damages the named part and records the hit', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 10, target: BodyPartKind.LEFT_ARM, source: 'sword' });

      system.update(world, 1);

      expect(requireAnatomy(world, entity).get(BodyPartKind.LEFT_ARM)?.currentHp).toBe(30);
      const tracking = requireDamageTracking(world, entity);
      expect(tracking.recentHits).toEqual([
        { turn: 1, part: BodyPartKind.LEFT_ARM, amount: 10, source: 'sword', destroyedPart: false },
      ]);
      expect(tracking.totalDamageTaken).toBe(10);
      expect(tracking.lastDamageSource).toBe('sword');
      expect(world.hasTag(entity, Tags.DamagedThisTurn)).toBe(true);
    });

    it('consumes the intent', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 1, target: BodyPartKind.HEAD });

      system.update(world, 1);
      system.update(world, 2);

      expect(world.hasComponent(entity, Components.DamageIntent)).toBe(false);
      expect(requireAnatomy(world, entity).get(BodyPartKind.HEAD)?.currentHp).toBe(49);
    });

    it('records only the HP actually removed and logs destroyed parts', () => {
      const entity = createTestCreature(world, { id: 'victim' });
      queueDamage(world, entity, { amount: 100, target: BodyPartKind.LEFT_HAND });

      system.update(world, 4);

      const tracking = requireDamageTracking(world, entity);
      expect(tracking.recentHits).toEqual([
        { turn: 4, part: BodyPartKind.LEFT_HAND, amount: 16, source: 'unknown', destroyedPart: true },
      ]);
      expect(logPartDestroyed).toHaveBeenCalledWith('victim', BodyPartKind.LEFT_HAND, 'unknown');
    });

    it('accumulates several hits in one turn', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 5, target: BodyPartKind.TORSO, source: 'a' });
      queueDamage(world, entity, { amount: 7, target: BodyPartKind.TORSO, source: 'b' });

      system.update(world, 1);

      const tracking = requireDamageTracking(world, entity);
      expect(tracking.recentHits.map((h) => h.amount)).toEqual([5, 7]);
      expect(tracking.totalDamageTaken).toBe(12);
      expect(tracking.lastDamageSource).toBe('b');
      expect(requireAnatomy(world, entity).get(BodyPartKind.TORSO)?.currentHp).toBe(88);
    });
  });

  describe('untargeted and fallback hits', () => {
    beforeEach(() => {
      // Roll 0 always picks the first intact part in template order
      world.setResource(Resources.Rng, () => 0);
    });

    it('picks a part with the world random source', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 5 });

      system.update(world, 1);

      expect(requireAnatomy(world, entity).get(BodyPartKind.HEAD)?.currentHp).toBe(45);
      expect(requireDamageTracking(world, entity).recentHits[0].part).toBe(BodyPartKind.HEAD);
    });

    it('uses hit weights tuned after the creature spawned', () => {
      const entity = createTestCreature(world);
      setConfigOverride('HIT_WEIGHT_HEAD', 0);
      setConfigOverride('HIT_WEIGHT_OTHER', 0);
      queueDamage(world, entity, { amount: 5 });

      system.update(world, 1);

      expect(requireDamageTracking(world, entity).recentHits[0].part).toBe(BodyPartKind.TORSO);
      expect(requireAnatomy(world, entity).get(BodyPartKind.HEAD)?.currentHp).toBe(50);
    });

    it('falls back to a random part when the target is destroyed', () => {
      const entity = createTestCreature(world);
      const registry = requireAnatomy(world, entity);
      registry.applyDamage(BodyPartKind.LEFT_ARM, 40);
      queueDamage(world, entity, { amount: 5, target: BodyPartKind.LEFT_ARM });

      system.update(world, 1);

      expect(registry.get(BodyPartKind.HEAD)?.currentHp).toBe(45);
      expect(registry.get(BodyPartKind.LEFT_ARM)?.currentHp).toBe(0);
    });

    it('falls back to a random part when the layout lacks the target', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 3, target: BodyPartKind.TAIL });

      system.update(world, 1);

      expect(requireDamageTracking(world, entity).recentHits).toEqual([
        { turn: 1, part: BodyPartKind.HEAD, amount: 3, source: 'unknown', destroyedPart: false },
      ]);
    });

    it('records the clamped amount for a random overkill', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 80 });

      system.update(world, 1);

      expect(requireDamageTracking(world, entity).recentHits[0]).toEqual(
        { turn: 1, part: BodyPartKind.HEAD, amount: 50, source: 'unknown', destroyedPart: true }
      );
    });
  });

  describe('ignored hits', () => {
    it('discards intents on dead creatures', () => {
      const entity = createTestCreature(world);
      world.addTag(entity, Tags.Dead);
      queueDamage(world, entity, { amount: 10, target: BodyPartKind.TORSO });

      system.update(world, 1);

      expect(requireAnatomy(world, entity).get(BodyPartKind.TORSO)?.currentHp).toBe(100);
      expect(world.hasComponent(entity, Components.DamageIntent)).toBe(false);
    });

    it('does not tag creatures that took no damage', () => {
      const entity = createTestCreature(world);
      queueDamage(world, entity, { amount: 0, target: BodyPartKind.TORSO });

      system.update(world, 1);

      expect(world.hasTag(entity, Tags.DamagedThisTurn)).toBe(false);
      expect(requireDamageTracking(world, entity).recentHits).toEqual([]);
    });

    it('rejects invalid amounts when queued', () => {
      const entity = createTestCreature(world);
      expect(() => queueDamage(world, entity, { amount: -3 })).toThrow(/InvalidAmount/);
      expect(world.hasComponent(entity, Components.DamageIntent)).toBe(false);
    });
  });
});
