// ============================================
// BodyPartRegistry Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { BodyPartRegistry } from '../anatomy/BodyPartRegistry';
import { createRng } from '../rng';
import { FULL_HEALTH_REPORT } from '../constants';
import { AnatomyVariant, BodyPartKind } from '../types';

const LOCOMOTION = [
  BodyPartKind.LEFT_LEG,
  BodyPartKind.RIGHT_LEG,
  BodyPartKind.LEFT_FOOT,
  BodyPartKind.RIGHT_FOOT,
];

const LIMBS = [
  BodyPartKind.LEFT_ARM,
  BodyPartKind.RIGHT_ARM,
  BodyPartKind.LEFT_HAND,
  BodyPartKind.RIGHT_HAND,
  ...LOCOMOTION,
];

function humanoid(totalHp = 100, seed: string | number = 1): BodyPartRegistry {
  return new BodyPartRegistry(AnatomyVariant.HUMANOID, totalHp, { rng: createRng(seed) });
}

function destroy(registry: BodyPartRegistry, kind: BodyPartKind): void {
  registry.applyDamage(kind, registry.get(kind)?.maxHp ?? 0);
}

describe('BodyPartRegistry', () => {
  describe('construction', () => {
    it('builds the variant layout', () => {
      const registry = humanoid();
      expect(registry.variant).toBe(AnatomyVariant.HUMANOID);
      expect(registry.totalHp).toBe(100);
      expect(registry.size).toBe(11);
    });

    it('rejects an invalid total', () => {
      expect(() => new BodyPartRegistry(AnatomyVariant.HUMANOID, 0)).toThrow(/InvalidAnatomy/);
    });
  });

  describe('queries', () => {
    it('returns undefined for kinds the layout lacks', () => {
      expect(humanoid().get(BodyPartKind.THORAX)).toBeUndefined();
    });

    it('returns a copy from all()', () => {
      const registry = humanoid();
      const copy = registry.all();
      copy.delete(BodyPartKind.HEAD);
      expect(registry.get(BodyPartKind.HEAD)).toBeDefined();
      expect(registry.size).toBe(11);
    });

    it('lists vital parts and limbs', () => {
      const registry = humanoid();
      expect(registry.vitalParts().map((p) => p.kind)).toEqual([
        BodyPartKind.HEAD,
        BodyPartKind.NECK,
        BodyPartKind.TORSO,
      ]);
      expect(registry.limbs().map((p) => p.kind)).toEqual(LIMBS);
    });

    it('tracks damaged and destroyed parts', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.LEFT_ARM, 5);
      destroy(registry, BodyPartKind.RIGHT_FOOT);
      expect(registry.damagedParts().map((p) => p.kind)).toEqual([
        BodyPartKind.LEFT_ARM,
        BodyPartKind.RIGHT_FOOT,
      ]);
      expect(registry.destroyedParts().map((p) => p.kind)).toEqual([BodyPartKind.RIGHT_FOOT]);
    });

    it('lists intact grasping parts', () => {
      const registry = humanoid();
      expect(registry.graspingParts().map((p) => p.kind)).toEqual([
        BodyPartKind.LEFT_HAND,
        BodyPartKind.RIGHT_HAND,
      ]);
      destroy(registry, BodyPartKind.LEFT_HAND);
      expect(registry.graspingParts().map((p) => p.kind)).toEqual([BodyPartKind.RIGHT_HAND]);
    });
  });

  describe('canEquip', () => {
    it('matches exactly the two hands for hand + grasp', () => {
      const registry = humanoid();
      expect(registry.partsMatching(['hand', 'grasp']).map((p) => p.kind)).toEqual([
        BodyPartKind.LEFT_HAND,
        BodyPartKind.RIGHT_HAND,
      ]);
      expect(registry.canEquip(new Set(['hand', 'grasp']))).toBe(true);
    });

    it('fails once both hands are destroyed', () => {
      const registry = humanoid();
      destroy(registry, BodyPartKind.LEFT_HAND);
      expect(registry.canEquip(['hand', 'grasp'])).toBe(true);
      destroy(registry, BodyPartKind.RIGHT_HAND);
      expect(registry.canEquip(['hand', 'grasp'])).toBe(false);
    });

    it('targets one side through side tags', () => {
      const registry = humanoid();
      expect(registry.partsMatching(['hand', 'left']).map((p) => p.kind)).toEqual([BodyPartKind.LEFT_HAND]);
    });

    it('matches only the armoured parts for an armor requirement', () => {
      expect(humanoid().partsMatching(['armor']).map((p) => p.kind)).toEqual([
        BodyPartKind.HEAD,
        BodyPartKind.NECK,
        BodyPartKind.TORSO,
        BodyPartKind.LEFT_ARM,
        BodyPartKind.RIGHT_ARM,
        BodyPartKind.LEFT_FOOT,
        BodyPartKind.RIGHT_FOOT,
      ]);
      expect(humanoid().canEquip(['leg', 'armor'])).toBe(false);
      expect(humanoid().canEquip(['hand', 'armor'])).toBe(false);
    });

    it('matches any intact part for an empty requirement', () => {
      expect(humanoid().partsMatching([]).length).toBe(11);
    });
  });

  describe('life status', () => {
    it('survives the loss of every limb', () => {
      const registry = humanoid();
      for (const kind of LIMBS) destroy(registry, kind);
      expect(registry.isAlive()).toBe(true);
      expect(registry.canMove()).toBe(false);
      expect(registry.canManipulate()).toBe(false);
    });

    it('dies when any vital part is destroyed', () => {
      for (const kind of [BodyPartKind.HEAD, BodyPartKind.NECK, BodyPartKind.TORSO]) {
        const registry = humanoid();
        destroy(registry, kind);
        expect(registry.isAlive()).toBe(false);
      }
    });
  });

  describe('movementPenalty', () => {
    it('is 0, 0.25 and 1 as locomotion parts are lost', () => {
      const registry = humanoid();
      expect(registry.movementPenalty()).toBe(0);

      destroy(registry, BodyPartKind.LEFT_LEG);
      expect(registry.movementPenalty()).toBe(0.25);
      expect(registry.canMove()).toBe(true);

      for (const kind of LOCOMOTION) destroy(registry, kind);
      expect(registry.movementPenalty()).toBe(1);
      expect(registry.canMove()).toBe(false);
    });

    it('ignores damage short of destruction', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.LEFT_LEG, 49);
      expect(registry.movementPenalty()).toBe(0);
    });

    it('scales with body damage for the simple layout', () => {
      const registry = new BodyPartRegistry(AnatomyVariant.SIMPLE, 50);
      expect(registry.get(BodyPartKind.TORSO)?.maxHp).toBe(50);

      registry.applyDamage(BodyPartKind.TORSO, 25);
      expect(registry.movementPenalty()).toBe(0.5);
      expect(registry.canMove()).toBe(true);

      registry.applyDamage(BodyPartKind.TORSO, 24);
      expect(registry.canMove()).toBe(true);

      registry.applyDamage(BodyPartKind.TORSO, 1);
      expect(registry.canMove()).toBe(false);
      expect(registry.movementPenalty()).toBe(1);
    });

    it('counts all eight legs for arachnids', () => {
      const registry = new BodyPartRegistry(AnatomyVariant.ARACHNID, 100);
      destroy(registry, BodyPartKind.FRONT_LEFT_LEG);
      destroy(registry, BodyPartKind.BACK_RIGHT_LEG);
      expect(registry.movementPenalty()).toBe(0.25);
    });
  });

  describe('manipulationPenalty', () => {
    it('counts hands and arms for humanoids', () => {
      const registry = humanoid();
      destroy(registry, BodyPartKind.LEFT_HAND);
      expect(registry.manipulationPenalty()).toBe(0.25);
    });

    it('is 0 for layouts without manipulators', () => {
      const registry = new BodyPartRegistry(AnatomyVariant.QUADRUPED, 100);
      destroy(registry, BodyPartKind.FRONT_LEFT_LEG);
      expect(registry.manipulationPenalty()).toBe(0);
      expect(registry.canManipulate()).toBe(false);
    });
  });

  describe('applyDamage', () => {
    it('returns HP removed and clamps at zero', () => {
      const registry = humanoid();
      expect(registry.applyDamage(BodyPartKind.LEFT_HAND, 10)).toBe(10);
      expect(registry.applyDamage(BodyPartKind.LEFT_HAND, 10)).toBe(6);
      expect(registry.get(BodyPartKind.LEFT_HAND)?.currentHp).toBe(0);
      expect(registry.applyDamage(BodyPartKind.LEFT_HAND, 10)).toBe(0);
    });

    it('returns 0 for a missing kind', () => {
      expect(humanoid().applyDamage(BodyPartKind.TAIL, 10)).toBe(0);
    });

    it('rejects invalid amounts', () => {
      const registry = humanoid();
      expect(() => registry.applyDamage(BodyPartKind.HEAD, -1)).toThrow(/InvalidAmount/);
      expect(() => registry.applyDamage(BodyPartKind.HEAD, 0.5)).toThrow(/InvalidAmount/);
      expect(registry.get(BodyPartKind.HEAD)?.currentHp).toBe(50);
    });

    it('keeps HP within bounds under any sequence', () => {
      const registry = humanoid(100, 'bounds');
      const rng = createRng('amounts');
      for (let i = 0; i < 200; i++) {
        const amount = Math.floor(rng() * 40);
        if (i % 3 === 0) registry.heal(BodyPartKind.TORSO, amount);
        else registry.applyDamageRandom(amount);
        for (const part of registry.all().values()) {
          expect(part.currentHp).toBeGreaterThanOrEqual(0);
          expect(part.currentHp).toBeLessThanOrEqual(part.maxHp);
        }
      }
    });
  });

  describe('applyDamageRandom', () => {
    it('hits parts in a fixed order for a fixed seed', () => {
      const registry = humanoid(100, 42);
      const struck = Array.from({ length: 5 }, () => registry.applyDamageRandom(1)?.kind);
      expect(struck).toEqual([
        BodyPartKind.RIGHT_HAND,
        BodyPartKind.RIGHT_ARM,
        BodyPartKind.LEFT_FOOT,
        BodyPartKind.LEFT_LEG,
        BodyPartKind.TORSO,
      ]);
    });

    it('hashes string seeds to the same fixed order', () => {
      const registry = humanoid(100, 'test-seed');
      const struck = Array.from({ length: 5 }, () => registry.applyDamageRandom(1)?.kind);
      expect(struck).toEqual([
        BodyPartKind.LEFT_ARM,
        BodyPartKind.LEFT_HAND,
        BodyPartKind.NECK,
        BodyPartKind.RIGHT_ARM,
        BodyPartKind.HEAD,
      ]);
    });

    it('strikes the torso most often over many draws', () => {
      // Large pools so no part is destroyed and every weight stays in play
      const registry = humanoid(1_000_000, 7);
      const counts = new Map<BodyPartKind, number>();
      for (let i = 0; i < 5000; i++) {
        const kind = registry.applyDamageRandom(1)?.kind;
        if (kind !== undefined) counts.set(kind, (counts.get(kind) ?? 0) + 1);
      }

      const torso = counts.get(BodyPartKind.TORSO) ?? 0;
      expect(torso).toBe(794);
      for (const [kind, count] of counts) {
        if (kind !== BodyPartKind.TORSO) expect(count).toBeLessThan(torso);
      }
    });

    it('uses a per-call random source when given', () => {
      const registry = humanoid();
      // Roll 0 always lands on the first intact part
      expect(registry.applyDamageRandom(1, () => 0)?.kind).toBe(BodyPartKind.HEAD);
    });

    it('skips destroyed parts', () => {
      const registry = humanoid();
      destroy(registry, BodyPartKind.HEAD);
      expect(registry.applyDamageRandom(1, () => 0)?.kind).toBe(BodyPartKind.NECK);
    });

    it('returns undefined when nothing loses HP', () => {
      const registry = humanoid();
      expect(registry.applyDamageRandom(0, () => 0)).toBeUndefined();

      const simple = new BodyPartRegistry(AnatomyVariant.SIMPLE, 10);
      destroy(simple, BodyPartKind.TORSO);
      expect(simple.applyDamageRandom(5, () => 0)).toBeUndefined();
    });

    it('honours custom hit weights', () => {
      const registry = new BodyPartRegistry(AnatomyVariant.HUMANOID, 100, {
        hitWeights: { torso: 1, head: 0, limb: 0, other: 0 },
      });
      for (let i = 0; i < 5; i++) {
        expect(registry.applyDamageRandom(1)?.kind).toBe(BodyPartKind.TORSO);
      }
    });
  });

  describe('healing', () => {
    it('heals one part up to max', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.HEAD, 20);
      expect(registry.heal(BodyPartKind.HEAD, 5)).toBe(5);
      expect(registry.heal(BodyPartKind.HEAD, 50)).toBe(15);
      expect(registry.heal(BodyPartKind.TAIL, 5)).toBe(0);
    });

    it('heals every part including destroyed ones', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.HEAD, 3);
      destroy(registry, BodyPartKind.LEFT_FOOT);
      expect(registry.healAll(2)).toBe(4);
      expect(registry.get(BodyPartKind.HEAD)?.currentHp).toBe(49);
      expect(registry.get(BodyPartKind.LEFT_FOOT)?.currentHp).toBe(2);
    });
  });

  describe('status effects', () => {
    it('adds and removes effects on existing parts', () => {
      const registry = humanoid();
      expect(registry.addStatusEffect(BodyPartKind.LEFT_LEG, 'bleeding')).toBe(true);
      expect(registry.addStatusEffect(BodyPartKind.TAIL, 'bleeding')).toBe(false);
      expect(registry.partsWithStatus('bleeding').map((p) => p.kind)).toEqual([BodyPartKind.LEFT_LEG]);
      expect(registry.removeStatusEffect(BodyPartKind.LEFT_LEG, 'bleeding')).toBe(true);
      expect(registry.removeStatusEffect(BodyPartKind.LEFT_LEG, 'bleeding')).toBe(false);
      expect(registry.partsWithStatus('bleeding')).toEqual([]);
    });
  });

  describe('statusReport', () => {
    it('reports full health with a single line', () => {
      expect(humanoid().statusReport()).toEqual([FULL_HEALTH_REPORT]);
    });

    it('lists damaged and destroyed parts in template order', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.LEFT_HAND, 5);
      registry.applyDamage(BodyPartKind.TORSO, 10);
      destroy(registry, BodyPartKind.RIGHT_FOOT);

      expect(registry.statusReport()).toEqual([
        'torso: damaged',
        'left hand: wounded',
        'right foot: destroyed',
      ]);
    });

    it('leaves status effects out of the report', () => {
      const registry = humanoid();
      registry.addStatusEffect(BodyPartKind.HEAD, 'dazed');
      expect(registry.statusReport()).toEqual([FULL_HEALTH_REPORT]);

      registry.addStatusEffect(BodyPartKind.TORSO, 'bleeding');
      registry.applyDamage(BodyPartKind.TORSO, 10);
      expect(registry.statusReport()).toEqual(['torso: damaged']);
    });
  });

  describe('setMaxHp', () => {
    it('resizes parts and keeps health ratios', () => {
      const registry = humanoid();
      registry.applyDamage(BodyPartKind.HEAD, 10);
      registry.setMaxHp(200);

      expect(registry.totalHp).toBe(200);
      expect(registry.get(BodyPartKind.HEAD)?.maxHp).toBe(100);
      expect(registry.get(BodyPartKind.HEAD)?.currentHp).toBe(80);
      expect(registry.get(BodyPartKind.NECK)?.maxHp).toBe(53);
      expect(registry.get(BodyPartKind.NECK)?.currentHp).toBe(53);
    });

    it('rejects invalid totals without changing anything', () => {
      const registry = humanoid();
      expect(() => registry.setMaxHp(0)).toThrow(/InvalidAnatomy/);
      expect(registry.totalHp).toBe(100);
      expect(registry.get(BodyPartKind.HEAD)?.maxHp).toBe(50);
    });
  });
});
