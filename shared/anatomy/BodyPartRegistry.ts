// ============================================
// Body Part Registry
// Owns one entity's parts: queries, damage/heal, derived status
// ============================================

import { ANATOMY_CONFIG, FULL_HEALTH_REPORT, GRASP_TAG } from '../constants';
import { pickWeighted, type Rng } from '../rng';
import { BodyPartKind, type AnatomyVariant } from '../types';
import { assertAmount, type BodyPart } from './BodyPart';
import { assertTotalHp, buildAnatomy, partMaxHp } from './builder';
import {
  getAnatomyTemplate,
  LOCOMOTION_KINDS,
  MANIPULATION_KINDS,
  type AnatomyTemplate,
} from './templates';

/**
 * Relative odds of each part being struck by an untargeted hit.
 */
export interface HitWeights {
  torso: number;
  head: number;
  limb: number;
  other: number;
}

export const DEFAULT_HIT_WEIGHTS: Readonly<HitWeights> = {
  torso: ANATOMY_CONFIG.HIT_WEIGHT_TORSO,
  head: ANATOMY_CONFIG.HIT_WEIGHT_HEAD,
  limb: ANATOMY_CONFIG.HIT_WEIGHT_LIMB,
  other: ANATOMY_CONFIG.HIT_WEIGHT_OTHER,
};

export interface BodyPartRegistryOptions {
  /** Random source for untargeted hits (defaults to Math.random) */
  rng?: Rng;
  hitWeights?: Partial<HitWeights>;
}

/**
 * Weight for a single part under the given table.
 */
export function hitWeightFor(part: BodyPart, weights: HitWeights): number {
  if (part.kind === BodyPartKind.TORSO) return weights.torso;
  if (part.kind === BodyPartKind.HEAD) return weights.head;
  if (part.isLimb) return weights.limb;
  return weights.other;
}

// 1 - functional/total over the slots present; 0 when none are present
function lossRatio(parts: BodyPart[]): number {
  if (parts.length === 0) return 0;
  const functional = parts.filter((p) => !p.isDestroyed).length;
  return 1 - functional / parts.length;
}

/**
 * BodyPartRegistry - the anatomy of one creature.
 *
 * The part set is fixed at construction; a severed limb is a destroyed
 * part, never a removed one. Life status is always derived from part state.
 */
export class BodyPartRegistry {
  readonly variant: AnatomyVariant;
  private readonly template: AnatomyTemplate;
  private readonly parts: Map<BodyPartKind, BodyPart>;
  private readonly rng: Rng;
  private readonly hitWeights: HitWeights;
  private _totalHp: number;

  constructor(variant: AnatomyVariant, totalHp: number, options: BodyPartRegistryOptions = {}) {
    this.template = getAnatomyTemplate(variant);
    this.parts = buildAnatomy(variant, totalHp);
    this.variant = variant;
    this._totalHp = totalHp;
    this.rng = options.rng ?? Math.random;
    this.hitWeights = { ...DEFAULT_HIT_WEIGHTS, ...options.hitWeights };
  }

  get totalHp(): number {
    return this._totalHp;
  }

  get size(): number {
    return this.parts.size;
  }

  // ============================================
  // Queries
  // ============================================

  get(kind: BodyPartKind): BodyPart | undefined {
    return this.parts.get(kind);
  }

  /**
   * Copy of the part mapping. Adding or removing entries on the copy
   * does not touch the registry.
   */
  all(): Map<BodyPartKind, BodyPart> {
    return new Map(this.parts);
  }

  kinds(): BodyPartKind[] {
    return Array.from(this.parts.keys());
  }

  private filter(predicate: (part: BodyPart) => boolean): BodyPart[] {
    const result: BodyPart[] = [];
    for (const part of this.parts.values()) {
      if (predicate(part)) result.push(part);
    }
    return result;
  }

  vitalParts(): BodyPart[] {
    return this.filter((p) => p.isVital);
  }

  limbs(): BodyPart[] {
    return this.filter((p) => p.isLimb);
  }

  damagedParts(): BodyPart[] {
    return this.filter((p) => p.isDamaged);
  }

  destroyedParts(): BodyPart[] {
    return this.filter((p) => p.isDestroyed);
  }

  /** Working parts that can hold a weapon or tool. */
  graspingParts(): BodyPart[] {
    return this.filter((p) => !p.isDestroyed && p.capabilityTags.has(GRASP_TAG));
  }

  partsWithStatus(effect: string): BodyPart[] {
    return this.filter((p) => p.statusEffects.has(effect));
  }

  /**
   * Intact parts whose tags are a superset of requiredTags, in template order.
   */
  partsMatching(requiredTags: Iterable<string>): BodyPart[] {
    const required = Array.from(requiredTags);
    return this.filter((p) => !p.isDestroyed && p.hasTags(required));
  }

  canEquip(requiredTags: Iterable<string>): boolean {
    return this.partsMatching(requiredTags).length > 0;
  }

  // ============================================
  // Derived Status
  // ============================================

  isAlive(): boolean {
    for (const part of this.parts.values()) {
      if (part.isVital && part.isDestroyed) return false;
    }
    return true;
  }

  private locomotionParts(): BodyPart[] {
    return this.filter((p) => LOCOMOTION_KINDS.has(p.kind));
  }

  canMove(): boolean {
    if (this.template.mobility === 'body') {
      const torso = this.parts.get(BodyPartKind.TORSO);
      return torso !== undefined && !torso.isDestroyed;
    }
    return this.locomotionParts().some((p) => !p.isDestroyed);
  }

  canManipulate(): boolean {
    return this.graspingParts().length > 0;
  }

  /** 0.0 = no penalty, 1.0 = cannot move */
  movementPenalty(): number {
    if (this.template.mobility === 'body') {
      const torso = this.parts.get(BodyPartKind.TORSO);
      return torso ? torso.damageFraction : 0;
    }
    return lossRatio(this.locomotionParts());
  }

  /** 0.0 = no penalty, 1.0 = cannot manipulate */
  manipulationPenalty(): number {
    if (!this.template.hasManipulators) return 0;
    return lossRatio(this.filter((p) => MANIPULATION_KINDS.has(p.kind)));
  }

  /**
   * One line per damaged or destroyed part, e.g. "left hand: wounded".
   */
  statusReport(): string[] {
    const lines = this.filter((p) => p.isDamaged || p.isDestroyed).map((p) => `${p.displayName}: ${p.damageTier}`);
    return lines.length > 0 ? lines : [FULL_HEALTH_REPORT];
  }

  // ============================================
  // Mutators
  // ============================================

  /**
   * Damage a specific part. Returns the HP actually removed;
   * 0 for a missing or already destroyed part.
   */
  applyDamage(kind: BodyPartKind, amount: number): number {
    assertAmount(amount, 'damage');
    const part = this.parts.get(kind);
    if (!part || part.isDestroyed) return 0;
    return part.takeDamage(amount);
  }

  /**
   * Damage a weighted-random intact part.
   * Returns the struck part, or undefined if nothing lost HP.
   */
  applyDamageRandom(
    amount: number,
    rng: Rng = this.rng,
    weights: HitWeights = this.hitWeights
  ): BodyPart | undefined {
    assertAmount(amount, 'damage');
    const entries = this.filter((p) => !p.isDestroyed).map((part) => ({
      item: part,
      weight: hitWeightFor(part, weights),
    }));
    const struck = pickWeighted(rng, entries);
    if (!struck) return undefined;
    return struck.takeDamage(amount) > 0 ? struck : undefined;
  }

  heal(kind: BodyPartKind, amount: number): number {
    assertAmount(amount, 'healing');
    const part = this.parts.get(kind);
    if (!part) return 0;
    return part.heal(amount);
  }

  /**
   * Heal every part by the same amount (destroyed parts included).
   * Returns total healing done.
   */
  healAll(amountPerPart: number): number {
    assertAmount(amountPerPart, 'healing');
    let total = 0;
    for (const part of this.parts.values()) {
      total += part.heal(amountPerPart);
    }
    return total;
  }

  addStatusEffect(kind: BodyPartKind, effect: string): boolean {
    const part = this.parts.get(kind);
    if (!part) return false;
    part.statusEffects.add(effect);
    return true;
  }

  removeStatusEffect(kind: BodyPartKind, effect: string): boolean {
    return this.parts.get(kind)?.statusEffects.delete(effect) ?? false;
  }

  /**
   * Resize every part for a new entity HP budget (level up, buffs),
   * keeping each part's remaining-health ratio.
   */
  setMaxHp(totalHp: number): void {
    assertTotalHp(totalHp);
    this._totalHp = totalHp;
    for (const part of this.parts.values()) {
      part.rescale(partMaxHp(part.maxHpRatio, totalHp));
    }
  }
}
