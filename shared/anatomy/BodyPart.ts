// ============================================
// Body Part
// One anatomical part with its own HP pool, tags, and status effects
// ============================================

import type { BodyPartKind, DamageTier } from '../types';

/**
 * Construction data for a single part.
 * Tag and status sets are taken over by the part, so callers must hand in
 * containers that nothing else references (the builder always does).
 */
export interface BodyPartInit {
  kind: BodyPartKind;
  displayName: string;
  maxHpRatio: number;
  maxHp: number;
  isVital: boolean;
  isLimb: boolean;
  naturalProtection: number;
  capabilityTags: Set<string>;
  statusEffects: Set<string>;
  currentHp?: number;
}

/**
 * Assert a damage/heal/HP amount is a non-negative integer.
 * Negative input is a caller bug; it is never sign-flipped.
 */
export function assertAmount(amount: number, label: string): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new Error(`InvalidAmount: ${label} must be a non-negative integer, got ${amount}`);
  }
}

export class BodyPart {
  readonly kind: BodyPartKind;
  readonly displayName: string;
  readonly maxHpRatio: number;
  readonly isVital: boolean;
  readonly isLimb: boolean;
  readonly naturalProtection: number;
  readonly capabilityTags: Set<string>;
  readonly statusEffects: Set<string>;

  private _maxHp: number;
  private _currentHp: number;

  constructor(init: BodyPartInit) {
    assertAmount(init.maxHp, 'maxHp');
    assertAmount(init.naturalProtection, 'naturalProtection');
    if (!(init.maxHpRatio > 0 && init.maxHpRatio <= 1)) {
      throw new Error(`InvalidAnatomy: ${init.displayName} maxHpRatio must be in (0, 1], got ${init.maxHpRatio}`);
    }

    this.kind = init.kind;
    this.displayName = init.displayName;
    this.maxHpRatio = init.maxHpRatio;
    this.isVital = init.isVital;
    this.isLimb = init.isLimb;
    this.naturalProtection = init.naturalProtection;
    this.capabilityTags = init.capabilityTags;
    this.statusEffects = init.statusEffects;

    this._maxHp = init.maxHp;
    this._currentHp = Math.min(init.currentHp ?? init.maxHp, init.maxHp);
    assertAmount(this._currentHp, 'currentHp');
  }

  get maxHp(): number {
    return this._maxHp;
  }

  get currentHp(): number {
    return this._currentHp;
  }

  get isDestroyed(): boolean {
    return this._currentHp === 0;
  }

  get isDamaged(): boolean {
    return this._currentHp < this._maxHp;
  }

  /** 0.0 = untouched, 1.0 = destroyed. A zero-HP part counts as destroyed. */
  get damageFraction(): number {
    if (this._maxHp <= 0) return 1;
    return 1 - this._currentHp / this._maxHp;
  }

  /** Remaining HP as a ratio (0.0 to 1.0). */
  get healthRatio(): number {
    if (this._maxHp <= 0) return 0;
    return this._currentHp / this._maxHp;
  }

  /**
   * Banding on lost HP, computed in integers so the quarter
   * boundaries are exact: lost/max <= 1/4 is 'damaged', and so on.
   */
  get damageTier(): DamageTier {
    if (this.isDestroyed) return 'destroyed';
    const lost = this._maxHp - this._currentHp;
    if (lost === 0) return 'healthy';
    if (lost * 4 <= this._maxHp) return 'damaged';
    if (lost * 2 <= this._maxHp) return 'wounded';
    if (lost * 4 <= this._maxHp * 3) return 'badly wounded';
    return 'severely wounded';
  }

  hasTags(required: Iterable<string>): boolean {
    for (const tag of required) {
      if (!this.capabilityTags.has(tag)) return false;
    }
    return true;
  }

  /**
   * Deal damage to this part. Returns the HP actually removed.
   */
  takeDamage(amount: number): number {
    assertAmount(amount, 'damage');
    const actual = Math.min(amount, this._currentHp);
    this._currentHp -= actual;
    return actual;
  }

  /**
   * Heal this part. Returns the HP actually restored.
   */
  heal(amount: number): number {
    assertAmount(amount, 'healing');
    const actual = Math.min(amount, this._maxHp - this._currentHp);
    this._currentHp += actual;
    return actual;
  }

  /**
   * Resize the HP pool, keeping the same remaining-health ratio.
   */
  rescale(newMaxHp: number): void {
    assertAmount(newMaxHp, 'maxHp');
    const ratio = this._maxHp > 0 ? this._currentHp / this._maxHp : 1;
    this._maxHp = newMaxHp;
    this._currentHp = Math.min(Math.floor(newMaxHp * ratio), newMaxHp);
  }
}
