// ============================================
// Anatomy Builder
// Turns a template + total HP into independent BodyPart instances
// ============================================

import type { AnatomyVariant, BodyPartKind } from '../types';
import { BodyPart } from './BodyPart';
import { getAnatomyTemplate, type PartSpec } from './templates';

/**
 * Validate the entity-wide HP budget parts are sized against.
 */
export function assertTotalHp(totalHp: number): void {
  if (!Number.isInteger(totalHp) || totalHp <= 0) {
    throw new Error(`InvalidAnatomy: totalHp must be a positive integer, got ${totalHp}`);
  }
}

// Epsilon keeps products like 0.29 * 100 (28.999...) from flooring a whole point low
export function partMaxHp(ratio: number, totalHp: number): number {
  return Math.floor(ratio * totalHp + 1e-9);
}

/**
 * Build one part from its spec.
 * Each call allocates its own tag and status containers.
 */
export function buildPart(spec: PartSpec, totalHp: number): BodyPart {
  return new BodyPart({
    kind: spec.kind,
    displayName: spec.displayName,
    maxHpRatio: spec.ratio,
    maxHp: partMaxHp(spec.ratio, totalHp),
    isVital: spec.isVital,
    isLimb: spec.isLimb,
    naturalProtection: spec.naturalProtection,
    capabilityTags: spec.makeTags(),
    statusEffects: new Set<string>(),
  });
}

/**
 * Build the full part mapping for a variant.
 *
 * Each part gets its own HP pool of floor(ratio * totalHp); the ratios are
 * not a partition of totalHp (a humanoid's sum to ~4.4).
 * Map iteration order follows the template.
 */
export function buildAnatomy(variant: AnatomyVariant, totalHp: number): Map<BodyPartKind, BodyPart> {
  assertTotalHp(totalHp);
  const template = getAnatomyTemplate(variant);

  const parts = new Map<BodyPartKind, BodyPart>();
  for (const spec of template.parts) {
    parts.set(spec.kind, buildPart(spec, totalHp));
  }
  return parts;
}
