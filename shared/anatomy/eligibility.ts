// ============================================
// Equipment Eligibility
// Can this creature wear/wield an item, and on which part?
// ============================================

import type { BodyPartKind, EquipmentDefinition, EquipTargetPolicy } from '../types';
import type { BodyPart } from './BodyPart';
import type { BodyPartRegistry } from './BodyPartRegistry';

export function canEquipItem(registry: BodyPartRegistry, item: EquipmentDefinition): boolean {
  return registry.canEquip(item.requiredTags);
}

/**
 * Every intact part that could host the item, in template order.
 */
export function equipCandidates(registry: BodyPartRegistry, item: EquipmentDefinition): BodyPart[] {
  return registry.partsMatching(item.requiredTags);
}

/**
 * Pick the hosting part deterministically.
 *
 * - first: earliest candidate in template order
 * - least-damaged: highest health ratio, template order on ties
 *
 * Parts listed in `occupied` are skipped. Returns undefined when no free
 * candidate remains.
 */
export function selectEquipTarget(
  candidates: readonly BodyPart[],
  policy: EquipTargetPolicy,
  occupied: ReadonlySet<BodyPartKind> = new Set()
): BodyPart | undefined {
  const free = candidates.filter((part) => !occupied.has(part.kind));
  if (free.length === 0) return undefined;

  if (policy === 'least-damaged') {
    let best = free[0];
    for (const part of free) {
      if (part.healthRatio > best.healthRatio) best = part;
    }
    return best;
  }
  return free[0];
}

/**
 * Eligibility plus target choice in one call, for equip actions.
 */
export function resolveEquipTarget(
  registry: BodyPartRegistry,
  item: EquipmentDefinition,
  policy: EquipTargetPolicy,
  occupied?: ReadonlySet<BodyPartKind>
): BodyPart | undefined {
  if (!canEquipItem(registry, item)) return undefined;
  return selectEquipTarget(equipCandidates(registry, item), policy, occupied);
}
