// ============================================
// Anatomy Module Exports
// ============================================

export { BodyPart, assertAmount } from './BodyPart';
export type { BodyPartInit } from './BodyPart';
export { buildAnatomy, buildPart, assertTotalHp, partMaxHp } from './builder';
export {
  ANATOMY_TEMPLATES,
  LOCOMOTION_KINDS,
  MANIPULATION_KINDS,
  getAnatomyTemplate,
} from './templates';
export type { AnatomyTemplate, PartSpec } from './templates';
export { BodyPartRegistry, DEFAULT_HIT_WEIGHTS, hitWeightFor } from './BodyPartRegistry';
export type { BodyPartRegistryOptions, HitWeights } from './BodyPartRegistry';
export {
  canEquipItem,
  equipCandidates,
  selectEquipTarget,
  resolveEquipTarget,
} from './eligibility';
