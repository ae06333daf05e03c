// ============================================
// Anatomy Templates
// Data table: AnatomyVariant -> ordered part specifications
// ============================================

import { AnatomyVariant, BodyPartKind, type Mobility } from '../types';

/**
 * Static description of one part in a layout.
 * Tags come from a factory so every built part owns a fresh Set.
 */
export interface PartSpec {
  readonly kind: BodyPartKind;
  readonly displayName: string;
  readonly ratio: number;
  readonly isVital: boolean;
  readonly isLimb: boolean;
  readonly naturalProtection: number;
  readonly makeTags: () => Set<string>;
}

export interface AnatomyTemplate {
  readonly variant: AnatomyVariant;
  readonly mobility: Mobility;
  // Whether hands/arms count toward manipulation penalties
  readonly hasManipulators: boolean;
  // Enumeration order: queries and weighted draws walk parts in this order
  readonly parts: readonly PartSpec[];
}

type Side = 'left' | 'right';

interface PartOptions {
  vital?: boolean;
  limb?: boolean;
  protection?: number;
}

function part(
  kind: BodyPartKind,
  displayName: string,
  ratio: number,
  tags: readonly string[],
  options: PartOptions = {}
): PartSpec {
  return {
    kind,
    displayName,
    ratio,
    isVital: options.vital ?? false,
    isLimb: options.limb ?? false,
    naturalProtection: options.protection ?? 0,
    makeTags: () => new Set(tags),
  };
}

/**
 * A limb on one side of the body.
 * Adds the generic side tag and the compound one (e.g. "left" + "left_hand"),
 * so the two instances of a pair never have equal tag sets.
 */
function sidedLimb(
  kind: BodyPartKind,
  side: Side,
  ratio: number,
  functionalTags: readonly string[]
): PartSpec {
  const displayName = kind.replace(/_/g, ' ');
  return part(kind, displayName, ratio, [...functionalTags, side, kind], { limb: true });
}

// ============================================
// Layouts
// ============================================

const HAND_TAGS = ['hand', 'grasp', 'manipulate', 'hold', 'use', 'upper_limbs'];

const HUMANOID: AnatomyTemplate = {
  variant: AnatomyVariant.HUMANOID,
  mobility: 'limbs',
  hasManipulators: true,
  parts: [
    part(BodyPartKind.HEAD, 'head', 0.5, ['head', 'armor', 'cranium'], { vital: true }),
    part(BodyPartKind.NECK, 'neck', 0.267, ['neck', 'armor', 'cranium'], { vital: true }),
    part(BodyPartKind.TORSO, 'torso', 1.0, ['torso', 'armor', 'core'], { vital: true }),
    sidedLimb(BodyPartKind.LEFT_ARM, 'left', 0.4, ['arm', 'armor', 'upper_limbs']),
    sidedLimb(BodyPartKind.RIGHT_ARM, 'right', 0.4, ['arm', 'armor', 'upper_limbs']),
    sidedLimb(BodyPartKind.LEFT_HAND, 'left', 0.167, HAND_TAGS),
    sidedLimb(BodyPartKind.RIGHT_HAND, 'right', 0.167, HAND_TAGS),
    sidedLimb(BodyPartKind.LEFT_LEG, 'left', 0.5, ['leg', 'locomotion', 'lower_limbs']),
    sidedLimb(BodyPartKind.RIGHT_LEG, 'right', 0.5, ['leg', 'locomotion', 'lower_limbs']),
    sidedLimb(BodyPartKind.LEFT_FOOT, 'left', 0.2, ['foot', 'locomotion', 'armor', 'lower_limbs']),
    sidedLimb(BodyPartKind.RIGHT_FOOT, 'right', 0.2, ['foot', 'locomotion', 'armor', 'lower_limbs']),
  ],
};

// Slimes, golems: one body that is both core and locomotion
const SIMPLE: AnatomyTemplate = {
  variant: AnatomyVariant.SIMPLE,
  mobility: 'body',
  hasManipulators: false,
  parts: [part(BodyPartKind.TORSO, 'body', 1.0, ['torso', 'armor'], { vital: true, protection: 1 })],
};

const SPIDER_LEG_TAGS = ['leg', 'locomotion'];

const ARACHNID: AnatomyTemplate = {
  variant: AnatomyVariant.ARACHNID,
  mobility: 'limbs',
  hasManipulators: false,
  parts: [
    part(BodyPartKind.THORAX, 'thorax', 1.0, ['thorax', 'armor'], { vital: true }),
    sidedLimb(BodyPartKind.FRONT_LEFT_LEG, 'left', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.FRONT_RIGHT_LEG, 'right', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.SECOND_LEFT_LEG, 'left', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.SECOND_RIGHT_LEG, 'right', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.THIRD_LEFT_LEG, 'left', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.THIRD_RIGHT_LEG, 'right', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_LEFT_LEG, 'left', 0.4, SPIDER_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_RIGHT_LEG, 'right', 0.4, SPIDER_LEG_TAGS),
    part(BodyPartKind.ABDOMEN, 'abdomen', 0.5, ['abdomen', 'armor'], { vital: true }),
  ],
};

const QUADRUPED_LEG_TAGS = ['leg', 'locomotion', 'armor'];

// Wolves, horses, bears
const QUADRUPED: AnatomyTemplate = {
  variant: AnatomyVariant.QUADRUPED,
  mobility: 'limbs',
  hasManipulators: false,
  parts: [
    part(BodyPartKind.HEAD, 'head', 0.5, ['head', 'armor', 'cranium', 'bite'], { vital: true }),
    part(BodyPartKind.NECK, 'neck', 0.3, ['neck', 'armor'], { vital: true }),
    part(BodyPartKind.TORSO, 'torso', 1.0, ['torso', 'armor', 'core', 'saddle'], { vital: true }),
    sidedLimb(BodyPartKind.FRONT_LEFT_LEG, 'left', 0.4, QUADRUPED_LEG_TAGS),
    sidedLimb(BodyPartKind.FRONT_RIGHT_LEG, 'right', 0.4, QUADRUPED_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_LEFT_LEG, 'left', 0.4, QUADRUPED_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_RIGHT_LEG, 'right', 0.4, QUADRUPED_LEG_TAGS),
    part(BodyPartKind.TAIL, 'tail', 0.2, ['tail']),
  ],
};

const INSECT_LEG_TAGS = ['leg', 'locomotion'];

// Beetles, ants: six legs on the thorax
const INSECT: AnatomyTemplate = {
  variant: AnatomyVariant.INSECT,
  mobility: 'limbs',
  hasManipulators: false,
  parts: [
    part(BodyPartKind.HEAD, 'head', 0.4, ['head', 'armor', 'cranium'], { vital: true }),
    part(BodyPartKind.THORAX, 'thorax', 1.0, ['thorax', 'armor', 'core'], { vital: true }),
    part(BodyPartKind.ABDOMEN, 'abdomen', 0.6, ['abdomen', 'armor'], { vital: true }),
    part(BodyPartKind.ANTENNA, 'antenna', 0.1, ['antenna', 'sense']),
    part(BodyPartKind.MANDIBLES, 'mandibles', 0.2, ['mandibles', 'bite']),
    sidedLimb(BodyPartKind.FRONT_LEFT_LEG, 'left', 0.25, INSECT_LEG_TAGS),
    sidedLimb(BodyPartKind.FRONT_RIGHT_LEG, 'right', 0.25, INSECT_LEG_TAGS),
    sidedLimb(BodyPartKind.SECOND_LEFT_LEG, 'left', 0.25, INSECT_LEG_TAGS),
    sidedLimb(BodyPartKind.SECOND_RIGHT_LEG, 'right', 0.25, INSECT_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_LEFT_LEG, 'left', 0.25, INSECT_LEG_TAGS),
    sidedLimb(BodyPartKind.BACK_RIGHT_LEG, 'right', 0.25, INSECT_LEG_TAGS),
  ],
};

const BIRD: AnatomyTemplate = {
  variant: AnatomyVariant.BIRD,
  mobility: 'limbs',
  hasManipulators: false,
  parts: [
    part(BodyPartKind.HEAD, 'head', 0.4, ['head', 'armor', 'cranium', 'beak'], { vital: true }),
    part(BodyPartKind.NECK, 'neck', 0.2, ['neck'], { vital: true }),
    part(BodyPartKind.TORSO, 'torso', 1.0, ['torso', 'armor', 'core'], { vital: true }),
    part(BodyPartKind.WINGS, 'wings', 0.5, ['wings', 'flight'], { limb: true }),
    sidedLimb(BodyPartKind.LEFT_LEG, 'left', 0.3, ['leg', 'locomotion']),
    sidedLimb(BodyPartKind.RIGHT_LEG, 'right', 0.3, ['leg', 'locomotion']),
    sidedLimb(BodyPartKind.LEFT_FOOT, 'left', 0.15, ['foot', 'locomotion', 'talon']),
    sidedLimb(BodyPartKind.RIGHT_FOOT, 'right', 0.15, ['foot', 'locomotion', 'talon']),
    part(BodyPartKind.TAIL, 'tail', 0.15, ['tail']),
  ],
};

export const ANATOMY_TEMPLATES: Readonly<Record<AnatomyVariant, AnatomyTemplate>> = {
  [AnatomyVariant.HUMANOID]: HUMANOID,
  [AnatomyVariant.SIMPLE]: SIMPLE,
  [AnatomyVariant.ARACHNID]: ARACHNID,
  [AnatomyVariant.QUADRUPED]: QUADRUPED,
  [AnatomyVariant.INSECT]: INSECT,
  [AnatomyVariant.BIRD]: BIRD,
};

// Every slot that counts as locomotion for limb-walking layouts
export const LOCOMOTION_KINDS: ReadonlySet<BodyPartKind> = new Set([
  BodyPartKind.LEFT_LEG,
  BodyPartKind.RIGHT_LEG,
  BodyPartKind.LEFT_FOOT,
  BodyPartKind.RIGHT_FOOT,
  BodyPartKind.FRONT_LEFT_LEG,
  BodyPartKind.FRONT_RIGHT_LEG,
  BodyPartKind.SECOND_LEFT_LEG,
  BodyPartKind.SECOND_RIGHT_LEG,
  BodyPartKind.THIRD_LEFT_LEG,
  BodyPartKind.THIRD_RIGHT_LEG,
  BodyPartKind.BACK_LEFT_LEG,
  BodyPartKind.BACK_RIGHT_LEG,
]);

// Slots that count toward manipulation penalties
export const MANIPULATION_KINDS: ReadonlySet<BodyPartKind> = new Set([
  BodyPartKind.LEFT_HAND,
  BodyPartKind.RIGHT_HAND,
  BodyPartKind.LEFT_ARM,
  BodyPartKind.RIGHT_ARM,
]);

/**
 * Look up the template for a variant.
 * Throws for anything outside the table (e.g. an unchecked string from content data).
 */
export function getAnatomyTemplate(variant: AnatomyVariant): AnatomyTemplate {
  const template: AnatomyTemplate | undefined = Object.prototype.hasOwnProperty.call(ANATOMY_TEMPLATES, variant)
    ? ANATOMY_TEMPLATES[variant]
    : undefined;
  if (!template) {
    throw new Error(`InvalidAnatomy: unknown anatomy variant "${String(variant)}"`);
  }
  return template;
}
