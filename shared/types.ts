// ============================================
// Shared Types & Interfaces
// Anatomy enums, item definitions, and type definitions
// ============================================

// Anatomical slots a creature can have.
// Paired kinds are distinct members so left/right never share identity.
export enum BodyPartKind {
  HEAD = 'head',
  NECK = 'neck',
  TORSO = 'torso',

  // Arms
  LEFT_ARM = 'left_arm',
  RIGHT_ARM = 'right_arm',
  LEFT_HAND = 'left_hand',
  RIGHT_HAND = 'right_hand',

  // Legs
  LEFT_LEG = 'left_leg',
  RIGHT_LEG = 'right_leg',
  LEFT_FOOT = 'left_foot',
  RIGHT_FOOT = 'right_foot',

  // Multi-legged layouts (front to back)
  FRONT_LEFT_LEG = 'front_left_leg',
  FRONT_RIGHT_LEG = 'front_right_leg',
  SECOND_LEFT_LEG = 'second_left_leg',
  SECOND_RIGHT_LEG = 'second_right_leg',
  THIRD_LEFT_LEG = 'third_left_leg',
  THIRD_RIGHT_LEG = 'third_right_leg',
  BACK_LEFT_LEG = 'back_left_leg',
  BACK_RIGHT_LEG = 'back_right_leg',

  // Animal-specific
  TAIL = 'tail',
  WINGS = 'wings',

  // Insect-specific
  THORAX = 'thorax',
  ABDOMEN = 'abdomen',
  ANTENNA = 'antenna',
  MANDIBLES = 'mandibles',
}

// Creature layouts. Every member must have an entry in ANATOMY_TEMPLATES.
export enum AnatomyVariant {
  HUMANOID = 'humanoid',
  SIMPLE = 'simple',
  ARACHNID = 'arachnid',
  QUADRUPED = 'quadruped',
  INSECT = 'insect',
  BIRD = 'bird',
}

// Remaining-HP banding shown to players.
// 'damaged' is the lightest injury band; the labels are matched literally by callers.
export type DamageTier =
  | 'healthy'
  | 'damaged'
  | 'wounded'
  | 'badly wounded'
  | 'severely wounded'
  | 'destroyed';

// How a layout gets around
// - body: slithers/rolls on its torso (slimes, golems)
// - limbs: walks on leg and foot slots
export type Mobility = 'body' | 'limbs';

// ============================================
// Equipment
// Item definitions are owned by the equipment layer;
// the anatomy core only reads requiredTags.
// ============================================

export enum EquipmentType {
  WEAPON = 'weapon',
  ARMOR = 'armor',
  OFFHAND = 'offhand',
  SHIELD = 'shield',
  HELMET = 'helmet',
  BOOTS = 'boots',
  GAUNTLETS = 'gauntlets',
  LEGGINGS = 'leggings',
  BACKPACK = 'backpack',
}

export interface EquipmentDefinition {
  id: string;
  name: string;
  type: EquipmentType;
  powerBonus: number;
  defenseBonus: number;
  requiredTags: ReadonlySet<string>;
}

// Deterministic tie-break when several parts can host an item
export type EquipTargetPolicy = 'first' | 'least-damaged';
