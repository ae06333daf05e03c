// ============================================
// Anatomy Constants & Configuration
// Runtime-tunable values and static configuration
// ============================================

import type { EquipTargetPolicy } from './types';

// Runtime config that can be modified (subset of ANATOMY_CONFIG keys)
export const DEV_TUNABLE_CONFIGS = [
  // Random hit distribution
  'HIT_WEIGHT_TORSO',
  'HIT_WEIGHT_HEAD',
  'HIT_WEIGHT_LIMB',
  'HIT_WEIGHT_OTHER',

  // Recovery
  'REGEN_PER_TURN',

  // Movement
  'CREATURE_BASE_SPEED',

  // Telemetry
  'TELEMETRY_INTERVAL_TURNS',
  'SLOW_TURN_THRESHOLD_MS',
] as const;

export type TunableConfigKey = (typeof DEV_TUNABLE_CONFIGS)[number];

// ============================================
// Anatomy Constants
// ============================================

const DEFAULT_EQUIP_TARGET_POLICY: EquipTargetPolicy = 'first';

export const ANATOMY_CONFIG = {
  // Weighted random hits: bigger targets get struck more often
  HIT_WEIGHT_TORSO: 30,
  HIT_WEIGHT_HEAD: 10,
  HIT_WEIGHT_LIMB: 15, // Any other limb (arms, hands, legs, feet)
  HIT_WEIGHT_OTHER: 20, // Non-limb parts (neck, tail, abdomen...)

  // Healing applied to every part of a living creature each turn
  REGEN_PER_TURN: 1,

  // Speed of a creature with no locomotion damage (tiles per turn)
  CREATURE_BASE_SPEED: 10,

  // Which matching part receives an equipped item
  EQUIP_TARGET_POLICY: DEFAULT_EQUIP_TARGET_POLICY,

  // Aggregate stats logging cadence
  TELEMETRY_INTERVAL_TURNS: 10,

  // Turns slower than this get a per-system breakdown in the perf log
  SLOW_TURN_THRESHOLD_MS: 10,
};

// Tag every part able to hold a weapon or tool carries
export const GRASP_TAG = 'grasp';

// Sentinel line for a creature with nothing to report
export const FULL_HEALTH_REPORT = 'All body parts are healthy.';
