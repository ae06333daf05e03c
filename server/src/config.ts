// ============================================
// Runtime Config
// ANATOMY_CONFIG with live tuning overrides
// ============================================

import { ANATOMY_CONFIG, DEV_TUNABLE_CONFIGS, type TunableConfigKey } from '#shared';
import { logger } from './logger';

// Runtime config overrides (applied on top of ANATOMY_CONFIG)
const configOverrides: Map<TunableConfigKey, number> = new Map();

// ============================================
// Config Access (with overrides)
// ============================================

/**
 * Get a config value, checking overrides first
 */
export function getConfig<K extends keyof typeof ANATOMY_CONFIG>(key: K): (typeof ANATOMY_CONFIG)[K] {
  if (isTunableConfigKey(key)) {
    const override = configOverrides.get(key);
    if (override !== undefined) {
      return override as (typeof ANATOMY_CONFIG)[K];
    }
  }
  return ANATOMY_CONFIG[key];
}

export function isTunableConfigKey(key: string): key is TunableConfigKey {
  return (DEV_TUNABLE_CONFIGS as readonly string[]).includes(key);
}

/**
 * Override a tunable value at runtime.
 * Unknown keys and non-finite or negative values are rejected.
 */
export function setConfigOverride(key: string, value: number): void {
  if (!isTunableConfigKey(key)) {
    throw new Error(`UnknownConfigKey: ${key} is not tunable`);
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`InvalidConfigValue: ${key} must be a non-negative number, got ${value}`);
  }

  const oldValue = getConfig(key);
  configOverrides.set(key, value);
  logger.info({ event: 'config_override', key, oldValue, newValue: value }, `Config ${key}: ${oldValue} -> ${value}`);
}

export function clearConfigOverrides(): void {
  configOverrides.clear();
}

export function getConfigOverrides(): Record<string, number> {
  return Object.fromEntries(configOverrides);
}
