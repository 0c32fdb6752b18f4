/**
 * Environment variable overrides for watcher settings.
 *
 * Lets an operator switch the watcher or autosaver on or off, or retune their
 * timings, without touching the code that constructs the store.
 *
 * Override precedence: env > constructor metadata > defaults
 *
 * @packageDocumentation
 */

import type { WatcherSettings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Readonly<Record<string, string | undefined>>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Environment variable enabling debug logging on the default logger.
 */
export const DEBUG_ENV_VAR = 'CONFIG_KEEPER_DEBUG';

const BOOLEAN_MAPPINGS = [
  ['CONFIG_KEEPER_WATCHER_ENABLED', 'enabled'],
  ['CONFIG_KEEPER_AUTOSAVE_ENABLED', 'autoSaveEnabled'],
] as const;

const NUMBER_MAPPINGS = [
  ['CONFIG_KEEPER_DEBOUNCE_MS', 'debounceMs'],
  ['CONFIG_KEEPER_AUTOSAVE_INTERVAL_MS', 'autoSaveIntervalMs'],
] as const;

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean. Case-insensitive.
 *
 * @throws EnvCoercionError if the value is not a recognized boolean word.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const normalized = value.trim().toLowerCase();

  if (TRUTHY.includes(normalized)) {
    return true;
  }

  if (FALSY.includes(normalized)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Watcher settings found in the environment. */
  overrides: Partial<WatcherSettings>;
  /** Environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads the watcher overrides present in the environment. Unset and empty
 * variables are ignored.
 *
 * @param env - The environment to read from.
 * @returns The overrides and the names of the variables they came from.
 * @throws EnvCoercionError if a variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ CONFIG_KEEPER_DEBOUNCE_MS: '250' });
 * overrides.debounceMs; // 250
 * ```
 */
export function readEnvOverrides(env: EnvRecord): EnvOverrideResult {
  const overrides: Partial<WatcherSettings> = {};
  const appliedVars: string[] = [];

  for (const [envVar, field] of BOOLEAN_MAPPINGS) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    overrides[field] = coerceToBoolean(value, envVar);
    appliedVars.push(envVar);
  }

  for (const [envVar, field] of NUMBER_MAPPINGS) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    overrides[field] = coerceToNumber(value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Applies environment overrides to watcher settings.
 *
 * @param settings - Settings resolved from metadata and defaults.
 * @param env - The environment to read from.
 * @returns New settings with the overrides applied.
 * @throws EnvCoercionError if a variable cannot be coerced.
 */
export function applyEnvOverrides(settings: WatcherSettings, env: EnvRecord): WatcherSettings {
  const { overrides } = readEnvOverrides(env);
  return { ...settings, ...overrides };
}

/**
 * Reads the debug logging switch.
 *
 * @param env - The environment to read from.
 * @returns Whether debug logging was requested; false when unset.
 * @throws EnvCoercionError if the variable is set to an unrecognized value.
 */
export function readDebugFlag(env: EnvRecord): boolean {
  const value = env[DEBUG_ENV_VAR];
  if (value === undefined || value === '') {
    return false;
  }
  return coerceToBoolean(value, DEBUG_ENV_VAR);
}
