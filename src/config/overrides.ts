/**
 * Config Overrides Manager
 * Persists coefficient changes to a JSON file that gets merged with
 * DEFAULT_CONFIG when a run starts
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { ShopConfig } from '../core/types.js';
import { checkConfigValue, validateConfig } from '../core/validation.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to overrides file (relative to project root)
const OVERRIDES_PATH = resolve(__dirname, '../../config/shop-overrides.json');

// ============================================================================
// Types
// ============================================================================

export interface ConfigOverride {
  path: string; // dotted path, e.g. "demand.baseDemand"
  oldValue: unknown;
  newValue: unknown;
  appliedAt: string;
  source: string; // e.g. "experiment-3"
  rationale?: string;
}

export interface OverridesFile {
  version: number;
  lastModified: string;
  overrides: ConfigOverride[];
}

function emptyOverrides(): OverridesFile {
  return {
    version: 1,
    lastModified: new Date().toISOString(),
    overrides: [],
  };
}

function isConfigOverride(value: unknown): value is ConfigOverride {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'path') === 'string' &&
    typeof Reflect.get(value, 'appliedAt') === 'string' &&
    typeof Reflect.get(value, 'source') === 'string' &&
    Reflect.has(value, 'newValue')
  );
}

function isOverridesFile(value: unknown): value is OverridesFile {
  if (typeof value !== 'object' || value === null) return false;
  const overrides: unknown = Reflect.get(value, 'overrides');
  return (
    typeof Reflect.get(value, 'version') === 'number' &&
    typeof Reflect.get(value, 'lastModified') === 'string' &&
    Array.isArray(overrides) &&
    overrides.every(isConfigOverride)
  );
}

// ============================================================================
// Load/Save Functions
// ============================================================================

/**
 * Load overrides from file
 */
export function loadOverrides(filePath: string = OVERRIDES_PATH): OverridesFile {
  try {
    if (existsSync(filePath)) {
      const content: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
      if (isOverridesFile(content)) {
        return content;
      }
      console.warn('[ConfigOverrides] Ignoring malformed overrides file:', filePath);
    }
  } catch (error) {
    console.warn('[ConfigOverrides] Failed to load overrides:', error);
  }

  return emptyOverrides();
}

/**
 * Save overrides to file
 */
export function saveOverrides(data: OverridesFile, filePath: string = OVERRIDES_PATH): boolean {
  try {
    data.lastModified = new Date().toISOString();
    writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
    console.log('[ConfigOverrides] Saved to', filePath);
    return true;
  } catch (error) {
    console.error('[ConfigOverrides] Failed to save:', error);
    return false;
  }
}

/**
 * Add a new override, replacing any existing one for the same path
 */
export function addOverride(
  override: Omit<ConfigOverride, 'appliedAt'>,
  filePath: string = OVERRIDES_PATH
): boolean {
  const data = loadOverrides(filePath);

  data.overrides = data.overrides.filter((o) => o.path !== override.path);
  data.overrides.push({
    ...override,
    appliedAt: new Date().toISOString(),
  });

  return saveOverrides(data, filePath);
}

/**
 * Remove an override by path
 */
export function removeOverride(path: string, filePath: string = OVERRIDES_PATH): boolean {
  const data = loadOverrides(filePath);
  const initialLength = data.overrides.length;
  data.overrides = data.overrides.filter((o) => o.path !== path);

  if (data.overrides.length < initialLength) {
    return saveOverrides(data, filePath);
  }
  return false;
}

/**
 * Clear all overrides
 */
export function clearOverrides(filePath: string = OVERRIDES_PATH): boolean {
  return saveOverrides(emptyOverrides(), filePath);
}

/**
 * Return a copy of `base` with every override applied
 *
 * An override only applies to an existing leaf whose value has the same
 * type (maxPeriods also takes null) and lies in the leaf's declared range,
 * and only if the config stays valid as a whole; others are skipped with
 * a warning.
 */
export function applyOverridesToConfig(
  base: ShopConfig,
  data: OverridesFile = loadOverrides()
): ShopConfig {
  let config = structuredClone(base);
  let applied = 0;

  for (const override of data.overrides) {
    const candidate = structuredClone(config);
    if (!setNestedValue(candidate, override.path, override.newValue)) {
      console.warn(`[ConfigOverrides] Skipped invalid override: ${override.path}`);
      continue;
    }

    const problems = validateConfig(candidate);
    if (problems.length > 0) {
      console.warn(`[ConfigOverrides] Skipped override ${override.path}: ${problems.join('; ')}`);
      continue;
    }

    config = candidate;
    applied++;
    console.log(`[ConfigOverrides] Applied: ${override.path} = ${JSON.stringify(override.newValue)}`);
  }

  if (applied > 0) {
    console.log(`[ConfigOverrides] Applied ${applied} override(s)`);
  }

  return config;
}

/**
 * Get the overrides file path (for display purposes)
 */
export function getOverridesPath(): string {
  return OVERRIDES_PATH;
}

// ============================================================================
// Helpers
// ============================================================================

// Nullable numeric leaves
const NULLABLE_KEYS: ReadonlySet<string> = new Set(['maxPeriods']);

function isCompatible(key: string, current: unknown, next: unknown): boolean {
  if (NULLABLE_KEYS.has(key) && (next === null || current === null)) {
    return next === null || typeof next === 'number';
  }
  return typeof current === typeof next && typeof next !== 'object';
}

function setNestedValue(obj: object, path: string, value: unknown): boolean {
  const parts = path.split('.');
  let current: object = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const child: unknown = Reflect.get(current, parts[i]);
    if (typeof child !== 'object' || child === null) {
      return false;
    }
    current = child;
  }

  const leaf = parts[parts.length - 1];
  if (!Reflect.has(current, leaf) || !isCompatible(leaf, Reflect.get(current, leaf), value)) {
    return false;
  }
  if (checkConfigValue(path, value) !== null) {
    return false;
  }

  return Reflect.set(current, leaf, value);
}
