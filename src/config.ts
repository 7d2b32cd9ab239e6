/**
 * Application Configuration
 *
 * Effective settings are three tiers merged key by key:
 * built-in defaults < config file < command-line flags.
 */

import type { Environment } from './env.js';
import type { Settings, SettingsLayer } from './types.js';
import { PlacemarksError, toErrorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import { isPlainObject, mergeLayers } from './utils/merge-layers.js';
import { readYamlSafe } from './utils/read-yaml-safe.js';

const log = createLogger('config');

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  clipboard: false,
  style: 'unified',
  folder: 'toolbar',
});

const BOOLEAN_KEYS = ['clipboard'] as const;
const STRING_KEYS = ['style', 'folder', 'filter'] as const;

function invalidConfig(configFile: string, detail: string): PlacemarksError {
  return new PlacemarksError(
    'invalid_config',
    `Invalid config file ${configFile}: ${detail}`,
    'Fix or remove the file; it is optional.',
    { configFile }
  );
}

/**
 * Validate a parsed config document into a settings layer.
 * `null` values count as absent.
 */
export function toSettingsLayer(raw: unknown, configFile: string): SettingsLayer {
  if (!isPlainObject(raw)) {
    throw invalidConfig(configFile, 'expected a mapping at the top level');
  }

  const layer: SettingsLayer = {};

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'boolean') {
      throw invalidConfig(configFile, `"${key}" must be true or false`);
    }
    layer[key] = value;
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw invalidConfig(configFile, `"${key}" must be a string`);
    }
    layer[key] = value;
  }

  const known = new Set<string>([...BOOLEAN_KEYS, ...STRING_KEYS]);
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      log.warn(`Ignoring unknown key "${key}" in ${configFile}`);
    }
  }

  return layer;
}

/**
 * Load the optional config file. A missing file is an empty layer.
 */
export async function loadConfigLayer(env: Environment): Promise<SettingsLayer> {
  let raw: unknown;
  try {
    raw = await readYamlSafe(env.configFile, {});
  } catch (e) {
    throw invalidConfig(env.configFile, toErrorMessage(e));
  }
  const layer = toSettingsLayer(raw, env.configFile);
  log.debug(`Loaded ${Object.keys(layer).length} setting(s) from ${env.configFile}`);
  return layer;
}

export async function resolveSettings(flags: SettingsLayer, env: Environment): Promise<Settings> {
  const fileLayer = await loadConfigLayer(env);
  return mergeLayers<Settings>(DEFAULT_SETTINGS, fileLayer, flags);
}
