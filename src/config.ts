/**
 * Configuration Loader for tern-check
 * Loads and validates .ternrc.yaml project files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MODULE_EXTENSION } from './semantic/index.js';

// ============================================================
// TYPES
// ============================================================

export interface ModuleConfig {
  /** Base directory for local imports, relative to the project directory */
  readonly root: string;
  /** Appended to local imports written without an extension */
  readonly extension: string;
}

export interface TernConfig {
  readonly modules: ModuleConfig;
  /** Log analyzer scope and declaration events to stderr */
  readonly trace: boolean;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.ternrc.yaml';

const TOP_LEVEL_KEYS = ['modules', 'trace'];
const MODULE_KEYS = ['root', 'extension'];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): TernConfig {
  return {
    modules: { root: '.', extension: DEFAULT_MODULE_EXTENSION },
    trace: false,
  };
}

// ============================================================
// VALIDATION
// ============================================================

interface RawConfig {
  modules?: { root?: string; extension?: string };
  trace?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rejectUnknownKeys(
  data: Record<string, unknown>,
  known: readonly string[],
  prefix: string
): void {
  for (const key of Object.keys(data)) {
    if (!known.includes(key)) {
      throw new Error(`Invalid configuration: unknown key ${prefix}${key}`);
    }
  }
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is RawConfig {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }
  rejectUnknownKeys(data, TOP_LEVEL_KEYS, '');

  if ('trace' in data && typeof data['trace'] !== 'boolean') {
    throw new Error('Invalid configuration: trace must be a boolean');
  }

  if (!('modules' in data)) return;
  const modules = data['modules'];
  if (!isRecord(modules)) {
    throw new Error('Invalid configuration: modules must be a mapping');
  }
  rejectUnknownKeys(modules, MODULE_KEYS, 'modules.');

  const { root, extension } = modules;
  if (root !== undefined && (typeof root !== 'string' || root === '')) {
    throw new Error(
      'Invalid configuration: modules.root must be a non-empty string'
    );
  }
  if (
    extension !== undefined &&
    (typeof extension !== 'string' || !extension.startsWith('.'))
  ) {
    throw new Error(
      'Invalid configuration: modules.extension must be a string starting with "."'
    );
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .ternrc.yaml in the specified directory.
 * Missing keys take their default values; an empty file is all defaults.
 *
 * @param cwd - Directory to search for configuration file
 * @returns TernConfig object, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if YAML or shape is invalid
 */
export function loadConfig(cwd: string): TernConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // yaml.parse returns null for empty content
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent) ?? {};
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  validateConfig(parsedData);

  const defaults = createDefaultConfig();
  return {
    modules: {
      root: parsedData.modules?.root ?? defaults.modules.root,
      extension: parsedData.modules?.extension ?? defaults.modules.extension,
    },
    trace: parsedData.trace ?? defaults.trace,
  };
}
