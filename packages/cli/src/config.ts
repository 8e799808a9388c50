/**
 * Board configuration — defaults, YAML/TOML file, environment, flags.
 *
 * Later sources override earlier ones field by field:
 *   defaults < config file < BROADSIDE_* environment < --flags
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import yaml from 'js-yaml';
import * as TOML from 'smol-toml';
import type { BoardConfig } from '@broadside/engine';

export const DEFAULT_CONFIG: BoardConfig = {
  width: 9,
  height: 7,
  ships: [2, 3, 3, 4, 5],
};

export type ConfigFormat = 'yaml' | 'toml' | 'auto';

export interface CliFlags {
  config?: string;
  width?: string;
  height?: string;
  ships?: string;
}

/**
 * Error thrown for unusable configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Validation
// =============================================================================

function positiveInteger(field: string, value: unknown, source: string): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n <= 0) {
    throw new ConfigError(
      `Invalid "${field}" in ${source}: expected a positive integer, got ${JSON.stringify(value)}`,
      field
    );
  }
  return n;
}

function shipList(value: unknown, source: string): number[] {
  const items = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(items)) {
    throw new ConfigError(`Invalid "ships" in ${source}: expected a list of lengths`, 'ships');
  }
  if (items.length === 0) {
    throw new ConfigError(`Invalid "ships" in ${source}: at least one ship is required`, 'ships');
  }
  return items.map((item: unknown) => positiveInteger('ships', item, source));
}

/** Validate a parsed config object. Every field is optional. */
export function validateConfig(raw: unknown, source: string): Partial<BoardConfig> {
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config in ${source}: expected an object`, '');
  }

  const obj = raw as Record<string, unknown>;
  const config: Partial<BoardConfig> = {};
  if (obj.width !== undefined) config.width = positiveInteger('width', obj.width, source);
  if (obj.height !== undefined) config.height = positiveInteger('height', obj.height, source);
  if (obj.ships !== undefined) config.ships = shipList(obj.ships, source);
  return config;
}

// =============================================================================
// Sources
// =============================================================================

export function parseConfigText(
  text: string,
  format: ConfigFormat,
  source: string
): Partial<BoardConfig> {
  const trimmed = text.trim();
  // TOML uses key = value, YAML uses key: value
  const isToml = format === 'toml' || (format === 'auto' && /^\w+\s*=/m.test(trimmed));
  const raw = isToml ? TOML.parse(trimmed) : yaml.load(trimmed);
  return validateConfig(raw, source);
}

export function formatFromPath(path: string): ConfigFormat {
  switch (extname(path).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.toml':
      return 'toml';
    default:
      return 'auto';
  }
}

export async function readConfigFile(path: string): Promise<Partial<BoardConfig>> {
  const text = await readFile(path, 'utf8');
  return parseConfigText(text, formatFromPath(path), path);
}

export function configFromEnv(env: Record<string, string | undefined>): Partial<BoardConfig> {
  return validateConfig(
    {
      width: env.BROADSIDE_WIDTH,
      height: env.BROADSIDE_HEIGHT,
      ships: env.BROADSIDE_SHIPS,
    },
    'environment'
  );
}

/** Accepts --key=value flags only. */
export function parseFlags(argv: string[]): CliFlags {
  const flags: CliFlags = {};
  for (const arg of argv) {
    const m = arg.match(/^--([^=]+)=(.*)$/);
    if (!m) throw new ConfigError(`Unrecognized argument "${arg}" (use --key=value)`, arg);
    const [, key, value] = m;
    if (key === 'config' || key === 'width' || key === 'height' || key === 'ships') {
      flags[key] = value;
    } else {
      throw new ConfigError(`Unknown flag "--${key}"`, key);
    }
  }
  return flags;
}

export async function loadConfig(
  flags: CliFlags,
  env: Record<string, string | undefined>
): Promise<BoardConfig> {
  const file = flags.config ? await readConfigFile(flags.config) : {};
  const fromFlags = validateConfig(
    { width: flags.width, height: flags.height, ships: flags.ships },
    'command line'
  );

  return {
    ...DEFAULT_CONFIG,
    ...file,
    ...configFromEnv(env),
    ...fromFlags,
  };
}
