/**
 * @module runtime-config
 *
 * Loads, validates, and merges the prefixrun configuration from the
 * user-global file and the pipeline directory's own file using a layered
 * deep-merge strategy. The merge result is validated against a strict Zod
 * schema and command line flags are applied as final overrides.
 *
 * Key exports:
 * - {@link loadRuntimeConfig} - Main entry point to load and merge config
 * - {@link resolveConfigSources} - Resolve the config file paths
 * - {@link parseExtensionFlag} - Parse one `--ext EXT=COMMAND` value
 */
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../../errors.js';
import type { RuntimeConfig, RuntimeFlags } from '../kernel/contracts.js';
import { defaultExtensions } from '../pipeline/extensions.js';

const CommandTokensSchema = z.array(z.string().min(1)).min(1);

const RuntimeConfigSchema = z.object({
  extensions: z.record(z.string(), CommandTokensSchema),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).strict(),
  process: z.object({
    failOnNonZeroExit: z.boolean(),
  }).strict(),
}).strict();

/** Resolved file paths for the configuration layers. */
export interface ConfigSources {
  /** Path to the user-global config (default: ~/.prefixrun/config.json). */
  userConfigPath: string;
  /** Path to the config kept beside the steps (<directory>/.prefixrun.json). */
  directoryConfigPath: string;
}

export const DIRECTORY_CONFIG_FILE = '.prefixrun.json';

function defaultConfig() {
  return {
    extensions: defaultExtensions(),
    logging: {
      level: 'info'
    },
    process: {
      failOnNonZeroExit: true
    }
  } satisfies RuntimeConfig;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
function deepMerge(base: Record<string, unknown>, override?: Record<string, unknown>): Record<string, unknown> {
  if (!override) {
    return structuredClone(base);
  }

  const output: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = output[key];
    if (isPlainObject(value) && isPlainObject(baseValue)) {
      output[key] = deepMerge(baseValue, value);
      continue;
    }

    output[key] = value;
  }

  return output;
}

async function readOptionalJson(path: string): Promise<Record<string, unknown> | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigError(`Cannot read config ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config root must be an object (${path})`);
  }
  return parsed;
}

/**
 * Resolves the configuration file paths for a pipeline directory and optional
 * CLI flags (e.g. an explicit `--config` path).
 */
export function resolveConfigSources(directory: string, flags: RuntimeFlags): ConfigSources {
  return {
    userConfigPath: flags.configPath ?? join(homedir(), '.prefixrun', 'config.json'),
    directoryConfigPath: join(directory, DIRECTORY_CONFIG_FILE)
  };
}

function applyRuntimeFlags(config: RuntimeConfig, flags: RuntimeFlags): RuntimeConfig {
  const next = structuredClone(config);

  if (flags.extensions) {
    next.extensions = { ...next.extensions, ...flags.extensions };
  }
  if (flags.logLevel) {
    next.logging.level = flags.logLevel;
  }
  if (flags.failOnNonZeroExit !== undefined) {
    next.process.failOnNonZeroExit = flags.failOnNonZeroExit;
  }

  return next;
}

/**
 * Parses a `--ext` value such as `.sh=zsh` or `.py=python3 -u` into an
 * extension and its command tokens.
 *
 * @throws ConfigError if the value has no `=`, no extension, or no command.
 */
export function parseExtensionFlag(value: string): [string, string[]] {
  const eq = value.indexOf('=');
  const extension = eq === -1 ? '' : value.slice(0, eq).trim();
  const tokens = eq === -1 ? [] : value.slice(eq + 1).split(/\s+/).filter((token) => token !== '');
  if (extension === '' || tokens.length === 0) {
    throw new ConfigError(`Expected --ext EXT=COMMAND, got "${value}"`);
  }
  return [extension, tokens];
}

/**
 * Loads and merges the configuration for one pipeline directory.
 *
 * Merge order (later wins): defaults -> user-global -> directory-local.
 * The merged result is validated against the Zod schema, and runtime CLI
 * flags are applied as final overrides.
 *
 * @throws ConfigError if a config file is unreadable, is not a JSON object,
 * or fails schema validation.
 */
export async function loadRuntimeConfig(directory: string, flags: RuntimeFlags = {}): Promise<RuntimeConfig> {
  const sources = resolveConfigSources(directory, flags);

  const userConfig = await readOptionalJson(sources.userConfigPath);
  const directoryConfig = sources.directoryConfigPath !== sources.userConfigPath
    ? await readOptionalJson(sources.directoryConfigPath)
    : undefined;

  let merged = deepMerge(defaultConfig(), userConfig);
  merged = deepMerge(merged, directoryConfig);

  const result = RuntimeConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return applyRuntimeFlags(result.data, flags);
}
