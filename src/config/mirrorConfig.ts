import { promises as fs } from 'fs';
import { ValidationError, describeError } from '../errors/mirrorErrors.js';
import { COMPARE_MODES, type CompareMode } from '../utils/hashUtils.js';
import { DEFAULT_IGNORE_FILE } from '../utils/fileFilter.patterns.js';
import { resolveUserPath } from '../utils/pathExpansion.js';

/**
 * Fully resolved settings for one run
 */
export interface MirrorConfig {
  sourceDir: string;
  replicaDir: string;
  frequencySeconds: number;
  logDir: string;
  compare: CompareMode;
  exclude: string[];
  /** Ignore file read from the source root; false disables it */
  ignoreFile: string | false;
  once: boolean;
  dryRun: boolean;
  debug: boolean;
}

/**
 * Options as commander hands them over
 */
export interface CliOptions {
  frequency?: string;
  log_dir?: string;
  compare?: string;
  exclude?: string[];
  config?: string;
  once?: boolean;
  dryRun?: boolean;
}

/**
 * Shape of the optional JSON config file
 */
export interface ConfigFile {
  source?: string;
  replica?: string;
  frequency?: number;
  logDir?: string;
  compare?: CompareMode;
  exclude?: string[];
  ignoreFile?: string | false;
}

export const DEFAULT_FREQUENCY_SECONDS = 60;

export const ENV_VARS = {
  frequency: 'TREE_MIRROR_FREQUENCY',
  logDir: 'TREE_MIRROR_LOG_DIR',
  compare: 'TREE_MIRROR_COMPARE'
} as const;

/**
 * Parse a positive whole number of seconds
 */
export function parseFrequency(value: unknown): number {
  const parsed = typeof value === 'number'
    ? value
    : typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? Number(value) : NaN;

  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError('frequency', value, 'positive integer number of seconds');
  }
  return parsed;
}

export function parseCompareMode(value: unknown): CompareMode {
  const mode = COMPARE_MODES.find(candidate => candidate === value);
  if (!mode) {
    throw new ValidationError('compare', value, COMPARE_MODES.join(' or '));
  }
  return mode;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`config.${key}`, value, 'string');
  }
  return value;
}

/**
 * Validate parsed JSON against ConfigFile
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('config', raw, 'JSON object');
  }
  const entries: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const config: ConfigFile = {
    source: optionalString(entries, 'source'),
    replica: optionalString(entries, 'replica'),
    logDir: optionalString(entries, 'logDir')
  };

  if (entries.frequency !== undefined) {
    config.frequency = parseFrequency(entries.frequency);
  }
  if (entries.compare !== undefined) {
    config.compare = parseCompareMode(entries.compare);
  }
  const { exclude, ignoreFile } = entries;
  if (exclude !== undefined) {
    if (!isStringArray(exclude)) {
      throw new ValidationError('config.exclude', exclude, 'array of patterns');
    }
    config.exclude = exclude;
  }
  if (ignoreFile !== undefined) {
    if (ignoreFile === false || typeof ignoreFile === 'string') {
      config.ignoreFile = ignoreFile;
    } else {
      throw new ValidationError('config.ignoreFile', ignoreFile, 'file name or false');
    }
  }

  return config;
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const resolved = resolveUserPath(filePath);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ValidationError('config', filePath, `readable JSON file (${describeError(error)})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError('config', filePath, `valid JSON (${describeError(error)})`);
  }

  return parseConfigFile(raw);
}

/**
 * Merge CLI > environment > config file > defaults
 */
export function resolveConfig(
  positionals: { source?: string; replica?: string },
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  file: ConfigFile = {},
  cwd: string = process.cwd()
): MirrorConfig {
  const source = positionals.source ?? file.source;
  const replica = positionals.replica ?? file.replica;

  if (!source) {
    throw new ValidationError('source_dir', '', 'a source directory path');
  }
  if (!replica) {
    throw new ValidationError('replica_dir', '', 'a replica directory path');
  }

  const frequencyInput = cli.frequency ?? env[ENV_VARS.frequency];
  const compareInput = cli.compare ?? env[ENV_VARS.compare];

  return {
    sourceDir: source,
    replicaDir: replica,
    frequencySeconds: frequencyInput !== undefined
      ? parseFrequency(frequencyInput)
      : file.frequency ?? DEFAULT_FREQUENCY_SECONDS,
    logDir: cli.log_dir ?? env[ENV_VARS.logDir] ?? file.logDir ?? cwd,
    compare: compareInput !== undefined
      ? parseCompareMode(compareInput)
      : file.compare ?? 'content',
    exclude: [...(file.exclude ?? []), ...(cli.exclude ?? [])],
    ignoreFile: file.ignoreFile ?? DEFAULT_IGNORE_FILE,
    once: cli.once ?? false,
    dryRun: cli.dryRun ?? false,
    debug: Boolean(env.DEBUG)
  };
}
