/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from the user level
 * (~/.config/watchtower/config.json), the project level
 * (.watchtower/config.json) and WATCHTOWER_* environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../errors/index.js';
import { getConfigPath, getProjectDir } from '../paths.js';
import { PipelineConfigSchema, defaultConfig, type PipelineConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Environment to read WATCHTOWER_* overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: PipelineConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project' | 'env'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

/**
 * Environment variable to config path. Numeric settings are converted;
 * a value that is not a number is passed through so validation reports it.
 */
const ENV_MAPPINGS: Array<{ name: string; path: string[]; numeric?: boolean }> = [
  { name: 'WATCHTOWER_HOST', path: ['server', 'host'] },
  { name: 'WATCHTOWER_PORT', path: ['server', 'port'], numeric: true },
  { name: 'WATCHTOWER_LOG_LEVEL', path: ['logging', 'level'] },
  { name: 'WATCHTOWER_LOG_FILE', path: ['logging', 'file'] },
  { name: 'WATCHTOWER_TRACE_LOG', path: ['traceLog', 'path'] },
  { name: 'WATCHTOWER_BATCH_SIZE', path: ['critic', 'batchSize'], numeric: true },
  { name: 'WATCHTOWER_FLUSH_INTERVAL_MS', path: ['critic', 'flushIntervalMs'], numeric: true },
  { name: 'WATCHTOWER_ANALYSIS_TIMEOUT_MS', path: ['critic', 'analysisTimeoutMs'], numeric: true },
];

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigRecord | null {
  const result: ConfigRecord = {};
  let found = false;

  for (const mapping of ENV_MAPPINGS) {
    const raw = env[mapping.name];
    if (raw === undefined || raw === '') {
      continue;
    }
    found = true;
    const asNumber = Number(raw);
    const value = mapping.numeric && Number.isFinite(asNumber) ? asNumber : raw;
    setPath(result, mapping.path, value);
  }

  return found ? result : null;
}

function setPath(target: ConfigRecord, path: string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: ConfigRecord = {};
      node[key] = created;
      node = created;
    }
  }
  const leaf = path[path.length - 1];
  if (leaf !== undefined) {
    node[leaf] = value;
  }
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * Objects merge recursively; arrays and scalars replace.
 */
export function deepMergeConfigs(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isRecord(value) && isRecord(baseValue) ? deepMergeConfigs(baseValue, value) : value;
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): ConfigRecord | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);

    if (!isRecord(parsed)) {
      throw new ConfigError(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
        filePath
      );
    }

    return parsed;
  } catch (err) {
    const failure =
      err instanceof ConfigError
        ? err
        : new ConfigError(
            `${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
            filePath,
            err instanceof Error ? err : undefined
          );
    warnings.push(failure.message);
    return null;
  }
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `config validation: ${path}: ${issue.message}`;
}

/**
 * Remove what an issue points at, so the rest of the config survives.
 */
function dropIssue(config: ConfigRecord, issue: ZodIssue): void {
  let node: unknown = config;
  const path = issue.code === 'unrecognized_keys' ? issue.path : issue.path.slice(0, -1);
  for (const key of path) {
    if (!isRecord(node)) {
      return;
    }
    node = node[String(key)];
  }
  if (!isRecord(node)) {
    return;
  }

  if (issue.code === 'unrecognized_keys') {
    for (const key of issue.keys) {
      delete node[key];
    }
    return;
  }
  const leaf = issue.path[issue.path.length - 1];
  if (leaf !== undefined) {
    delete node[String(leaf)];
  }
}

/**
 * Validate a merged raw config. Invalid settings are reported and fall
 * back to their defaults; valid ones are kept.
 */
export function resolveConfig(raw: ConfigRecord, warnings: string[] = []): PipelineConfig {
  const working = structuredClone(raw);

  for (let attempt = 0; attempt < 5; attempt++) {
    const result = PipelineConfigSchema.safeParse(working);
    if (result.success) {
      return result.data;
    }
    for (const issue of result.error.issues) {
      if (attempt === 0) {
        warnings.push(describeIssue(issue));
      }
      dropIssue(working, issue);
    }
  }

  warnings.push('config validation: falling back to defaults');
  return defaultConfig();
}

/**
 * Load configuration from user, project and environment sources.
 *
 * Priority: user <- project <- env (later overrides earlier).
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false, env = process.env } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: ConfigRecord | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  const envRaw = configFromEnv(env);
  sources.push({ path: 'WATCHTOWER_*', level: 'env', loaded: envRaw !== null });

  let merged: ConfigRecord = {};
  for (const layer of [userRaw, projectRaw, envRaw]) {
    if (layer) {
      merged = deepMergeConfigs(merged, layer);
    }
  }

  const config = resolveConfig(merged, warnings);
  return { config, sources, warnings };
}
