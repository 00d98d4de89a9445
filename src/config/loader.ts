import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute, join } from 'node:path';
import { homedir } from 'node:os';
import { ClusterRelayConfigSchema, type ClusterRelayConfig } from './schema.js';
import type { ReportMode } from '../issues/types.js';
import { exists } from '../util/fs.js';

/**
 * Config as consumed by the runtime: `stateDir` is always resolved by loadConfig.
 */
export interface RuntimeConfig extends Omit<ClusterRelayConfig, 'stateDir'> {
  /** Always an absolute path. */
  readonly stateDir: string;
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

const ENV_PATTERN = /\$\{([A-Z0-9_]+)\}/g;

/**
 * Replace `${VAR}` placeholders in every string value of a parsed JSON document.
 * An unset variable is a load error rather than an empty credential.
 */
export function expandEnv(value: unknown, env: NodeJS.ProcessEnv = process.env, path = ''): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PATTERN, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigLoadError(`Environment variable ${name} is not set (referenced by ${path || 'config'})`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((entry, i) => expandEnv(entry, env, `${path}[${i}]`));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, env, path ? `${path}.${k}` : k)]),
    );
  }
  return value;
}

/**
 * Load, parse, and validate a cluster-relay.config.json file.
 */
export async function loadConfig(configPath: string): Promise<RuntimeConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!(await exists(absPath))) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(absPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
  }

  const result = ClusterRelayConfigSchema.safeParse(expandEnv(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid config:\n${issues}`, result.error);
  }

  const config = result.data;

  const missing = config.feed.items.filter((item) => !(String(item) in config.catalog));
  if (missing.length > 0) {
    throw new ConfigLoadError(`feed.items reference items absent from the catalog: ${missing.join(', ')}`);
  }

  // State lives outside the working directory unless configured otherwise
  const resolvedStateDir = config.stateDir
    ? isAbsolute(config.stateDir)
      ? config.stateDir
      : resolve(process.cwd(), config.stateDir)
    : join(homedir(), '.cluster-relay', config.projectName);

  const frozen: RuntimeConfig = {
    ...config,
    stateDir: resolvedStateDir,
  };

  return Object.freeze(frozen);
}

export interface ConfigOverrides {
  mode?: ReportMode;
  items?: number[];
  departments?: string[];
  regions?: string[];
  startDate?: string;
  endDate?: string;
}

/**
 * Apply CLI overrides to a loaded config.
 */
export function applyOverrides(config: RuntimeConfig, overrides: ConfigOverrides): RuntimeConfig {
  const merged: RuntimeConfig = { ...config, run: { ...config.run }, feed: { ...config.feed } };

  if (overrides.mode != null) {
    merged.run.mode = overrides.mode;
  }

  if (overrides.items && overrides.items.length > 0) {
    const missing = overrides.items.filter((item) => !(String(item) in config.catalog));
    if (missing.length > 0) {
      throw new ConfigLoadError(`Unknown item(s): ${missing.join(', ')}`);
    }
    merged.feed.items = overrides.items;
  }

  // A territorial filter given on the command line replaces the configured one.
  if (overrides.departments && overrides.departments.length > 0) {
    merged.run.departments = overrides.departments;
    merged.run.regions = undefined;
  }

  if (overrides.regions && overrides.regions.length > 0) {
    if (overrides.departments && overrides.departments.length > 0) {
      throw new ConfigLoadError('departments and regions filters are mutually exclusive');
    }
    merged.run.regions = overrides.regions;
    merged.run.departments = undefined;
  }

  if (overrides.startDate != null) {
    merged.run.startDate = overrides.startDate;
  }

  if (overrides.endDate != null) {
    merged.run.endDate = overrides.endDate;
  }

  return Object.freeze(merged);
}
