/**
 * Drama Collector — Configuration
 *
 * Loads config/default.json (or CONFIG_PATH), applies environment overrides
 * and validates the result. ConfigManager keeps the current copy and supports
 * reloading it at runtime.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import 'dotenv/config';
import type { ZodError } from 'zod';
import { ConfigError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { SystemConfigSchema, type SystemConfig, type SystemConfigInput } from './schema';

export * from './schema';

const log = logger.child({ component: 'config' });

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../../config/default.json', import.meta.url)
);

export interface LoadConfigOptions {
  /** Path to a JSON config file; defaults to CONFIG_PATH or config/default.json */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a raw configuration object.
 */
export function parseConfig(raw: unknown): SystemConfig {
  const result = SystemConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }
  return result.data;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') return undefined;

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    log.warn('Ignoring non-numeric environment override', { name, value });
    return undefined;
  }
  return parsed;
}

/**
 * Apply environment overrides on top of a parsed config.
 */
export function applyEnvOverrides(config: SystemConfig, env: NodeJS.ProcessEnv): SystemConfigInput {
  const scheduler = { ...config.scheduler };
  const processing = { ...config.processing };
  const store = { ...config.store };
  const exportConfig = { ...config.export };
  const server = { ...config.server };

  const interval = numberFromEnv(env, 'COLLECTION_INTERVAL_HOURS');
  if (interval !== undefined) scheduler.collectionIntervalHours = interval;

  const maintenanceHour = numberFromEnv(env, 'MAINTENANCE_HOUR');
  if (maintenanceHour !== undefined) scheduler.maintenanceHour = maintenanceHour;

  const maxJobs = numberFromEnv(env, 'MAX_CONCURRENT_JOBS');
  if (maxJobs !== undefined) processing.maxConcurrentJobs = maxJobs;

  const port = numberFromEnv(env, 'API_PORT');
  if (port !== undefined) server.port = port;

  if (env.STORE_DRIVER === 'memory' || env.STORE_DRIVER === 'supabase') {
    store.driver = env.STORE_DRIVER;
  } else if (env.STORE_DRIVER) {
    log.warn('Ignoring unknown STORE_DRIVER', { value: env.STORE_DRIVER });
  }
  if (env.SUPABASE_URL) store.supabaseUrl = env.SUPABASE_URL;
  if (env.SUPABASE_SERVICE_ROLE_KEY) store.supabaseServiceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;

  if (env.EXPORT_OUTPUT_DIR) exportConfig.outputDirectory = env.EXPORT_OUTPUT_DIR;

  const sources = { ...config.sources };
  if (env.PRIMARY_API_KEY) {
    for (const [name, source] of Object.entries(sources)) {
      if (source.kind === 'api') {
        sources[name] = { ...source, apiKey: env.PRIMARY_API_KEY };
      }
    }
  }

  return { ...config, scheduler, processing, store, export: exportConfig, server, sources };
}

/**
 * Load, override and validate the configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): SystemConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  const fileConfig = parseConfig(readConfigFile(path));
  const config = parseConfig(applyEnvOverrides(fileConfig, env));

  log.debug('Configuration loaded', { path, sources: Object.keys(config.sources) });
  return config;
}

const REDACTED = '***';

/**
 * Config view safe to expose over the API.
 */
export function summarizeConfig(config: SystemConfig): SystemConfig {
  const summary = structuredClone(config);
  for (const source of Object.values(summary.sources)) {
    if (source.apiKey) source.apiKey = REDACTED;
  }
  if (summary.store.supabaseServiceRoleKey) {
    summary.store.supabaseServiceRoleKey = REDACTED;
  }
  return summary;
}

/**
 * Holds the active configuration. Readers get copies.
 */
export class ConfigManager {
  private config: SystemConfig;

  constructor(private readonly options: LoadConfigOptions = {}, initial?: SystemConfig) {
    this.config = initial ?? loadConfig(options);
  }

  get(): SystemConfig {
    return structuredClone(this.config);
  }

  /**
   * Re-read the file and environment. The previous config stays active when
   * the new one is invalid.
   */
  reload(): SystemConfig {
    const next = loadConfig(this.options);
    this.config = next;
    log.info('Configuration reloaded');
    return this.get();
  }

  summary(): SystemConfig {
    return summarizeConfig(this.config);
  }
}
