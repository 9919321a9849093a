/**
 * Application configuration
 *
 * Sources, lowest to highest priority:
 * 1. Defaults
 * 2. Config file ($XDG_CONFIG_HOME/smart-command/config.json)
 * 3. Environment variables (SMART_CMD_*)
 * 4. Explicit overrides (CLI options)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { detectSystemLanguage, normalizeLanguage } from '../i18n/index.js';
import { defaultConfigHome } from '../catalog/loader.js';
import { ConfigError, getErrorMessage } from '../errors/definition-error.js';
import { logger } from '../utils/logger.js';

export const AppConfigSchema = z
  .object({
    /** Display language for descriptions */
    lang: z.string().min(1),
    /** Extra definitions directory, searched before all others */
    definitionsDir: z.string().min(1).optional(),
    /** Input prefix that switches completion to catalog search */
    searchPrefix: z.string().min(1),
    /** Maximum number of search results */
    searchLimit: z.number().int().positive(),
    /** Maximum number of filesystem entries offered by path completion */
    maxPathEntries: z.number().int().positive(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

const PartialConfigSchema = AppConfigSchema.partial();

export type AppConfigOverrides = z.infer<typeof PartialConfigSchema>;

export interface LoadAppConfigOptions {
  /** Base config directory (default: $XDG_CONFIG_HOME or ~/.config) */
  configHome?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: AppConfigOverrides;
}

export function defaultAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    lang: detectSystemLanguage(env),
    searchPrefix: '/',
    searchLimit: 20,
    maxPathEntries: 200,
    logLevel: 'warn',
  };
}

export function getConfigFilePath(configHome: string = defaultConfigHome()): string {
  return path.join(configHome, 'smart-command', 'config.json');
}

async function readConfigFile(filePath: string): Promise<AppConfigOverrides> {
  if (!(await fs.pathExists(filePath))) {
    return {};
  }

  try {
    const raw: unknown = await fs.readJson(filePath);
    const result = PartialConfigSchema.safeParse(raw);
    if (!result.success) {
      logger.warn(`Ignoring invalid config file ${filePath}`, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return {};
    }
    return result.data;
  } catch (error) {
    logger.warn(`Cannot read config file ${filePath}`, { error: getErrorMessage(error) });
    return {};
  }
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    logger.warn(`Ignoring ${name}: expected a positive integer, got "${value}"`);
    return undefined;
  }
  return parsed;
}

/**
 * Read SMART_CMD_* variables. Invalid values are skipped with a warning.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): AppConfigOverrides {
  const config: AppConfigOverrides = {};

  const lang = normalizeLanguage(env.SMART_CMD_LANG);
  if (lang) config.lang = lang;

  if (env.SMART_CMD_DEFINITIONS_DIR) config.definitionsDir = env.SMART_CMD_DEFINITIONS_DIR;
  if (env.SMART_CMD_SEARCH_PREFIX) config.searchPrefix = env.SMART_CMD_SEARCH_PREFIX;

  const searchLimit = parsePositiveInt('SMART_CMD_SEARCH_LIMIT', env.SMART_CMD_SEARCH_LIMIT);
  if (searchLimit !== undefined) config.searchLimit = searchLimit;

  const maxPathEntries = parsePositiveInt('SMART_CMD_MAX_PATH_ENTRIES', env.SMART_CMD_MAX_PATH_ENTRIES);
  if (maxPathEntries !== undefined) config.maxPathEntries = maxPathEntries;

  const logLevel = env.SMART_CMD_LOG_LEVEL?.toLowerCase();
  if (logLevel) {
    const parsed = AppConfigSchema.shape.logLevel.safeParse(logLevel);
    if (parsed.success) {
      config.logLevel = parsed.data;
    } else {
      logger.warn(`Ignoring SMART_CMD_LOG_LEVEL: unknown level "${logLevel}"`);
    }
  }

  return config;
}

function applyOverrides(base: AppConfig, ...layers: AppConfigOverrides[]): AppConfig {
  const result: AppConfig = { ...base };
  for (const layer of layers) {
    if (layer.lang !== undefined) result.lang = layer.lang;
    if (layer.definitionsDir !== undefined) result.definitionsDir = layer.definitionsDir;
    if (layer.searchPrefix !== undefined) result.searchPrefix = layer.searchPrefix;
    if (layer.searchLimit !== undefined) result.searchLimit = layer.searchLimit;
    if (layer.maxPathEntries !== undefined) result.maxPathEntries = layer.maxPathEntries;
    if (layer.logLevel !== undefined) result.logLevel = layer.logLevel;
  }
  return result;
}

/**
 * Load the merged configuration
 */
export async function loadAppConfig(options: LoadAppConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configHome = options.configHome ?? defaultConfigHome(env);

  const fileConfig = await readConfigFile(getConfigFilePath(configHome));
  const merged = applyOverrides(defaultAppConfig(env), fileConfig, readEnvConfig(env), options.overrides ?? {});

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}
