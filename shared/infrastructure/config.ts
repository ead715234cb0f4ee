/**
 * Configuration module for sitesearch
 *
 * Precedence: defaults < sitesearch.config.json in the working directory <
 * environment variables (a .env file is loaded first if present).
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

dotenv.config();

const ConfigSchema = z.object({
  /** URL the CLI starts crawling from */
  seedUrl: z.string().url(),

  /** Keyword the CLI searches for after crawling */
  keyword: z.string(),

  /** Log level */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),

  /** Optional log file path */
  logFile: z.string().min(1).optional(),

  crawler: z.object({
    /** Default maximum crawl depth */
    maxDepth: z.number().int().nonnegative(),

    /** Per-request timeout in milliseconds */
    timeout: z.number().int().positive(),

    /** User agent sent with every request */
    userAgent: z.string().min(1)
  })
});

export type SiteSearchConfig = z.infer<typeof ConfigSchema>;

const PartialConfigSchema = ConfigSchema.extend({
  crawler: ConfigSchema.shape.crawler.partial()
}).partial();

type PartialConfig = z.infer<typeof PartialConfigSchema>;

export const CONFIG_FILE_NAME = 'sitesearch.config.json';

export const defaultConfig: SiteSearchConfig = {
  seedUrl: 'https://example.com',
  keyword: 'test',
  logLevel: 'info',
  crawler: {
    maxDepth: 3,
    timeout: 5000,
    userAgent: 'sitesearch-bot/1.0'
  }
};

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got '${value}'`, { name, value });
  }
  return parsed;
}

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const crawler: PartialConfig['crawler'] = {};
  const maxDepth = parseInteger('SITESEARCH_MAX_DEPTH', env.SITESEARCH_MAX_DEPTH);
  const timeout = parseInteger('SITESEARCH_TIMEOUT_MS', env.SITESEARCH_TIMEOUT_MS);
  if (maxDepth !== undefined) crawler.maxDepth = maxDepth;
  if (timeout !== undefined) crawler.timeout = timeout;
  if (env.SITESEARCH_USER_AGENT) crawler.userAgent = env.SITESEARCH_USER_AGENT;

  const overrides: Record<string, unknown> = { crawler };
  if (env.SITESEARCH_SEED_URL) overrides.seedUrl = env.SITESEARCH_SEED_URL;
  if (env.SITESEARCH_KEYWORD !== undefined) overrides.keyword = env.SITESEARCH_KEYWORD;
  if (env.SITESEARCH_LOG_LEVEL) overrides.logLevel = env.SITESEARCH_LOG_LEVEL.toLowerCase();
  if (env.SITESEARCH_LOG_FILE) overrides.logFile = env.SITESEARCH_LOG_FILE;

  return validatePartial(overrides, 'environment');
}

/**
 * Read overrides from a JSON config file; a missing file yields none
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${filePath}`, { filePath, originalError: error });
  }
  return validatePartial(raw, filePath);
}

function validatePartial(raw: unknown, origin: string): PartialConfig {
  const result = PartialConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${origin}`, { issues: result.error.issues });
  }
  return result.data;
}

/**
 * Merge layers on top of the defaults and validate the result
 */
export function mergeConfig(...layers: PartialConfig[]): SiteSearchConfig {
  let merged: PartialConfig = defaultConfig;
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      crawler: { ...merged.crawler, ...layer.crawler }
    };
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', { issues: result.error.issues });
  }
  return result.data;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SiteSearchConfig {
  return mergeConfig(configFromFile(path.join(cwd, CONFIG_FILE_NAME)), configFromEnv(env));
}

let config = loadConfig();

export { config };

export function reloadConfig(): SiteSearchConfig {
  config = loadConfig();
  return config;
}
