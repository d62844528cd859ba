/**
 * Configuration
 *
 * Settings come from environment variables. The entry point loads `.env`
 * through dotenv before anything here is read.
 */

import path from 'path';
import type { AppConfig, Environment, LogLevelName, NameSearchSettings } from '../types';

export const DEFAULT_SEED_FILE = path.join('data', 'students.json');

export const DEFAULT_NAME_SEARCH: NameSearchSettings = {
  threshold: 0.4,
  limit: 10,
};

const ENVIRONMENTS: readonly Environment[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export interface ConfigResult {
  config: AppConfig;
  /** Settings that were present but unusable and fell back to a default. */
  warnings: string[];
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((e) => e === value);
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some((l) => l === value);
}

export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const value = (env.NODE_ENV || '').trim().toLowerCase();
  return isEnvironment(value) ? value : 'production';
}

/**
 * Log threshold: LOG_LEVEL when set, otherwise derived from NODE_ENV
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevelName {
  const explicit = (env.LOG_LEVEL || '').trim().toLowerCase();
  if (isLogLevelName(explicit)) return explicit;

  const environment = resolveEnvironment(env);
  if (environment === 'test') return 'error';
  if (environment === 'development') return 'debug';
  return 'warn';
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConfigResult {
  const warnings: string[] = [];

  const rawNodeEnv = env.NODE_ENV?.trim();
  if (rawNodeEnv && !isEnvironment(rawNodeEnv.toLowerCase())) {
    warnings.push(`Unknown NODE_ENV "${rawNodeEnv}", using production`);
  }

  const rawLogLevel = env.LOG_LEVEL?.trim();
  if (rawLogLevel && !isLogLevelName(rawLogLevel.toLowerCase())) {
    warnings.push(`Unknown LOG_LEVEL "${rawLogLevel}", using the ${resolveEnvironment(env)} default`);
  }

  const seedFile = path.resolve(cwd, env.STUDENTS_SEED_FILE?.trim() || DEFAULT_SEED_FILE);

  let threshold = DEFAULT_NAME_SEARCH.threshold;
  const rawThreshold = env.NAME_SEARCH_THRESHOLD?.trim();
  if (rawThreshold) {
    const parsed = Number(rawThreshold);
    if (Number.isFinite(parsed) && parsed >= 0 && parsed <= 1) {
      threshold = parsed;
    } else {
      warnings.push(`NAME_SEARCH_THRESHOLD must be between 0 and 1, got "${rawThreshold}"`);
    }
  }

  let limit = DEFAULT_NAME_SEARCH.limit;
  const rawLimit = env.NAME_SEARCH_LIMIT?.trim();
  if (rawLimit) {
    const parsed = Number(rawLimit);
    if (Number.isInteger(parsed) && parsed > 0) {
      limit = parsed;
    } else {
      warnings.push(`NAME_SEARCH_LIMIT must be a positive whole number, got "${rawLimit}"`);
    }
  }

  return {
    config: {
      logLevel: resolveLogLevel(env),
      seedFile,
      nameSearch: { threshold, limit },
    },
    warnings,
  };
}
