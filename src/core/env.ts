/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import { ConfigurationError } from '@/core/errors';

export interface EnvConfig {
  fmpApiKey: string;
  polygonApiKey: string | null;
  scoringPreset: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

export function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function requireEnvVar(name: string): string {
  const value = getEnvVar(name);
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw) ?? 'info';

  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';
  const nodeEnv = NODE_ENVS.find((env) => env === nodeEnvRaw) ?? 'development';

  return {
    fmpApiKey: requireEnvVar('FMP_API_KEY'),
    polygonApiKey: getEnvVar('POLYGON_API_KEY') ?? null,
    scoringPreset: getEnvVar('SCORING_PRESET') ?? null,
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
