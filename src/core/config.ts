/**
 * Application paths resolved from the project root and ENV
 */

import { isAbsolute, join } from 'path';

export interface AppConfig {
  projectRoot: string;
  configDir: string;
  presetsDir: string;
  tickersFile: string;
  outputDir: string;
}

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function resolveFromRoot(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const configDir = join(projectRoot, 'config');

  return {
    projectRoot,
    configDir,
    presetsDir: join(configDir, 'presets'),
    tickersFile: resolveFromRoot(
      projectRoot,
      process.env.TICKERS_FILE || join('config', 'tickers.txt')
    ),
    outputDir: resolveFromRoot(projectRoot, process.env.OUTPUT_DIR || 'output'),
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
