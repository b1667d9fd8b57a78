import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync, readFileSync } from 'node:fs';
import type { Logger } from './logger.js';

export interface EnvLoaderOptions {
  logger?: Partial<Logger>;
}

export interface EnvLoaderResult {
  loaded: string[];
}

function declaresWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    return false;
  }
}

function findWorkspaceRoot(startDir: string): string | null {
  let current = startDir;
  const root = resolve('/');
  while (current !== root) {
    const packageJsonPath = resolve(current, 'package.json');
    if (existsSync(packageJsonPath) && declaresWorkspaces(packageJsonPath)) {
      return current;
    }
    current = dirname(current);
  }
  return null;
}

/**
 * Load environment variables from .env files.
 *
 * Searches for .env files in the following order (first file found takes priority):
 * 1. Workspace root (the nearest package.json declaring `workspaces`)
 * 2. Current working directory (as fallback)
 *
 * @param callerUrl - The import.meta.url of the calling module
 * @returns Object containing list of loaded .env file paths
 */
export function loadEnv(callerUrl: string, options: EnvLoaderOptions = {}): EnvLoaderResult {
  const callerDir = dirname(fileURLToPath(callerUrl));
  const workspaceRoot = findWorkspaceRoot(callerDir);
  const loaded: string[] = [];

  if (workspaceRoot) {
    const rootEnvPath = resolve(workspaceRoot, '.env');
    if (existsSync(rootEnvPath)) {
      const result = dotenvConfig({ path: rootEnvPath });
      if (result.parsed) {
        loaded.push(rootEnvPath);
        options.logger?.debug?.(`[env] Loaded: ${rootEnvPath}`);
      }
    }
  }

  // Fallback: never overrides values that are already set.
  const cwdEnvPath = resolve(process.cwd(), '.env');
  if (!loaded.includes(cwdEnvPath) && existsSync(cwdEnvPath)) {
    const result = dotenvConfig({ path: cwdEnvPath, override: false });
    if (result.parsed) {
      loaded.push(cwdEnvPath);
      options.logger?.debug?.(`[env] Loaded (fallback): ${cwdEnvPath}`);
    }
  }

  return { loaded };
}
