import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import path from 'path';
import { DEFAULT_DEEP_LINK_SCHEME } from '../domain/deepLinks';

let loadedFrom: string | null = null;

export function getAppEnv(): string {
  return process.env.APP_ENV ?? process.env.NODE_ENV ?? 'development';
}

/**
 * Load `.env`, `.env.<env>`, `.env.local`, `.env.<env>.local` from `root`, later
 * files overriding earlier ones. Runs once per root.
 */
export function loadEnvFiles(root: string = process.cwd()): void {
  if (loadedFrom === root) return;
  loadedFrom = root;

  // Silence noisy dotenv tips when loading multiple files.
  if (!process.env.DOTENV_CONFIG_QUIET) {
    process.env.DOTENV_CONFIG_QUIET = 'true';
  }

  const appEnv = getAppEnv();
  const envFiles = ['.env', `.env.${appEnv}`, '.env.local', `.env.${appEnv}.local`];
  envFiles.forEach((file) => {
    const fullPath = path.resolve(root, file);
    if (existsSync(fullPath)) {
      loadEnv({ path: fullPath, override: true });
    }
  });
}

export function getEnvVar(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function getSupabaseUrl(): string | undefined {
  return getEnvVar('SUPABASE_URL');
}

export function getSupabasePublishableKey(): string | undefined {
  return getEnvVar('SUPABASE_PUBLISHABLE_KEY');
}

export function getDeepLinkScheme(): string {
  return (getEnvVar('DEEP_LINK_SCHEME') ?? DEFAULT_DEEP_LINK_SCHEME).toLowerCase();
}

export function getCompanionStoragePath(): string {
  return getEnvVar('COMPANION_STORAGE_PATH') ?? path.resolve(process.cwd(), '.schoolday', 'companion.json');
}

export function isDebugLoggingEnabled(): boolean {
  const flag = getEnvVar('SCHOOLDAY_DEBUG_LOGS');
  if (flag === '1' || flag === 'true') return true;
  if (flag === '0' || flag === 'false') return false;
  return getAppEnv() === 'development';
}
