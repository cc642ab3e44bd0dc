import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

export const USER_ENV_FILE = path.join('.workbalance', '.env');

/**
 * Picks the dotenv file for this run: `.env.local` in the working directory when started
 * through tsx or with NODE_ENV=development, the per-user file otherwise.
 */
export function resolveEnvFile(runtime: string, nodeEnv: string | undefined): string {
  if (runtime.includes('tsx') || nodeEnv === 'development') {
    return path.resolve('.env.local');
  }
  return path.join(os.homedir(), USER_ENV_FILE);
}

// Test runs configure themselves; a developer's .env.local must not leak into them.
export function loadEnv(): void {
  if (process.env.VITEST) return;
  dotenv.config({ path: resolveEnvFile(process.argv[0], process.env.NODE_ENV) });
}
