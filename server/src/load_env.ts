import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * Loads the first env file found in `cwd` or its parent. Variables already
 * set in the process environment win.
 */
export function loadEnv(cwd = process.cwd()): string | null {
  const candidates = ENV_FILES.flatMap((file) => [path.resolve(cwd, file), path.resolve(cwd, '..', file)]);
  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) return null;
  dotenv.config({ path: envPath });
  return envPath;
}
