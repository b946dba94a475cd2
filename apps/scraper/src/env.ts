import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';

const currentDir = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(currentDir, '../../../');

/**
 * Load `.env`, then `.env.local` on top, from the repository root.
 * Variables already set in the process environment are kept.
 */
export function loadEnvFiles(root: string = repoRoot): void {
  const envPath = resolve(root, '.env');
  const envLocalPath = resolve(root, '.env.local');

  if (existsSync(envPath)) {
    config({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    config({ path: envLocalPath, override: true });
  }
}
