/**
 * Loads `.env.local` then `.env` from a directory into process.env.
 * Variables already set are never overwritten, so the first file wins.
 */

import dotenv from 'dotenv';
import { join } from 'path';

export function loadEnvFiles(dir: string): void {
  dotenv.config({ path: join(dir, '.env.local') });
  dotenv.config({ path: join(dir, '.env') });
}
