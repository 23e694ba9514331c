/**
 * Load the .env file from the project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Walk up from startPath until a directory holding .env is found
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from the project root .env file,
 * falling back to the working directory
 */
export function loadEnvFromRoot(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  const projectRoot = findProjectRoot(here);

  if (projectRoot) {
    dotenv.config({ path: join(projectRoot, '.env') });
  } else {
    dotenv.config();
  }
}
