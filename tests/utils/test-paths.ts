/**
 * Test Path Utilities
 *
 * Provides clean path constants for test files to avoid messy relative paths,
 * plus scratch directories for tests that write files.
 */

import * as path from 'node:path';
import * as fs from 'node:fs';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';

// Tests run from their TypeScript sources, so this file lives at
// tests/utils/test-paths.ts and the repo root is two levels up
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const REPO_ROOT = path.resolve(__dirname, '../../');

export const FIXTURES_DIR = path.join(REPO_ROOT, 'tests', 'utils', 'fixtures');

// Validate that paths exist and point to the right location
function validatePaths(): void {
  if (!fs.existsSync(FIXTURES_DIR)) {
    throw new Error(
      `Fixtures directory not found at: ${FIXTURES_DIR}\n` +
      `Calculated from REPO_ROOT: ${REPO_ROOT}\n` +
      `Test may be running from unexpected location.`
    );
  }
}

// Validate paths on module load
validatePaths();

/**
 * Absolute path of a fixture file
 */
export function fixturePath(filename: string): string {
  const filepath = path.join(FIXTURES_DIR, filename);
  if (!fs.existsSync(filepath)) {
    throw new Error(
      `Fixture not found: ${filename}\n` +
      `Looked in: ${FIXTURES_DIR}`
    );
  }
  return filepath;
}

/**
 * Create an empty scratch directory under the OS temp dir
 */
export function createScratchDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'raster-filters-'));
}

/**
 * Remove a scratch directory and everything in it
 */
export function removeScratchDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
