/**
 * Shared test utilities for sitelaunch
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

/**
 * Create a temporary directory for testing
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'sitelaunch-test-'));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files (relative path -> contents) under `root`, creating folders as needed
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, contents);
  }
}
