/**
 * Local directory target
 *
 * Copies the build output to a folder on this machine instead of a bucket,
 * e.g. to preview a build or hand it to another web server.
 */

import { copy, pathExists, remove } from 'fs-extra/esm';
import { basename, dirname, join, resolve, sep } from 'path';
import { StepFailure, formatError } from '../lib/errors.js';
import { collectFiles } from '../lib/s3/uploader.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type { ILocalPublisher, LocalCopyOptions } from '../lib/interfaces.js';
import type { LocalCopySummary } from '../types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function timestampSuffix(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Absolute target folder, with the timestamp suffix when requested
 */
export function resolveDestination(destination: string, timestamp: boolean, now: Date): string {
  const absolute = resolve(destination);
  if (!timestamp) return absolute;
  return join(dirname(absolute), `${basename(absolute)}_${timestampSuffix(now)}`);
}

function isInside(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent + sep);
}

export class LocalDirectoryPublisher implements ILocalPublisher {
  constructor(
    private readonly logger: StructuredLogger = createSilentLogger(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async copyOutput(sourceDir: string, destination: string, options: LocalCopyOptions): Promise<LocalCopySummary> {
    const source = resolve(sourceDir);
    const target = resolveDestination(destination, options.timestamp, this.now());

    if (isInside(target, source)) {
      throw new StepFailure('LocalCopyFailed', `Destination ${target} is inside the build output ${source}`);
    }
    // Cleaning a parent of the output would delete the build itself
    if (isInside(source, target)) {
      throw new StepFailure('LocalCopyFailed', `Destination ${target} contains the build output ${source}`);
    }

    let fileCount: number;
    try {
      fileCount = collectFiles(source).length;
    } catch (error) {
      throw new StepFailure('LocalCopyFailed', `Cannot read build output ${source}: ${formatError(error)}`);
    }
    if (fileCount === 0) {
      throw new StepFailure('LocalCopyFailed', `Build output ${source} contains no files`);
    }

    try {
      if (options.clean && (await pathExists(target))) {
        this.logger.warn('Removing existing destination', { destination: target });
        await remove(target);
      }
      await copy(source, target, { overwrite: true });
    } catch (error) {
      throw new StepFailure('LocalCopyFailed', `Failed to copy ${source} to ${target}: ${formatError(error)}`);
    }

    this.logger.info('Copied build output', { destination: target, fileCount });
    return { destination: target, fileCount };
  }
}
