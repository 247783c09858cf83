/**
 * S3 static site uploader
 *
 * Uploads a build output folder file by file. Keys are the prefix plus the
 * file's POSIX path relative to the folder, so re-uploading the same build
 * overwrites the same objects.
 */

import { readdirSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import {
  S3Client,
  PutObjectCommand,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { StepFailure, formatError } from '../errors.js';
import { retryWithBackoff, type RetryOptions } from '../aws-retry.js';
import { createSilentLogger, type StructuredLogger } from '../../monitoring/structured-logger.js';
import type { IStorageUploader } from '../interfaces.js';
import type { UploadSummary } from '../../types.js';

/**
 * The S3 calls the uploader makes
 */
export interface S3Api {
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
}

export function createS3Api(client: S3Client): S3Api {
  return {
    putObject: input => client.send(new PutObjectCommand(input)),
  };
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.mjs': 'application/javascript',
  '.json': 'application/json',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.eot': 'application/vnd.ms-fontobject',
  '.xml': 'application/xml',
  '.txt': 'text/plain',
  '.map': 'application/json',
  '.webmanifest': 'application/manifest+json',
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * HTML must be revalidated so a new deploy shows up immediately; hashed assets can be cached
 */
export function cacheControlFor(filePath: string): string {
  return contentTypeFor(filePath) === 'text/html'
    ? 'no-cache, no-store, must-revalidate'
    : 'public, max-age=31536000';
}

/**
 * Object key for a file: `prefix/relative/path`, with no leading slash
 */
export function toObjectKey(prefix: string, relativePath: string): string {
  const posixPath = relativePath.split(sep).join('/');
  const cleanPrefix = prefix.replace(/^\/+|\/+$/g, '');
  return cleanPrefix ? `${cleanPrefix}/${posixPath}` : posixPath;
}

/**
 * Every regular file under `dir`, depth first, in name order
 */
export function collectFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...collectFiles(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export class S3Uploader implements IStorageUploader {
  constructor(
    private readonly api: S3Api,
    private readonly logger: StructuredLogger = createSilentLogger(),
    private readonly retry: RetryOptions = {}
  ) {}

  async upload(sourceDir: string, bucket: string, prefix: string, makePublic: boolean): Promise<UploadSummary> {
    let files: string[];
    try {
      files = collectFiles(sourceDir);
    } catch (error) {
      throw new StepFailure('UploadFailed', `Cannot read build output ${sourceDir}: ${formatError(error)}`);
    }
    if (files.length === 0) {
      throw new StepFailure('UploadFailed', `Build output ${sourceDir} contains no files`);
    }

    const keys: string[] = [];
    for (const file of files) {
      const key = toObjectKey(prefix, relative(sourceDir, file));
      try {
        const body = await readFile(file);
        const input: PutObjectCommandInput = {
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentTypeFor(file),
          CacheControl: cacheControlFor(file),
        };
        if (makePublic) {
          input.ACL = 'public-read';
        }
        // PUT of the same key is an overwrite, so transient failures are safe to retry
        await retryWithBackoff(() => this.api.putObject(input), this.retry);
      } catch (error) {
        throw new StepFailure(
          'UploadFailed',
          `Failed to upload ${key} to s3://${bucket}: ${formatError(error)}`,
          { uploadedFileCount: keys.length }
        );
      }
      keys.push(key);
      this.logger.debug('Uploaded object', { key });
    }

    this.logger.info('Upload complete', { bucket, fileCount: keys.length });
    return { fileCount: keys.length, keys };
  }
}
