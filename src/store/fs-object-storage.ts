/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import bs58check from 'bs58check';
import fs, { type Dirent } from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import winston from 'winston';

import { DetailedError, RoutingError } from '../lib/error.js';
import type {
  AccessGrant,
  ListItem,
  ObjectInfo,
  ObjectProject,
  ObjectStorage,
  StorageCallOptions,
} from '../types.js';

/**
 * Access grant understood by {@link FsObjectStorage}: a base58 check encoded
 * JSON document behind version byte 0. Without a bucket list every bucket
 * is accessible.
 */
export interface FsAccessGrant extends AccessGrant {
  readonly buckets: readonly string[] | undefined;
}

export function encodeFsAccess({ buckets }: { buckets?: string[] } = {}) {
  const payload = Buffer.from(JSON.stringify(buckets ? { buckets } : {}));
  return bs58check.encode(Buffer.concat([Buffer.from([0]), payload]));
}

export function decodeFsAccess(serialized: string): FsAccessGrant {
  const decoded = bs58check.decode(serialized);
  if (decoded[0] !== 0) {
    throw new DetailedError('Unsupported access version', {
      version: decoded[0],
    });
  }

  const document: unknown = JSON.parse(
    Buffer.from(decoded.subarray(1)).toString('utf8'),
  );
  if (typeof document !== 'object' || document === null) {
    throw new DetailedError('Access payload is not an object');
  }

  let buckets: string[] | undefined;
  if ('buckets' in document && document.buckets !== undefined) {
    const value = document.buckets;
    if (
      !Array.isArray(value) ||
      !value.every((bucket): bucket is string => typeof bucket === 'string')
    ) {
      throw new DetailedError('Access buckets must be a list of names');
    }
    buckets = value;
  }

  return Object.freeze({ serialized, buckets });
}

/**
 * Object storage backed by a local directory: each bucket is a directory
 * under baseDir and object keys are paths below it.
 */
export class FsObjectStorage implements ObjectStorage {
  private log: winston.Logger;
  private baseDir: string;

  constructor({ log, baseDir }: { log: winston.Logger; baseDir: string }) {
    this.log = log.child({ class: this.constructor.name });
    this.baseDir = path.resolve(baseDir);
  }

  parseAccess(serializedAccess: string): FsAccessGrant {
    return decodeFsAccess(serializedAccess);
  }

  async openProject(
    access: AccessGrant,
    { signal }: StorageCallOptions = {},
  ): Promise<ObjectProject> {
    signal?.throwIfAborted();
    const { buckets } = decodeFsAccess(access.serialized);
    return new FsObjectProject({
      log: this.log,
      baseDir: this.baseDir,
      buckets,
    });
  }
}

class FsObjectProject implements ObjectProject {
  private log: winston.Logger;
  private baseDir: string;
  private buckets: readonly string[] | undefined;

  constructor({
    log,
    baseDir,
    buckets,
  }: {
    log: winston.Logger;
    baseDir: string;
    buckets: readonly string[] | undefined;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.baseDir = baseDir;
    this.buckets = buckets;
  }

  private async bucketDir(bucket: string) {
    const allowed =
      bucket !== '' &&
      bucket !== '.' &&
      bucket !== '..' &&
      !bucket.includes('/') &&
      !bucket.includes('\\') &&
      (this.buckets === undefined || this.buckets.includes(bucket));
    const dir = path.join(this.baseDir, bucket);
    if (allowed) {
      try {
        if ((await fs.promises.stat(dir)).isDirectory()) {
          return dir;
        }
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
    throw new RoutingError('BucketNotFound', 'bucket not found', { bucket });
  }

  // Keys map onto paths segment by segment, so segments that the filesystem
  // would collapse or climb out of cannot name an object.
  private keySegments(key: string) {
    const segments = key.split('/');
    if (
      segments.some(
        (segment) =>
          segment === '' ||
          segment === '.' ||
          segment === '..' ||
          segment.includes('\\'),
      )
    ) {
      return undefined;
    }
    return segments;
  }

  private async objectPath(bucket: string, key: string) {
    const dir = await this.bucketDir(bucket);
    const segments = this.keySegments(key);
    if (segments === undefined) {
      throw new RoutingError('ObjectNotFound', 'object not found', {
        bucket,
        key,
      });
    }
    return path.join(dir, ...segments);
  }

  async statObject(
    bucket: string,
    key: string,
    { signal }: StorageCallOptions = {},
  ): Promise<ObjectInfo> {
    signal?.throwIfAborted();
    const objectPath = await this.objectPath(bucket, key);
    try {
      const stats = await fs.promises.stat(objectPath);
      if (stats.isFile()) {
        return { key, size: stats.size, created: stats.mtime };
      }
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
    throw new RoutingError('ObjectNotFound', 'object not found', {
      bucket,
      key,
    });
  }

  async *listObjects(
    bucket: string,
    { prefix, signal }: StorageCallOptions & { prefix: string },
  ): AsyncIterable<ListItem> {
    if (prefix !== '' && !prefix.endsWith('/')) {
      throw new DetailedError('Listing prefix must end with a slash', {
        prefix,
      });
    }
    const dir = await this.bucketDir(bucket);
    const segments =
      prefix === '' ? [] : this.keySegments(prefix.slice(0, -1));
    if (segments === undefined) {
      return;
    }

    let entries: Dirent[];
    try {
      entries = await fs.promises.readdir(path.join(dir, ...segments), {
        withFileTypes: true,
      });
    } catch (error) {
      // A prefix without objects lists as empty.
      if (isNotFound(error) || isNotDirectory(error)) {
        return;
      }
      throw error;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      signal?.throwIfAborted();
      if (entry.isDirectory()) {
        yield { key: `${prefix}${entry.name}/`, isPrefix: true, size: 0 };
      } else if (entry.isFile()) {
        const stats = await fs.promises.stat(
          path.join(dir, ...segments, entry.name),
        );
        yield { key: prefix + entry.name, isPrefix: false, size: stats.size };
      }
    }
  }

  async downloadObject(
    bucket: string,
    key: string,
    {
      offset = 0,
      length,
      signal,
    }: StorageCallOptions & { offset?: number; length?: number } = {},
  ): Promise<Readable> {
    signal?.throwIfAborted();
    const objectPath = await this.objectPath(bucket, key);
    this.log.debug('Opening object stream', { bucket, key, offset, length });
    return fs.createReadStream(objectPath, {
      start: offset,
      // end is inclusive
      end: length !== undefined ? offset + length - 1 : undefined,
      signal,
    });
  }

  async close() {
    // Nothing is held open between calls.
  }
}

function errorCode(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error
    ? error.code
    : undefined;
}

function isNotFound(error: unknown) {
  return errorCode(error) === 'ENOENT';
}

function isNotDirectory(error: unknown) {
  return errorCode(error) === 'ENOTDIR';
}
