/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Readable } from 'node:stream';

/**
 * Authorization to perform storage operations, as produced by
 * {@link ObjectStorage.parseAccess}. Opaque to routing.
 */
export interface AccessGrant {
  readonly serialized: string;
}

export interface ObjectInfo {
  key: string;
  size: number;
  created: Date;
  contentType?: string;
}

export interface ListItem {
  key: string;
  isPrefix: boolean;
  size: number;
}

export interface StorageCallOptions {
  signal?: AbortSignal;
}

export interface ObjectProject {
  statObject(
    bucket: string,
    key: string,
    options?: StorageCallOptions,
  ): Promise<ObjectInfo>;
  // Non-recursive; prefix is empty or ends in '/'.
  listObjects(
    bucket: string,
    options: StorageCallOptions & { prefix: string },
  ): AsyncIterable<ListItem>;
  downloadObject(
    bucket: string,
    key: string,
    options?: StorageCallOptions & { offset?: number; length?: number },
  ): Promise<Readable>;
  close(): Promise<void>;
}

export interface ObjectStorage {
  parseAccess(serializedAccess: string): AccessGrant;
  openProject(
    access: AccessGrant,
    options?: StorageCallOptions,
  ): Promise<ObjectProject>;
}

export interface AccessKeyResolution {
  accessGrant: string;
  public: boolean;
}

export interface AccessKeyResolver {
  resolve(
    accessKeyId: string,
    options?: { signal?: AbortSignal },
  ): Promise<AccessKeyResolution>;
}

export interface TxtRecordClient {
  // One string per record, with split character-strings already joined.
  lookupTxt(host: string, options?: { signal?: AbortSignal }): Promise<string[]>;
}

export interface CustomDomainAccess {
  readonly access: AccessGrant;
  readonly root: string;
  readonly fetchedAt: number;
}

export type RoutingMode = 'traditional' | 'raw' | 'custom-domain';

export interface TraditionalRoutingResult {
  mode: 'traditional' | 'raw';
  access: AccessGrant;
  serializedAccess: string;
  bucket: string;
  key: string;
  // HEAD requests are answered with the object's location only.
  locationOnly: boolean;
}

export interface CustomDomainRoutingResult {
  mode: 'custom-domain';
  access: AccessGrant;
  host: string;
  root: string;
  bucket: string;
  key: string;
}

export type RoutingResult = TraditionalRoutingResult | CustomDomainRoutingResult;
