/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import bs58check from 'bs58check';
import winston from 'winston';

import { RoutingError, isRoutingError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import type {
  AccessGrant,
  AccessKeyResolution,
  AccessKeyResolver,
  ObjectStorage,
} from '../types.js';

// Version bytes recovered by base58 check decoding.
export const SERIALIZED_ACCESS_VERSION = 0;
export const ACCESS_KEY_ID_VERSION = 1;

/**
 * Turns the access token found in a URL or TXT record into an access grant.
 * Tokens are either serialized access grants or access key ids that the auth
 * service expands into one.
 */
export class AccessDecoder {
  private log: winston.Logger;
  private storage: Pick<ObjectStorage, 'parseAccess'>;
  private accessKeyResolver: AccessKeyResolver | undefined;

  constructor({
    log,
    storage,
    accessKeyResolver,
  }: {
    log: winston.Logger;
    storage: Pick<ObjectStorage, 'parseAccess'>;
    accessKeyResolver?: AccessKeyResolver;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.storage = storage;
    this.accessKeyResolver = accessKeyResolver;
  }

  async decode(
    token: string,
    {
      signal,
      requirePublic = true,
    }: { signal?: AbortSignal; requirePublic?: boolean } = {},
  ): Promise<AccessGrant> {
    let serializedAccess = token;

    const version = checkDecodeVersion(token);
    if (version === ACCESS_KEY_ID_VERSION) {
      serializedAccess = await this.resolveAccessKeyId(token, {
        signal,
        requirePublic,
      });
    } else if (version !== SERIALIZED_ACCESS_VERSION) {
      throw new RoutingError(
        'UnsupportedCredentialVersion',
        'invalid access version',
        { version },
      );
    }

    try {
      return this.storage.parseAccess(serializedAccess);
    } catch (error) {
      throw new RoutingError('InvalidCredential', 'invalid access', {
        cause: error,
      });
    }
  }

  private async resolveAccessKeyId(
    accessKeyId: string,
    { signal, requirePublic }: { signal?: AbortSignal; requirePublic: boolean },
  ): Promise<string> {
    if (this.accessKeyResolver === undefined) {
      throw new RoutingError(
        'InvalidCredential',
        'access key ids are not accepted without an auth service',
      );
    }

    let resolution: AccessKeyResolution;
    try {
      resolution = await this.accessKeyResolver.resolve(accessKeyId, {
        signal,
      });
    } catch (error) {
      metrics.accessKeyResolutionsCounter.inc({ result: 'error' });
      if (isRoutingError(error)) {
        throw error;
      }
      throw new RoutingError('InternalFailure', 'unable to resolve access', {
        cause: error,
      });
    }

    if (!resolution.public && requirePublic) {
      metrics.accessKeyResolutionsCounter.inc({ result: 'non_public' });
      this.log.warn('Rejected non-public access key id');
      throw new RoutingError(
        'NonPublicCredential',
        'non-public access key id',
      );
    }

    metrics.accessKeyResolutionsCounter.inc({ result: 'ok' });
    return resolution.accessGrant;
  }
}

function checkDecodeVersion(token: string): number {
  let decoded: Uint8Array;
  try {
    decoded = bs58check.decode(token);
  } catch (error) {
    throw new RoutingError('InvalidCredential', 'invalid access', {
      cause: error,
    });
  }

  if (decoded.length === 0) {
    throw new RoutingError('InvalidCredential', 'invalid access');
  }
  return decoded[0];
}
