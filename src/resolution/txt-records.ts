/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { LRUCache } from 'lru-cache';
import winston from 'winston';

import { RoutingError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import type { CustomDomainAccess, TxtRecordClient } from '../types.js';
import type { AccessDecoder } from './access-decoder.js';

export const DEFAULT_TXT_RECORD_TTL_SECONDS = 60 * 60; // 1 hour
export const DEFAULT_TXT_RECORD_CACHE_MAX_ENTRIES = 10000;
export const DEFAULT_TXT_RECORD_TAG_PREFIX = 'share';

export interface TxtRecordFields {
  serializedAccess?: string;
  root?: string;
}

/**
 * Picks the access and storage root fields out of a host's TXT records.
 * Fields look like "<prefix>-access=<token>" and "<prefix>-root=<bucket/path>";
 * a ':' separator is accepted too. The first record for a field wins and
 * empty values are ignored.
 */
export function parseTxtRecords(
  records: string[],
  tagPrefix: string = DEFAULT_TXT_RECORD_TAG_PREFIX,
): TxtRecordFields {
  const fields: TxtRecordFields = {};
  for (const record of records) {
    const match = /^\s*([^=:\s]+)\s*[=:](.*)$/.exec(record);
    if (match === null) {
      continue;
    }
    const tag = match[1];
    const value = match[2].trim();
    if (value === '') {
      continue;
    }

    // Either '-' or '_' may join the prefix and the field name.
    const field = tag.startsWith(tagPrefix)
      ? /^[-_](access|root)$/.exec(tag.slice(tagPrefix.length))?.[1]
      : undefined;
    if (field === 'access' && fields.serializedAccess === undefined) {
      fields.serializedAccess = value;
    } else if (field === 'root' && fields.root === undefined) {
      fields.root = value;
    }
  }
  return fields;
}

/**
 * Resolves custom domains to an access grant and storage root through DNS
 * TXT records, caching results per host for a fixed TTL.
 *
 * Concurrent misses for one host each query DNS; the last one to finish
 * replaces the cached entry. Entries are frozen and replaced whole.
 */
export class TxtRecords {
  private log: winston.Logger;
  private dns: TxtRecordClient;
  private accessDecoder: Pick<AccessDecoder, 'decode'>;
  private ttlMs: number;
  private tagPrefix: string;
  private requirePublicAccess: boolean;
  private now: () => number;
  private cache: LRUCache<string, CustomDomainAccess>;

  constructor({
    log,
    dns,
    accessDecoder,
    ttlSeconds = DEFAULT_TXT_RECORD_TTL_SECONDS,
    maxEntries = DEFAULT_TXT_RECORD_CACHE_MAX_ENTRIES,
    tagPrefix = DEFAULT_TXT_RECORD_TAG_PREFIX,
    requirePublicAccess = false,
    now = Date.now,
  }: {
    log: winston.Logger;
    dns: TxtRecordClient;
    accessDecoder: Pick<AccessDecoder, 'decode'>;
    ttlSeconds?: number;
    maxEntries?: number;
    tagPrefix?: string;
    requirePublicAccess?: boolean;
    now?: () => number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.dns = dns;
    this.accessDecoder = accessDecoder;
    this.ttlMs = ttlSeconds * 1000;
    this.tagPrefix = tagPrefix;
    this.requirePublicAccess = requirePublicAccess;
    this.now = now;
    this.cache = new LRUCache({ max: maxEntries });
  }

  async fetchAccessForHost(
    host: string,
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<CustomDomainAccess> {
    const log = this.log.child({ method: 'fetchAccessForHost', host });

    const cached = this.cache.get(host);
    if (cached !== undefined && this.now() < cached.fetchedAt + this.ttlMs) {
      metrics.txtRecordCacheRequestsCounter.inc({ result: 'hit' });
      log.debug('Found TXT record access in cache');
      return cached;
    }
    metrics.txtRecordCacheRequestsCounter.inc({ result: 'miss' });

    let records: string[];
    const end = metrics.txtRecordLookupDuration.startTimer();
    try {
      records = await this.dns.lookupTxt(host, { signal });
    } catch (error) {
      log.warn('TXT record lookup failed', {
        message: error instanceof Error ? error.message : String(error),
      });
      throw new RoutingError('DNSResolutionFailed', 'TXT record lookup failed', {
        cause: error,
        host,
      });
    } finally {
      end();
    }

    const { serializedAccess, root } = parseTxtRecords(records, this.tagPrefix);
    if (serializedAccess === undefined || root === undefined) {
      throw new RoutingError(
        'CustomDomainNotConfigured',
        `missing ${this.tagPrefix}-access or ${this.tagPrefix}-root TXT record`,
        { host },
      );
    }
    if (root.startsWith('/')) {
      throw new RoutingError(
        'CustomDomainNotConfigured',
        'storage root does not name a bucket',
        { host, root },
      );
    }

    const access = await this.accessDecoder.decode(serializedAccess, {
      signal,
      requirePublic: this.requirePublicAccess,
    });

    const entry: CustomDomainAccess = Object.freeze({
      access,
      root,
      fetchedAt: this.now(),
    });
    this.cache.set(host, entry);
    log.debug('Cached TXT record access', { root });

    return entry;
  }
}
