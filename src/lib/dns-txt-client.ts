/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Resolver } from 'node:dns/promises';
import winston from 'winston';

import type { TxtRecordClient } from '../types.js';

export type TxtResolver = Pick<Resolver, 'resolveTxt' | 'cancel'>;

export const DEFAULT_DNS_TIMEOUT_MS = 5000;

/**
 * TXT lookups over node:dns. Every lookup gets its own resolver so that
 * aborting one request cancels only its own queries.
 */
export class NodeDnsTxtClient implements TxtRecordClient {
  private log: winston.Logger;
  private createResolver: () => TxtResolver;

  constructor({
    log,
    server,
    timeoutMs = DEFAULT_DNS_TIMEOUT_MS,
    createResolver,
  }: {
    log: winston.Logger;
    server?: string;
    timeoutMs?: number;
    createResolver?: () => TxtResolver;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.createResolver =
      createResolver ??
      (() => {
        const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
        if (server !== undefined) {
          resolver.setServers([server]);
        }
        return resolver;
      });
  }

  async lookupTxt(
    host: string,
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<string[]> {
    signal?.throwIfAborted();

    const resolver = this.createResolver();
    const onAbort = () => resolver.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const records = await resolver.resolveTxt(host);
      this.log.debug('Resolved TXT records', {
        host,
        count: records.length,
      });
      // Long values are split into several character-strings per record.
      return records.map((chunks) => chunks.join(''));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
