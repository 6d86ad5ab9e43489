/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { RoutingError, toRoutingError } from '../lib/error.js';
import { compareHosts, stripPort } from '../lib/hosts.js';
import { parseRequestPath } from '../lib/request-path.js';
import { determineBucketAndObjectKey } from '../lib/storage-root.js';
import type { RoutingResult } from '../types.js';
import type { AccessDecoder } from './access-decoder.js';
import type { TxtRecords } from './txt-records.js';

export interface ShareRequest {
  method: string;
  host: string;
  // Decoded URL path, without the query string.
  path: string;
  signal?: AbortSignal;
}

/**
 * Decides which bucket and key a request refers to and which access grant
 * authorizes it. Requests for the base host carry the access in their path;
 * requests for any other host are custom domains configured through DNS.
 */
export class ShareRequestRouter {
  private log: winston.Logger;
  private baseHost: string;
  private accessDecoder: Pick<AccessDecoder, 'decode'>;
  private txtRecords: Pick<TxtRecords, 'fetchAccessForHost'>;

  constructor({
    log,
    baseHost,
    accessDecoder,
    txtRecords,
  }: {
    log: winston.Logger;
    baseHost: string;
    accessDecoder: Pick<AccessDecoder, 'decode'>;
    txtRecords: Pick<TxtRecords, 'fetchAccessForHost'>;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.baseHost = baseHost;
    this.accessDecoder = accessDecoder;
    this.txtRecords = txtRecords;
  }

  async route(request: ShareRequest): Promise<RoutingResult> {
    try {
      return await this.routeRequest(request);
    } catch (error) {
      throw toRoutingError(error, request.signal);
    }
  }

  private async routeRequest({
    method,
    host,
    path,
    signal,
  }: ShareRequest): Promise<RoutingResult> {
    if (!compareHosts(host, this.baseHost)) {
      return this.routeCustomDomain({ host, path, signal });
    }

    if (method !== 'GET' && method !== 'HEAD') {
      throw new RoutingError('MethodNotAllowed', 'method not allowed', {
        method,
      });
    }

    const { rawRequest, serializedAccess, bucket, key } =
      parseRequestPath(path);
    const access = await this.accessDecoder.decode(serializedAccess, {
      signal,
    });

    return {
      mode: rawRequest ? 'raw' : 'traditional',
      access,
      serializedAccess,
      bucket,
      key,
      locationOnly: method === 'HEAD',
    };
  }

  private async routeCustomDomain({
    host,
    path,
    signal,
  }: {
    host: string;
    path: string;
    signal?: AbortSignal;
  }): Promise<RoutingResult> {
    const bareHost = stripPort(host);
    const { access, root } = await this.txtRecords.fetchAccessForHost(
      bareHost,
      { signal },
    );
    const { bucket, key } = determineBucketAndObjectKey(root, path);
    this.log.debug('Routed custom domain request', {
      host: bareHost,
      bucket,
      key,
    });

    return { mode: 'custom-domain', access, host: bareHost, root, bucket, key };
  }
}
