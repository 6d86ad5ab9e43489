/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  default as axios,
  isAxiosError,
  type AxiosAdapter,
  type AxiosInstance,
} from 'axios';
import winston from 'winston';

import { RoutingError } from '../lib/error.js';
import type { AccessKeyResolution, AccessKeyResolver } from '../types.js';

export const DEFAULT_AUTH_SERVICE_TIMEOUT_MS = 5000;

/**
 * Resolves access key ids through the auth service's
 * GET /v1/access/{accessKeyId} endpoint.
 */
export class AuthServiceResolver implements AccessKeyResolver {
  private log: winston.Logger;
  private httpClient: AxiosInstance;

  constructor({
    log,
    baseUrl,
    token,
    timeoutMs = DEFAULT_AUTH_SERVICE_TIMEOUT_MS,
    adapter,
  }: {
    log: winston.Logger;
    baseUrl: string;
    token?: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.httpClient = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: token !== undefined ? { Authorization: `Bearer ${token}` } : {},
      adapter,
    });
  }

  async resolve(
    accessKeyId: string,
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<AccessKeyResolution> {
    const log = this.log.child({ method: 'resolve' });

    let body: unknown;
    try {
      const response = await this.httpClient.get<unknown>(
        `/v1/access/${encodeURIComponent(accessKeyId)}`,
        { signal },
      );
      body = response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        throw new RoutingError('InvalidCredential', 'unknown access key id');
      }
      log.warn('Auth service request failed', {
        message: error instanceof Error ? error.message : String(error),
        status: isAxiosError(error) ? error.response?.status : undefined,
      });
      throw new RoutingError('InternalFailure', 'auth service request failed', {
        cause: error,
      });
    }

    if (
      typeof body !== 'object' ||
      body === null ||
      !('access_grant' in body) ||
      typeof body.access_grant !== 'string' ||
      !('public' in body) ||
      typeof body.public !== 'boolean'
    ) {
      log.warn('Malformed auth service response');
      throw new RoutingError(
        'InternalFailure',
        'malformed auth service response',
      );
    }

    return { accessGrant: body.access_grant, public: body.public };
  }
}
