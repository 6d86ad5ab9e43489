/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { beforeEach, describe, it, mock } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import { RoutingError, isRoutingError } from '../lib/error.js';
import {
  decodeFsAccess,
  encodeFsAccess,
} from '../store/fs-object-storage.js';
import type { CustomDomainAccess } from '../types.js';
import { AccessDecoder } from './access-decoder.js';
import { ShareRequestRouter } from './share-request-router.js';

const log = createTestLogger({ suite: 'ShareRequestRouter' });
const token = encodeFsAccess({ buckets: ['photos'] });
const siteToken = encodeFsAccess({ buckets: ['site'] });

function createFetchAccessForHost() {
  return mock.fn(
    async (
      _host: string,
      _options?: { signal?: AbortSignal },
    ): Promise<CustomDomainAccess> => ({
      access: decodeFsAccess(siteToken),
      root: 'site/prefix',
      fetchedAt: 0,
    }),
  );
}

describe('ShareRequestRouter', () => {
  let fetchAccessForHost: ReturnType<typeof createFetchAccessForHost>;
  let router: ShareRequestRouter;

  beforeEach(() => {
    fetchAccessForHost = createFetchAccessForHost();
    router = new ShareRequestRouter({
      log,
      baseHost: 'gateway.test',
      accessDecoder: new AccessDecoder({
        log,
        storage: { parseAccess: decodeFsAccess },
      }),
      txtRecords: { fetchAccessForHost },
    });
  });

  describe('on the base host', () => {
    it('should route traditional requests', async () => {
      const result = await router.route({
        method: 'GET',
        host: 'gateway.test:4000',
        path: `/${token}/photos/a/b.jpg`,
      });

      assert.equal(result.mode, 'traditional');
      if (result.mode === 'custom-domain') {
        return;
      }
      assert.equal(result.serializedAccess, token);
      assert.equal(result.access.serialized, token);
      assert.equal(result.bucket, 'photos');
      assert.equal(result.key, 'a/b.jpg');
      assert.equal(result.locationOnly, false);
      assert.equal(fetchAccessForHost.mock.calls.length, 0);
    });

    it('should route raw requests', async () => {
      const result = await router.route({
        method: 'GET',
        host: 'gateway.test',
        path: `/raw/${token}/photos/a/b.jpg`,
      });

      assert.equal(result.mode, 'raw');
      assert.equal(result.bucket, 'photos');
      assert.equal(result.key, 'a/b.jpg');
    });

    it('should answer HEAD requests with the location only', async () => {
      const result = await router.route({
        method: 'HEAD',
        host: 'gateway.test',
        path: `/${token}/photos/a.txt`,
      });

      assert.equal(result.mode, 'traditional');
      assert.equal(result.mode !== 'custom-domain' && result.locationOnly, true);
    });

    it('should reject methods other than GET and HEAD', async () => {
      for (const method of ['POST', 'PUT', 'DELETE']) {
        await assert.rejects(
          router.route({
            method,
            host: 'gateway.test',
            path: `/${token}/photos/a.txt`,
          }),
          (error: unknown) => isRoutingError(error, 'MethodNotAllowed'),
        );
      }
    });

    it('should reject incomplete paths', async () => {
      await assert.rejects(
        router.route({ method: 'GET', host: 'gateway.test', path: '/' }),
        (error: unknown) => isRoutingError(error, 'MissingCredential'),
      );
      await assert.rejects(
        router.route({
          method: 'GET',
          host: 'gateway.test',
          path: `/${token}`,
        }),
        (error: unknown) => isRoutingError(error, 'MissingBucket'),
      );
    });

    it('should reject invalid access', async () => {
      await assert.rejects(
        router.route({
          method: 'GET',
          host: 'gateway.test',
          path: '/garbage/photos/a.txt',
        }),
        (error: unknown) => isRoutingError(error, 'InvalidCredential'),
      );
    });

    it('should match IPv6 base hosts', async () => {
      const ipv6Router = new ShareRequestRouter({
        log,
        baseHost: '[::1]:4000',
        accessDecoder: new AccessDecoder({
          log,
          storage: { parseAccess: decodeFsAccess },
        }),
        txtRecords: { fetchAccessForHost },
      });

      const result = await ipv6Router.route({
        method: 'GET',
        host: '[::1]:8080',
        path: `/${token}/photos/a.txt`,
      });

      assert.equal(result.mode, 'traditional');
    });
  });

  describe('on other hosts', () => {
    it('should route through the TXT records of the host', async () => {
      const controller = new AbortController();
      const result = await router.route({
        method: 'GET',
        host: 'site.test:8080',
        path: '/images/pic.jpg',
        signal: controller.signal,
      });

      assert.deepEqual(fetchAccessForHost.mock.calls[0].arguments, [
        'site.test',
        { signal: controller.signal },
      ]);
      assert.equal(result.mode, 'custom-domain');
      if (result.mode !== 'custom-domain') {
        return;
      }
      assert.equal(result.host, 'site.test');
      assert.equal(result.root, 'site/prefix');
      assert.equal(result.access.serialized, siteToken);
      assert.equal(result.bucket, 'site');
      assert.equal(result.key, 'prefix/images/pic.jpg');
    });

    it('should not restrict methods', async () => {
      const result = await router.route({
        method: 'POST',
        host: 'site.test',
        path: '/form',
      });

      assert.equal(result.mode, 'custom-domain');
      assert.equal(result.key, 'prefix/form');
    });

    it('should propagate TXT record failures', async () => {
      fetchAccessForHost.mock.mockImplementation(async () => {
        throw new RoutingError('CustomDomainNotConfigured', 'no records');
      });

      await assert.rejects(
        router.route({ method: 'GET', host: 'site.test', path: '/' }),
        (error: unknown) => isRoutingError(error, 'CustomDomainNotConfigured'),
      );
    });

    it('should report lookups cut short by the signal as timeouts', async () => {
      fetchAccessForHost.mock.mockImplementation(async () => {
        throw new RoutingError('DNSResolutionFailed', 'lookup cancelled');
      });

      await assert.rejects(
        router.route({
          method: 'GET',
          host: 'site.test',
          path: '/',
          signal: AbortSignal.abort(),
        }),
        (error: unknown) => isRoutingError(error, 'RequestTimeout'),
      );
    });

    it('should fail on malformed hosts', async () => {
      await assert.rejects(
        router.route({ method: 'GET', host: 'a:b:c', path: '/' }),
        (error: unknown) => isRoutingError(error, 'InternalFailure'),
      );
      assert.equal(fetchAccessForHost.mock.calls.length, 0);
    });
  });
});
