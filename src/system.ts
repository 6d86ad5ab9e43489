/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as config from './config.js';
import { NodeDnsTxtClient } from './lib/dns-txt-client.js';
import log from './log.js';
import { AccessDecoder } from './resolution/access-decoder.js';
import { AuthServiceResolver } from './resolution/auth-service-resolver.js';
import { ShareRequestRouter } from './resolution/share-request-router.js';
import { TxtRecords } from './resolution/txt-records.js';
import { FsObjectStorage } from './store/fs-object-storage.js';

export const objectStorage = new FsObjectStorage({
  log,
  baseDir: config.STORAGE_DATA_PATH,
});

export const accessKeyResolver =
  config.AUTH_SERVICE_BASE_URL !== undefined
    ? new AuthServiceResolver({
        log,
        baseUrl: config.AUTH_SERVICE_BASE_URL,
        token: config.AUTH_SERVICE_TOKEN,
        timeoutMs: config.AUTH_SERVICE_TIMEOUT_MS,
      })
    : undefined;

if (accessKeyResolver === undefined) {
  log.info('AUTH_SERVICE_BASE_URL not set, access key ids will be rejected');
}

export const accessDecoder = new AccessDecoder({
  log,
  storage: objectStorage,
  accessKeyResolver,
});

export const txtRecords = new TxtRecords({
  log,
  dns: new NodeDnsTxtClient({ log, server: config.DNS_SERVER }),
  accessDecoder,
  ttlSeconds: config.TXT_RECORD_TTL_SECONDS,
  maxEntries: config.TXT_RECORD_CACHE_MAX_ENTRIES,
  tagPrefix: config.TXT_RECORD_TAG_PREFIX,
  requirePublicAccess: config.TXT_RECORD_REQUIRE_PUBLIC_ACCESS,
});

export const shareRequestRouter = new ShareRequestRouter({
  log,
  baseHost: config.URL_BASE.host,
  accessDecoder,
  txtRecords,
});
