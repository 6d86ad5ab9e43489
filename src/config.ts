/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { URL } from 'node:url';

import * as env from './lib/env.js';
import { DEFAULT_AUTH_SERVICE_TIMEOUT_MS } from './resolution/auth-service-resolver.js';
import {
  DEFAULT_TXT_RECORD_CACHE_MAX_ENTRIES,
  DEFAULT_TXT_RECORD_TAG_PREFIX,
  DEFAULT_TXT_RECORD_TTL_SECONDS,
} from './resolution/txt-records.js';

/**
 * Validates the public base URL of the gateway. Its host decides which
 * requests are link sharing requests; it also prefixes HEAD redirects.
 */
export function parseUrlBase(value: string): URL {
  const url = new URL(value);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error('URL base must be http:// or https://');
  }
  if (url.host === '') {
    throw new Error('URL base must contain host');
  }
  if (url.username !== '' || url.password !== '') {
    throw new Error('URL base must not contain user info');
  }
  if (url.search !== '') {
    throw new Error('URL base must not contain query values');
  }
  if (url.hash !== '') {
    throw new Error('URL base must not contain a fragment');
  }
  return url;
}

//
// HTTP server
//

// HTTP server port
export const PORT = env.positiveIntOrDefault('PORT', 4000);

// Canonical base URL; requests for any other host are custom domains
export const URL_BASE = parseUrlBase(
  env.varOrDefault('URL_BASE', `http://localhost:${PORT}`),
);

// Deadline for routing a request and looking up its object, including DNS
// and auth lookups; streaming the body is not bounded by it
export const REQUEST_TIMEOUT_MS = env.positiveIntOrDefault(
  'REQUEST_TIMEOUT_MS',
  30 * 1000,
);

//
// Custom domains
//

export const TXT_RECORD_TTL_SECONDS = env.positiveIntOrDefault(
  'TXT_RECORD_TTL_SECONDS',
  DEFAULT_TXT_RECORD_TTL_SECONDS,
);

export const TXT_RECORD_CACHE_MAX_ENTRIES = env.positiveIntOrDefault(
  'TXT_RECORD_CACHE_MAX_ENTRIES',
  DEFAULT_TXT_RECORD_CACHE_MAX_ENTRIES,
);

// TXT fields are named <prefix>-access and <prefix>-root
export const TXT_RECORD_TAG_PREFIX = env.varOrDefault(
  'TXT_RECORD_TAG_PREFIX',
  DEFAULT_TXT_RECORD_TAG_PREFIX,
);

// Reject access key ids resolving to private grants on custom domains too
export const TXT_RECORD_REQUIRE_PUBLIC_ACCESS = env.boolOrDefault(
  'TXT_RECORD_REQUIRE_PUBLIC_ACCESS',
  false,
);

// DNS server (host[:port]) used for TXT lookups, system resolvers if unset
export const DNS_SERVER = env.varOrUndefined('DNS_SERVER');

//
// Auth service
//

// Access key ids are rejected when no auth service is configured
export const AUTH_SERVICE_BASE_URL = env.varOrUndefined(
  'AUTH_SERVICE_BASE_URL',
);

export const AUTH_SERVICE_TOKEN = env.varOrUndefined('AUTH_SERVICE_TOKEN');

export const AUTH_SERVICE_TIMEOUT_MS = env.positiveIntOrDefault(
  'AUTH_SERVICE_TIMEOUT_MS',
  DEFAULT_AUTH_SERVICE_TIMEOUT_MS,
);

//
// Storage
//

// Directory holding one subdirectory per bucket
export const STORAGE_DATA_PATH = env.varOrDefault(
  'STORAGE_DATA_PATH',
  'data/buckets',
);
