/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Routing metrics
//

export const shareRequestsCounter = new promClient.Counter({
  name: 'share_requests_total',
  help: 'Count of routed share requests',
  labelNames: ['mode'],
});

export const routingErrorsCounter = new promClient.Counter({
  name: 'share_routing_errors_total',
  help: 'Count of share requests that failed, by error kind',
  labelNames: ['kind'],
});

//
// Custom domain metrics
//

export const txtRecordCacheRequestsCounter = new promClient.Counter({
  name: 'txt_record_cache_requests_total',
  help: 'Count of TXT record cache lookups',
  labelNames: ['result'],
});

export const txtRecordLookupDuration = new promClient.Histogram({
  name: 'txt_record_lookup_duration_seconds',
  help: 'Duration of DNS TXT record lookups',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
});

//
// Credential metrics
//

export const accessKeyResolutionsCounter = new promClient.Counter({
  name: 'access_key_resolutions_total',
  help: 'Count of access key id resolutions through the auth service',
  labelNames: ['result'],
});
