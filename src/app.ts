/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express from 'express';
import * as promClient from 'prom-client';

import * as config from './config.js';
import log from './log.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';
import { createGatewayRouter } from './routes/gateway.js';
import { shareRouter } from './routes/share/index.js';

promClient.collectDefaultMetrics();

// HTTP server
const app = express();

app.use(
  cors({
    exposedHeaders: [
      // these are not exposed by default and must be added manually to be used on browsers
      'content-length',
      'content-range',
      'accept-ranges',
    ],
  }),
);

app.use(createAbortSignalMiddleware({ timeoutMs: config.REQUEST_TIMEOUT_MS }));

app.use(createGatewayRouter({ baseHost: config.URL_BASE.host }));
app.use(shareRouter);

export const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`, {
    urlBase: config.URL_BASE.href,
  });
});
