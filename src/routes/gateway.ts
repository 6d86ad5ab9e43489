/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';
import * as promClient from 'prom-client';

import { compareHosts } from '../lib/hosts.js';

// '_' is not part of the base58 alphabet, so no access token can start a
// path with this prefix. Custom domains may serve any key, so these routes
// only answer on the base host.
export const GATEWAY_PATH_PREFIX = '/_gateway';

function isBaseHost(host: string | undefined, baseHost: string) {
  try {
    return compareHosts(host ?? '', baseHost);
  } catch {
    // Malformed hosts are reported by the share handler.
    return false;
  }
}

export function createGatewayRouter({ baseHost }: { baseHost: string }) {
  const gatewayRouter = Router();

  gatewayRouter.use((req, _res, next) => {
    if (isBaseHost(req.headers.host, baseHost)) {
      next();
    } else {
      next('router');
    }
  });

  gatewayRouter.get(`${GATEWAY_PATH_PREFIX}/healthcheck`, (_req, res) => {
    res.status(200).send({
      status: 'ok',
      uptime: process.uptime(),
      date: new Date(),
    });
  });

  gatewayRouter.get(`${GATEWAY_PATH_PREFIX}/metrics`, async (_req, res) => {
    res.set('Content-Type', promClient.register.contentType);
    res.send(await promClient.register.metrics());
  });

  return gatewayRouter;
}
