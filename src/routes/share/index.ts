/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';

import * as config from '../../config.js';
import log from '../../log.js';
import * as system from '../../system.js';
import { createShareHandler } from './handlers.js';

export const shareHandler = createShareHandler({
  log,
  shareRouter: system.shareRequestRouter,
  storage: system.objectStorage,
  urlBase: config.URL_BASE,
});

export const shareRouter = Router();

// Link sharing and custom domain requests can carry any path, so this
// router takes everything not claimed by the gateway routes.
shareRouter.use(shareHandler);
