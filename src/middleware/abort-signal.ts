/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Handler, Request, Response } from 'express';

/**
 * Middleware that attaches an AbortSignal to each request. The signal is
 * aborted when the client disconnects before the response completes or,
 * with a timeout, once the request has been in flight for timeoutMs.
 *
 * Handlers pass req.signal to every DNS, auth service and storage call so
 * that abandoned requests stop waiting on them.
 */
export function createAbortSignalMiddleware({
  timeoutMs,
}: { timeoutMs?: number } = {}): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    });

    req.disconnectSignal = controller.signal;
    req.signal =
      timeoutMs !== undefined
        ? AbortSignal.any([controller.signal, AbortSignal.timeout(timeoutMs)])
        : controller.signal;

    next();
  };
}
