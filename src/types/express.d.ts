/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

declare global {
  namespace Express {
    interface Request {
      // Aborted on client disconnect or when the request deadline passes.
      signal?: AbortSignal;
      // Aborted on client disconnect only; bounds streaming of response
      // bodies, which may outlive the deadline.
      disconnectSignal?: AbortSignal;
    }
  }
}

export {};
