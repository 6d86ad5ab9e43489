/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { RoutingError } from './error.js';

export interface ParsedRequestPath {
  rawRequest: boolean;
  serializedAccess: string;
  bucket: string;
  key: string;
}

/**
 * Splits a link sharing path of the form /[raw/]{access}/{bucket}[/{key}]
 * into its parts. The access is returned undecoded.
 */
export function parseRequestPath(requestPath: string): ParsedRequestPath {
  // Drop the leading slash, if necessary.
  const path = requestPath.startsWith('/') ? requestPath.slice(1) : requestPath;

  let rawRequest = false;
  let segments = splitN(path, '/', 4);
  if (segments.length === 4) {
    if (segments[0] === 'raw') {
      rawRequest = true;
      segments = segments.slice(1);
    } else {
      // The last two entries both belong to the object key.
      segments = [segments[0], segments[1], `${segments[2]}/${segments[3]}`];
    }
  }

  if (segments.length === 1) {
    if (segments[0] === '') {
      throw new RoutingError('MissingCredential', 'missing access');
    }
    throw new RoutingError('MissingBucket', 'missing bucket');
  }

  const [serializedAccess, bucket, key = ''] = segments;
  if (bucket === '') {
    throw new RoutingError('MissingBucket', 'missing bucket');
  }

  return { rawRequest, serializedAccess, bucket, key };
}

// Splits into at most n parts; the last part keeps any remaining separators.
function splitN(value: string, separator: string, n: number): string[] {
  const parts: string[] = [];
  let rest = value;
  while (parts.length < n - 1) {
    const index = rest.indexOf(separator);
    if (index < 0) {
      break;
    }
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}
