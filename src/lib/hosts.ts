/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { DetailedError } from './error.js';

export const MISSING_PORT = 'missing port in address';
const TOO_MANY_COLONS = 'too many colons in address';

export class AddressError extends DetailedError {
  readonly reason: string;
  readonly address: string;

  constructor(address: string, reason: string) {
    super(`address ${address}: ${reason}`);
    this.reason = reason;
    this.address = address;
  }
}

/**
 * Splits "host:port", "[v6]:port" into host and port. Brackets around IPv6
 * literals are removed from the returned host.
 */
export function splitHostPort(hostport: string): {
  host: string;
  port: string;
} {
  // The port starts after the last colon.
  const i = hostport.lastIndexOf(':');
  if (i < 0) {
    throw new AddressError(hostport, MISSING_PORT);
  }

  let host: string;
  let j = 0;
  let k = 0;
  if (hostport.startsWith('[')) {
    // Expect the first ']' just before the last ':'.
    const end = hostport.indexOf(']');
    if (end < 0) {
      throw new AddressError(hostport, "missing ']' in address");
    }
    if (end + 1 === hostport.length) {
      throw new AddressError(hostport, MISSING_PORT);
    }
    if (end + 1 !== i) {
      throw new AddressError(
        hostport,
        hostport[end + 1] === ':' ? TOO_MANY_COLONS : MISSING_PORT,
      );
    }
    host = hostport.slice(1, end);
    j = 1;
    k = end + 1;
  } else {
    host = hostport.slice(0, i);
    if (host.includes(':')) {
      throw new AddressError(hostport, TOO_MANY_COLONS);
    }
  }

  if (hostport.slice(j).includes('[')) {
    throw new AddressError(hostport, "unexpected '[' in address");
  }
  if (hostport.slice(k).includes(']')) {
    throw new AddressError(hostport, "unexpected ']' in address");
  }

  return { host, port: hostport.slice(i + 1) };
}

/**
 * Returns the host without its port. A value without a port is returned
 * as-is, minus the brackets of a bracketed IPv6 literal; any other split
 * failure is thrown.
 */
export function stripPort(hostport: string): string {
  try {
    return splitHostPort(hostport).host;
  } catch (error) {
    if (error instanceof AddressError && error.reason === MISSING_PORT) {
      return /^\[[^\[\]]*\]$/.test(hostport) ? hostport.slice(1, -1) : hostport;
    }
    throw error;
  }
}

/**
 * Whether two Host values name the same host. Ports never take part in the
 * comparison, and it is case sensitive.
 */
export function compareHosts(host1: string, host2: string): boolean {
  return stripPort(host1) === stripPort(host2);
}
