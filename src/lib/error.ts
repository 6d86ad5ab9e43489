/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  cause?: unknown;
  stack?: string;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(
      message,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? this.stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

export const routingErrorKinds = [
  'InvalidCredential',
  'NonPublicCredential',
  'UnsupportedCredentialVersion',
  'MissingCredential',
  'MissingBucket',
  'MalformedRequest',
  'DNSResolutionFailed',
  'CustomDomainNotConfigured',
  'MethodNotAllowed',
  'ObjectNotFound',
  'BucketNotFound',
  'RequestTimeout',
  'InternalFailure',
] as const;

export type RoutingErrorKind = (typeof routingErrorKinds)[number];

/**
 * Failure of any stage of share request handling. The kind decides the
 * response status; the message and any extra details are for logs only.
 */
export class RoutingError extends DetailedError {
  readonly kind: RoutingErrorKind;

  constructor(
    kind: RoutingErrorKind,
    message: string,
    options?: DetailedErrorOptions,
  ) {
    super(message, options);
    this.kind = kind;
  }
}

export function isRoutingError(
  error: unknown,
  kind?: RoutingErrorKind,
): error is RoutingError {
  return (
    error instanceof RoutingError && (kind === undefined || error.kind === kind)
  );
}

/**
 * Normalizes anything thrown while handling a request. Once the request
 * signal has fired, DNS and internal failures are reported as timeouts.
 */
export function toRoutingError(
  error: unknown,
  signal?: AbortSignal,
): RoutingError {
  const interrupted =
    signal?.aborted === true &&
    (!isRoutingError(error) ||
      error.kind === 'InternalFailure' ||
      error.kind === 'DNSResolutionFailed');

  if (interrupted) {
    return new RoutingError('RequestTimeout', 'request aborted', {
      cause: error,
    });
  }

  if (isRoutingError(error)) {
    return error;
  }

  return new RoutingError(
    'InternalFailure',
    error instanceof Error ? error.message : String(error),
    { cause: error },
  );
}

export function statusForRoutingError(kind: RoutingErrorKind): number {
  switch (kind) {
    case 'InvalidCredential':
    case 'NonPublicCredential':
    case 'UnsupportedCredentialVersion':
    case 'MissingCredential':
    case 'MissingBucket':
    case 'MalformedRequest':
      return 400;
    case 'MethodNotAllowed':
      return 405;
    case 'ObjectNotFound':
    case 'BucketNotFound':
      return 404;
    case 'RequestTimeout':
      return 504;
    case 'DNSResolutionFailed':
    case 'CustomDomainNotConfigured':
    case 'InternalFailure':
      return 500;
  }
}
