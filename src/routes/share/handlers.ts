/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Handler, Request, Response } from 'express';
import asyncHandler from 'express-async-handler';
import path from 'node:path';
import { URL } from 'node:url';
import winston from 'winston';

import {
  RoutingError,
  isRoutingError,
  statusForRoutingError,
  toRoutingError,
} from '../../lib/error.js';
import * as metrics from '../../metrics.js';
import type { ShareRequestRouter } from '../../resolution/share-request-router.js';
import type {
  CustomDomainRoutingResult,
  ObjectInfo,
  ObjectProject,
  ObjectStorage,
  TraditionalRoutingResult,
} from '../../types.js';
import { serveContent } from './content.js';
import {
  type Breadcrumb,
  type ListingEntry,
  formatSize,
  renderNotFound,
  renderPrefixListing,
  renderSingleObject,
} from './render.js';

const INDEX_DOCUMENT = 'index.html';

export interface ShareHandlerDependencies {
  log: winston.Logger;
  shareRouter: Pick<ShareRequestRouter, 'route'>;
  storage: Pick<ObjectStorage, 'openProject'>;
  urlBase: URL;
}

/**
 * Joins the request path onto the base URL, yielding the canonical location
 * of a shared object.
 */
export function makeLocation(urlBase: URL, requestPath: string): string {
  const location = new URL(urlBase.href);
  location.pathname = path.posix.join(location.pathname, requestPath);
  return location.toString();
}

export function sendRoutingError(
  log: winston.Logger,
  res: Response,
  error: RoutingError,
  action: string,
) {
  const status = statusForRoutingError(error.kind);
  metrics.routingErrorsCounter.inc({ kind: error.kind });

  if (status >= 500) {
    log.error('Unable to handle request', {
      action,
      kind: error.kind,
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    });
  } else {
    log.debug('Rejected request', {
      action,
      kind: error.kind,
      message: error.message,
    });
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  switch (status) {
    case 400:
      res.status(400).type('text').send('invalid request');
      return;
    case 404:
      res
        .status(404)
        .type('html')
        .send(
          renderNotFound(
            error.kind === 'BucketNotFound'
              ? 'Oops! Bucket not found.'
              : 'Oops! Object not found.',
          ),
        );
      return;
    case 405:
      res.status(405).type('text').send('method not allowed');
      return;
    case 504:
      res.status(504).type('text').send('request timed out');
      return;
    default:
      res.status(status).type('text').send('unable to handle request');
  }
}

function decodeRequestPath(req: Request): string {
  try {
    return decodeURIComponent(req.path);
  } catch (error) {
    throw new RoutingError('MalformedRequest', 'malformed request path', {
      cause: error,
    });
  }
}

async function statIfExists(
  project: ObjectProject,
  bucket: string,
  key: string,
  signal?: AbortSignal,
): Promise<ObjectInfo | undefined> {
  try {
    return await project.statObject(bucket, key, { signal });
  } catch (error) {
    if (isRoutingError(error, 'ObjectNotFound')) {
      return undefined;
    }
    throw error;
  }
}

async function servePrefix({
  res,
  project,
  root,
  title,
  bucket,
  realPrefix,
  visiblePrefix,
  signal,
}: {
  res: Response;
  project: ObjectProject;
  root: Breadcrumb;
  title: string;
  bucket: string;
  realPrefix: string;
  visiblePrefix: string;
  signal?: AbortSignal;
}) {
  const breadcrumbs: Breadcrumb[] = [root];
  if (visiblePrefix !== '') {
    const trimmed = visiblePrefix.replace(/\/+$/, '');
    for (const prefix of trimmed.split('/')) {
      breadcrumbs.push({
        prefix,
        url: `${breadcrumbs[breadcrumbs.length - 1].url}${prefix}/`,
      });
    }
  }

  // TODO: page through large listings instead of collecting every entry
  const objects: ListingEntry[] = [];
  for await (const item of project.listObjects(bucket, {
    prefix: realPrefix,
    signal,
  })) {
    objects.push({
      key: item.key.slice(realPrefix.length),
      size: formatSize(item.size),
      prefix: item.isPrefix,
    });
  }

  res
    .status(200)
    .type('html')
    .send(renderPrefixListing({ title, breadcrumbs, objects }));
}

async function handleTraditional({
  req,
  res,
  project,
  result,
  urlBase,
  signal,
}: {
  req: Request;
  res: Response;
  project: ObjectProject;
  result: TraditionalRoutingResult;
  urlBase: URL;
  signal?: AbortSignal;
}) {
  const { bucket, key, serializedAccess } = result;

  if (key === '' || key.endsWith('/')) {
    if (!req.path.endsWith('/')) {
      // Directories need a trailing '/' for relative listing links to work.
      res.redirect(301, `${req.path}/`);
      return;
    }
    await servePrefix({
      res,
      project,
      root: { prefix: bucket, url: `/${serializedAccess}/${bucket}/` },
      title: bucket,
      bucket,
      realPrefix: key,
      visiblePrefix: key,
      signal,
    });
    return;
  }

  const object = await project.statObject(bucket, key, { signal });

  if (result.locationOnly) {
    res.redirect(302, makeLocation(urlBase, req.path));
    return;
  }

  const download = req.query.download !== undefined;
  const view = req.query.view !== undefined;
  if (!download && !view && result.mode !== 'raw') {
    res
      .status(200)
      .type('html')
      .send(
        renderSingleObject({ key: object.key, size: formatSize(object.size) }),
      );
    return;
  }

  if (download) {
    res.attachment(key.split('/').pop() ?? key);
  }
  await serveContent({
    req,
    res,
    project,
    bucket,
    object,
    signal: req.disconnectSignal,
  });
}

async function handleCustomDomain({
  req,
  res,
  requestPath,
  project,
  result,
  signal,
}: {
  req: Request;
  res: Response;
  requestPath: string;
  project: ObjectProject;
  result: CustomDomainRoutingResult;
  signal?: AbortSignal;
}) {
  const { bucket, key, host } = result;

  // There are no objects with the empty key.
  if (key !== '') {
    const object = await statIfExists(project, bucket, key, signal);
    if (object !== undefined) {
      await serveContent({
        req,
        res,
        project,
        bucket,
        object,
        signal: req.disconnectSignal,
      });
      return;
    }
    if (!key.endsWith('/')) {
      throw new RoutingError('ObjectNotFound', 'object not found', {
        bucket,
        key,
      });
    }
  }

  // The key is either empty or ends in '/' at this point.
  const index = await statIfExists(
    project,
    bucket,
    key + INDEX_DOCUMENT,
    signal,
  );
  if (index !== undefined) {
    await serveContent({
      req,
      res,
      project,
      bucket,
      object: index,
      signal: req.disconnectSignal,
    });
    return;
  }

  await servePrefix({
    res,
    project,
    root: { prefix: host, url: '/' },
    title: host,
    bucket,
    realPrefix: key,
    visiblePrefix: requestPath.replace(/^\//, ''),
    signal,
  });
}

export function createShareHandler({
  log: parentLog,
  shareRouter,
  storage,
  urlBase,
}: ShareHandlerDependencies): Handler {
  const log = parentLog.child({ handler: 'share' });

  return asyncHandler(async (req: Request, res: Response) => {
    const signal = req.signal;
    let action = 'route request';
    let project: ObjectProject | undefined;

    try {
      const requestPath = decodeRequestPath(req);
      const result = await shareRouter.route({
        method: req.method,
        host: req.headers.host ?? '',
        path: requestPath,
        signal,
      });
      metrics.shareRequestsCounter.inc({ mode: result.mode });

      action = 'open project';
      project = await storage.openProject(result.access, { signal });

      action = 'serve';
      if (result.mode === 'custom-domain') {
        await handleCustomDomain({
          req,
          res,
          requestPath,
          project,
          result,
          signal,
        });
      } else {
        await handleTraditional({
          req,
          res,
          project,
          result,
          urlBase,
          signal,
        });
      }
    } catch (error) {
      sendRoutingError(log, res, toRoutingError(error, signal), action);
    } finally {
      if (project !== undefined) {
        try {
          await project.close();
        } catch (error) {
          log.warn('Unable to close project', {
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  });
}
