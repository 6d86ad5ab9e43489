/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Request, Response } from 'express';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import rangeParser from 'range-parser';

import type { ObjectInfo, ObjectProject } from '../../types.js';

const REQUEST_METHOD_HEAD = 'HEAD';

/**
 * Streams an object, honouring a single byte range. Requests for several
 * ranges get the whole object. The signal should only fire when the client
 * goes away; a request deadline would cut long transfers short.
 */
export async function serveContent({
  req,
  res,
  project,
  bucket,
  object,
  signal,
}: {
  req: Request;
  res: Response;
  project: ObjectProject;
  bucket: string;
  object: ObjectInfo;
  signal?: AbortSignal;
}): Promise<void> {
  res.setHeader('Accept-Ranges', 'bytes');
  res.setHeader('Last-Modified', object.created.toUTCString());
  res.type(object.contentType ?? (path.posix.extname(object.key) || 'bin'));

  let offset = 0;
  let length = object.size;

  const rangeHeader = req.headers.range;
  if (rangeHeader !== undefined) {
    const ranges = rangeParser(object.size, rangeHeader, { combine: true });

    // Malformed range header
    if (ranges === -2) {
      res.status(400).type('text').send(`Malformed 'range' header`);
      return;
    }

    // Unsatisfiable range
    if (ranges === -1 || ranges.type !== 'bytes') {
      res
        .status(416)
        .set('Content-Range', `bytes */${object.size}`)
        .type('text')
        .send('Range not satisfiable');
      return;
    }

    if (ranges.length === 1) {
      const { start, end } = ranges[0];
      offset = start;
      length = end - start + 1;
      res.status(206); // Partial Content
      res.setHeader('Content-Range', `bytes ${start}-${end}/${object.size}`);
    }
  }

  res.setHeader('Content-Length', length.toString());
  if (req.method === REQUEST_METHOD_HEAD || length === 0) {
    res.end();
    return;
  }

  const stream = await project.downloadObject(bucket, object.key, {
    offset,
    length,
    signal,
  });
  await pipeline(stream, res);
}
