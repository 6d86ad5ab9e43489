/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { beforeEach, describe, it } from 'node:test';
import bs58check from 'bs58check';
import express from 'express';
import { URL } from 'node:url';
import { default as request } from 'supertest';

import {
  InMemoryObjectStorage,
  StubTxtRecordClient,
} from '../../../test/stubs.js';
import { createTestLogger } from '../../../test/test-logger.js';
import { createAbortSignalMiddleware } from '../../middleware/abort-signal.js';
import { createGatewayRouter } from '../gateway.js';
import { AccessDecoder } from '../../resolution/access-decoder.js';
import { ShareRequestRouter } from '../../resolution/share-request-router.js';
import { TxtRecords } from '../../resolution/txt-records.js';
import { encodeFsAccess } from '../../store/fs-object-storage.js';
import type { TxtRecordClient } from '../../types.js';
import { createShareHandler, makeLocation } from './handlers.js';

const log = createTestLogger({ suite: 'Share routes' });
const urlBase = new URL('http://127.0.0.1');
const token = encodeFsAccess();
const accessKeyId = bs58check.encode(
  Buffer.concat([Buffer.from([1]), Buffer.from('key-1')]),
);

function createApp({
  storage,
  dns,
  timeoutMs,
}: {
  storage: InMemoryObjectStorage;
  dns: TxtRecordClient;
  timeoutMs?: number;
}) {
  const accessDecoder = new AccessDecoder({
    log,
    storage,
    accessKeyResolver: {
      resolve: async () => ({ accessGrant: token, public: false }),
    },
  });
  const shareRouter = new ShareRequestRouter({
    log,
    baseHost: urlBase.host,
    accessDecoder,
    txtRecords: new TxtRecords({ log, dns, accessDecoder }),
  });

  const app = express();
  app.use(createAbortSignalMiddleware({ timeoutMs }));
  app.use(createGatewayRouter({ baseHost: urlBase.host }));
  app.use(createShareHandler({ log, shareRouter, storage, urlBase }));
  return app;
}

describe('makeLocation', () => {
  it('should join the request path onto the base URL', () => {
    assert.equal(
      makeLocation(new URL('https://share.test/links'), '/ACCESS/b/k.txt'),
      'https://share.test/links/ACCESS/b/k.txt',
    );
    assert.equal(
      makeLocation(urlBase, '/ACCESS/b/k.txt'),
      'http://127.0.0.1/ACCESS/b/k.txt',
    );
  });
});

describe('createShareHandler', () => {
  let storage: InMemoryObjectStorage;
  let app: express.Express;

  beforeEach(() => {
    storage = new InMemoryObjectStorage();
    storage.putObject('photos', 'a/b.jpg', 'jpeg-bytes');
    storage.putObject('photos', 'dir/c.txt', 'c');
    storage.putObject('photos', 'notes.txt', 'hello world');
    storage.putObject('site', 'prefix/index.html', '<h1>home</h1>');
    storage.putObject('site', 'prefix/about.html', '<h1>about</h1>');
    storage.putObject('site', 'prefix/docs/guide.txt', 'read me');
    storage.putObject('site', 'prefix/blog/index.html', '<h1>blog</h1>');
    storage.putObject('site', 'prefix/_gateway/healthcheck', 'customer page');

    app = createApp({
      storage,
      dns: new StubTxtRecordClient({
        'site.test': [`share-access=${token}`, 'share-root=site/prefix'],
        'private.test': [`share-access=${accessKeyId}`, 'share-root=site'],
        'nobucket.test': [`share-access=${token}`, 'share-root=nobucket/site'],
        'bare.test': [`share-access=${token}`, 'share-root=nobucket'],
      }),
    });
  });

  describe('traditional requests', () => {
    it('should render the single object page', async () => {
      const res = await request(app).get(`/${token}/photos/notes.txt`);

      assert.equal(res.status, 200);
      assert.equal(res.headers['content-type'], 'text/html; charset=utf-8');
      assert.ok(res.text.includes('<h1>notes.txt</h1>\n<p>11 B</p>'));
    });

    it('should serve the object when viewing', async () => {
      const res = await request(app).get(`/${token}/photos/notes.txt?view`);

      assert.equal(res.status, 200);
      assert.equal(res.headers['content-type'], 'text/plain; charset=utf-8');
      assert.equal(res.headers['content-length'], '11');
      assert.equal(res.headers['accept-ranges'], 'bytes');
      assert.equal(res.text, 'hello world');
    });

    it('should serve the object as an attachment when downloading', async () => {
      const res = await request(app).get(`/${token}/photos/notes.txt?download`);

      assert.equal(res.status, 200);
      assert.equal(
        res.headers['content-disposition'],
        'attachment; filename="notes.txt"',
      );
      assert.equal(res.text, 'hello world');
    });

    it('should answer HEAD requests with a redirect to the object', async () => {
      const res = await request(app).head(`/${token}/photos/notes.txt`);

      assert.equal(res.status, 302);
      assert.equal(
        res.headers.location,
        `http://127.0.0.1/${token}/photos/notes.txt`,
      );
    });

    it('should not redirect HEAD requests for missing objects', async () => {
      const res = await request(app).head(`/${token}/photos/missing.txt`);

      assert.equal(res.status, 404);
      assert.equal(res.headers.location, undefined);
    });

    it('should redirect bucket paths to their listing', async () => {
      const res = await request(app).get(`/${token}/photos`);

      assert.equal(res.status, 301);
      assert.equal(res.headers.location, `/${token}/photos/`);
    });

    it('should list a bucket', async () => {
      const res = await request(app).get(`/${token}/photos/`);

      assert.equal(res.status, 200);
      assert.ok(
        res.text.includes(`<nav><a href="/${token}/photos/">photos</a></nav>`),
      );
      assert.ok(res.text.includes('<td><a href="./a/">a/</a></td><td></td>'));
      assert.ok(
        res.text.includes(
          '<td><a href="./notes.txt">notes.txt</a></td><td>11 B</td>',
        ),
      );
    });

    it('should list a prefix with breadcrumbs', async () => {
      const res = await request(app).get(`/${token}/photos/dir/`);

      assert.equal(res.status, 200);
      assert.ok(
        res.text.includes(
          `<nav><a href="/${token}/photos/">photos</a> / <a href="/${token}/photos/dir/">dir</a></nav>`,
        ),
      );
      assert.ok(res.text.includes('<td><a href="./c.txt">c.txt</a></td><td>1 B</td>'));
    });

    it('should serve raw requests directly', async () => {
      const res = await request(app).get(`/raw/${token}/photos/notes.txt`);

      assert.equal(res.status, 200);
      assert.equal(res.text, 'hello world');
    });

    it('should serve a single byte range', async () => {
      const res = await request(app)
        .get(`/raw/${token}/photos/notes.txt`)
        .set('Range', 'bytes=6-10');

      assert.equal(res.status, 206);
      assert.equal(res.headers['content-range'], 'bytes 6-10/11');
      assert.equal(res.headers['content-length'], '5');
      assert.equal(res.text, 'world');
    });

    it('should reject unsatisfiable ranges', async () => {
      const res = await request(app)
        .get(`/raw/${token}/photos/notes.txt`)
        .set('Range', 'bytes=50-60');

      assert.equal(res.status, 416);
      assert.equal(res.headers['content-range'], 'bytes */11');
    });

    it('should reject malformed ranges', async () => {
      const res = await request(app)
        .get(`/raw/${token}/photos/notes.txt`)
        .set('Range', 'bytes');

      assert.equal(res.status, 400);
      assert.equal(res.text, `Malformed 'range' header`);
    });

    it('should serve the whole object for several ranges', async () => {
      const res = await request(app)
        .get(`/raw/${token}/photos/notes.txt`)
        .set('Range', 'bytes=0-1,5-6');

      assert.equal(res.status, 200);
      assert.equal(res.text, 'hello world');
    });

    it('should report missing objects', async () => {
      const res = await request(app).get(`/${token}/photos/missing.txt`);

      assert.equal(res.status, 404);
      assert.ok(res.text.includes('<h1>Oops! Object not found.</h1>'));
    });

    it('should report missing buckets', async () => {
      const res = await request(app).get(`/${token}/nobucket/x.txt`);

      assert.equal(res.status, 404);
      assert.ok(res.text.includes('<h1>Oops! Bucket not found.</h1>'));
    });

    it('should reject methods other than GET and HEAD', async () => {
      const res = await request(app).post(`/${token}/photos/notes.txt`);

      assert.equal(res.status, 405);
      assert.equal(res.text, 'method not allowed');
    });

    it('should reject invalid requests', async () => {
      for (const path of [
        '/',
        `/${token}`,
        '/garbage/photos/notes.txt',
        `/${accessKeyId}/photos/notes.txt`,
        '/%E0%A4%A/photos/notes.txt',
      ]) {
        const res = await request(app).get(path);

        assert.equal(res.status, 400, path);
        assert.equal(res.text, 'invalid request');
      }
    });

    it('should close every project it opens', async () => {
      await request(app).get(`/${token}/photos/`);
      await request(app).get(`/${token}/photos/missing.txt`);

      assert.equal(storage.openedProjects, 2);
      assert.equal(storage.closedProjects, 2);
    });
  });

  describe('custom domain requests', () => {
    it('should serve the index document of the site root', async () => {
      const res = await request(app).get('/').set('Host', 'site.test');

      assert.equal(res.status, 200);
      assert.equal(res.headers['content-type'], 'text/html; charset=utf-8');
      assert.equal(res.text, '<h1>home</h1>');
    });

    it('should serve objects below the storage root', async () => {
      const res = await request(app)
        .get('/about.html')
        .set('Host', 'site.test:8080');

      assert.equal(res.status, 200);
      assert.equal(res.text, '<h1>about</h1>');
    });

    it('should list prefixes without an index document', async () => {
      const res = await request(app).get('/docs/').set('Host', 'site.test');

      assert.equal(res.status, 200);
      assert.ok(
        res.text.includes(
          '<nav><a href="/">site.test</a> / <a href="/docs/">docs</a></nav>',
        ),
      );
      assert.ok(res.text.includes('<a href="./guide.txt">guide.txt</a>'));
    });

    it('should serve the index document of a subdirectory', async () => {
      const res = await request(app).get('/blog/').set('Host', 'site.test');

      assert.equal(res.status, 200);
      assert.equal(res.text, '<h1>blog</h1>');
      assert.deepEqual(storage.statted, [
        'site/prefix/blog/',
        'site/prefix/blog/index.html',
      ]);
      assert.deepEqual(storage.listed, []);
    });

    it('should surface storage failures without falling back', async () => {
      const res = await request(app).get('/docs/').set('Host', 'nobucket.test');

      assert.equal(res.status, 404);
      assert.ok(res.text.includes('<h1>Oops! Bucket not found.</h1>'));
      assert.deepEqual(storage.statted, ['nobucket/site/docs/']);
      assert.deepEqual(storage.listed, []);
    });

    it('should not list the site root of a missing bucket', async () => {
      const res = await request(app).get('/').set('Host', 'bare.test');

      assert.equal(res.status, 404);
      assert.ok(res.text.includes('<h1>Oops! Bucket not found.</h1>'));
      assert.deepEqual(storage.statted, ['nobucket/index.html']);
      assert.deepEqual(storage.listed, []);
    });

    it('should serve gateway paths as objects', async () => {
      const res = await request(app)
        .get('/_gateway/healthcheck')
        .set('Host', 'site.test')
        .responseType('blob');

      assert.equal(res.status, 200);
      assert.equal(res.headers['content-type'], 'application/octet-stream');
      assert.equal(res.body.toString('utf8'), 'customer page');
    });

    it('should report missing objects', async () => {
      const res = await request(app).get('/missing').set('Host', 'site.test');

      assert.equal(res.status, 404);
      assert.ok(res.text.includes('<h1>Oops! Object not found.</h1>'));
    });

    it('should serve non-public grants from TXT records', async () => {
      const res = await request(app)
        .get('/prefix/docs/guide.txt')
        .set('Host', 'private.test');

      assert.equal(res.status, 200);
      assert.equal(res.text, 'read me');
    });

    it('should fail for hosts without TXT records', async () => {
      const res = await request(app).get('/').set('Host', 'unknown.test');

      assert.equal(res.status, 500);
      assert.equal(res.text, 'unable to handle request');
    });
  });

  it('should answer gateway paths on the base host', async () => {
    const res = await request(app).get('/_gateway/healthcheck');

    assert.equal(res.status, 200);
    assert.equal(res.body.status, 'ok');
  });

  it('should keep streaming bodies past the deadline', async () => {
    storage.putObject('photos', 'big.txt', '0123456789');
    storage.chunkDelayMs = 10;
    const slowApp = createApp({
      storage,
      dns: new StubTxtRecordClient({}),
      timeoutMs: 30,
    });

    const res = await request(slowApp).get(`/raw/${token}/photos/big.txt`);

    assert.equal(res.status, 200);
    assert.equal(res.text, '0123456789');
  });

  it('should time out requests that outlive the deadline', async () => {
    const hangingDns: TxtRecordClient = {
      lookupTxt: (_host, { signal } = {}) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () =>
            reject(new Error('queryTxt ECANCELLED')),
          );
        }),
    };
    const slowApp = createApp({ storage, dns: hangingDns, timeoutMs: 20 });

    const res = await request(slowApp).get('/').set('Host', 'slow.test');

    assert.equal(res.status, 504);
    assert.equal(res.text, 'request timed out');
  });
});
