/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Maps a custom domain's storage root and a request path onto a bucket and
 * object key.
 *
 * Given http://mydomain.test/prefix2/index.html and a storage root of
 * "bucket1/prefix1/", the bucket is "bucket1" and the key is
 * "prefix1/prefix2/index.html". Only the first slash of the URL path is
 * stripped. A non-empty root prefix always gets a trailing slash so that a
 * request can never address a sibling of the prefix (root "b/pre" must not
 * reach "b/prefix-private/...").
 */
export function determineBucketAndObjectKey(
  root: string,
  urlPath: string,
): { bucket: string; key: string } {
  const separator = root.indexOf('/');
  const bucket = separator < 0 ? root : root.slice(0, separator);
  let prefix = separator < 0 ? '' : root.slice(separator + 1);
  if (prefix !== '' && !prefix.endsWith('/')) {
    prefix += '/';
  }

  const suffix = urlPath.startsWith('/') ? urlPath.slice(1) : urlPath;
  return { bucket, key: prefix + suffix };
}
