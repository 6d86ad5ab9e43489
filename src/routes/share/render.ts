/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export interface Breadcrumb {
  prefix: string;
  url: string;
}

export interface ListingEntry {
  key: string;
  size: string;
  prefix: boolean;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

const SIZE_UNITS = [
  { unit: 'EB', bytes: 1e18 },
  { unit: 'PB', bytes: 1e15 },
  { unit: 'TB', bytes: 1e12 },
  { unit: 'GB', bytes: 1e9 },
  { unit: 'MB', bytes: 1e6 },
  { unit: 'KB', bytes: 1e3 },
];

/**
 * Formats a byte count with base 10 units. A unit is used once the size
 * reaches two thirds of it, so 700 bytes reads "0.7 KB".
 */
export function formatSize(bytes: number): string {
  if (bytes === 0) {
    return '0 B';
  }
  for (const { unit, bytes: unitBytes } of SIZE_UNITS) {
    if (bytes >= (unitBytes * 2) / 3) {
      return `${(bytes / unitBytes).toFixed(1)} ${unit}`;
    }
  }
  return `${bytes} B`;
}

function page(title: string, body: string) {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
</head>
<body>
${body}
</body>
</html>`;
}

export function renderPrefixListing({
  title,
  breadcrumbs,
  objects,
}: {
  title: string;
  breadcrumbs: Breadcrumb[];
  objects: ListingEntry[];
}): string {
  const crumbs = breadcrumbs
    .map(
      ({ prefix, url }) =>
        `<a href="${escapeHtml(url)}">${escapeHtml(prefix)}</a>`,
    )
    .join(' / ');
  const rows = objects
    .map(({ key, size, prefix }) => {
      const link = `<a href="./${escapeHtml(encodeKeyForHref(key))}">${escapeHtml(key)}</a>`;
      return `  <tr><td>${link}</td><td>${prefix ? '' : escapeHtml(size)}</td></tr>`;
    })
    .join('\n');

  return page(
    title,
    `<nav>${crumbs}</nav>
<table>
${rows}
</table>`,
  );
}

export function renderSingleObject({
  key,
  size,
}: {
  key: string;
  size: string;
}): string {
  const name = key.split('/').pop() ?? key;
  return page(
    name,
    `<h1>${escapeHtml(key)}</h1>
<p>${escapeHtml(size)}</p>
<p><a href="?view">View</a> <a href="?download">Download</a></p>`,
  );
}

export function renderNotFound(message: string): string {
  return page('Not found', `<h1>${escapeHtml(message)}</h1>`);
}

// Listing entries are relative to the current prefix; keep their '/'
// separators but escape everything a URL would otherwise interpret.
function encodeKeyForHref(key: string) {
  return key.split('/').map(encodeURIComponent).join('/');
}
