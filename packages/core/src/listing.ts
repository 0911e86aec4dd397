/**
 * Directory listing page
 */

import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { encodePath, encodePathSegment, escapeHtml, formatSize } from './response.js';
import { DEFAULT_VISIBLE, type VisibleSet } from './types.js';

/** Listing paths that get the visible-set filter */
export const TOP_LEVEL_PATHS: ReadonlySet<string> = new Set(['/', '/public/']);

export interface ListingEntry {
  name: string;
  isDirectory: boolean;
  /** Byte size; ignored for directories */
  size: number;
}

export interface ListingOptions {
  /** Request path of the directory, ending in `/` */
  requestPath: string;
  entries: ListingEntry[];
  /** Hit count lookup by request path */
  hits: (requestPath: string) => number;
  visible?: VisibleSet;
  /** Text of the page's `<h1>` */
  heading?: string;
}

export const DEFAULT_HEADING = 'File Server';

export const FORBIDDEN_PAGE = '<html><body><h1>Forbidden</h1></body></html>';

/**
 * Read a directory's entries, sorted by name. Symlinks report what they
 * point at; entries that vanish or cannot be stat'ed are skipped.
 */
export async function readListingEntries(directory: string): Promise<ListingEntry[]> {
  const names = (await readdir(directory)).sort();
  const entries: ListingEntry[] = [];

  for (const name of names) {
    try {
      const stats = await stat(path.join(directory, name));
      entries.push({ name, isDirectory: stats.isDirectory(), size: stats.size });
    } catch {
      continue; // removed or dangling link
    }
  }
  return entries;
}

/** `/a/b/` -> `/a/`, `/a/` -> `/` */
export function parentPath(requestPath: string): string {
  const trimmed = requestPath.replace(/\/+$/, '');
  const parent = trimmed.slice(0, trimmed.lastIndexOf('/'));
  return parent ? `${parent}/` : '/';
}

function isVisible(entry: ListingEntry, visible: VisibleSet): boolean {
  return entry.isDirectory ? visible.directories.has(entry.name) : visible.files.has(entry.name);
}

export function renderDirectoryListing(options: ListingOptions): string {
  const { requestPath, hits } = options;
  const visible = options.visible ?? DEFAULT_VISIBLE;
  const title = escapeHtml(`Content of ${requestPath}`);
  const filtered = TOP_LEVEL_PATHS.has(requestPath);

  const lines = [
    '<!DOCTYPE html>',
    "<html lang='en'>",
    '<head>',
    "<meta charset='utf-8'>",
    "<meta name='viewport' content='width=device-width, initial-scale=1'>",
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    `<h1>${escapeHtml(options.heading ?? DEFAULT_HEADING)}</h1>`,
    `<h2>${title}</h2>`,
    '<main>',
  ];

  if (requestPath !== '/') {
    lines.push(`<a href="${escapeHtml(encodePath(parentPath(requestPath)))}">⬆ Parent directory</a>`);
  }
  lines.push("<table border='1'>", '<tr><th>Name</th><th>Size</th><th>Hits</th></tr>');

  for (const entry of options.entries) {
    if (filtered && !isVisible(entry, visible)) continue;

    const suffix = entry.isDirectory ? '/' : '';
    const href = escapeHtml(encodePathSegment(entry.name) + suffix);
    const size = entry.isDirectory ? '—' : formatSize(entry.size);
    const count = hits(requestPath + entry.name + suffix);
    lines.push(
      `<tr><td><a href="${href}">${escapeHtml(entry.name + suffix)}</a></td>` +
        `<td>${size}</td><td>${count}</td></tr>`
    );
  }

  lines.push('</table></main></body></html>');
  return lines.join('\n');
}
