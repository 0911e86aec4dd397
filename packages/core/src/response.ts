/**
 * Response Builder
 *
 * Renders responses in the exact wire format: status line, one line per
 * header, a blank line, then the body with nothing after it.
 */

import {
  ERROR_CODE_TO_STATUS,
  STATUS_REASONS,
  type HeaderRecord,
  type HttpErrorCode,
  type HttpResponse,
} from './types.js';

const HTML = 'text/html; charset=utf-8';
const TEXT = 'text/plain';

/**
 * Serialize a response. `Content-Length` and `Connection: close` are set
 * here for every response; values in `headers` for those names are replaced.
 */
export function serializeResponse(response: HttpResponse): Buffer {
  const reason = STATUS_REASONS[response.status] ?? '';
  const headers: HeaderRecord = {
    ...response.headers,
    'Content-Length': String(response.body.length),
    Connection: 'close',
  };

  const head = [`HTTP/1.1 ${response.status} ${reason}`.trimEnd()];
  for (const [name, value] of Object.entries(headers)) {
    head.push(`${name}: ${value}`);
  }
  head.push('', '');

  return Buffer.concat([Buffer.from(head.join('\r\n'), 'latin1'), response.body]);
}

export function okResponse(body: Buffer, contentType: string): HttpResponse {
  return { status: 200, headers: { 'Content-Type': contentType }, body };
}

export function htmlResponse(html: string): HttpResponse {
  return okResponse(Buffer.from(html, 'utf8'), HTML);
}

export function redirectResponse(location: string): HttpResponse {
  const href = escapeHtml(location);
  return {
    status: 301,
    headers: { Location: location, 'Content-Type': HTML },
    body: Buffer.from(`<html><body>Moved: <a href="${href}">${href}</a></body></html>`, 'utf8'),
  };
}

const NOT_FOUND_PAGE = `<!DOCTYPE html>
<html>
<head>
  <title>404 Not Found</title>
</head>
<body>
  <h1>404 Not Found</h1>
  <p>The requested page does not exist.</p>
  <a href="/">Return to homepage</a>
</body>
</html>`;

const RATE_LIMITED_PAGE = `<!DOCTYPE html>
<html>
<head>
  <title>429 Too Many Requests</title>
</head>
<body>
  <h1>429 Too Many Requests</h1>
  <p>Please slow down and try again later.</p>
</body>
</html>`;

const ERROR_RESPONSES: Record<HttpErrorCode, { headers: HeaderRecord; body: string }> = {
  bad_request: { headers: { 'Content-Type': TEXT }, body: 'Bad Request' },
  not_found: { headers: { 'Content-Type': HTML }, body: NOT_FOUND_PAGE },
  method_not_allowed: {
    headers: { Allow: 'GET', 'Content-Type': TEXT },
    body: 'Only GET is allowed',
  },
  rate_limited: {
    headers: { 'Content-Type': HTML, 'Retry-After': '1' },
    body: RATE_LIMITED_PAGE,
  },
  server_error: { headers: { 'Content-Type': TEXT }, body: 'Internal Server Error' },
};

/** Fixed page for an error code; never reveals more than the status */
export function errorResponse(code: HttpErrorCode): HttpResponse {
  const { headers, body } = ERROR_RESPONSES[code];
  return {
    status: ERROR_CODE_TO_STATUS[code],
    headers: { ...headers },
    body: Buffer.from(body, 'utf8'),
  };
}

// =============================================================================
// Formatting helpers
// =============================================================================

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/** 1024-based size with one decimal place, e.g. `1.5 KB` */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Percent-encode one path segment, keeping only unreserved characters.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/** Percent-encode a path, keeping `/` separators */
export function encodePath(value: string): string {
  return value.split('/').map(encodePathSegment).join('/');
}
