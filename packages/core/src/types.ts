/**
 * Shared types and defaults for the request pipeline
 */

// =============================================================================
// Defaults
// =============================================================================

/** Sliding window length for the per-client limiter */
export const DEFAULT_WINDOW_MS = 1000;

/** Admissions per client per window */
export const DEFAULT_MAX_REQUESTS = 5;

/** Lock-held delay applied by the hit counter on every increment */
export const DEFAULT_HIT_DELAY_MS = 100;

/** Upper bound on a request head before it is rejected */
export const DEFAULT_MAX_REQUEST_BYTES = 8192;

/** Extensions that may be served, with the content type sent for each */
export const DEFAULT_CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html; charset=utf-8',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.pdf': 'application/pdf',
};

export const DEFAULT_ALLOWED_EXTENSIONS: readonly string[] = Object.keys(DEFAULT_CONTENT_TYPES);

/** Names shown in the top-level listing; everything else there is hidden */
export interface VisibleSet {
  files: ReadonlySet<string>;
  directories: ReadonlySet<string>;
}

export const DEFAULT_VISIBLE: VisibleSet = {
  files: new Set(['index.html', 'Syllabus PR FAF-23x -2.pdf']),
  directories: new Set(['books', 'docs', 'mercedes', 'report_pics']),
};

// =============================================================================
// Errors
// =============================================================================

export type HttpErrorCode =
  | 'bad_request'         // 400
  | 'not_found'           // 404
  | 'method_not_allowed'  // 405
  | 'rate_limited'        // 429
  | 'server_error';       // 500

/** Map error codes to HTTP status */
export const ERROR_CODE_TO_STATUS: Record<HttpErrorCode, number> = {
  bad_request: 400,
  not_found: 404,
  method_not_allowed: 405,
  rate_limited: 429,
  server_error: 500,
};

export const STATUS_REASONS: Record<number, string> = {
  200: 'OK',
  301: 'Moved Permanently',
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
};

/**
 * Why a request ended in 404. Only ever logged: every reason produces the
 * same page on the wire.
 */
export type NotFoundReason =
  | 'traversal'     // canonical path escapes the content root
  | 'missing'       // nothing at that path (or the name cannot be resolved)
  | 'not_a_file'    // exists but is neither a directory nor a regular file
  | 'extension'     // extension outside the allowed set
  | 'content_type'; // no content type known for the extension

export class HttpError extends Error {
  public readonly status: number;

  constructor(
    public readonly code: HttpErrorCode,
    message?: string
  ) {
    super(message ?? code);
    this.name = 'HttpError';
    this.status = ERROR_CODE_TO_STATUS[code];
  }
}

export class NotFoundError extends HttpError {
  constructor(public readonly reason: NotFoundReason, message?: string) {
    super('not_found', message ?? `Not found (${reason})`);
    this.name = 'NotFoundError';
  }
}

// =============================================================================
// Pipeline values
// =============================================================================

/** A request line that passed parsing and the method check */
export interface ParsedRequest {
  method: 'GET';
  /** Normalized and percent-decoded; always begins with `/` */
  target: string;
  version: string;
}

export interface ResolvedPath {
  absolutePath: string;
  isDirectory: boolean;
  isFile: boolean;
}

/** Header names are unique; insertion order is the order written */
export type HeaderRecord = Record<string, string>;

export interface HttpResponse {
  status: number;
  headers: HeaderRecord;
  body: Buffer;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
