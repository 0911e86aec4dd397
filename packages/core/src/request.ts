/**
 * Request head accumulation and request-line parsing
 */

import { DEFAULT_MAX_REQUEST_BYTES, HttpError, type ParsedRequest } from './types.js';

const CRLF = Buffer.from('\r\n');
const HEAD_TERMINATOR = Buffer.from('\r\n\r\n');

export type AccumulatorState = 'incomplete' | 'complete' | 'overflow';

/**
 * Collects socket chunks until the request head is complete.
 *
 * Only the request line is interpreted; header lines are read so the peer
 * is not cut off mid-send, then ignored.
 */
export class RequestHeadAccumulator {
  private chunks: Buffer[] = [];
  private length = 0;

  constructor(private readonly maxBytes: number = DEFAULT_MAX_REQUEST_BYTES) {}

  push(chunk: Buffer): AccumulatorState {
    this.chunks.push(chunk);
    this.length += chunk.length;
    return this.state();
  }

  state(): AccumulatorState {
    const data = this.bytes();
    const end = data.indexOf(HEAD_TERMINATOR);
    if (end !== -1 && end + HEAD_TERMINATOR.length <= this.maxBytes) {
      return 'complete';
    }
    return this.length > this.maxBytes ? 'overflow' : 'incomplete';
  }

  /** True once the first line has its terminator */
  hasRequestLine(): boolean {
    return this.bytes().indexOf(CRLF) !== -1;
  }

  get size(): number {
    return this.length;
  }

  bytes(): Buffer {
    if (this.chunks.length > 1) {
      this.chunks = [Buffer.concat(this.chunks)];
    }
    return this.chunks[0] ?? Buffer.alloc(0);
  }
}

/**
 * Text up to the first CRLF, or the whole buffer when there is none.
 * Invalid UTF-8 becomes U+FFFD rather than failing.
 */
export function extractRequestLine(data: Buffer): string {
  const end = data.indexOf(CRLF);
  return data.subarray(0, end === -1 ? data.length : end).toString('utf8');
}

/**
 * Percent-decode a target. Malformed escapes are left as written instead
 * of failing the request.
 */
export function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Decode each run of escapes on its own; invalid UTF-8 becomes U+FFFD
    return value.replace(/(?:%[0-9a-fA-F]{2})+/g, (run) => {
      try {
        return decodeURIComponent(run);
      } catch {
        return Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8');
      }
    });
  }
}

/** Force a leading `/`, then percent-decode */
export function normalizeTarget(rawTarget: string): string {
  const target = rawTarget.startsWith('/') ? rawTarget : '/';
  return percentDecode(target);
}

/**
 * Parse `METHOD SP target SP version`.
 *
 * @throws HttpError `bad_request` unless there are exactly three tokens,
 *   `method_not_allowed` for anything but GET
 */
export function parseRequestLine(line: string): ParsedRequest {
  const parts = line.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length !== 3) {
    throw new HttpError('bad_request', `Expected 3 tokens in request line, got ${parts.length}`);
  }

  const [method, rawTarget, version] = parts;
  if (method !== 'GET') {
    throw new HttpError('method_not_allowed', `Method ${method} not allowed`);
  }

  return {
    method,
    target: normalizeTarget(rawTarget),
    version,
  };
}
