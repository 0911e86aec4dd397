/**
 * Connection Handler
 *
 * Runs one request per connection:
 * rate check -> read -> parse -> count -> resolve -> respond -> close.
 */

import type { Socket } from 'node:net';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  DEFAULT_ALLOWED_EXTENSIONS,
  DEFAULT_CONTENT_TYPES,
  DEFAULT_HEADING,
  DEFAULT_MAX_REQUEST_BYTES,
  DEFAULT_VISIBLE,
  FORBIDDEN_PAGE,
  HitCounter,
  HttpError,
  NotFoundError,
  PathResolver,
  RequestHeadAccumulator,
  SlidingWindowRateLimiter,
  encodePath,
  errorMessage,
  errorResponse,
  extractRequestLine,
  htmlResponse,
  okResponse,
  parseRequestLine,
  readListingEntries,
  redirectResponse,
  renderDirectoryListing,
  serializeResponse,
  type HttpResponse,
  type ParsedRequest,
  type VisibleSet,
} from '@tinyserve/core';
import { DEFAULT_HEADER_GRACE_MS, DEFAULT_READ_TIMEOUT_MS, type Logger } from './config.js';

export interface ConnectionHandlerConfig {
  resolver: PathResolver;
  rateLimiter: SlidingWindowRateLimiter;
  hits: HitCounter;
  logger: Logger;
  /** Lower-case extensions, with the dot, that may be served */
  allowedExtensions?: readonly string[];
  contentTypes?: Readonly<Record<string, string>>;
  /** Names shown in the top-level listing */
  visible?: VisibleSet;
  /** `<h1>` of listing pages */
  heading?: string;
  /** Simulated work after admission, before reading (default: 0) */
  workDelayMs?: number;
  /** How long to wait for the request head */
  readTimeoutMs?: number;
  /** How long to wait for headers after the request line (default: 50) */
  headerGraceMs?: number;
  maxRequestBytes?: number;
}

/** `line`: the request line arrived and the header grace period ran out */
export type HeadReadOutcome = 'complete' | 'line' | 'ended' | 'overflow' | 'timeout';

export interface HeadReadResult {
  outcome: HeadReadOutcome;
  data: Buffer;
}

/**
 * Read from `socket` until the request head is complete, the peer stops
 * sending, the size limit is passed or `timeoutMs` elapses. Once the request
 * line is in, the rest of the head gets at most `graceMs` more.
 */
export function readRequestHead(
  socket: Socket,
  options: { maxBytes: number; timeoutMs: number; graceMs: number }
): Promise<HeadReadResult> {
  const accumulator = new RequestHeadAccumulator(options.maxBytes);

  if (socket.destroyed || socket.readableEnded) {
    return Promise.resolve({ outcome: 'ended', data: accumulator.bytes() });
  }

  return new Promise((resolve) => {
    let timer: NodeJS.Timeout | undefined;
    let grace: NodeJS.Timeout | undefined;

    const finish = (outcome: HeadReadOutcome) => {
      clearTimeout(timer);
      clearTimeout(grace);
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.pause();
      resolve({ outcome, data: accumulator.bytes() });
    };
    const onData = (chunk: Buffer) => {
      const state = accumulator.push(chunk);
      if (state !== 'incomplete') {
        finish(state);
      } else if (grace === undefined && accumulator.hasRequestLine()) {
        grace = setTimeout(() => finish('line'), options.graceMs);
      }
    };
    const onEnd = () => finish('ended');

    timer = setTimeout(() => finish('timeout'), options.timeoutMs);
    socket.on('data', onData);
    socket.on('end', onEnd);
    socket.on('close', onEnd);
    socket.resume();
  });
}

interface Outcome {
  requestLine: string;
  response: HttpResponse;
}

export class ConnectionHandler {
  private readonly allowedExtensions: ReadonlySet<string>;
  private readonly contentTypes: Readonly<Record<string, string>>;

  constructor(private readonly config: ConnectionHandlerConfig) {
    this.allowedExtensions = new Set(
      (config.allowedExtensions ?? DEFAULT_ALLOWED_EXTENSIONS).map((ext) => ext.toLowerCase())
    );
    this.contentTypes = config.contentTypes ?? DEFAULT_CONTENT_TYPES;
  }

  /**
   * Serve one request on `socket` and close it. Resolves once the socket
   * has closed. Never rejects. The caller attaches the socket's `error`
   * listener.
   */
  async handle(socket: Socket): Promise<void> {
    const identity = socket.remoteAddress ?? 'unknown';
    const closed = this.whenClosed(socket);

    try {
      const outcome = await this.process(socket, identity);
      if (outcome) {
        this.send(socket, outcome.response);
        this.config.logger.log(
          `[Handler] ${identity} "${outcome.requestLine}" ${outcome.response.status}`
        );
      } else {
        socket.destroy();
      }
    } catch (err) {
      this.config.logger.error(`[Handler] Failed serving ${identity}: ${errorMessage(err)}`);
      socket.destroy();
    }

    await closed;
  }

  private async process(socket: Socket, identity: string): Promise<Outcome | null> {
    if (!this.config.rateLimiter.allow(identity)) {
      return { requestLine: '-', response: errorResponse('rate_limited') };
    }

    const workDelayMs = this.config.workDelayMs ?? 0;
    if (workDelayMs > 0) {
      await sleep(workDelayMs);
    }

    const head = await readRequestHead(socket, {
      maxBytes: this.config.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES,
      timeoutMs: this.config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS,
      graceMs: this.config.headerGraceMs ?? DEFAULT_HEADER_GRACE_MS,
    });
    if (head.data.length === 0 && head.outcome === 'ended') {
      return null;
    }

    const requestLine = extractRequestLine(head.data);
    const lineComplete = head.outcome !== 'timeout' || head.data.includes('\r\n');
    if (head.outcome === 'overflow' || !lineComplete) {
      return { requestLine, response: errorResponse('bad_request') };
    }

    let request: ParsedRequest;
    try {
      request = parseRequestLine(requestLine);
    } catch (err) {
      if (err instanceof HttpError) {
        return { requestLine, response: errorResponse(err.code) };
      }
      throw err;
    }

    await this.config.hits.record(request.target);

    try {
      return { requestLine, response: await this.serve(request.target) };
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.config.logger.log(`[Handler] ${request.target}: ${err.message}`);
        return { requestLine, response: errorResponse('not_found') };
      }
      throw err;
    }
  }

  /**
   * Response for a decoded target.
   *
   * A directory target without its trailing slash is redirected to the
   * target plus `/`, percent-encoded, so decoded control characters such
   * as CR/LF cannot reach the `Location` header.
   *
   * @throws NotFoundError for every not-found cause
   */
  async serve(target: string): Promise<HttpResponse> {
    const resolved = await this.config.resolver.resolve(target);

    if (resolved.isDirectory) {
      if (!target.endsWith('/')) {
        return redirectResponse(encodePath(`${target}/`));
      }
      return htmlResponse(await this.renderListing(target, resolved.absolutePath));
    }

    if (!resolved.isFile) {
      throw new NotFoundError('not_a_file');
    }

    const ext = path.extname(resolved.absolutePath).toLowerCase();
    if (!this.allowedExtensions.has(ext)) {
      throw new NotFoundError('extension', `Extension "${ext}" is not served`);
    }

    const contentType = Object.hasOwn(this.contentTypes, ext) ? this.contentTypes[ext] : undefined;
    if (!contentType) {
      throw new NotFoundError('content_type', `No content type for "${ext}"`);
    }

    let body: Buffer;
    try {
      body = await readFile(resolved.absolutePath);
    } catch (err) {
      this.config.logger.error(`[Handler] Reading ${resolved.absolutePath} failed: ${errorMessage(err)}`);
      return errorResponse('server_error');
    }
    return okResponse(body, contentType);
  }

  private async renderListing(requestPath: string, directory: string): Promise<string> {
    try {
      const entries = await readListingEntries(directory);
      return renderDirectoryListing({
        requestPath,
        entries,
        hits: (child) => this.config.hits.get(child),
        visible: this.config.visible ?? DEFAULT_VISIBLE,
        heading: this.config.heading ?? DEFAULT_HEADING,
      });
    } catch (err) {
      this.config.logger.warn(`[Handler] Cannot list ${directory}: ${errorMessage(err)}`);
      return FORBIDDEN_PAGE;
    }
  }

  /**
   * Write the response and half-close. Remaining input is drained so the
   * peer sees FIN rather than a reset; a peer that never closes its side is
   * dropped after the read timeout.
   */
  private send(socket: Socket, response: HttpResponse): void {
    if (socket.destroyed) return;
    socket.end(serializeResponse(response));
    socket.resume();
    socket.setTimeout(this.config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS, () => socket.destroy());
  }

  private whenClosed(socket: Socket): Promise<void> {
    if (socket.closed) return Promise.resolve();
    return new Promise((resolve) => socket.once('close', () => resolve()));
  }
}
