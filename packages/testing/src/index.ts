/**
 * @tinyserve/testing
 *
 * Shared test helpers: content trees on disk and raw HTTP over loopback.
 */

import net from 'node:net';
import { mkdir, mkdtemp, realpath, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

export interface RawResponse {
  statusLine: string;
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export interface MemoryLogger {
  lines: string[];
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Logger that records instead of printing */
export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    log: (message) => lines.push(message),
    warn: (message) => lines.push(message),
    error: (message) => lines.push(message),
  };
}

/**
 * Build a content root in a temp directory. `files` maps paths relative to
 * the content root to their contents; directories are created as needed.
 */
export async function createContentTree(files: Record<string, string | Buffer>): Promise<string> {
  const root = await realpath(await mkdtemp(path.join(tmpdir(), 'tinyserve-')));
  await mkdir(path.join(root, 'public'), { recursive: true });
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    if (relative.endsWith('/')) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
  return root;
}

/** Split a raw response into status, headers and body bytes */
export function parseRawResponse(raw: Buffer): RawResponse {
  const split = raw.indexOf('\r\n\r\n');
  if (split === -1) {
    throw new Error(`Incomplete response: ${JSON.stringify(raw.toString('latin1'))}`);
  }
  const [statusLine = '', ...headerLines] = raw.subarray(0, split).toString('latin1').split('\r\n');
  const headers: Record<string, string> = {};
  for (const line of headerLines) {
    const colon = line.indexOf(':');
    headers[line.slice(0, colon)] = line.slice(colon + 1).trim();
  }
  return {
    statusLine,
    status: Number(statusLine.split(' ')[1]),
    headers,
    body: raw.subarray(split + 4),
  };
}

/**
 * Connect, write `payload` and collect everything the server sends until it
 * closes the connection. Unless `end` is false the client half-closes after
 * writing, as a one-shot client would.
 */
export function sendRaw(
  port: number,
  payload?: string | Buffer,
  options: { end?: boolean } = {}
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ port, host: '127.0.0.1' }, () => {
      if (payload !== undefined) socket.write(payload);
      if (options.end ?? true) socket.end();
    });
    socket.on('data', (chunk) => chunks.push(chunk));
    socket.on('error', reject);
    socket.on('close', () => resolve(Buffer.concat(chunks)));
  });
}

export async function get(port: number, target: string): Promise<RawResponse> {
  const raw = await sendRaw(port, `GET ${target} HTTP/1.1\r\nHost: localhost\r\n\r\n`);
  return parseRawResponse(raw);
}
