import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { readdir, readFile, rm } from 'node:fs/promises';
import {
  FORBIDDEN_PAGE,
  HitCounter,
  PathResolver,
  SlidingWindowRateLimiter,
} from '@tinyserve/core';
import { createContentTree, createMemoryLogger } from '@tinyserve/testing';
import { ConnectionHandler, type ConnectionHandlerConfig } from '../src/handler.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readFile: vi.fn(actual.readFile),
    readdir: vi.fn(actual.readdir),
  };
});

describe('ConnectionHandler.serve', () => {
  let contentRoot: string;
  let resolver: PathResolver;

  beforeAll(async () => {
    contentRoot = await createContentTree({
      'public/index.html': '<h1>home</h1>',
      'public/notes.txt': 'notes',
      'public/docs/guide.html': 'guide',
      'public/my docs/': '',
    });
    resolver = await PathResolver.create(contentRoot);
  });

  afterAll(async () => {
    await rm(contentRoot, { recursive: true, force: true });
  });

  function createHandler(overrides: Partial<ConnectionHandlerConfig> = {}) {
    const logger = createMemoryLogger();
    const handler = new ConnectionHandler({
      resolver,
      rateLimiter: new SlidingWindowRateLimiter(),
      hits: new HitCounter({ delayMs: 0 }),
      logger,
      ...overrides,
    });
    return { handler, logger };
  }

  it('should return file bytes with the content type for the extension', async () => {
    const { handler } = createHandler();

    const response = await handler.serve('/index.html');

    expect(response.status).toBe(200);
    expect(response.headers).toEqual({ 'Content-Type': 'text/html; charset=utf-8' });
    expect(response.body.toString()).toBe('<h1>home</h1>');
  });

  it('should redirect directories that lack a trailing slash', async () => {
    const { handler } = createHandler();

    const response = await handler.serve('/docs');

    expect(response.status).toBe(301);
    expect(response.headers.Location).toBe('/docs/');
  });

  it('should percent-encode the redirect location', async () => {
    const { handler } = createHandler();

    const response = await handler.serve('/my docs');

    expect(response.headers.Location).toBe('/my%20docs/');
  });

  it('should render a listing with hit counts from the counter', async () => {
    const hits = new HitCounter({ delayMs: 0 });
    await hits.record('/docs/guide.html');
    await hits.record('/docs/guide.html');
    const { handler } = createHandler({ hits, heading: 'Docs' });

    const response = await handler.serve('/docs/');
    const html = response.body.toString();

    expect(response.status).toBe(200);
    expect(html).toContain('<h1>Docs</h1>');
    expect(html).toContain('<a href="guide.html">guide.html</a></td><td>5.0 B</td><td>2</td>');
  });

  it('should apply a custom visible set at the root', async () => {
    const { handler } = createHandler({
      visible: { files: new Set(['notes.txt']), directories: new Set() },
    });

    const html = (await handler.serve('/')).body.toString();

    expect(html).toContain('<a href="notes.txt">notes.txt</a>');
    expect(html).not.toContain('index.html');
    expect(html).not.toContain('docs/');
  });

  it('should reject extensions outside the allowed set', async () => {
    const { handler } = createHandler();

    await expect(handler.serve('/notes.txt')).rejects.toMatchObject({
      reason: 'extension',
      status: 404,
    });
  });

  it('should reject allowed extensions with no content type', async () => {
    const { handler } = createHandler({ allowedExtensions: ['.html', '.TXT'] });

    await expect(handler.serve('/notes.txt')).rejects.toMatchObject({ reason: 'content_type' });
  });

  it('should serve extra extensions given a content type', async () => {
    const { handler } = createHandler({
      allowedExtensions: ['.txt'],
      contentTypes: { '.txt': 'text/plain; charset=utf-8' },
    });

    const response = await handler.serve('/notes.txt');

    expect(response.headers['Content-Type']).toBe('text/plain; charset=utf-8');
    await expect(handler.serve('/index.html')).rejects.toMatchObject({ reason: 'extension' });
  });

  it('should answer 500 when the file cannot be read', async () => {
    const { handler, logger } = createHandler();
    vi.mocked(readFile).mockRejectedValueOnce(new Error('EIO: i/o error'));

    const response = await handler.serve('/index.html');

    expect(response.status).toBe(500);
    expect(response.body.toString()).toBe('Internal Server Error');
    expect(logger.lines).toEqual([
      `[Handler] Reading ${resolver.publicRoot}/index.html failed: EIO: i/o error`,
    ]);
  });

  it('should render the forbidden page when a directory cannot be read', async () => {
    const { handler } = createHandler();
    vi.mocked(readdir).mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const response = await handler.serve('/docs/');

    expect(response.status).toBe(200);
    expect(response.body.toString()).toBe(FORBIDDEN_PAGE);
  });
});
