/**
 * File Server
 *
 * Accepts TCP connections and hands each one to the connection handler,
 * with at most `maxWorkers` connections in progress at once.
 */

import net, { type Socket } from 'node:net';
import {
  DEFAULT_HIT_DELAY_MS,
  DEFAULT_RATE_LIMIT,
  HitCounter,
  PathResolver,
  Semaphore,
  SlidingWindowRateLimiter,
  errorMessage,
  type RateLimitConfig,
} from '@tinyserve/core';
import {
  DEFAULT_HOST,
  DEFAULT_MAX_WORKERS,
  DEFAULT_PORT,
  type Logger,
} from './config.js';
import { ConnectionHandler, type ConnectionHandlerConfig } from './handler.js';

type HandlerOptions = Omit<ConnectionHandlerConfig, 'resolver' | 'rateLimiter' | 'hits' | 'logger'>;

export interface FileServerConfig extends HandlerOptions {
  /** Directory containing `public/` */
  contentRoot: string;
  /** Default: 8001; 0 picks a free port */
  port?: number;
  host?: string;
  /** Soft cap on connections handled concurrently; the rest wait */
  maxWorkers?: number;
  rateLimit?: RateLimitConfig;
  /** Lock-held delay on every hit increment */
  hitDelayMs?: number;
  logger?: Logger;
}

export function createFileServer(config: FileServerConfig) {
  const logger = config.logger ?? console;
  const rateLimit = config.rateLimit ?? DEFAULT_RATE_LIMIT;
  const rateLimiter = new SlidingWindowRateLimiter(rateLimit);
  const hits = new HitCounter({ delayMs: config.hitDelayMs ?? DEFAULT_HIT_DELAY_MS });
  const workers = new Semaphore(config.maxWorkers ?? DEFAULT_MAX_WORKERS);
  const sockets = new Set<Socket>();

  let server: net.Server | null = null;

  const dispatch = (socket: Socket, handler: ConnectionHandler): void => {
    sockets.add(socket);
    socket.on('error', (err) => {
      logger.warn(`[Server] Socket error from ${socket.remoteAddress ?? 'unknown'}: ${err.message}`);
    });
    socket.once('close', () => sockets.delete(socket));

    workers.run(() => handler.handle(socket)).catch((err: unknown) => {
      logger.error(`[Server] Worker failed: ${errorMessage(err)}`);
      socket.destroy();
    });
  };

  /** Bound port, once listening */
  const port = (): number => {
    const address = server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening');
    }
    return address.port;
  };

  return {
    rateLimiter,
    hits,
    workers,
    start: async (): Promise<void> => {
      const resolver = await PathResolver.create(config.contentRoot);
      const handler = new ConnectionHandler({
        ...config,
        resolver,
        rateLimiter,
        hits,
        logger,
      });

      // The handler decides when each socket closes, even after the peer's FIN
      const listener = net.createServer(
        { pauseOnConnect: true, allowHalfOpen: true },
        (socket) => dispatch(socket, handler)
      );
      server = listener;

      await new Promise<void>((resolve, reject) => {
        listener.once('error', reject);
        listener.listen(config.port ?? DEFAULT_PORT, config.host ?? DEFAULT_HOST, () => {
          listener.off('error', reject);
          resolve();
        });
      });
      listener.on('error', (err) => logger.error(`[Server] ${err.message}`));

      logger.log(`[Server] Serving directory: ${resolver.contentRoot}`);
      logger.log(`[Server] Listening on ${config.host ?? DEFAULT_HOST}:${port()}`);
      logger.log(`[Server] Rate limit: ${rateLimit.maxRequests} requests per ${rateLimit.windowMs}ms`);
    },
    /** Stop accepting and drop in-flight connections without draining */
    stop: (): Promise<void> => {
      return new Promise<void>((resolve, reject) => {
        if (!server) {
          resolve();
          return;
        }
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server = null;
        for (const socket of sockets) {
          socket.destroy();
        }
      });
    },
    port,
  };
}

export type FileServer = ReturnType<typeof createFileServer>;
