/**
 * @tinyserve/server
 *
 * TCP acceptor and per-connection request handler.
 */

export { createFileServer, type FileServer, type FileServerConfig } from './server.js';
export {
  ConnectionHandler,
  readRequestHead,
  type ConnectionHandlerConfig,
  type HeadReadOutcome,
  type HeadReadResult,
} from './handler.js';
export {
  loadEnvConfig,
  parseInteger,
  resolveContentRoot,
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_MAX_WORKERS,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_HEADER_GRACE_MS,
  type EnvConfig,
  type Logger,
} from './config.js';
