/**
 * @tinyserve/core
 *
 * Request pipeline building blocks: rate limiting, hit counting, request
 * parsing, path resolution and response rendering.
 */

export * from './types.js';
export { SlidingWindowRateLimiter, DEFAULT_RATE_LIMIT, type RateLimitConfig } from './ratelimit.js';
export { Mutex, Semaphore } from './lock.js';
export { HitCounter, type HitCounterConfig } from './hits.js';
export {
  RequestHeadAccumulator,
  extractRequestLine,
  normalizeTarget,
  parseRequestLine,
  percentDecode,
  type AccumulatorState,
} from './request.js';
export { PathResolver, PUBLIC_DIR, isSubpath } from './resolver.js';
export {
  serializeResponse,
  okResponse,
  htmlResponse,
  redirectResponse,
  errorResponse,
  formatSize,
  escapeHtml,
  encodePath,
  encodePathSegment,
} from './response.js';
export {
  renderDirectoryListing,
  readListingEntries,
  parentPath,
  TOP_LEVEL_PATHS,
  DEFAULT_HEADING,
  FORBIDDEN_PAGE,
  type ListingEntry,
  type ListingOptions,
} from './listing.js';
