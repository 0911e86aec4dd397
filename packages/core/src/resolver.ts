/**
 * Path Resolver
 *
 * Maps request targets onto the `public` directory of the content root and
 * refuses anything whose canonical path leaves the content root.
 */

import { realpath, stat } from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError, errorMessage, type ResolvedPath } from './types.js';

/** Directory under the content root that is exposed to clients */
export const PUBLIC_DIR = 'public';

/**
 * True when `child` is `parent` or lies beneath it. Both must already be
 * canonical. Paths on different roots (another drive) never match.
 */
export function isSubpath(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

export class PathResolver {
  private constructor(
    /** Canonical content root */
    public readonly contentRoot: string
  ) {}

  get publicRoot(): string {
    return path.join(this.contentRoot, PUBLIC_DIR);
  }

  /**
   * Create a resolver for `contentRoot`, canonicalizing it once up front.
   */
  static async create(contentRoot: string): Promise<PathResolver> {
    return new PathResolver(await realpath(path.resolve(contentRoot)));
  }

  /**
   * Resolve a decoded target (leading `/`) to a canonical path inside the
   * content root.
   *
   * @throws NotFoundError `missing` if the path cannot be canonicalized,
   *   `traversal` if it escapes the content root
   */
  async resolve(target: string): Promise<ResolvedPath> {
    const requested = path.join(this.publicRoot, target.replace(/^\/+/, ''));

    let canonical: string;
    try {
      canonical = await realpath(requested);
    } catch (err) {
      throw new NotFoundError('missing', `Cannot resolve ${target}: ${errorMessage(err)}`);
    }

    if (!isSubpath(canonical, this.contentRoot)) {
      throw new NotFoundError('traversal', `${target} resolves outside the content root`);
    }

    const stats = await stat(canonical).catch((err: unknown) => {
      throw new NotFoundError('missing', `Cannot stat ${target}: ${errorMessage(err)}`);
    });

    return {
      absolutePath: canonical,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }
}
