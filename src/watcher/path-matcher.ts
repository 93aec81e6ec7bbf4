import micromatch from 'micromatch';
import path from 'path';
import { MATCH_CONSTANTS } from '../config/constants.js';

export interface PathMatcherOptions {
  watchPaths: readonly string[];
  extensions: readonly string[];
  ignorePatterns: readonly string[];
}

export interface PathMatcher {
  /** True when the path is under a watch root, not ignored, and has a watched extension */
  isRelevant(filePath: string): boolean;
  /** True when the path is below a watch root and excluded by the dotfile, VCS or ignore rules */
  isIgnored(filePath: string): boolean;
  /** Deepest watch root containing the path, or null */
  rootOf(filePath: string): string | null;
}

const GLOB_CHARS = /[*?[\]{}()!]/;
const VCS_DIRECTORIES = new Set<string>(MATCH_CONSTANTS.VCS_DIRECTORIES);

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

function normalizeAbsolute(filePath: string): string {
  const posix = toPosixPath(path.resolve(filePath));
  return posix.length > 1 && posix.endsWith('/') ? posix.slice(0, -1) : posix;
}

function isHiddenSegment(segment: string): boolean {
  return segment.startsWith('.') || VCS_DIRECTORIES.has(segment);
}

interface CompiledPattern {
  matches(relativePath: string, absolutePath: string): boolean;
}

function compilePattern(raw: string): CompiledPattern {
  const pattern = toPosixPath(raw).replace(/^\.\//, '');
  // Absolute patterns are tested against the absolute path, the rest against the root-relative one
  const absolute = path.posix.isAbsolute(pattern);

  if (GLOB_CHARS.test(pattern)) {
    const matchBase = !pattern.includes('/');
    const isMatch = micromatch.matcher(pattern, { dot: true, matchBase });
    return { matches: (relativePath, absolutePath) => isMatch(absolute ? absolutePath : relativePath) };
  }

  return {
    matches: (relativePath, absolutePath) =>
      absolute ? absolutePath.startsWith(pattern) : relativePath.includes(pattern),
  };
}

/**
 * Build the relevance filter for changed paths. Pure: no filesystem access,
 * matching is case-sensitive and works on absolute `/`-separated paths.
 */
export function createPathMatcher(options: PathMatcherOptions): PathMatcher {
  // Deepest root first so nested watch paths resolve to the closest root
  const roots = options.watchPaths
    .map(normalizeAbsolute)
    .sort((a, b) => b.length - a.length);
  const extensions = new Set(options.extensions);
  const acceptAnyExtension = extensions.has('*');
  const patterns = options.ignorePatterns.map(compilePattern);

  function rootOf(filePath: string): string | null {
    const normalized = normalizeAbsolute(filePath);
    for (const root of roots) {
      if (normalized === root) {
        return root;
      }
      const prefix = root.endsWith('/') ? root : `${root}/`;
      if (normalized.startsWith(prefix)) {
        return root;
      }
    }
    return null;
  }

  function relativeTo(root: string, filePath: string): string {
    const normalized = normalizeAbsolute(filePath);
    // A watch root that is itself a file is matched by its own name
    return normalized === root ? path.posix.basename(root) : path.posix.relative(root, normalized);
  }

  function isExcluded(relativePath: string, filePath: string): boolean {
    const absolutePath = normalizeAbsolute(filePath);
    // Hidden and VCS segments count anywhere in the path, the watch root's own ancestors included
    if (absolutePath.split('/').some(isHiddenSegment)) {
      return true;
    }
    return patterns.some((pattern) => pattern.matches(relativePath, absolutePath));
  }

  return {
    rootOf,

    isIgnored(filePath: string): boolean {
      const root = rootOf(filePath);
      // Never exclude a watch root itself
      if (root === null || normalizeAbsolute(filePath) === root) {
        return false;
      }
      return isExcluded(relativeTo(root, filePath), filePath);
    },

    isRelevant(filePath: string): boolean {
      const root = rootOf(filePath);
      if (root === null) {
        return false;
      }

      const relativePath = relativeTo(root, filePath);
      if (relativePath === '' || isExcluded(relativePath, filePath)) {
        return false;
      }

      if (acceptAnyExtension) {
        return true;
      }
      const ext = path.posix.extname(relativePath).slice(1);
      return ext.length > 0 && extensions.has(ext);
    },
  };
}
