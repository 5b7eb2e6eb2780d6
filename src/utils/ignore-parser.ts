import * as fs from 'fs';
import * as path from 'path';
import { errnoCode, errorMessage, FatalIOError } from '../errors';

export const IGNORE_FILE_NAME = '.backupscanignore';

/**
 * Default patterns (always excluded unless negated in the ignore file)
 */
export const DEFAULT_SCAN_IGNORE = [
  '.git/',
  'node_modules/',
];

/**
 * Parse a .backupscanignore file (gitignore-like syntax).
 *
 * Supports:
 * - Comments (#)
 * - Blank lines (ignored)
 * - Negation (!) — stored as-is, resolved by mergeIgnorePatterns
 * - Directory markers (trailing /)
 * - Glob patterns (*, **, ?)
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Defaults plus user patterns. `!pattern` drops a matching default
 * (`!node_modules` and `!node_modules/` are the same).
 */
export function mergeIgnorePatterns(userPatterns: string[]): string[] {
  const negations = userPatterns
    .filter(p => p.startsWith('!'))
    .map(p => p.slice(1).replace(/\/$/, ''));
  const additions = userPatterns.filter(p => !p.startsWith('!'));

  const defaults = DEFAULT_SCAN_IGNORE.filter(
    defaultPat => !negations.includes(defaultPat.replace(/\/$/, '')),
  );
  return [...defaults, ...additions];
}

/**
 * Read the ignore file from the scan root, if there is one.
 * A missing file is not an error; an unreadable one is.
 */
export function loadIgnorePatterns(rootDir: string): { patterns: string[]; hasFile: boolean } {
  const ignorePath = path.join(rootDir, IGNORE_FILE_NAME);
  let content: string;
  try {
    content = fs.readFileSync(ignorePath, 'utf-8');
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT') {
      return { patterns: [], hasFile: false };
    }
    throw new FatalIOError(`Cannot read ${ignorePath}: ${errorMessage(err)}`, ignorePath, code);
  }
  return { patterns: parseIgnoreFile(content), hasFile: true };
}

/**
 * Check a path (relative to the scan root, `/`-separated) against ignore
 * patterns. Directories are tested with `isDirectory` so that `uploads/`
 * matches the directory itself, not just its contents.
 */
export function shouldIgnorePath(relativePath: string, patterns: string[], isDirectory = false): boolean {
  const normalized = relativePath.replace(/\\/g, '/');
  const asDir = isDirectory ? `${normalized}/` : normalized;

  for (const pattern of patterns) {
    let p = pattern;
    // Anchored to the root
    const anchored = p.startsWith('/');
    if (anchored) p = p.slice(1);

    if (p.endsWith('/')) {
      const dirPart = p.slice(0, -1);
      if (hasGlob(dirPart)) {
        const regex = globToPathRegex(dirPart, anchored);
        const dirPath = isDirectory ? normalized : normalized.slice(0, Math.max(normalized.lastIndexOf('/'), 0));
        if (pathPrefixes(dirPath).some(prefix => regex.test(prefix))) return true;
      } else if (anchored
        ? asDir.startsWith(`${dirPart}/`)
        : asDir.startsWith(`${dirPart}/`) || asDir.includes(`/${dirPart}/`)) {
        return true;
      }
    } else if (hasGlob(p)) {
      if (globToPathRegex(p, anchored || p.includes('/')).test(normalized)) return true;
    } else if (p.includes('/') || anchored) {
      if (normalized === p || asDir.startsWith(`${p}/`)) return true;
    } else {
      // Plain name: any path segment
      if (normalized.split('/').includes(p)) return true;
    }
  }

  return false;
}

function hasGlob(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

/** `a/b/c` -> `a`, `a/b`, `a/b/c` */
function pathPrefixes(dirPath: string): string[] {
  const segments = dirPath.split('/').filter(s => s.length > 0);
  return segments.map((_, i) => segments.slice(0, i + 1).join('/'));
}

/**
 * Convert an ignore glob to a RegExp over `/`-separated paths.
 * Unanchored patterns may match starting at any segment.
 */
function globToPathRegex(pattern: string, anchored: boolean): RegExp {
  const body = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*/g, '{{GLOBSTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/\{\{GLOBSTAR\}\}/g, '.*');

  return new RegExp(anchored ? `^${body}$` : `(?:^|/)${body}$`);
}
