import * as fs from 'fs';
import * as path from 'path';
import { Candidate, ScanWarning, WarningCode } from '../types';
import { errnoCode, errorMessage, FatalIOError } from '../errors';
import { shouldIgnorePath } from './ignore-parser';

export interface WalkOptions {
  /** Directory levels to descend below the root. Unlimited by default; 0 = root files only. */
  maxDepth?: number;
  /** Enter symlinked directories. Cycles are still cut by real-path tracking. */
  followSymlinks?: boolean;
  /** Visit each directory's entries in name order instead of readdir order. */
  sorted?: boolean;
  ignorePatterns?: string[];
  onDirectory?: (dir: string) => void;
  onWarning?: (warning: ScanWarning) => void;
}

/**
 * Fail fast on a root that cannot be scanned at all. Everything below the
 * root is best-effort and reported through onWarning instead.
 */
export function assertScanRoot(root: string): string {
  const absRoot = path.resolve(root);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absRoot);
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new FatalIOError(`Scan root not found: ${absRoot}`, absRoot, code);
    }
    throw new FatalIOError(`Cannot access scan root ${absRoot}: ${errorMessage(err)}`, absRoot, code);
  }
  if (!stat.isDirectory()) {
    throw new FatalIOError(`Scan root is not a directory: ${absRoot}`, absRoot, 'ENOTDIR');
  }
  try {
    fs.accessSync(absRoot, fs.constants.R_OK | fs.constants.X_OK);
  } catch (err) {
    throw new FatalIOError(`Scan root is not readable: ${absRoot}`, absRoot, errnoCode(err));
  }
  return absRoot;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Lazily yield every regular file under `root`. Each call starts a fresh
 * traversal; no state is shared between calls.
 *
 * A directory is never entered twice, however symlinks are arranged, so no
 * entry location (real directory + name) is yielded twice.
 */
export function* walkCandidates(root: string, options: WalkOptions = {}): Generator<Candidate, void, undefined> {
  const absRoot = assertScanRoot(root);
  const ignorePatterns = options.ignorePatterns ?? [];
  const visitedDirs = new Set<string>();
  const yieldedFiles = new Set<string>();

  function warn(target: string, code: WarningCode, err: unknown): void {
    options.onWarning?.({ path: target, code, message: errorMessage(err) });
  }

  function* walk(dir: string, relDir: string, depth: number): Generator<Candidate, void, undefined> {
    let realDir: string;
    try {
      realDir = fs.realpathSync(dir);
    } catch (err) {
      warn(dir, 'stat-failed', err);
      return;
    }
    if (visitedDirs.has(realDir)) return;
    visitedDirs.add(realDir);

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      warn(dir, 'unreadable-directory', err);
      return;
    }
    options.onDirectory?.(dir);
    if (options.sorted) entries.sort(byName);

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relativePath = relDir ? `${relDir}/${entry.name}` : entry.name;
      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        let target: fs.Stats;
        try {
          target = fs.statSync(fullPath);
        } catch (err) {
          warn(fullPath, 'broken-symlink', err);
          continue;
        }
        if (target.isDirectory() && !options.followSymlinks) continue;
        isDirectory = target.isDirectory();
        isFile = target.isFile();
      }

      if (isDirectory) {
        if (shouldIgnorePath(relativePath, ignorePatterns, true)) continue;
        if (options.maxDepth !== undefined && depth >= options.maxDepth) continue;
        yield* walk(fullPath, relativePath, depth + 1);
      } else if (isFile) {
        if (shouldIgnorePath(relativePath, ignorePatterns)) continue;
        // Keyed on the entry's own location, not its target: a backup-named
        // symlink to a live file is itself an exposure and must be reported.
        const location = path.join(realDir, entry.name);
        if (yieldedFiles.has(location)) continue;
        yieldedFiles.add(location);
        yield { path: fullPath, relativePath, name: entry.name, depth };
      }
    }
  }

  yield* walk(absRoot, '', 0);
}
