import * as fs from 'fs';
import { RunResult, ScanOptions } from './types';
import { UsageError } from './errors';
import { buildRuleSet } from './patterns/backup-patterns';
import { createMatcher } from './utils/matcher';
import { assertScanRoot, walkCandidates } from './utils/file-walker';
import { loadIgnorePatterns, mergeIgnorePatterns } from './utils/ignore-parser';
import { Reporter } from './utils/reporter';
import { loadScanConfig, toRule } from './config/loader';

export const VERSION = '0.1.0';

function isExistingDirectory(value: string): boolean {
  try {
    return fs.statSync(value).isDirectory();
  } catch {
    // not a path at all, so a real suffix
    return false;
  }
}

/**
 * With no ROOT operand, a directory among the -e values is the root the
 * user meant to scan, read as a suffix instead.
 */
export function assertNoSwallowedRoot(extensions: string[] | undefined): void {
  const swallowed = extensions?.find(isExistingDirectory);
  if (swallowed !== undefined) {
    throw new UsageError(`"${swallowed}" is a directory, not a suffix; put ROOT before -e or end the suffix list with --`);
  }
}

/**
 * Scan `targetPath` for backup-like file names and emit the results.
 * Throws UsageError / FatalIOError; per-entry problems become warnings.
 */
export async function runScan(targetPath: string, options: ScanOptions = {}): Promise<RunResult> {
  // Checked before anything is read or written, so a bad root never
  // touches the output file.
  const absRoot = assertScanRoot(targetPath);

  const { config, source } = loadScanConfig(absRoot, options.config);
  const ignoreFile = loadIgnorePatterns(absRoot);

  // CLI flags take precedence over config values
  const rules = buildRuleSet({
    suffixes: options.extensions ?? config.extensions,
    extraSuffixes: config.extraSuffixes,
    rules: config.rules.map(toRule),
  });
  const ignorePatterns = mergeIgnorePatterns([
    ...ignoreFile.patterns,
    ...config.exclude,
    ...(options.exclude ?? []),
  ]);

  const reporter = new Reporter({
    verbose: options.verbose,
    format: options.json ? 'json' : 'text',
    output: options.output,
    version: VERSION,
  });

  reporter.info(`Target: ${absRoot}`);
  if (source) reporter.info(`Config: ${source}`);
  reporter.info(`Rules: ${rules.map(r => r.pattern).join(' ')}`);
  if (ignorePatterns.length > 0) reporter.info(`Exclude: ${ignorePatterns.join(', ')}`);

  const matcher = createMatcher(rules);
  const candidates = walkCandidates(absRoot, {
    maxDepth: options.maxDepth ?? config.maxDepth,
    followSymlinks: options.followSymlinks ?? config.followSymlinks ?? false,
    sorted: options.sorted ?? config.sorted ?? false,
    ignorePatterns,
    onDirectory: dir => reporter.directory(dir),
    onWarning: warning => reporter.warn(warning),
  });

  for (const candidate of candidates) {
    reporter.scanned(candidate);
    const rule = matcher.match(candidate);
    if (rule) {
      reporter.record({ candidate, rule });
    }
  }

  const result = reporter.finalize(absRoot);
  reporter.emit(result);
  return result;
}
