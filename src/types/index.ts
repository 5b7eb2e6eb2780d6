/**
 * How a rule's pattern is interpreted:
 *  - suffix: the base name ends with `pattern` (case-insensitive)
 *  - glob: `*` / `?` wildcard over the whole base name (case-insensitive)
 *  - regex: regular expression tested against the base name (case-insensitive)
 */
export type RuleKind = 'suffix' | 'glob' | 'regex';

export interface Rule {
  readonly id: string;
  readonly kind: RuleKind;
  readonly pattern: string;
  readonly reason: string;
}

export type RuleSet = ReadonlyArray<Rule>;

export interface Candidate {
  readonly path: string;
  readonly relativePath: string;
  readonly name: string;
  readonly depth: number;
}

export interface Finding {
  readonly candidate: Candidate;
  readonly rule: Rule;
}

export type WarningCode = 'unreadable-directory' | 'stat-failed' | 'broken-symlink';

export interface ScanWarning {
  path: string;
  code: WarningCode;
  message: string;
}

export interface RunSummary {
  filesScanned: number;
  directoriesScanned: number;
  matches: number;
  warnings: number;
}

export interface RunResult {
  version: string;
  root: string;
  timestamp: string;
  duration: number; // ms
  findings: Finding[];
  warnings: ScanWarning[];
  summary: RunSummary;
}

export type OutputFormat = 'text' | 'json';

export interface ScanOptions {
  output?: string;
  json?: boolean;
  verbose?: boolean;
  extensions?: string[];
  exclude?: string[];
  config?: string;
  maxDepth?: number;
  followSymlinks?: boolean;
  sorted?: boolean;
}
