import * as path from 'path';
import { Rule, RuleKind, RuleSet } from '../types';
import { UsageError, errorMessage } from '../errors';

/**
 * Backup-file naming conventions, in evaluation order.
 * The first matching rule decides the reason reported for a file.
 */
const DEFAULT_SUFFIXES: ReadonlyArray<{ suffix: string; reason: string }> = [
  { suffix: '.bak', reason: 'backup file (.bak)' },
  { suffix: '.swp', reason: 'editor swap file (.swp)' },
  { suffix: '~', reason: 'editor backup file (~)' },
  { suffix: '.old', reason: 'old copy (.old)' },
  { suffix: '.tmp', reason: 'temporary file (.tmp)' },
  { suffix: '.backup', reason: 'backup file (.backup)' },
  { suffix: '.orig', reason: 'merge/patch original (.orig)' },
];

function makeRule(kind: RuleKind, pattern: string, reason: string): Rule {
  return Object.freeze({ id: `${kind}:${pattern}`, kind, pattern, reason });
}

/**
 * `bak` and `.bak` both mean the `.bak` suffix. Suffixes starting with `~`
 * or `.` are kept as written.
 */
export function normalizeSuffix(raw: string): string {
  const suffix = raw.trim();
  if (suffix.length === 0) {
    throw new UsageError('Backup suffix must not be empty');
  }
  // base names never contain a separator; a path here is a scan root
  // swallowed by the variadic -e
  if (suffix.includes('/') || suffix.includes(path.sep)) {
    throw new UsageError(`Backup suffix "${suffix}" looks like a path; put ROOT before -e or end the suffix list with --`);
  }
  if (suffix.startsWith('.') || suffix.startsWith('~')) return suffix;
  return `.${suffix}`;
}

export function suffixRule(raw: string, reason?: string): Rule {
  const suffix = normalizeSuffix(raw);
  return makeRule('suffix', suffix, reason ?? `backup file (${suffix})`);
}

export function globRule(pattern: string, reason?: string): Rule {
  if (pattern.trim().length === 0) {
    throw new UsageError('Glob rule pattern must not be empty');
  }
  return makeRule('glob', pattern, reason ?? `matches ${pattern}`);
}

export function regexRule(source: string, reason?: string): Rule {
  try {
    new RegExp(source, 'i');
  } catch (err) {
    throw new UsageError(`Invalid regex rule "${source}": ${errorMessage(err)}`);
  }
  return makeRule('regex', source, reason ?? `matches /${source}/`);
}

export const DEFAULT_BACKUP_RULES: RuleSet = Object.freeze(
  DEFAULT_SUFFIXES.map(({ suffix, reason }) => makeRule('suffix', suffix, reason)),
);

export interface RuleSetOptions {
  /** Replaces the default suffix list (the `-e` flag). */
  suffixes?: string[];
  /** Appended after the active suffixes. */
  extraSuffixes?: string[];
  /** Glob/regex rules, appended last. */
  rules?: Rule[];
}

function dedupKey(rule: Rule): string {
  // regex sources are case-sensitive text even though matching is not
  return rule.kind === 'regex' ? `${rule.kind}:${rule.pattern}` : `${rule.kind}:${rule.pattern.toLowerCase()}`;
}

export function buildRuleSet(options: RuleSetOptions = {}): RuleSet {
  const base = options.suffixes && options.suffixes.length > 0
    ? options.suffixes.map(s => suffixRule(s))
    : DEFAULT_BACKUP_RULES;

  const extra = (options.extraSuffixes ?? []).map(s => suffixRule(s));
  const all = [...base, ...extra, ...(options.rules ?? [])];

  const seen = new Set<string>();
  const rules: Rule[] = [];
  for (const rule of all) {
    const key = dedupKey(rule);
    if (seen.has(key)) continue;
    seen.add(key);
    rules.push(rule);
  }
  return Object.freeze(rules);
}
