import { Candidate, Rule, RuleSet } from '../types';

export interface Matcher {
  readonly rules: RuleSet;
  /** First rule (in rule-set order) the candidate's base name matches. */
  match(candidate: Candidate): Rule | undefined;
}

type NameTest = (name: string, lowerName: string) => boolean;

const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

/**
 * Convert a base-name glob (`*`, `?`) to an anchored, case-insensitive RegExp.
 * Base names carry no `/`, so `**` is the same as `*`.
 */
export function globToRegex(pattern: string): RegExp {
  const body = pattern
    .replace(REGEX_SPECIALS, '\\$&')
    .replace(/\*+/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${body}$`, 'is');
}

function compile(rule: Rule): NameTest {
  switch (rule.kind) {
    case 'suffix': {
      const suffix = rule.pattern.toLowerCase();
      return (_name, lowerName) => lowerName.endsWith(suffix);
    }
    case 'glob': {
      const regex = globToRegex(rule.pattern);
      return name => regex.test(name);
    }
    case 'regex': {
      const regex = new RegExp(rule.pattern, 'i');
      return name => regex.test(name);
    }
  }
}

export function createMatcher(rules: RuleSet): Matcher {
  const compiled = rules.map(rule => ({ rule, test: compile(rule) }));

  return {
    rules,
    match(candidate: Candidate): Rule | undefined {
      return matchCompiled(compiled, candidate.name);
    },
  };
}

function matchCompiled(compiled: Array<{ rule: Rule; test: NameTest }>, name: string): Rule | undefined {
  const lowerName = name.toLowerCase();
  for (const { rule, test } of compiled) {
    if (test(name, lowerName)) return rule;
  }
  return undefined;
}

/** One-off check of a bare file name, without building a Candidate. */
export function matchName(rules: RuleSet, name: string): Rule | undefined {
  return matchCompiled(rules.map(rule => ({ rule, test: compile(rule) })), name);
}
