import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Rule } from '../types';
import { errnoCode, errorMessage, FatalIOError, UsageError } from '../errors';
import { globRule, regexRule, suffixRule } from '../patterns/backup-patterns';
import { describeIssues, RuleConfig, ScanConfig, scanConfigSchema } from './schema';

export const DEFAULT_CONFIG_FILE = '.backupscanrc.yml';

export interface LoadedConfig {
  config: ScanConfig;
  /** Absolute path of the file the config came from, if any. */
  source?: string;
}

export function parseScanConfig(raw: unknown, source = 'config'): ScanConfig {
  const result = scanConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new UsageError(`Invalid config in ${source}:\n${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load the YAML config. An explicit path must exist; the default
 * `<root>/.backupscanrc.yml` is optional.
 */
export function loadScanConfig(rootDir: string, explicitPath?: string): LoadedConfig {
  const configPath = path.resolve(explicitPath ?? path.join(rootDir, DEFAULT_CONFIG_FILE));

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' && explicitPath === undefined) {
      return { config: parseScanConfig({}) };
    }
    if (code === 'ENOENT') {
      throw new FatalIOError(`Config file not found: ${configPath}`, configPath, code);
    }
    throw new FatalIOError(`Cannot read config file ${configPath}: ${errorMessage(err)}`, configPath, code);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: configPath });
  } catch (err) {
    throw new UsageError(`Cannot parse config file ${configPath}: ${errorMessage(err)}`);
  }

  return { config: parseScanConfig(raw, configPath), source: configPath };
}

export function toRule(entry: RuleConfig): Rule {
  if ('suffix' in entry) return suffixRule(entry.suffix, entry.reason);
  if ('glob' in entry) return globRule(entry.glob, entry.reason);
  return regexRule(entry.regex, entry.reason);
}
