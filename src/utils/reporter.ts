import * as fse from 'fs-extra';
import chalk from 'chalk';
import { Candidate, Finding, OutputFormat, RunResult, ScanWarning } from '../types';
import { errnoCode, errorMessage, FatalIOError } from '../errors';

const PREFIX = '[backup-scan]';

export interface ReporterOptions {
  verbose?: boolean;
  format?: OutputFormat;
  /** Results go to this file instead of stdout. */
  output?: string;
  version?: string;
}

/** Tabs and newlines in a name would break the one-line-per-finding format. */
function escapeField(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\t/g, '\\t')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

export function formatFindingLine(finding: Finding): string {
  return `${escapeField(finding.candidate.path)}\t${escapeField(finding.rule.reason)}`;
}

export function formatText(result: RunResult): string {
  return result.findings.map(f => `${formatFindingLine(f)}\n`).join('');
}

export function formatJson(result: RunResult): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}

export function renderResults(result: RunResult, format: OutputFormat = 'text'): string {
  return format === 'json' ? formatJson(result) : formatText(result);
}

/** Create or truncate `outputPath` (parent directories included). */
export function writeResultsFile(content: string, outputPath: string): void {
  try {
    fse.outputFileSync(outputPath, content, 'utf-8');
  } catch (err) {
    throw new FatalIOError(
      `Cannot write results to ${outputPath}: ${errorMessage(err)}`,
      outputPath,
      errnoCode(err),
    );
  }
}

export function summaryLine(result: RunResult): string {
  const { matches, filesScanned } = result.summary;
  if (matches === 0) {
    return `No backup files found (${filesScanned} files scanned).`;
  }
  const noun = matches === 1 ? 'backup file' : 'backup files';
  return `${matches} ${noun} found (${filesScanned} files scanned).`;
}

/**
 * Collects findings during a scan and owns every byte of output.
 * Results are written only by emit(), after finalize(); diagnostics
 * go to stderr so the results stream stays clean.
 */
export class Reporter {
  private readonly findings: Finding[] = [];
  private readonly warnings: ScanWarning[] = [];
  private filesScanned = 0;
  private directoriesScanned = 0;
  private readonly startedAt = Date.now();
  private finalized = false;

  constructor(private readonly options: ReporterOptions = {}) {}

  get verbose(): boolean {
    return this.options.verbose === true;
  }

  /** Verbose-only diagnostic line. */
  info(message: string): void {
    if (this.verbose) {
      console.error(chalk.cyan(`${PREFIX} ${message}`));
    }
  }

  directory(dir: string): void {
    this.directoriesScanned++;
    if (this.verbose) {
      console.error(chalk.gray(`${PREFIX} Scanning ${dir}`));
    }
  }

  warn(warning: ScanWarning): void {
    this.warnings.push(warning);
    if (this.verbose) {
      console.error(chalk.yellow(`${PREFIX} Skipped ${warning.path} (${warning.code}): ${warning.message}`));
    }
  }

  scanned(_candidate: Candidate): void {
    this.filesScanned++;
  }

  /**
   * Throws a plain Error once finalize() has run: a caller bug, not a
   * ScanError, so main() rethrows it instead of mapping it to an exit code.
   */
  record(finding: Finding): void {
    if (this.finalized) {
      throw new Error('Reporter already finalized');
    }
    this.findings.push(finding);
    if (this.verbose) {
      console.error(chalk.gray(`${PREFIX} Match ${finding.candidate.relativePath} -> ${finding.rule.id}`));
    }
  }

  /** Build the run result. Callable once; a second call throws like record(). */
  finalize(root: string): RunResult {
    if (this.finalized) {
      throw new Error('Reporter already finalized');
    }
    this.finalized = true;
    return {
      version: this.options.version ?? '0.0.0',
      root,
      timestamp: new Date().toISOString(),
      duration: Date.now() - this.startedAt,
      findings: [...this.findings],
      warnings: [...this.warnings],
      summary: {
        filesScanned: this.filesScanned,
        directoriesScanned: this.directoriesScanned,
        matches: this.findings.length,
        warnings: this.warnings.length,
      },
    };
  }

  emit(result: RunResult): void {
    const content = renderResults(result, this.options.format);

    if (this.options.output) {
      writeResultsFile(content, this.options.output);
    } else if (content.length > 0) {
      process.stdout.write(content);
    }

    const summary = summaryLine(result);
    console.error(result.summary.matches === 0 ? chalk.green(summary) : chalk.yellow(summary));
    if (result.summary.warnings > 0 && !this.verbose) {
      console.error(chalk.gray(`${PREFIX} ${result.summary.warnings} path(s) skipped, rerun with -v for details`));
    }
    if (this.options.output) {
      console.error(chalk.gray(`${PREFIX} Results saved to: ${this.options.output}`));
    }
  }
}
