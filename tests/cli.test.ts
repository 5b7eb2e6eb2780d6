import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { assertNoSwallowedRoot, runScan } from '../src/cli';
import { main } from '../src/index';
import { FatalIOError, UsageError } from '../src/errors';

function createTree(files: string[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'backup-scan-cli-'));
  for (const file of files) {
    fs.outputFileSync(path.join(dir, file), 'x');
  }
  return dir;
}

describe('CLI', () => {
  let errorSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;
  const dirs: string[] = [];

  function tree(files: string[]): string {
    const dir = createTree(files);
    dirs.push(dir);
    return dir;
  }

  function stdout(): string {
    return stdoutSpy.mock.calls.map(c => String(c[0])).join('');
  }

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    for (const dir of dirs.splice(0)) {
      fs.removeSync(dir);
    }
  });

  describe('runScan', () => {
    test('empty directory yields no findings', async () => {
      const root = tree([]);
      const result = await runScan(root);
      expect(result.findings).toEqual([]);
      expect(result.summary.filesScanned).toBe(0);
      expect(stdoutSpy).not.toHaveBeenCalled();
    });

    test('flags a.bak and c~ but not b.txt', async () => {
      const root = tree(['a.bak', 'b.txt', 'c~']);
      const result = await runScan(root, { sorted: true });
      expect(result.findings.map(f => f.candidate.name)).toEqual(['a.bak', 'c~']);
      expect(result.summary).toEqual({ filesScanned: 3, directoriesScanned: 1, matches: 2, warnings: 0 });
      expect(stdout()).toBe(
        `${path.join(root, 'a.bak')}\tbackup file (.bak)\n${path.join(root, 'c~')}\teditor backup file (~)\n`,
      );
    });

    test('custom extensions replace the defaults', async () => {
      const root = tree(['a.bak', 'b.old', 'c.conf']);
      const result = await runScan(root, { extensions: ['conf', '.old'], sorted: true });
      expect(result.findings.map(f => f.candidate.name)).toEqual(['b.old', 'c.conf']);
    });

    test('applies .backupscanignore and --exclude', async () => {
      const root = tree(['a.bak', 'drafts/b.bak', 'uploads/c.bak', 'node_modules/x/d.bak']);
      fs.writeFileSync(path.join(root, '.backupscanignore'), 'drafts/\n');
      const result = await runScan(root, { exclude: ['uploads/'] });
      expect(result.findings.map(f => f.candidate.relativePath)).toEqual(['a.bak']);
    });

    test('reads rules and limits from the config file', async () => {
      const root = tree(['index.php.save', 'a.bak', 'deep/b.bak']);
      fs.writeFileSync(path.join(root, '.backupscanrc.yml'), [
        'rules:',
        '  - glob: "*.php.*"',
        '    reason: renamed PHP source',
        'maxDepth: 0',
        'sorted: true',
      ].join('\n'));
      const result = await runScan(root);
      expect(result.findings.map(f => [f.candidate.name, f.rule.reason])).toEqual([
        ['a.bak', 'backup file (.bak)'],
        ['index.php.save', 'renamed PHP source'],
      ]);
    });

    test('command line flags win over config values', async () => {
      const root = tree(['a.bak', 'deep/b.bak']);
      fs.writeFileSync(path.join(root, '.backupscanrc.yml'), 'maxDepth: 0\n');
      const result = await runScan(root, { maxDepth: 1 });
      expect(result.findings).toHaveLength(2);
    });

    test('missing root is a FatalIOError', async () => {
      const root = tree([]);
      await expect(runScan(path.join(root, 'missing'))).rejects.toBeInstanceOf(FatalIOError);
    });

    test('reports a backup-named symlink to a live file', async () => {
      const root = tree(['config.php']);
      fs.symlinkSync(path.join(root, 'config.php'), path.join(root, 'config.php.bak'));
      const result = await runScan(root, { sorted: true });
      expect(result.findings.map(f => f.candidate.path)).toEqual([path.join(root, 'config.php.bak')]);
      expect(result.summary.filesScanned).toBe(2);
    });

    test('verbose reports an unreadable directory on stderr and keeps scanning', async () => {
      const root = tree(['a.bak', 'locked/b.bak']);
      const locked = path.join(root, 'locked');
      const nodeFs = jest.requireActual<typeof import('fs')>('fs');
      const realReaddir = nodeFs.readdirSync;
      const readdirSpy = jest.spyOn(nodeFs, 'readdirSync').mockImplementation((dir, options) => {
        if (String(dir) === locked) {
          throw Object.assign(new Error(`EACCES: permission denied, scandir '${locked}'`), { code: 'EACCES' });
        }
        return realReaddir(dir, options);
      });
      try {
        const result = await runScan(root, { verbose: true });
        expect(result.findings.map(f => f.candidate.name)).toEqual(['a.bak']);
        expect(result.summary.warnings).toBe(1);
        expect(errorSpy.mock.calls.map(c => String(c[0])).join('\n')).toContain(
          `[backup-scan] Skipped ${locked} (unreadable-directory): EACCES: permission denied, scandir '${locked}'`,
        );
        expect(stdout()).toBe(`${path.join(root, 'a.bak')}\tbackup file (.bak)\n`);
      } finally {
        readdirSpy.mockRestore();
      }
    });

    test('assertNoSwallowedRoot only rejects existing directories', () => {
      const root = tree([]);
      expect(() => assertNoSwallowedRoot([root])).toThrow(UsageError);
      expect(() => assertNoSwallowedRoot(['.old', '~'])).not.toThrow();
      expect(() => assertNoSwallowedRoot(undefined)).not.toThrow();
    });

    test('empty extension is a UsageError', async () => {
      const root = tree([]);
      await expect(runScan(root, { extensions: [' '] })).rejects.toBeInstanceOf(UsageError);
    });
  });

  describe('main', () => {
    test('exit code 0 for an empty directory', async () => {
      const root = tree([]);
      await expect(main([root])).resolves.toBe(0);
      expect(errorSpy.mock.calls.map(c => String(c[0])).join('\n')).toContain('No backup files found');
    });

    test('exit code 0 when matches are found', async () => {
      const root = tree(['a.bak']);
      await expect(main([root])).resolves.toBe(0);
      expect(stdout()).toBe(`${path.join(root, 'a.bak')}\tbackup file (.bak)\n`);
    });

    test('-o writes the same content stdout would get', async () => {
      const root = tree(['a.bak', 'b.txt', 'c~', 'sub/d.swp']);
      await main([root, '--sorted']);
      const printed = stdout();
      stdoutSpy.mockClear();

      const outputPath = path.join(tree([]), 'results.txt');
      await expect(main([root, '--sorted', '-o', outputPath])).resolves.toBe(0);
      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(fs.readFileSync(outputPath, 'utf-8')).toBe(printed);
      expect(printed.split('\n').filter(l => l.length > 0)).toHaveLength(3);
    });

    test('--json prints the run result', async () => {
      const root = tree(['a.bak', 'b.txt']);
      await expect(main([root, '--json'])).resolves.toBe(0);
      const parsed = JSON.parse(stdout());
      expect(parsed.root).toBe(root);
      expect(parsed.summary.matches).toBe(1);
      expect(parsed.summary.filesScanned).toBe(2);
    });

    test('-e takes a list of suffixes', async () => {
      const root = tree(['a.bak', 'b.old']);
      await expect(main([root, '-e', 'old'])).resolves.toBe(0);
      expect(stdout()).toBe(`${path.join(root, 'b.old')}\tbackup file (.old)\n`);
    });

    test('-e before ROOT is rejected instead of scanning the working directory', async () => {
      const root = tree(['a.bak', 'b.old']);
      await expect(main(['-e', '.old', root])).resolves.toBe(1);
      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(errorSpy.mock.calls.map(c => String(c[0])).join('\n')).toContain(
        `"${root}" is a directory, not a suffix; put ROOT before -e or end the suffix list with --`,
      );
    });

    test('-- ends the suffix list', async () => {
      const root = tree(['a.bak', 'b.old']);
      await expect(main(['-e', '.old', '--', root])).resolves.toBe(0);
      expect(stdout()).toBe(`${path.join(root, 'b.old')}\tbackup file (.old)\n`);
    });

    test('-v reports progress on stderr', async () => {
      const root = tree(['a.bak']);
      await expect(main(['-v', root])).resolves.toBe(0);
      const diagnostics = errorSpy.mock.calls.map(c => String(c[0])).join('\n');
      expect(diagnostics).toContain(`[backup-scan] Scanning ${root}`);
      expect(stdout()).toBe(`${path.join(root, 'a.bak')}\tbackup file (.bak)\n`);
    });

    test('exit code 2 and no output file for a missing root', async () => {
      const outDir = tree([]);
      const outputPath = path.join(outDir, 'results.txt');
      const missing = path.join(outDir, 'does-not-exist');
      await expect(main([missing, '-o', outputPath])).resolves.toBe(2);
      expect(fs.existsSync(outputPath)).toBe(false);
      expect(errorSpy.mock.calls.map(c => String(c[0])).join('\n')).toContain(`Scan root not found: ${missing}`);
    });

    test('exit code 2 when the root is a file', async () => {
      const root = tree(['plain.txt']);
      await expect(main([path.join(root, 'plain.txt')])).resolves.toBe(2);
    });

    test('exit code 2 when the output cannot be written', async () => {
      const root = tree(['a.bak', 'blocker']);
      await expect(main([root, '-o', path.join(root, 'blocker', 'out.txt')])).resolves.toBe(2);
    });

    test('exit code 1 for an invalid --max-depth', async () => {
      const root = tree([]);
      await expect(main([root, '--max-depth', 'deep'])).resolves.toBe(1);
    });

    test('exit code 1 for an unknown option', async () => {
      await expect(main(['--no-such-flag'])).resolves.toBe(1);
    });

    test('exit code 1 for an invalid config file', async () => {
      const root = tree([]);
      fs.writeFileSync(path.join(root, '.backupscanrc.yml'), 'maxDepth: many\n');
      await expect(main([root])).resolves.toBe(1);
    });

    test('exit code 2 for a missing explicit config file', async () => {
      const root = tree([]);
      await expect(main([root, '-c', path.join(root, 'nope.yml')])).resolves.toBe(2);
    });

    test('-h prints usage and exits 0', async () => {
      await expect(main(['-h'])).resolves.toBe(0);
      expect(stdout()).toContain('Usage: vscan-backup-file-detector [options] [root]');
    });

    test('--version prints the version and exits 0', async () => {
      await expect(main(['--version'])).resolves.toBe(0);
      expect(stdout()).toBe('0.1.0\n');
    });
  });
});
