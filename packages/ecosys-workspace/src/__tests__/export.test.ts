/**
 * Codebase Export
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { exportCodebase, fileBanner, isExcludedFile, resolveExportRules } from '../export';
import { ExportError } from '../errors';

describe('Codebase Export', () => {
  let root: string;

  const write = (relative: string, content: string | Buffer) => {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'ecosys-export-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should exclude by extension and path suffix by default', () => {
    const rules = resolveExportRules({ source: '.', output: 'context.txt' });

    expect(isExcludedFile('assets/logo.PNG', rules)).toBe(true);
    expect(isExcludedFile('website/package-lock.json', rules)).toBe(true);
    expect(isExcludedFile('Cargo.lock', rules)).toBe(true);
    expect(isExcludedFile('src/main.py', rules)).toBe(false);
    expect(isExcludedFile('docs/not-package-lock.json', rules)).toBe(false);
  });

  it('should keep only the given exclusions with --no-defaults', () => {
    const rules = resolveExportRules({ source: '.', output: 'out.txt', useDefaults: false, excludeExts: ['.MD'] });

    expect(rules.excludeDirs).toEqual([]);
    expect(rules.excludeExts).toEqual(['md']);
    expect(isExcludedFile('logo.png', rules)).toBe(false);
    expect(isExcludedFile('README.md', rules)).toBe(true);
  });

  it('should concatenate text files with a banner each, in path order', async () => {
    write('src/b.py', 'print("b")');
    write('src/a.py', 'print("a")');
    write('node_modules/pkg/index.js', 'module.exports = 1;');
    write('img/logo.png', 'png');
    write('data.bin.txt', Buffer.from([0x00, 0x01, 0x02]));

    const result = await exportCodebase({ source: '.', output: 'context.txt', cwd: root });

    expect(result.exported).toEqual(['src/a.py', 'src/b.py']);
    expect(result.skipped).toEqual(['data.bin.txt']);
    expect(fs.readFileSync(path.join(root, 'context.txt'), 'utf-8')).toBe(
      `${fileBanner('src/a.py')}print("a")\n\n${fileBanner('src/b.py')}print("b")\n\n`
    );
  });

  it('should frame each file name between rules', () => {
    expect(fileBanner('src/a.py')).toBe(`${'='.repeat(80)}\n### FILE: src/a.py\n${'='.repeat(80)}\n\n`);
  });

  it('should not export a previous output file into itself', async () => {
    write('notes.md', '# notes');
    write('context.txt', 'old export');

    const result = await exportCodebase({ source: '.', output: 'context.txt', cwd: root });

    expect(result.exported).toEqual(['notes.md']);
  });

  it('should honour extra directory exclusions', async () => {
    write('src/a.py', 'a');
    write('generated/schema.py', 'generated');

    const result = await exportCodebase({ source: '.', output: 'out.txt', cwd: root, excludeDirs: ['generated'] });

    expect(result.exported).toEqual(['src/a.py']);
  });

  it('should export a single file', async () => {
    write('src/a.py', 'a');

    const result = await exportCodebase({ source: 'src/a.py', output: 'out.txt', cwd: root });

    expect(result.exported).toEqual(['src/a.py']);
  });

  it('should fail with EXPORT_PATH_MISSING for a missing path', async () => {
    await expect(exportCodebase({ source: 'nowhere', output: 'out.txt', cwd: root })).rejects.toBeInstanceOf(ExportError);
  });
});
