/**
 * Codebase Export
 *
 * Concatenates every readable text file under a path into one output file,
 * each preceded by a banner naming it. Binary files are skipped.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, entryKind, listFiles, readTextFile, silentLogger } from 'ecosys-audit';
import { ExportError } from './errors';

export const DEFAULT_EXPORT_EXCLUDE_DIRS: readonly string[] = [
  '.git',
  '.pytest_cache',
  'node_modules',
  'dist',
  'build',
  '__pycache__',
  '.idea',
  '.vscode',
  '.venv',
  'venv',
  'bin',
  'obj',
  '.docusaurus',
  '.ruff_cache'
];

export const DEFAULT_EXPORT_EXCLUDE_EXTS: readonly string[] = [
  // images
  'png', 'jpg', 'jpeg', 'gif', 'ico', 'svg', 'webp',
  // archives
  'zip', 'tar', 'gz', '7z', 'rar',
  // binaries
  'exe', 'dll', 'so', 'dylib', 'bin', 'pyc', 'class', 'jar',
  'lock'
];

/** Path suffixes, matched on whole path segments */
export const DEFAULT_EXPORT_EXCLUDE_PATHS: readonly string[] = [
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'poetry.lock',
  'Cargo.lock'
];

export const DEFAULT_EXPORT_OUTPUT = 'context.txt';

const RULE = '='.repeat(80);

export interface ExportOptions {
  /** File or directory to export */
  source: string;
  output: string;
  /** Directory that banner paths are shown relative to */
  cwd?: string;
  useDefaults?: boolean;
  excludeDirs?: readonly string[];
  excludeExts?: readonly string[];
  excludePaths?: readonly string[];
}

export interface ExportRules {
  excludeDirs: string[];
  excludeExts: string[];
  excludePaths: string[];
}

export interface ExportResult {
  output: string;
  exported: string[];
  skipped: string[];
}

export function resolveExportRules(options: ExportOptions): ExportRules {
  const useDefaults = options.useDefaults ?? true;
  const merge = (defaults: readonly string[], extra: readonly string[] = []) =>
    [...new Set([...(useDefaults ? defaults : []), ...extra])];

  return {
    excludeDirs: merge(DEFAULT_EXPORT_EXCLUDE_DIRS, options.excludeDirs),
    excludeExts: merge(DEFAULT_EXPORT_EXCLUDE_EXTS, options.excludeExts).map((ext) => ext.replace(/^\./, '').toLowerCase()),
    excludePaths: merge(DEFAULT_EXPORT_EXCLUDE_PATHS, options.excludePaths)
  };
}

export function isExcludedFile(relativePath: string, rules: ExportRules): boolean {
  const basename = path.posix.basename(relativePath);
  const dot = basename.lastIndexOf('.');
  if (dot >= 0 && rules.excludeExts.includes(basename.slice(dot + 1).toLowerCase())) {
    return true;
  }
  return rules.excludePaths.some((suffix) => relativePath === suffix || relativePath.endsWith(`/${suffix}`));
}

export function fileBanner(displayPath: string): string {
  return `${RULE}\n### FILE: ${displayPath}\n${RULE}\n\n`;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

export async function exportCodebase(options: ExportOptions, logger: Logger = silentLogger): Promise<ExportResult> {
  const cwd = options.cwd ?? process.cwd();
  const source = path.resolve(cwd, options.source);
  const output = path.resolve(cwd, options.output);
  const rules = resolveExportRules(options);

  logger.info(`[EXPORT] 📦 Exporting content from: ${source}`);
  logger.info(`[EXPORT] 📄 Output target: ${output}`);

  const kind = await entryKind(source);
  if (kind === null) {
    throw new ExportError(`Path '${source}' does not exist`, 'EXPORT_PATH_MISSING');
  }

  const candidates =
    kind === 'file'
      ? [source]
      : (await listFiles(source, rules.excludeDirs))
          .filter((relative) => !isExcludedFile(relative, rules))
          .map((relative) => path.join(source, relative));

  const result: ExportResult = { output, exported: [], skipped: [] };
  const handle = await fs.open(output, 'w');
  try {
    for (const absolute of candidates) {
      if (absolute === output) {
        continue;
      }
      const display = toPosix(path.relative(cwd, absolute));
      const read = await readTextFile(absolute, display);
      if (!read.ok) {
        logger.warn(`[EXPORT]    ⚠️  Skipping binary/unreadable: ${display}`);
        result.skipped.push(display);
        continue;
      }

      logger.debug(`[EXPORT]    + ${display}`);
      await handle.write(`${fileBanner(display)}${read.text}\n\n`);
      result.exported.push(display);
    }
  } finally {
    await handle.close();
  }

  logger.info(`[EXPORT] ✅ Exported ${result.exported.length} files to '${options.output}'`);
  return result;
}
