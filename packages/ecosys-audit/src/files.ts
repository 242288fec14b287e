/**
 * Read-only filesystem helpers shared by the auditor and extractors
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AuditReasonCode } from './reason-codes';
import { FileWarning } from './types';
import { errorMessage } from './errors';

export type EntryKind = 'file' | 'directory';

/**
 * Relative POSIX paths of every file under root, sorted.
 * Directories named in excludeDirs are pruned at any depth; symlinked
 * directories are not followed.
 */
export async function listFiles(root: string, excludeDirs: readonly string[] = []): Promise<string[]> {
  const excluded = new Set(excludeDirs);
  const files: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const absoluteDir = path.join(root, relativeDir);
    const entries = await fs.readdir(absoluteDir, { withFileTypes: true });

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name)) {
          await walk(relativePath);
        }
      } else if (entry.isFile()) {
        files.push(relativePath);
      } else if (entry.isSymbolicLink()) {
        if ((await entryKind(path.join(root, relativePath))) === 'file') {
          files.push(relativePath);
        }
      }
    }
  }

  await walk('');
  return files.sort();
}

/**
 * Immediate subdirectory names of dir, sorted; dot-directories excluded.
 * Symlinks to directories count as subdirectories.
 */
export async function listSubdirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }
    if (entry.isDirectory()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink() && (await entryKind(path.join(dir, entry.name))) === 'directory') {
      names.push(entry.name);
    }
  }
  return names.sort();
}

export async function entryKind(target: string): Promise<EntryKind | null> {
  try {
    const stats = await fs.stat(target);
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return null;
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

export function isMissingPathError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

export type TextReadResult = { ok: true; text: string } | { ok: false; warning: FileWarning };

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as UTF-8 text. Binary content and read failures come back
 * as warnings so scans can carry on over the remaining files.
 */
export async function readTextFile(absolutePath: string, displayPath: string): Promise<TextReadResult> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(absolutePath);
  } catch (error) {
    return {
      ok: false,
      warning: { code: AuditReasonCode.UNREADABLE_FILE, file: displayPath, message: errorMessage(error) }
    };
  }

  if (buffer.includes(0)) {
    return {
      ok: false,
      warning: { code: AuditReasonCode.UNDECODABLE_FILE, file: displayPath, message: 'contains NUL bytes' }
    };
  }

  try {
    return { ok: true, text: utf8.decode(buffer) };
  } catch {
    return {
      ok: false,
      warning: { code: AuditReasonCode.UNDECODABLE_FILE, file: displayPath, message: 'invalid UTF-8' }
    };
  }
}

/**
 * Compile a simple wildcard name (only * is special) to an anchored RegExp
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
