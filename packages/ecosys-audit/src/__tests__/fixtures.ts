/**
 * Temporary file trees for audit tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RepositoryRef, Role } from '../types';

export function makeTempDir(prefix = 'ecosys-audit-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files (relative path -> content); a path ending in / creates a directory
 */
export function writeTree(root: string, entries: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(entries)) {
    const target = path.join(root, relativePath);
    if (relativePath.endsWith('/')) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function classifiedRef(name: string, repositoryPath: string, role: Role): RepositoryRef {
  return { name, path: repositoryPath, topics: [role], classification: { kind: 'classified', role } };
}
