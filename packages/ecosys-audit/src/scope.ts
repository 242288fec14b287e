/**
 * Scope Resolver
 *
 * Turns (working directory, positional names) into an AuditScope:
 *   names given                        -> named repositories under <workspace>/<reposDir>
 *   cwd contains <reposDir>/           -> every repository in the workspace
 *   cwd is a repository                -> that repository alone
 *   otherwise                          -> ScopeResolutionError
 */

import * as path from 'path';
import { AuditScope, RepositoryRef, RoleClassification, ScopeInputError } from './types';
import { RunContext } from './context';
import { classifyRole } from './roles';
import { ManifestError, RepositoryNotFoundError, ScopeResolutionError } from './errors';
import { entryKind, listSubdirectories } from './files';
import { REPOSITORY_MANIFEST, RepositoryMetadata } from './metadata';

/** Any of these at a directory's top level marks it as a repository */
export const REPOSITORY_MARKERS = ['.git', REPOSITORY_MANIFEST];

/**
 * Nearest directory at or above start that contains the repositories root
 */
export async function findWorkspaceRoot(start: string, reposDir: string): Promise<string | undefined> {
  let current = path.resolve(start);
  for (;;) {
    if ((await entryKind(path.join(current, reposDir))) === 'directory') {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

export async function isRepositoryDir(dir: string): Promise<boolean> {
  for (const marker of REPOSITORY_MARKERS) {
    if ((await entryKind(path.join(dir, marker))) !== null) {
      return true;
    }
  }
  return false;
}

function isPlainName(name: string): boolean {
  return name.length > 0 && !name.includes('/') && !name.includes('\\') && name !== '.' && name !== '..';
}

async function buildRef(
  ctx: RunContext,
  name: string,
  repositoryPath: string,
  workspaceRoot?: string
): Promise<RepositoryRef> {
  let metadata: RepositoryMetadata;
  try {
    metadata = await ctx.metadata(name, repositoryPath, workspaceRoot);
  } catch (error) {
    if (!(error instanceof ManifestError)) {
      throw error;
    }
    // unreadable metadata leaves the repository unclassified, still in scope
    ctx.logger.warn(`[SCOPE] ⚠️  ${name}: ${error.message}`);
    const unclassified: RoleClassification = { kind: 'unclassified', error };
    return Object.freeze({ name, path: repositoryPath, topics: [], classification: unclassified });
  }

  const classification: RoleClassification = metadata.role
    ? { kind: 'classified', role: metadata.role }
    : classifyRole(name, metadata.topics, ctx.classifierOptions);

  if (classification.kind === 'classified') {
    ctx.logger.debug(`[SCOPE] ${name}: role ${classification.role} (from ${metadata.origin})`);
  } else {
    ctx.logger.warn(`[SCOPE] ⚠️  ${classification.error.message}`);
  }

  return Object.freeze({
    name,
    path: repositoryPath,
    topics: Object.freeze([...metadata.topics]),
    classification
  });
}

async function buildRefs(
  ctx: RunContext,
  candidates: Array<{ name: string; path: string }>,
  workspaceRoot: string | undefined
): Promise<RepositoryRef[]> {
  const refs: RepositoryRef[] = [];
  for (const candidate of candidates) {
    refs.push(await buildRef(ctx, candidate.name, candidate.path, workspaceRoot));
  }
  return refs;
}

export async function resolveScope(ctx: RunContext, names: readonly string[] = []): Promise<AuditScope> {
  const reposDir = ctx.config.reposDir;
  const inputErrors: ScopeInputError[] = [];

  if (names.length > 0) {
    const workspaceRoot = await findWorkspaceRoot(ctx.cwd, reposDir);
    if (!workspaceRoot) {
      throw new ScopeResolutionError(
        `Cannot resolve repository names: no '${reposDir}/' directory in ${ctx.cwd} or any parent. ` +
          'Run from inside a workspace created by `ecosys init`.'
      );
    }

    const reposRoot = path.join(workspaceRoot, reposDir);
    const candidates: Array<{ name: string; path: string }> = [];

    for (const name of new Set(names)) {
      const repositoryPath = path.join(reposRoot, name);
      if (isPlainName(name) && (await entryKind(repositoryPath)) === 'directory') {
        candidates.push({ name, path: repositoryPath });
      } else {
        const error = new RepositoryNotFoundError(name, reposRoot);
        ctx.logger.error(`[SCOPE] ❌ ${error.message}`);
        inputErrors.push({ name, code: error.code, message: error.message });
      }
    }

    return {
      kind: 'named',
      workspaceRoot,
      repositories: await buildRefs(ctx, candidates, workspaceRoot),
      inputErrors
    };
  }

  const reposRoot = path.join(ctx.cwd, reposDir);
  if ((await entryKind(reposRoot)) === 'directory') {
    const candidates = (await listSubdirectories(reposRoot)).map((name) => ({
      name,
      path: path.join(reposRoot, name)
    }));
    ctx.logger.debug(`[SCOPE] Workspace scope: ${candidates.length} repositories under ${reposRoot}`);

    return {
      kind: 'workspace',
      workspaceRoot: ctx.cwd,
      repositories: await buildRefs(ctx, candidates, ctx.cwd),
      inputErrors
    };
  }

  if (await isRepositoryDir(ctx.cwd)) {
    const workspaceRoot = await findWorkspaceRoot(path.dirname(ctx.cwd), reposDir);
    return {
      kind: 'local',
      workspaceRoot,
      repositories: await buildRefs(
        ctx,
        [{ name: path.basename(ctx.cwd), path: ctx.cwd }],
        workspaceRoot
      ),
      inputErrors
    };
  }

  throw new ScopeResolutionError(
    `${ctx.cwd} is neither a workspace root (containing '${reposDir}/') nor a repository. ` +
      'Run from a recognized location or pass repository names explicitly.'
  );
}
