/**
 * Workspace Bootstrap
 *
 * Lists the organisation's non-archived repositories through the GitHub
 * CLI, clones the missing ones under the repositories root and writes:
 *   <org>.code-workspace    editor workspace, folders grouped by role
 *   ecosys.workspace.json   repository/topic manifest read by the audits
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  ClassifierOptions,
  DEFAULT_CLASSIFIER_OPTIONS,
  Logger,
  Role,
  WORKSPACE_MANIFEST,
  WorkspaceManifest,
  classifyRole,
  entryKind,
  errorMessage,
  silentLogger
} from 'ecosys-audit';
import { CommandRunner, execFileRunner } from './command-runner';
import { WorkspaceInitError } from './errors';

/** Editor folder order; unclassified repositories come last */
export const WORKSPACE_GROUP_ORDER: readonly Role[] = [
  'meta',
  'core',
  'enabler',
  'sector',
  'worker',
  'tooling',
  'governance'
];

const RepositoryNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, 'repository names may only contain letters, digits, ".", "_" and "-"')
  .refine((name) => name !== '.' && name !== '..', 'invalid repository name');

// gh reports topics either as plain names or as { name } objects
const TopicSchema = z.union([z.string(), z.object({ name: z.string() }).transform((topic) => topic.name)]);

const GhRepositorySchema = z.object({
  name: RepositoryNameSchema,
  sshUrl: z.string().min(1),
  topics: z.array(TopicSchema).nullish().transform((topics) => topics ?? [])
});

export const GhRepositoryListSchema = z.array(GhRepositorySchema);

export type GhRepository = z.infer<typeof GhRepositorySchema>;

export type RepositoryGroup = Role | 'unclassified';

export interface GroupedRepositories {
  group: RepositoryGroup;
  repositories: GhRepository[];
}

export interface InitOptions {
  workspaceRoot: string;
  org: string;
  reposDir: string;
  force?: boolean;
  runner?: CommandRunner;
  logger?: Logger;
  classifierOptions?: ClassifierOptions;
  now?: () => Date;
}

export interface InitResult {
  workspaceFile: string;
  manifestFile: string;
  cloned: string[];
  recloned: string[];
  skipped: string[];
}

export async function listOrganisationRepositories(org: string, runner: CommandRunner): Promise<GhRepository[]> {
  try {
    await runner.run('gh', ['--version']);
  } catch (error) {
    throw new WorkspaceInitError(
      `GitHub CLI ('gh') is not available: ${errorMessage(error)}. Install it from https://cli.github.com/`,
      'GH_UNAVAILABLE'
    );
  }

  let stdout: string;
  try {
    ({ stdout } = await runner.run('gh', [
      'repo',
      'list',
      org,
      '--limit',
      '1000',
      '--json',
      'name,sshUrl,topics',
      '--no-archived'
    ]));
  } catch (error) {
    throw new WorkspaceInitError(`Cannot list repositories of ${org}: ${errorMessage(error)}`, 'GH_LIST_FAILED');
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new WorkspaceInitError(`gh returned invalid JSON: ${errorMessage(error)}`, 'GH_OUTPUT_INVALID');
  }

  const parsed = GhRepositoryListSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new WorkspaceInitError(`gh returned unexpected repository data: ${details}`, 'GH_OUTPUT_INVALID');
  }
  return parsed.data;
}

/**
 * Group by role in WORKSPACE_GROUP_ORDER, names sorted within a group.
 * Empty groups are left out.
 */
export function groupRepositories(
  repositories: readonly GhRepository[],
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS
): GroupedRepositories[] {
  const buckets = new Map<RepositoryGroup, GhRepository[]>();
  for (const repository of repositories) {
    const classification = classifyRole(repository.name, repository.topics, options);
    const group: RepositoryGroup = classification.kind === 'classified' ? classification.role : 'unclassified';
    const bucket = buckets.get(group) ?? [];
    bucket.push(repository);
    buckets.set(group, bucket);
  }

  const order: RepositoryGroup[] = [...WORKSPACE_GROUP_ORDER, 'unclassified'];
  return order
    .filter((group) => buckets.has(group))
    .map((group) => ({
      group,
      repositories: [...(buckets.get(group) ?? [])].sort((a, b) => a.name.localeCompare(b.name))
    }));
}

export function buildCodeWorkspace(groups: readonly GroupedRepositories[], reposDir: string) {
  return {
    folders: groups.flatMap(({ repositories }) =>
      repositories.map((repository) => ({ name: repository.name, path: `${reposDir}/${repository.name}` }))
    ),
    settings: {
      'files.exclude': {
        '**/.git': true,
        '**/.svn': true,
        '**/.hg': true,
        '**/CVS': true,
        '**/.DS_Store': true,
        '**/Thumbs.db': true,
        '**/node_modules': true,
        '**/__pycache__': true,
        '**/.venv': true
      },
      'explorer.compactFolders': false
    }
  };
}

export function buildWorkspaceManifest(
  org: string,
  groups: readonly GroupedRepositories[],
  generatedAt: Date
): WorkspaceManifest {
  return {
    org,
    generated_at: generatedAt.toISOString(),
    repositories: groups.flatMap(({ group, repositories }) =>
      repositories.map((repository) => ({
        name: repository.name,
        topics: repository.topics,
        ssh_url: repository.sshUrl,
        ...(group === 'unclassified' ? {} : { role: group })
      }))
    )
  };
}

export async function initWorkspace(options: InitOptions): Promise<InitResult> {
  const runner = options.runner ?? execFileRunner;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const reposRoot = path.join(options.workspaceRoot, options.reposDir);

  logger.info(`[INIT] 🔍 Fetching repository list from ${options.org}...`);
  const repositories = await listOrganisationRepositories(options.org, runner);
  const groups = groupRepositories(repositories, options.classifierOptions);
  logger.info(`[INIT] ${repositories.length} repositories in ${groups.length} groups`);

  await fs.mkdir(reposRoot, { recursive: true });

  const result: InitResult = {
    workspaceFile: path.join(options.workspaceRoot, `${options.org}.code-workspace`),
    manifestFile: path.join(options.workspaceRoot, WORKSPACE_MANIFEST),
    cloned: [],
    recloned: [],
    skipped: []
  };

  for (const { group, repositories: members } of groups) {
    logger.info(`[INIT] 📂 ${group.toUpperCase()}`);

    for (const repository of members) {
      const localPath = path.join(reposRoot, repository.name);
      const exists = (await entryKind(localPath)) !== null;

      if (exists && !options.force) {
        logger.info(`[INIT]    ✅ ${repository.name} already exists (skipping)`);
        result.skipped.push(repository.name);
        continue;
      }

      if (exists) {
        logger.info(`[INIT]    ♻️  Removing existing ${repository.name}...`);
        await fs.rm(localPath, { recursive: true, force: true });
      }

      logger.info(`[INIT]    ⬇️  Cloning ${repository.name}...`);
      try {
        await runner.run('git', ['clone', repository.sshUrl, localPath]);
      } catch (error) {
        throw new WorkspaceInitError(`Cannot clone ${repository.name}: ${errorMessage(error)}`, 'CLONE_FAILED');
      }
      (exists ? result.recloned : result.cloned).push(repository.name);
    }
  }

  const workspace = buildCodeWorkspace(groups, options.reposDir);
  await fs.writeFile(result.workspaceFile, JSON.stringify(workspace, null, 2) + '\n');
  logger.info(`[INIT] 📝 Generated workspace file: ${result.workspaceFile}`);

  const manifest = buildWorkspaceManifest(options.org, groups, now());
  await fs.writeFile(result.manifestFile, JSON.stringify(manifest, null, 2) + '\n');
  logger.info(`[INIT] 📝 Wrote repository manifest: ${result.manifestFile}`);

  return result;
}
