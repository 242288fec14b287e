/**
 * Repository metadata (topic tags)
 *
 * Topics come from the repository's own ecosys.repo.json first, then from
 * the workspace manifest that `ecosys init` writes at the workspace root,
 * together with the role init recorded for the repository.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ROLES, Role } from './types';
import { ManifestError, errorMessage } from './errors';
import { isMissingPathError } from './files';

export const WORKSPACE_MANIFEST = 'ecosys.workspace.json';
export const REPOSITORY_MANIFEST = 'ecosys.repo.json';

export const WorkspaceManifestSchema = z.object({
  org: z.string().min(1),
  generated_at: z.string(),
  repositories: z.array(
    z.object({
      name: z.string().min(1),
      topics: z.array(z.string()).default([]),
      ssh_url: z.string().optional(),
      role: z.enum(ROLES).optional()
    })
  )
});

export type WorkspaceManifest = z.infer<typeof WorkspaceManifestSchema>;

export const RepositoryManifestSchema = z.object({
  topics: z.array(z.string())
});

export type MetadataOrigin = 'repository-manifest' | 'workspace-manifest' | 'none';

export interface RepositoryMetadata {
  name: string;
  topics: string[];
  origin: MetadataOrigin;
  /** Role recorded by `ecosys init`; takes the place of topic classification */
  role?: Role;
}

export interface MetadataSource {
  lookup(name: string, repositoryPath: string, workspaceRoot?: string): Promise<RepositoryMetadata>;
}

async function readManifest<T>(manifestPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw new ManifestError(manifestPath, errorMessage(error));
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ManifestError(manifestPath, errorMessage(error));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ManifestError(
      manifestPath,
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    );
  }
  return parsed.data;
}

export async function readWorkspaceManifest(workspaceRoot: string): Promise<WorkspaceManifest | null> {
  return readManifest(path.join(workspaceRoot, WORKSPACE_MANIFEST), WorkspaceManifestSchema);
}

/**
 * Reads manifests from disk. Each workspace manifest is parsed at most once
 * per source instance.
 */
export class ManifestMetadataSource implements MetadataSource {
  private workspaceManifests = new Map<string, Promise<WorkspaceManifest | null>>();

  async lookup(name: string, repositoryPath: string, workspaceRoot?: string): Promise<RepositoryMetadata> {
    const own = await readManifest(path.join(repositoryPath, REPOSITORY_MANIFEST), RepositoryManifestSchema);
    if (own) {
      return { name, topics: own.topics, origin: 'repository-manifest' };
    }

    if (workspaceRoot) {
      const manifest = await this.workspaceManifest(workspaceRoot);
      const entry = manifest?.repositories.find((repo) => repo.name === name);
      if (entry) {
        return { name, topics: entry.topics, origin: 'workspace-manifest', role: entry.role };
      }
    }

    return { name, topics: [], origin: 'none' };
  }

  private workspaceManifest(workspaceRoot: string): Promise<WorkspaceManifest | null> {
    let pending = this.workspaceManifests.get(workspaceRoot);
    if (!pending) {
      pending = readWorkspaceManifest(workspaceRoot);
      this.workspaceManifests.set(workspaceRoot, pending);
    }
    return pending;
  }
}
