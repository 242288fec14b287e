/**
 * Run Context
 *
 * Everything one CLI invocation shares: configuration, logger, template
 * registry and the repository metadata cache. Created per invocation and
 * passed explicitly; nothing here outlives the run.
 */

import * as path from 'path';
import { DevtoolsConfig, defaultConfig } from './config';
import { Logger, silentLogger } from './logger';
import { TemplateRegistry } from './templates';
import { ManifestMetadataSource, MetadataSource, RepositoryMetadata } from './metadata';
import { ClassifierOptions } from './roles';

export interface RunContextOptions {
  cwd?: string;
  config?: DevtoolsConfig;
  logger?: Logger;
  registry?: TemplateRegistry;
  metadataSource?: MetadataSource;
}

export class RunContext {
  readonly cwd: string;
  readonly config: DevtoolsConfig;
  readonly logger: Logger;
  readonly registry: TemplateRegistry;
  private readonly metadataSource: MetadataSource;
  private readonly metadataCache = new Map<string, Promise<RepositoryMetadata>>();

  constructor(options: RunContextOptions = {}) {
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? TemplateRegistry.load(this.config.templatesPath);
    this.metadataSource = options.metadataSource ?? new ManifestMetadataSource();
  }

  get classifierOptions(): ClassifierOptions {
    return {
      precedence: this.config.rolePrecedence,
      aliases: this.config.topicAliases
    };
  }

  /**
   * Topic metadata for a repository, looked up once per run
   */
  metadata(name: string, repositoryPath: string, workspaceRoot?: string): Promise<RepositoryMetadata> {
    const key = path.resolve(repositoryPath);
    let pending = this.metadataCache.get(key);
    if (!pending) {
      this.logger.debug(`[SCOPE] Looking up metadata for ${name}`);
      pending = this.metadataSource.lookup(name, key, workspaceRoot);
      this.metadataCache.set(key, pending);
    }
    return pending;
  }
}
