/**
 * Init command - clone the organisation's repositories and write the
 * workspace file and manifest
 */

import { findWorkspaceRoot } from 'ecosys-audit';
import { CommandRunner, WorkspaceInitError, initWorkspace } from 'ecosys-workspace';
import { CommandIO, setup } from '../io';

export interface InitCommandOptions {
  force?: boolean;
  org?: string;
}

export async function initCommand(
  options: InitCommandOptions,
  io: CommandIO,
  runner?: CommandRunner
): Promise<number> {
  const { config, logger } = setup(io);

  const org = options.org ?? config.org;
  if (!org) {
    throw new WorkspaceInitError('No organisation given: pass --org or set "org" in ecosys.config.json', 'ORG_MISSING');
  }

  const workspaceRoot = (await findWorkspaceRoot(io.cwd, config.reposDir)) ?? io.cwd;
  const result = await initWorkspace({
    workspaceRoot,
    org,
    reposDir: config.reposDir,
    force: options.force === true,
    runner,
    logger,
    classifierOptions: { precedence: config.rolePrecedence, aliases: config.topicAliases }
  });

  logger.info(
    `[INIT] ✅ ${result.cloned.length} cloned, ${result.recloned.length} re-cloned, ${result.skipped.length} already present`
  );
  io.out(`Open ${result.workspaceFile} in your editor to load the workspace.`);
  return 0;
}
