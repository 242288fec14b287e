/**
 * Version commands - per-service patch bumps and global releases
 * Both operate on the repository in the working directory.
 */

import { ConfigError } from 'ecosys-audit';
import { RELEASE_TYPES, isReleaseType, patchService, release } from 'ecosys-workspace';
import { CommandIO, setup } from '../io';

export async function versionPatchCommand(service: string, io: CommandIO): Promise<number> {
  const { logger } = setup(io);
  const bump = await patchService(io.cwd, service, logger);
  io.out(`${bump.service} ${bump.from} -> ${bump.to}`);
  return 0;
}

export async function versionReleaseCommand(type: string, io: CommandIO): Promise<number> {
  if (!isReleaseType(type)) {
    throw new ConfigError(`Invalid release type: ${type}. Valid values: ${RELEASE_TYPES.join(', ')}`);
  }
  const { logger } = setup(io);

  const result = await release(io.cwd, type, logger);
  io.out(
    [`GLOBAL ${result.from} -> ${result.to}`, ...result.services.map((s) => `${s.service} ${s.from} -> ${s.to}`)].join(
      '\n'
    )
  );
  return 0;
}
