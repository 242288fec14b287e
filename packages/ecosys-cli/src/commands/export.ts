/**
 * Export command - dump a codebase into one text file
 */

import { DEFAULT_EXPORT_OUTPUT, exportCodebase } from 'ecosys-workspace';
import { CommandIO, setup } from '../io';

export interface ExportCommandOptions {
  output?: string;
  /** commander sets this to false for --no-defaults */
  defaults?: boolean;
  excludeDirs?: string[];
  excludeExts?: string[];
  excludePaths?: string[];
}

export async function exportCommand(source: string | undefined, options: ExportCommandOptions, io: CommandIO): Promise<number> {
  const { logger } = setup(io);

  const result = await exportCodebase(
    {
      source: source ?? '.',
      output: options.output ?? DEFAULT_EXPORT_OUTPUT,
      cwd: io.cwd,
      useDefaults: options.defaults !== false,
      excludeDirs: options.excludeDirs,
      excludeExts: options.excludeExts,
      excludePaths: options.excludePaths
    },
    logger
  );

  if (result.skipped.length > 0) {
    logger.warn(`[EXPORT] ⚠️  ${result.skipped.length} files skipped`);
  }
  io.out(result.output);
  return 0;
}
