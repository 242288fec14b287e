#!/usr/bin/env node
/**
 * ecosys CLI
 * Commands: audit structure, audit traceability, init, version, export
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'ecosys-audit';
import { CommandIO, GlobalOptions, failureExitCode, processIO } from './io';
import { AuditOptions, auditStructureCommand, auditTraceabilityCommand } from './commands/audit';
import { InitCommandOptions, initCommand } from './commands/init';
import { versionPatchCommand, versionReleaseCommand } from './commands/version';
import { ExportCommandOptions, exportCommand } from './commands/export';

const program = new Command();

program
  .name('ecosys')
  .description('ecosys - structure and traceability audits for a multi-repository ecosystem')
  .version('0.2.0')
  .option('--verbose', 'Log debug output');

async function runAction(action: (io: CommandIO) => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action(processIO(program.opts<GlobalOptions>()));
  } catch (error) {
    console.error(chalk.red(`[ERROR] ${errorMessage(error)}`));
    process.exit(failureExitCode(error));
  }
}

// ============================================================================
// Audits
// ============================================================================

const audit = new Command('audit').description('Audit repositories against the ecosystem conventions');

audit
  .command('structure')
  .description('Check each repository against the golden template of its role')
  .argument('[repos...]', 'Repositories to audit (default: current repository or whole workspace)')
  .option('--format <type>', 'Output format: text, markdown or json', 'text')
  .action(async (repos: string[], options: AuditOptions) => {
    await runAction((io) => auditStructureCommand(repos, options, io));
  });

audit
  .command('traceability')
  .description('Build the requirement-to-test traceability matrix')
  .argument('[repos...]', 'Repositories to audit (default: current repository or whole workspace)')
  .option('--format <type>', 'Output format: text, markdown or json', 'text')
  .option('--warn-only', 'Report uncovered requirements without failing')
  .action(async (repos: string[], options: AuditOptions) => {
    await runAction((io) => auditTraceabilityCommand(repos, options, io));
  });

program.addCommand(audit);

// ============================================================================
// Collaborator commands
// ============================================================================

program
  .command('init')
  .description("Clone the organisation's repositories and generate the workspace file")
  .option('--force', 'Delete and re-clone repositories that already exist')
  .option('--org <name>', 'GitHub organisation (default: "org" from ecosys.config.json)')
  .action(async (options: InitCommandOptions) => {
    await runAction((io) => initCommand(options, io));
  });

const version = new Command('version').description('Bump service and global versions');

version
  .command('patch')
  .description('Bump the patch version of one service (X.Y.Z -> X.Y.Z+1)')
  .argument('<service>', 'Service name (api, auth, app, website)')
  .action(async (service: string) => {
    await runAction((io) => versionPatchCommand(service, io));
  });

version
  .command('release')
  .description('Bump GLOBAL_VERSION and align every service to it')
  .argument('<type>', 'Release type: minor or major')
  .action(async (type: string) => {
    await runAction((io) => versionReleaseCommand(type, io));
  });

program.addCommand(version);

program
  .command('export')
  .description('Export a codebase into a single text file')
  .argument('[path]', 'File or directory to export', '.')
  .option('-o, --output <file>', 'Output file', 'context.txt')
  .option('--no-defaults', 'Do not apply the default exclusions')
  .option('--exclude-dirs <dirs...>', 'Additional directory names to exclude')
  .option('--exclude-exts <exts...>', 'Additional file extensions to exclude')
  .option('--exclude-paths <paths...>', 'Additional path suffixes to exclude')
  .action(async (source: string, options: ExportCommandOptions) => {
    await runAction((io) => exportCommand(source, options, io));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`[ERROR] ${errorMessage(error)}`));
  process.exit(1);
});
