/**
 * Audit commands - structure and traceability
 *
 * The report goes to stdout in the requested format; progress and
 * per-repository failures are logged to stderr.
 */

import {
  ConfigError,
  ReportFormat,
  RunContext,
  isReportFormat,
  plainStyler,
  renderStructureReport,
  renderTraceabilityReport,
  runStructureAudit,
  runTraceabilityAudit,
  structureExitCode,
  traceabilityExitCode
} from 'ecosys-audit';
import { CommandIO, setup } from '../io';
import { chalkStyler } from '../logger';

export interface AuditOptions {
  format?: string;
  warnOnly?: boolean;
}

function parseFormat(value: string | undefined): ReportFormat {
  const format = value ?? 'text';
  if (!isReportFormat(format)) {
    throw new ConfigError(`Invalid --format: ${format}. Valid values: text, markdown, json`);
  }
  return format;
}

function createContext(io: CommandIO): RunContext {
  const { config, logger } = setup(io);
  return new RunContext({ cwd: io.cwd, config, logger });
}

export async function auditStructureCommand(
  repositories: readonly string[],
  options: AuditOptions,
  io: CommandIO
): Promise<number> {
  const format = parseFormat(options.format);
  const ctx = createContext(io);

  ctx.logger.info('[AUDIT] 🔍 Structural audit');
  const report = await runStructureAudit(ctx, repositories);
  for (const inputError of report.input_errors) {
    ctx.logger.error(`[AUDIT] ❌ ${inputError.name}: ${inputError.message}`);
  }

  io.out(renderStructureReport(report, format, io.color && format === 'text' ? chalkStyler : plainStyler));

  const { compliant, non_compliant, skipped, failed } = report.summary;
  ctx.logger.info(
    `[AUDIT] 📊 ${compliant} compliant, ${non_compliant} non-compliant, ${skipped} skipped, ${failed} failed`
  );
  return structureExitCode(report);
}

export async function auditTraceabilityCommand(
  repositories: readonly string[],
  options: AuditOptions,
  io: CommandIO
): Promise<number> {
  const format = parseFormat(options.format);
  const ctx = createContext(io);
  const warnOnly = options.warnOnly === true || ctx.config.warnOnly;

  ctx.logger.info('[AUDIT] 🔗 Traceability audit');
  const report = await runTraceabilityAudit(ctx, repositories);
  for (const inputError of report.input_errors) {
    ctx.logger.error(`[AUDIT] ❌ ${inputError.name}: ${inputError.message}`);
  }

  io.out(renderTraceabilityReport(report, format, io.color && format === 'text' ? chalkStyler : plainStyler));

  const exitCode = traceabilityExitCode(report, warnOnly);
  if (exitCode === 0 && warnOnly && traceabilityExitCode(report, false) !== 0) {
    ctx.logger.warn('[AUDIT] ⚠️  Uncovered requirements (warn-only mode)');
  }
  return exitCode;
}
