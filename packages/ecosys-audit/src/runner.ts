/**
 * Audit Runner
 *
 * Resolves the scope once, processes each repository through a bounded
 * pool and aggregates the per-repository sections. A failure in one
 * repository is recorded in its section; the others still run.
 */

import {
  AuditScope,
  RepositoryFailure,
  RepositoryRef,
  RepositorySection,
  RepositoryStructureResult,
  RepositoryTraceabilityResult,
  StructureReport,
  TraceabilityReport
} from './types';
import { RunContext } from './context';
import { resolveScope } from './scope';
import { auditStructure } from './structure';
import { buildRollup, traceRepository } from './traceability';
import { errorMessage } from './errors';
import { AuditReasonCode } from './reason-codes';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INPUT_ERROR = 2;

/**
 * Map items with at most `limit` calls in flight; output keeps input order
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

async function processRepositories<T extends { repository: string }>(
  ctx: RunContext,
  scope: AuditScope,
  task: (ref: RepositoryRef) => Promise<T>
): Promise<RepositorySection<T>[]> {
  return mapWithConcurrency(scope.repositories, ctx.config.concurrency, async (ref) => {
    try {
      const result = await task(ref);
      return { status: 'ok' as const, ...result };
    } catch (error) {
      ctx.logger.error(`[AUDIT] ❌ ${ref.name}: ${errorMessage(error)}`);
      const failure: RepositoryFailure = {
        repository: ref.name,
        status: 'failed',
        code: AuditReasonCode.REPOSITORY_FAILED,
        error: errorMessage(error)
      };
      return failure;
    }
  });
}

export async function runStructureAudit(ctx: RunContext, names: readonly string[] = []): Promise<StructureReport> {
  const scope = await resolveScope(ctx, names);
  const sections = await processRepositories<RepositoryStructureResult>(ctx, scope, (ref) =>
    auditStructure(ref, ctx)
  );

  const summary = { total: sections.length, compliant: 0, non_compliant: 0, skipped: 0, failed: 0 };
  for (const section of sections) {
    if (section.status === 'failed') {
      summary.failed++;
    } else if (section.verdict === 'compliant') {
      summary.compliant++;
    } else if (section.verdict === 'non-compliant') {
      summary.non_compliant++;
    } else {
      summary.skipped++;
    }
  }

  return {
    generated_at: new Date().toISOString(),
    scope: scope.kind,
    input_errors: scope.inputErrors,
    repositories: sections,
    summary
  };
}

export async function runTraceabilityAudit(
  ctx: RunContext,
  names: readonly string[] = []
): Promise<TraceabilityReport> {
  const scope = await resolveScope(ctx, names);
  const sections = await processRepositories<RepositoryTraceabilityResult>(ctx, scope, (ref) =>
    traceRepository(ref, ctx)
  );

  const report: TraceabilityReport = {
    generated_at: new Date().toISOString(),
    scope: scope.kind,
    input_errors: scope.inputErrors,
    repositories: sections
  };

  if (scope.kind === 'workspace') {
    const succeeded = sections.filter(
      (section): section is { status: 'ok' } & RepositoryTraceabilityResult => section.status === 'ok'
    );
    report.rollup = buildRollup(succeeded);
  }

  return report;
}

export function structureExitCode(report: StructureReport): number {
  if (report.input_errors.length > 0) return EXIT_INPUT_ERROR;
  if (report.summary.non_compliant > 0 || report.summary.failed > 0) return EXIT_FAILURE;
  return EXIT_OK;
}

export function traceabilityExitCode(report: TraceabilityReport, warnOnly: boolean): number {
  if (report.input_errors.length > 0) return EXIT_INPUT_ERROR;

  let uncovered = 0;
  for (const section of report.repositories) {
    if (section.status === 'failed') return EXIT_FAILURE;
    uncovered += section.total_requirements - section.covered_requirements;
  }

  if (uncovered > 0 && !warnOnly) return EXIT_FAILURE;
  return EXIT_OK;
}
