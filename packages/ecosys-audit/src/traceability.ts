/**
 * Traceability Builder
 *
 * Left-joins declared requirements with verification links on identifier.
 * Coverage is binary per requirement (at least one distinct verifying test).
 * Links naming an undeclared identifier become ORPHAN_VERIFICATION findings.
 */

import { AuditReasonCode } from './reason-codes';
import {
  ContentFinding,
  CoverageRow,
  OrphanVerificationFinding,
  RepositoryRef,
  RepositoryTraceabilityResult,
  RequirementExtraction,
  TraceabilityReport,
  VerificationExtraction
} from './types';
import { RunContext } from './context';
import { extractRequirements, extractorOptions } from './requirements';
import { extractVerifications } from './verification';

export function coveragePercent(covered: number, total: number): number {
  return total > 0 ? (covered / total) * 100 : 0;
}

export function buildTraceability(
  repository: string,
  requirements: RequirementExtraction,
  verifications: VerificationExtraction
): RepositoryTraceabilityResult {
  const testsById = new Map<string, string[]>();
  for (const link of verifications.links) {
    for (const id of link.requirementIds) {
      const tests = testsById.get(id) ?? [];
      if (!tests.includes(link.test)) {
        tests.push(link.test);
      }
      testsById.set(id, tests);
    }
  }

  const rows: CoverageRow[] = requirements.requirements.map((requirement) => {
    const tests = testsById.get(requirement.id) ?? [];
    return { requirement, count: tests.length, tests, covered: tests.length >= 1 };
  });

  const declared = new Set(requirements.requirements.map((r) => r.id));
  const orphans: OrphanVerificationFinding[] = [];
  for (const [id, tests] of testsById) {
    if (!declared.has(id)) {
      orphans.push({ code: AuditReasonCode.ORPHAN_VERIFICATION, id, tests });
    }
  }

  const findings: ContentFinding[] = [
    ...requirements.duplicates,
    ...verifications.malformed,
    ...verifications.dangling,
    ...orphans
  ];

  const covered = rows.filter((row) => row.covered).length;

  return {
    repository,
    rows,
    findings,
    warnings: [...requirements.warnings, ...verifications.warnings],
    total_requirements: rows.length,
    covered_requirements: covered,
    coverage_percent: coveragePercent(covered, rows.length)
  };
}

/**
 * Run both extractors for one repository, then join.
 * Traceability does not need a role.
 */
export async function traceRepository(ref: RepositoryRef, ctx: RunContext): Promise<RepositoryTraceabilityResult> {
  ctx.logger.info(`[TRACE] 🔍 Scanning ${ref.name} for requirements and verification tags`);
  const options = extractorOptions(ctx.config);

  const [requirements, verifications] = await Promise.all([
    extractRequirements(ref.path, options, ctx.logger),
    extractVerifications(ref.path, options, ctx.logger)
  ]);

  const result = buildTraceability(ref.name, requirements, verifications);

  for (const finding of result.findings) {
    if (finding.code === AuditReasonCode.ORPHAN_VERIFICATION) {
      ctx.logger.warn(`[TRACE] ⚠️  ${ref.name}: ${finding.id} is verified by ${finding.tests.join(', ')} but never declared`);
    }
  }

  if (result.total_requirements === 0) {
    ctx.logger.warn(`[TRACE] ⚠️  ${ref.name}: no requirements declared`);
  }

  return result;
}

export function buildRollup(results: readonly RepositoryTraceabilityResult[]): NonNullable<TraceabilityReport['rollup']> {
  const rows = results.flatMap((result) => result.rows.map((row) => ({ ...row, repository: result.repository })));
  const covered = rows.filter((row) => row.covered).length;
  return {
    rows,
    total_requirements: rows.length,
    covered_requirements: covered,
    coverage_percent: coveragePercent(covered, rows.length)
  };
}
