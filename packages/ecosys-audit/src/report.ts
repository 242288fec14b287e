/**
 * Report Rendering
 *
 * Renders structure and traceability reports as plain text, Markdown or
 * JSON. Text output takes an optional styler so the CLI can colour it;
 * Markdown and JSON are never styled.
 */

import {
  ContentFinding,
  CoverageRow,
  RepositorySection,
  RepositoryStructureResult,
  RepositoryTraceabilityResult,
  ScopeInputError,
  StructuralFinding,
  StructureReport,
  TraceabilityReport
} from './types';
import { AuditReasonCode, REASON_CODE_DESCRIPTIONS } from './reason-codes';

export const REPORT_FORMATS = ['text', 'markdown', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export interface Styler {
  ok(text: string): string;
  bad(text: string): string;
  warn(text: string): string;
  dim(text: string): string;
  bold(text: string): string;
}

const plain = (text: string) => text;

export const plainStyler: Styler = { ok: plain, bad: plain, warn: plain, dim: plain, bold: plain };

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function pad(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

/**
 * Fixed-width table; widths come from the unstyled cells
 */
function table(
  headers: string[],
  rows: string[][],
  style: (cell: string, column: number, row: number) => string = plain
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const line = (cells: string[], row: number | null) =>
    cells
      .map((cell, column) => {
        const padded = pad(cell, widths[column]);
        return row === null ? padded : style(padded, column, row);
      })
      .join('  ')
      .trimEnd();

  return [
    line(headers, null),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map((cells, row) => line(cells, row))
  ];
}

export function describeFinding(finding: ContentFinding): string {
  switch (finding.code) {
    case AuditReasonCode.DUPLICATE_REQUIREMENT:
      return `${finding.id} declared again at ${finding.file}:${finding.line} (first at ${finding.firstDeclared.file}:${finding.firstDeclared.line})`;
    case AuditReasonCode.MALFORMED_TAG:
      return `${finding.file}:${finding.line} ${finding.tag}: ${finding.reason}${finding.test ? ` (${finding.test})` : ''}`;
    case AuditReasonCode.DANGLING_TAG:
      return `${finding.file}:${finding.line} tag for ${finding.requirementIds.join(', ')} has no test`;
    case AuditReasonCode.ORPHAN_VERIFICATION:
      return `${finding.id} is not declared; claimed by ${finding.tests.join(', ')}`;
  }
}

function inputErrorLines(errors: readonly ScopeInputError[], styler: Styler): string[] {
  if (errors.length === 0) return [];
  return [
    styler.bold('Input errors'),
    ...errors.map((error) => styler.bad(`  ${error.name}: [${error.code}] ${error.message}`)),
    ''
  ];
}

/**
 * Markdown table explaining every reason code the report mentions
 */
function reasonCodeLegend(codes: Iterable<AuditReasonCode>): string[] {
  const used = [...new Set(codes)].sort();
  if (used.length === 0) return [];
  return [
    '## Reason Codes',
    '',
    '| Code | Meaning |',
    '|------|---------|',
    ...used.map((code) => `| \`${code}\` | ${REASON_CODE_DESCRIPTIONS[code]} |`),
    ''
  ];
}

function visibleFindings(section: RepositoryStructureResult): StructuralFinding[] {
  return section.findings.filter((finding) => finding.status !== 'present');
}

// ============================================================================
// Structure
// ============================================================================

function structureText(report: StructureReport, styler: Styler): string {
  const lines: string[] = [styler.bold(`Structure audit (${report.scope})`), '', ...inputErrorLines(report.input_errors, styler)];

  for (const section of report.repositories) {
    if (section.status === 'failed') {
      lines.push(`${styler.bold(section.repository)}  ${styler.bad('FAILED')}`, `  ${section.error}`, '');
      continue;
    }

    if (section.verdict === 'skipped') {
      lines.push(`${styler.bold(section.repository)}  ${styler.dim('SKIPPED')}`, `  ${section.reason ?? ''}`, '');
      continue;
    }

    const verdict = section.verdict === 'compliant' ? styler.ok('COMPLIANT') : styler.bad('NON-COMPLIANT');
    lines.push(`${styler.bold(section.repository)}  ${section.role ?? ''}  ${verdict}`);
    if (section.services.length > 0) {
      lines.push(styler.dim(`  services: ${section.services.join(', ')}`));
    }

    const findings = visibleFindings(section);
    if (findings.length === 0) {
      lines.push('  all template paths present');
    } else {
      const rows = findings.map((finding) => [finding.status, finding.severity, finding.path, finding.pattern]);
      const colour = (cell: string, column: number, row: number) => {
        if (column !== 0) return cell;
        const finding = findings[row];
        return finding.status === 'missing' && finding.severity === 'required' ? styler.bad(cell) : styler.warn(cell);
      };
      lines.push(...table(['STATUS', 'SEVERITY', 'PATH', 'PATTERN'], rows, colour).map((row) => `  ${row}`));
    }
    lines.push('');
  }

  const s = report.summary;
  lines.push(
    `${s.total} repositories: ${s.compliant} compliant, ${s.non_compliant} non-compliant, ${s.skipped} skipped, ${s.failed} failed`
  );
  return lines.join('\n');
}

function structureMarkdown(report: StructureReport): string {
  const lines: string[] = [
    '# Structure Audit',
    '',
    `Generated: ${report.generated_at}`,
    `Scope: ${report.scope}`,
    ''
  ];

  if (report.input_errors.length > 0) {
    lines.push('## Input Errors', '', ...report.input_errors.map((e) => `- **${e.name}**: \`${e.code}\` ${e.message}`), '');
  }

  lines.push(
    '## Summary',
    '',
    '| Repository | Role | Verdict | Missing (required) | Missing (recommended) | Unexpected |',
    '|------------|------|---------|--------------------|-----------------------|------------|'
  );
  for (const section of report.repositories) {
    if (section.status === 'failed') {
      lines.push(`| ${section.repository} | - | failed | - | - | - |`);
      continue;
    }
    const count = (predicate: (f: StructuralFinding) => boolean) => section.findings.filter(predicate).length;
    lines.push(
      `| ${section.repository} | ${section.role ?? '-'} | ${section.verdict} | ` +
        `${count((f) => f.status === 'missing' && f.severity === 'required')} | ` +
        `${count((f) => f.status === 'missing' && f.severity === 'recommended')} | ` +
        `${count((f) => f.status === 'unexpected-extra')} |`
    );
  }
  lines.push('');

  for (const section of report.repositories) {
    lines.push(`## ${section.repository}`, '');
    if (section.status === 'failed') {
      lines.push(`Failed: ${section.error}`, '');
      continue;
    }
    if (section.verdict === 'skipped') {
      lines.push(`Skipped: ${section.reason ?? ''}`, '');
      continue;
    }
    const findings = visibleFindings(section);
    if (findings.length === 0) {
      lines.push('All template paths present.', '');
      continue;
    }
    lines.push('| Status | Severity | Path | Pattern |', '|--------|----------|------|---------|');
    lines.push(...findings.map((f) => `| ${f.status} | ${f.severity} | \`${f.path}\` | \`${f.pattern}\` |`), '');
  }

  lines.push(
    ...reasonCodeLegend([
      ...report.input_errors.map((e) => e.code),
      ...report.repositories.flatMap((section) => (section.status === 'failed' ? [section.code] : []))
    ])
  );

  return lines.join('\n');
}

export function renderStructureReport(report: StructureReport, format: ReportFormat, styler: Styler = plainStyler): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return structureMarkdown(report);
    case 'text':
      return structureText(report, styler);
  }
}

// ============================================================================
// Traceability
// ============================================================================

function coverageCells(row: CoverageRow): string[] {
  return [row.requirement.id, row.covered ? 'covered' : 'uncovered', String(row.count), row.tests.join(', ')];
}

function traceabilitySectionText(
  section: RepositorySection<RepositoryTraceabilityResult>,
  styler: Styler
): string[] {
  if (section.status === 'failed') {
    return [`${styler.bold(section.repository)}  ${styler.bad('FAILED')}`, `  ${section.error}`, ''];
  }

  const percent = formatPercent(section.coverage_percent);
  const lines = [
    `${styler.bold(section.repository)}  ${section.covered_requirements}/${section.total_requirements} covered (${percent})`
  ];

  if (section.rows.length > 0) {
    const colour = (cell: string, column: number, row: number) =>
      column !== 1 ? cell : section.rows[row].covered ? styler.ok(cell) : styler.bad(cell);
    lines.push(...table(['REQUIREMENT', 'STATUS', 'TESTS', 'VERIFIED BY'], section.rows.map(coverageCells), colour).map((row) => `  ${row}`));
  } else {
    lines.push(styler.dim('  no requirements declared'));
  }

  for (const finding of section.findings) {
    lines.push(styler.warn(`  [${finding.code}] ${describeFinding(finding)}`));
  }
  for (const warning of section.warnings) {
    lines.push(styler.dim(`  [${warning.code}] ${warning.file}: ${warning.message}`));
  }
  lines.push('');
  return lines;
}

function traceabilityText(report: TraceabilityReport, styler: Styler): string {
  const lines: string[] = [
    styler.bold(`Traceability audit (${report.scope})`),
    '',
    ...inputErrorLines(report.input_errors, styler)
  ];

  for (const section of report.repositories) {
    lines.push(...traceabilitySectionText(section, styler));
  }

  if (report.rollup) {
    const r = report.rollup;
    lines.push(
      styler.bold(`Ecosystem: ${r.covered_requirements}/${r.total_requirements} requirements covered (${formatPercent(r.coverage_percent)})`)
    );
  }

  return lines.join('\n').trimEnd();
}

function traceabilityMarkdown(report: TraceabilityReport): string {
  const lines: string[] = ['# Traceability Matrix', '', `Generated: ${report.generated_at}`, `Scope: ${report.scope}`, ''];

  if (report.input_errors.length > 0) {
    lines.push('## Input Errors', '', ...report.input_errors.map((e) => `- **${e.name}**: \`${e.code}\` ${e.message}`), '');
  }

  if (report.rollup) {
    const r = report.rollup;
    lines.push(
      '## Ecosystem Coverage',
      '',
      `- **Requirements**: ${r.total_requirements}`,
      `- **Covered**: ${r.covered_requirements}`,
      `- **Coverage**: ${formatPercent(r.coverage_percent)}`,
      ''
    );
  }

  for (const section of report.repositories) {
    lines.push(`## ${section.repository}`, '');
    if (section.status === 'failed') {
      lines.push(`Failed: ${section.error}`, '');
      continue;
    }

    lines.push(`Coverage: ${section.covered_requirements}/${section.total_requirements} (${formatPercent(section.coverage_percent)})`, '');
    if (section.rows.length > 0) {
      lines.push('| Requirement | Description | Status | Tests | Verified By |', '|-------------|-------------|--------|-------|-------------|');
      for (const row of section.rows) {
        const tests = row.tests.map((t) => `\`${t}\``).join('<br>');
        lines.push(
          `| ${row.requirement.id} | ${row.requirement.description.replace(/\|/g, '\\|')} | ${row.covered ? '✅' : '❌'} | ${row.count} | ${tests} |`
        );
      }
      lines.push('');
    }

    if (section.findings.length > 0) {
      lines.push('### Findings', '', ...section.findings.map((f) => `- \`${f.code}\` ${describeFinding(f)}`), '');
    }
    if (section.warnings.length > 0) {
      lines.push('### Skipped Files', '', ...section.warnings.map((w) => `- \`${w.code}\` ${w.file}: ${w.message}`), '');
    }
  }

  lines.push(
    ...reasonCodeLegend([
      ...report.input_errors.map((e) => e.code),
      ...report.repositories.flatMap((section) =>
        section.status === 'failed'
          ? [section.code]
          : [...section.findings.map((f) => f.code), ...section.warnings.map((w) => w.code)]
      )
    ])
  );

  return lines.join('\n');
}

export function renderTraceabilityReport(
  report: TraceabilityReport,
  format: ReportFormat,
  styler: Styler = plainStyler
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return traceabilityMarkdown(report);
    case 'text':
      return traceabilityText(report, styler);
  }
}
