/**
 * ecosys Audit Types
 *
 * Roles, golden templates, structural findings, requirements, verification
 * links and the reports composed from them.
 */

import { AuditReasonCode } from './reason-codes';
import type { ManifestError, UnknownRoleError } from './errors';

// ============================================================================
// Roles & Templates
// ============================================================================

export const ROLES = ['core', 'enabler', 'sector', 'worker', 'tooling', 'governance', 'meta'] as const;

export type Role = (typeof ROLES)[number];

/**
 * monorepo: one subdirectory per service, template paths use {service}
 * root-only: template paths are relative to the repository root
 */
export type LayoutKind = 'monorepo' | 'root-only';

export type Severity = 'required' | 'recommended';

export interface TemplatePattern {
  path: string;
  severity: Severity;
  description?: string;
}

export interface ServiceDiscovery {
  /** Directory holding one subdirectory per service, relative to the repo root */
  root: string;
  /** Subdirectory names that are never services (docs, tests, website...) */
  exclude: string[];
}

export interface GoldenTemplate {
  role: Role;
  layout: LayoutKind;
  services?: ServiceDiscovery;
  patterns: TemplatePattern[];
  /** Top-level entry names (with * wildcards) that should not exist */
  denylist: string[];
}

// ============================================================================
// Repositories & Scope
// ============================================================================

export type RoleClassification =
  | { kind: 'classified'; role: Role }
  | { kind: 'unclassified'; error: UnknownRoleError | ManifestError };

export interface RepositoryRef {
  readonly name: string;
  readonly path: string;
  readonly topics: readonly string[];
  readonly classification: RoleClassification;
}

export type ScopeKind = 'local' | 'named' | 'workspace';

export interface ScopeInputError {
  name: string;
  code: AuditReasonCode;
  message: string;
}

export interface AuditScope {
  kind: ScopeKind;
  workspaceRoot?: string;
  repositories: readonly RepositoryRef[];
  inputErrors: ScopeInputError[];
}

// ============================================================================
// Structural Audit
// ============================================================================

export type FindingStatus = 'present' | 'missing' | 'unexpected-extra';

export interface StructuralFinding {
  /** Template pattern as written, placeholder included */
  pattern: string;
  /** Concrete path checked (placeholder expanded) */
  path: string;
  severity: Severity;
  status: FindingStatus;
  service?: string;
}

export type StructureVerdict = 'compliant' | 'non-compliant' | 'skipped';

export interface RepositoryStructureResult {
  repository: string;
  role?: Role;
  verdict: StructureVerdict;
  services: string[];
  findings: StructuralFinding[];
  /** Set when verdict is skipped */
  reason?: string;
}

// ============================================================================
// Traceability
// ============================================================================

export interface Requirement {
  id: string;
  file: string;
  line: number;
  description: string;
}

export interface VerificationLink {
  /** Qualified test name: file::Suite::test */
  test: string;
  file: string;
  line: number;
  requirementIds: string[];
}

export interface CoverageRow {
  requirement: Requirement;
  count: number;
  tests: string[];
  covered: boolean;
}

export interface DuplicateRequirementFinding {
  code: AuditReasonCode.DUPLICATE_REQUIREMENT;
  id: string;
  file: string;
  line: number;
  firstDeclared: { file: string; line: number };
}

export interface MalformedTagFinding {
  code: AuditReasonCode.MALFORMED_TAG;
  file: string;
  line: number;
  tag: string;
  reason: string;
  test?: string;
}

export interface DanglingTagFinding {
  code: AuditReasonCode.DANGLING_TAG;
  file: string;
  line: number;
  requirementIds: string[];
}

export interface OrphanVerificationFinding {
  code: AuditReasonCode.ORPHAN_VERIFICATION;
  id: string;
  tests: string[];
}

export type ContentFinding =
  | DuplicateRequirementFinding
  | MalformedTagFinding
  | DanglingTagFinding
  | OrphanVerificationFinding;

export interface FileWarning {
  code: AuditReasonCode.UNREADABLE_FILE | AuditReasonCode.UNDECODABLE_FILE;
  file: string;
  message: string;
}

export interface RequirementExtraction {
  requirements: Requirement[];
  duplicates: DuplicateRequirementFinding[];
  warnings: FileWarning[];
  filesScanned: string[];
}

export interface VerificationExtraction {
  links: VerificationLink[];
  malformed: MalformedTagFinding[];
  dangling: DanglingTagFinding[];
  warnings: FileWarning[];
  filesScanned: string[];
}

export interface RepositoryTraceabilityResult {
  repository: string;
  rows: CoverageRow[];
  findings: ContentFinding[];
  warnings: FileWarning[];
  total_requirements: number;
  covered_requirements: number;
  coverage_percent: number;
}

// ============================================================================
// Reports
// ============================================================================

export interface RepositoryFailure {
  repository: string;
  status: 'failed';
  code: AuditReasonCode.REPOSITORY_FAILED;
  error: string;
}

export type RepositorySection<T> = ({ status: 'ok' } & T) | RepositoryFailure;

export interface StructureReport {
  generated_at: string;
  scope: ScopeKind;
  input_errors: ScopeInputError[];
  repositories: RepositorySection<RepositoryStructureResult>[];
  summary: {
    total: number;
    compliant: number;
    non_compliant: number;
    skipped: number;
    failed: number;
  };
}

export interface TraceabilityRollupRow extends CoverageRow {
  repository: string;
}

export interface TraceabilityReport {
  generated_at: string;
  scope: ScopeKind;
  input_errors: ScopeInputError[];
  repositories: RepositorySection<RepositoryTraceabilityResult>[];
  rollup?: {
    rows: TraceabilityRollupRow[];
    total_requirements: number;
    covered_requirements: number;
    coverage_percent: number;
  };
}
