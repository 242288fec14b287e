/**
 * Stable reason codes for audit errors and findings.
 * Codes appear in JSON reports; renaming one is a breaking change.
 */

export enum AuditReasonCode {
  // Input errors (fatal for the item, run continues)
  SCOPE_UNRESOLVED = 'SCOPE_UNRESOLVED',
  REPOSITORY_NOT_FOUND = 'REPOSITORY_NOT_FOUND',

  // Classification / configuration
  UNKNOWN_ROLE = 'UNKNOWN_ROLE',
  TEMPLATE_REGISTRY_INVALID = 'TEMPLATE_REGISTRY_INVALID',
  MANIFEST_INVALID = 'MANIFEST_INVALID',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Content findings (non-fatal)
  DUPLICATE_REQUIREMENT = 'DUPLICATE_REQUIREMENT',
  MALFORMED_TAG = 'MALFORMED_TAG',
  DANGLING_TAG = 'DANGLING_TAG',
  ORPHAN_VERIFICATION = 'ORPHAN_VERIFICATION',

  // Environment warnings
  UNREADABLE_FILE = 'UNREADABLE_FILE',
  UNDECODABLE_FILE = 'UNDECODABLE_FILE',

  // Per-repository failure
  REPOSITORY_FAILED = 'REPOSITORY_FAILED'
}

export const REASON_CODE_DESCRIPTIONS: Record<AuditReasonCode, string> = {
  [AuditReasonCode.SCOPE_UNRESOLVED]: 'Working directory is neither a workspace root nor a repository',
  [AuditReasonCode.REPOSITORY_NOT_FOUND]: 'Named repository does not exist under the repositories root',
  [AuditReasonCode.UNKNOWN_ROLE]: 'No topic tag maps to a known role; template checks skipped',
  [AuditReasonCode.TEMPLATE_REGISTRY_INVALID]: 'Golden template file is malformed or misses a role',
  [AuditReasonCode.MANIFEST_INVALID]: 'Workspace or repository manifest failed validation',
  [AuditReasonCode.CONFIG_INVALID]: 'Configuration file or environment override is invalid',
  [AuditReasonCode.DUPLICATE_REQUIREMENT]: 'Requirement identifier declared more than once',
  [AuditReasonCode.MALFORMED_TAG]: 'Verification tag could not be parsed; test excluded',
  [AuditReasonCode.DANGLING_TAG]: 'Verification tag is not attached to a test definition',
  [AuditReasonCode.ORPHAN_VERIFICATION]: 'Test claims to verify an undeclared requirement',
  [AuditReasonCode.UNREADABLE_FILE]: 'File could not be read and was skipped',
  [AuditReasonCode.UNDECODABLE_FILE]: 'File is not valid UTF-8 text and was skipped',
  [AuditReasonCode.REPOSITORY_FAILED]: 'Repository could not be processed'
};
