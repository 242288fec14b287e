/**
 * Audit error classes
 * Each carries a stable reason code so callers can branch without parsing messages.
 */

import { AuditReasonCode } from './reason-codes';

export class AuditError extends Error {
  code: AuditReasonCode;

  constructor(message: string, code: AuditReasonCode) {
    super(message);
    this.name = 'AuditError';
    this.code = code;
  }
}

export class ScopeResolutionError extends AuditError {
  constructor(message: string) {
    super(message, AuditReasonCode.SCOPE_UNRESOLVED);
    this.name = 'ScopeResolutionError';
  }
}

export class RepositoryNotFoundError extends AuditError {
  repository: string;

  constructor(repository: string, reposRoot: string) {
    super(`Repository '${repository}' not found under ${reposRoot}`, AuditReasonCode.REPOSITORY_NOT_FOUND);
    this.name = 'RepositoryNotFoundError';
    this.repository = repository;
  }
}

export class UnknownRoleError extends AuditError {
  repository: string;
  topics: readonly string[];

  constructor(repository: string, topics: readonly string[]) {
    const shown = topics.length > 0 ? topics.join(', ') : '(none)';
    super(`Cannot classify '${repository}': no role topic among ${shown}`, AuditReasonCode.UNKNOWN_ROLE);
    this.name = 'UnknownRoleError';
    this.repository = repository;
    this.topics = topics;
  }
}

export class TemplateRegistryError extends AuditError {
  constructor(message: string) {
    super(message, AuditReasonCode.TEMPLATE_REGISTRY_INVALID);
    this.name = 'TemplateRegistryError';
  }
}

export class ManifestError extends AuditError {
  manifestPath: string;

  constructor(manifestPath: string, message: string) {
    super(`Invalid manifest ${manifestPath}: ${message}`, AuditReasonCode.MANIFEST_INVALID);
    this.name = 'ManifestError';
    this.manifestPath = manifestPath;
  }
}

export class ConfigError extends AuditError {
  constructor(message: string) {
    super(message, AuditReasonCode.CONFIG_INVALID);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
