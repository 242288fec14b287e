/**
 * Workspace command errors
 * Fail-closed: every refusal carries a code the CLI can print.
 */

export class WorkspaceError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'WorkspaceError';
    this.code = code;
  }
}

export class WorkspaceInitError extends WorkspaceError {
  constructor(message: string, code: string = 'INIT_FAILED') {
    super(message, code);
    this.name = 'WorkspaceInitError';
  }
}

export class VersionError extends WorkspaceError {
  constructor(message: string, code: string = 'VERSION_INVALID') {
    super(message, code);
    this.name = 'VersionError';
  }
}

export class ExportError extends WorkspaceError {
  constructor(message: string, code: string = 'EXPORT_FAILED') {
    super(message, code);
    this.name = 'ExportError';
  }
}
