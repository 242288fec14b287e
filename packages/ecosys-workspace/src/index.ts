/**
 * ecosys Workspace Package
 *
 * Collaborator commands around the audits:
 * - init: clone the organisation's repositories and write the workspace files
 * - version: patch and release version bumps
 * - export: single-file codebase export
 */

export * from './errors';
export * from './command-runner';
export * from './init';
export * from './version';
export * from './export';
