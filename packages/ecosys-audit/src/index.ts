/**
 * ecosys Audit Package
 *
 * Structural and traceability audits across an ecosystem of repositories:
 * - Scope resolution and role classification
 * - Golden templates and structural drift findings
 * - Requirement/verification extraction and coverage matrices
 */

export * from './types';
export * from './reason-codes';
export * from './errors';
export * from './logger';
export * from './config';
export * from './roles';
export * from './templates';
export * from './files';
export * from './metadata';
export * from './context';
export * from './scope';
export * from './structure';
export * from './requirements';
export * from './verification';
export * from './traceability';
export * from './runner';
export * from './report';
