/**
 * Devtools Configuration
 *
 * Sources, lowest to highest priority:
 *   1. built-in defaults
 *   2. ecosys.config.json (nearest in the working directory or an ancestor)
 *   3. ECOSYS_* environment variables
 *
 * Fail-closed: an invalid file or override throws ConfigError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ROLES } from './types';
import { DEFAULT_ROLE_PRECEDENCE, DEFAULT_TOPIC_ALIASES } from './roles';
import { ConfigError } from './errors';
import { LOG_LEVELS, LogLevel, isLogLevel } from './logger';

export const CONFIG_FILENAME = 'ecosys.config.json';

export const DEFAULT_EXCLUDE_DIRS = [
  '.git',
  '.pytest_cache',
  'node_modules',
  'dist',
  'build',
  '__pycache__',
  '.idea',
  '.vscode',
  '.venv',
  'venv',
  '.docusaurus',
  '.ruff_cache'
];

const RoleSchema = z.enum(ROLES);

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const DevtoolsConfigSchema = z
  .object({
    reposDir: z.string().min(1).default('repos'),
    org: z.string().min(1).optional(),
    concurrency: z.number().int().min(1).max(64).default(4),
    rolePrecedence: z
      .array(RoleSchema)
      .min(1)
      .refine((roles) => new Set(roles).size === roles.length, 'rolePrecedence must not repeat a role')
      .default([...DEFAULT_ROLE_PRECEDENCE]),
    topicAliases: z.record(z.string(), RoleSchema).default({ ...DEFAULT_TOPIC_ALIASES }),
    templatesPath: z.string().min(1).optional(),
    requirementId: z
      .object({
        areaWidth: z.number().int().min(1).max(16).default(4),
        kindWidth: z.number().int().min(1).max(16).default(4),
        numberWidth: z.number().int().min(1).max(9).default(3)
      })
      .default({}),
    docPaths: z.array(z.string().min(1)).default(['website/docs', 'docs']),
    testDirs: z.array(z.string().min(1)).default(['tests', 'test', '__tests__', 'spec']),
    excludeDirs: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_DIRS]),
    warnOnly: z.boolean().default(false),
    logLevel: LogLevelSchema.default('info')
  })
  .strict();

export type DevtoolsConfig = z.infer<typeof DevtoolsConfigSchema>;

export interface LoadedConfig {
  config: DevtoolsConfig;
  /** Absolute path of the config file used, if any */
  configPath?: string;
}

export function defaultConfig(): DevtoolsConfig {
  return DevtoolsConfigSchema.parse({});
}

/**
 * Nearest ecosys.config.json walking up from start
 */
export function findConfigFile(start: string): string | undefined {
  let current = path.resolve(start);
  for (;;) {
    const candidate = path.join(current, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const object = z.record(z.unknown()).safeParse(parsed);
  if (!object.success) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  return object.data;
}

function parseBooleanEnv(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  throw new ConfigError(`Invalid ${name}: ${value}. Valid values: 1, 0, true, false`);
}

/**
 * Apply ECOSYS_* environment overrides on top of the raw file values
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
  cwd: string
): Record<string, unknown> {
  const result = { ...raw };

  if (env.ECOSYS_REPOS_DIR) {
    result.reposDir = env.ECOSYS_REPOS_DIR;
  }

  if (env.ECOSYS_ORG) {
    result.org = env.ECOSYS_ORG;
  }

  if (env.ECOSYS_CONCURRENCY) {
    const concurrency = Number(env.ECOSYS_CONCURRENCY);
    if (!Number.isInteger(concurrency)) {
      throw new ConfigError(`Invalid ECOSYS_CONCURRENCY: ${env.ECOSYS_CONCURRENCY}. Expected an integer`);
    }
    result.concurrency = concurrency;
  }

  if (env.ECOSYS_ROLE_PRECEDENCE) {
    result.rolePrecedence = env.ECOSYS_ROLE_PRECEDENCE.split(',')
      .map((role) => role.trim().toLowerCase())
      .filter((role) => role.length > 0);
  }

  if (env.ECOSYS_TEMPLATES_PATH) {
    result.templatesPath = path.resolve(cwd, env.ECOSYS_TEMPLATES_PATH);
  }

  if (env.ECOSYS_TRACE_WARN_ONLY) {
    result.warnOnly = parseBooleanEnv('ECOSYS_TRACE_WARN_ONLY', env.ECOSYS_TRACE_WARN_ONLY);
  }

  if (env.ECOSYS_LOG_LEVEL) {
    const level = env.ECOSYS_LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid ECOSYS_LOG_LEVEL: ${env.ECOSYS_LOG_LEVEL}. Valid values: ${LOG_LEVELS.join(', ')}`);
    }
    result.logLevel = level;
  }

  return result;
}

export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const configPath = findConfigFile(cwd);
  const raw: Record<string, unknown> = configPath ? readConfigFile(configPath) : {};

  // templatesPath in the file is relative to the file
  if (configPath && typeof raw.templatesPath === 'string') {
    raw.templatesPath = path.resolve(path.dirname(configPath), raw.templatesPath);
  }

  const merged = applyEnvOverrides(raw, env, cwd);
  const parsed = DevtoolsConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const source = configPath ?? 'environment';
    throw new ConfigError(`Invalid configuration (${source}): ${formatIssues(parsed.error)}`);
  }

  return { config: parsed.data, configPath };
}

export function effectiveLogLevel(config: DevtoolsConfig, verbose: boolean): LogLevel {
  return verbose ? 'debug' : config.logLevel;
}
