/**
 * Devtools Configuration
 */

import * as path from 'path';
import { CONFIG_FILENAME, effectiveLogLevel, loadConfig } from '../config';
import { ConfigError } from '../errors';
import { AuditReasonCode } from '../reason-codes';
import { makeTempDir, removeDir, writeTree } from './fixtures';

describe('Devtools Configuration', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('should apply defaults without a file or environment', () => {
    const { config, configPath } = loadConfig(root, {});

    expect(configPath).toBeUndefined();
    expect(config.reposDir).toBe('repos');
    expect(config.concurrency).toBe(4);
    expect(config.rolePrecedence).toEqual(['worker', 'sector', 'enabler', 'core', 'tooling', 'governance', 'meta']);
    expect(config.requirementId).toEqual({ areaWidth: 4, kindWidth: 4, numberWidth: 3 });
    expect(config.warnOnly).toBe(false);
  });

  it('should read the nearest config file from an ancestor', () => {
    writeTree(root, {
      [CONFIG_FILENAME]: JSON.stringify({ reposDir: 'checkouts', templatesPath: 'templates/custom.json' }),
      'nested/deeper/': ''
    });

    const { config, configPath } = loadConfig(path.join(root, 'nested', 'deeper'), {});

    expect(configPath).toBe(path.join(root, CONFIG_FILENAME));
    expect(config.reposDir).toBe('checkouts');
    expect(config.templatesPath).toBe(path.join(root, 'templates', 'custom.json'));
  });

  it('should let the environment override the file', () => {
    writeTree(root, { [CONFIG_FILENAME]: JSON.stringify({ concurrency: 2, warnOnly: false }) });

    const { config } = loadConfig(root, {
      ECOSYS_CONCURRENCY: '8',
      ECOSYS_ROLE_PRECEDENCE: 'Core, worker',
      ECOSYS_TRACE_WARN_ONLY: '1',
      ECOSYS_ORG: 'acme',
      ECOSYS_LOG_LEVEL: 'DEBUG'
    });

    expect(config.concurrency).toBe(8);
    expect(config.rolePrecedence).toEqual(['core', 'worker']);
    expect(config.warnOnly).toBe(true);
    expect(config.org).toBe('acme');
    expect(config.logLevel).toBe('debug');
  });

  it('should fail closed on invalid values', () => {
    expect(() => loadConfig(root, { ECOSYS_CONCURRENCY: 'many' })).toThrow(
      'Invalid ECOSYS_CONCURRENCY: many. Expected an integer'
    );
    expect(() => loadConfig(root, { ECOSYS_ROLE_PRECEDENCE: 'core,core' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { ECOSYS_ROLE_PRECEDENCE: 'core,platform' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { ECOSYS_TRACE_WARN_ONLY: 'maybe' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { ECOSYS_LOG_LEVEL: 'loud' })).toThrow(
      'Invalid ECOSYS_LOG_LEVEL: loud. Valid values: debug, info, warn, error, silent'
    );
  });

  it('should reject unknown keys and malformed files with CONFIG_INVALID', () => {
    writeTree(root, { [CONFIG_FILENAME]: JSON.stringify({ repoDir: 'typo' }) });

    let caught: unknown;
    try {
      loadConfig(root, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.code : undefined).toBe(AuditReasonCode.CONFIG_INVALID);

    writeTree(root, { [CONFIG_FILENAME]: '[1, 2]' });
    expect(() => loadConfig(root, {})).toThrow(`${path.join(root, CONFIG_FILENAME)} must contain a JSON object`);
  });

  it('should force debug logging with --verbose', () => {
    const { config } = loadConfig(root, {});
    expect(effectiveLogLevel(config, true)).toBe('debug');
    expect(effectiveLogLevel(config, false)).toBe('info');
  });
});
