/**
 * Audit Runner
 * - Bounded pool keeps order
 * - Per-repository failures are isolated
 * - Exit codes
 */

import * as fs from 'fs';
import * as path from 'path';
import { RunContext } from '../context';
import { defaultConfig } from '../config';
import {
  EXIT_FAILURE,
  EXIT_INPUT_ERROR,
  EXIT_OK,
  mapWithConcurrency,
  runStructureAudit,
  runTraceabilityAudit,
  structureExitCode,
  traceabilityExitCode
} from '../runner';
import { REPOSITORY_MANIFEST } from '../metadata';
import { AuditReasonCode } from '../reason-codes';
import { makeTempDir, removeDir, writeTree } from './fixtures';

const toolingRepo = (name: string) => ({
  [`repos/${name}/${REPOSITORY_MANIFEST}`]: JSON.stringify({ topics: ['tooling'] }),
  [`repos/${name}/README.md`]: `# ${name}\n`,
  [`repos/${name}/src/`]: '',
  [`repos/${name}/tests/`]: '',
  [`repos/${name}/.github/workflows/ci.yml`]: 'name: ci\n'
});

describe('Audit Runner', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('should keep input order and respect the limit in mapWithConcurrency', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('should handle an empty list in mapWithConcurrency', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should isolate a failing repository in the structure audit', async () => {
    writeTree(root, {
      ...toolingRepo('alpha'),
      ...toolingRepo('beta'),
      ...toolingRepo('delta'),
      'repos/gamma/.git/': ''
    });
    fs.rmSync(path.join(root, 'repos/beta/src'), { recursive: true });
    // README.md pointing at itself makes stat fail with ELOOP
    fs.rmSync(path.join(root, 'repos/delta/README.md'));
    fs.symlinkSync('README.md', path.join(root, 'repos/delta/README.md'));

    const report = await runStructureAudit(new RunContext({ cwd: root }));

    expect(report.scope).toBe('workspace');
    expect(report.repositories.map((section) => [section.repository, section.status])).toEqual([
      ['alpha', 'ok'],
      ['beta', 'ok'],
      ['delta', 'failed'],
      ['gamma', 'ok']
    ]);
    expect(report.summary).toEqual({ total: 4, compliant: 1, non_compliant: 1, skipped: 1, failed: 1 });

    const delta = report.repositories[2];
    expect(delta.status === 'failed' ? delta.error : '').toMatch(/ELOOP/);
    expect(delta.status === 'failed' ? delta.code : '').toBe(AuditReasonCode.REPOSITORY_FAILED);
    expect(structureExitCode(report)).toBe(EXIT_FAILURE);
  });

  it('should exit 0 for a structure audit of compliant repositories', async () => {
    writeTree(root, toolingRepo('alpha'));

    const report = await runStructureAudit(new RunContext({ cwd: root }), ['alpha']);

    expect(report.summary.compliant).toBe(1);
    expect(structureExitCode(report)).toBe(EXIT_OK);
  });

  it('should exit 2 on an unresolvable name while still auditing the others', async () => {
    writeTree(root, toolingRepo('alpha'));

    const report = await runStructureAudit(new RunContext({ cwd: root }), ['alpha', 'missing']);

    expect(report.summary.total).toBe(1);
    expect(report.input_errors.map((error) => error.name)).toEqual(['missing']);
    expect(structureExitCode(report)).toBe(EXIT_INPUT_ERROR);
  });

  describe('traceability', () => {
    beforeEach(() => {
      writeTree(root, {
        'repos/alpha/.git/': '',
        'repos/alpha/docs/requirements.md': [
          '## REQ-CORE-FUNC-001: Login',
          '## REQ-CORE-FUNC-002: Logout',
          '## REQ-CORE-FUNC-003: Refresh'
        ].join('\n'),
        'repos/alpha/tests/test_auth.py': [
          '@pytest.mark.requirement("REQ-CORE-FUNC-001")',
          'def test_login():',
          '    pass',
          '@pytest.mark.requirement("REQ-CORE-FUNC-002")',
          'def test_logout():',
          '    pass'
        ].join('\n'),
        'repos/beta/.git/': '',
        'repos/beta/docs/requirements.md': '## REQ-AGRO-FUNC-001: Crop registry\n',
        'repos/beta/tests/test_crops.py': '# requirement(REQ-AGRO-FUNC-001)\ndef test_register():\n    pass\n'
      });
    });

    it('should add an ecosystem rollup in workspace scope', async () => {
      const report = await runTraceabilityAudit(new RunContext({ cwd: root }));

      expect(report.rollup?.total_requirements).toBe(4);
      expect(report.rollup?.covered_requirements).toBe(3);
      expect(report.rollup?.coverage_percent).toBe(75);
      expect(traceabilityExitCode(report, false)).toBe(EXIT_FAILURE);
      expect(traceabilityExitCode(report, true)).toBe(EXIT_OK);
    });

    it('should still trace a repository whose manifest is unparseable', async () => {
      writeTree(root, { 'repos/beta/ecosys.repo.json': '{ not json' });

      const report = await runTraceabilityAudit(new RunContext({ cwd: root }));

      expect(report.input_errors).toEqual([]);
      expect(report.repositories.map((section) => section.repository)).toEqual(['alpha', 'beta']);
      expect(report.rollup?.total_requirements).toBe(4);
      expect(report.rollup?.covered_requirements).toBe(3);
      expect(traceabilityExitCode(report, false)).toBe(EXIT_FAILURE);
      expect(traceabilityExitCode(report, true)).toBe(EXIT_OK);
    });

    it('should add no rollup in named scope', async () => {
      const report = await runTraceabilityAudit(new RunContext({ cwd: root }), ['beta']);

      expect(report.scope).toBe('named');
      expect(report.rollup).toBeUndefined();
      expect(traceabilityExitCode(report, false)).toBe(EXIT_OK);
    });

    it('should produce the same report with a concurrency of one', async () => {
      const serial = await runTraceabilityAudit(new RunContext({ cwd: root, config: { ...defaultConfig(), concurrency: 1 } }));
      const parallel = await runTraceabilityAudit(new RunContext({ cwd: root }));

      expect(serial.repositories).toEqual(parallel.repositories);
    });
  });
});
