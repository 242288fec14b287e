/**
 * Traceability Builder
 */

import { AuditReasonCode } from '../reason-codes';
import { RepositoryTraceabilityResult, RequirementExtraction, VerificationExtraction } from '../types';
import { buildRollup, buildTraceability, coveragePercent, traceRepository } from '../traceability';
import { RunContext } from '../context';
import { classifiedRef, makeTempDir, removeDir, writeTree } from './fixtures';

function requirementsOf(...ids: string[]): RequirementExtraction {
  return {
    requirements: ids.map((id, index) => ({ id, file: 'docs/requirements.md', line: index + 1, description: id })),
    duplicates: [],
    warnings: [],
    filesScanned: ['docs/requirements.md']
  };
}

function verificationsOf(...links: Array<[string, string[]]>): VerificationExtraction {
  return {
    links: links.map(([test, requirementIds], index) => ({ test, file: 'tests/test_x.py', line: index + 1, requirementIds })),
    malformed: [],
    dangling: [],
    warnings: [],
    filesScanned: ['tests/test_x.py']
  };
}

function repositoryWith(name: string, total: number, covered: number): RepositoryTraceabilityResult {
  const ids = Array.from({ length: total }, (_, i) => `REQ-CORE-FUNC-00${i + 1}`);
  const links: Array<[string, string[]]> = ids.slice(0, covered).map((id) => [`tests/test_${name}.py::test_${id}`, [id]]);
  return buildTraceability(name, requirementsOf(...ids), verificationsOf(...links));
}

describe('Traceability Builder', () => {
  it('should count distinct tests per requirement', () => {
    const result = buildTraceability(
      'agro',
      requirementsOf('REQ-AGRO-FUNC-001', 'REQ-AGRO-FUNC-002'),
      verificationsOf(
        ['tests/test_x.py::test_a', ['REQ-AGRO-FUNC-001']],
        ['tests/test_x.py::test_b', ['REQ-AGRO-FUNC-001', 'REQ-AGRO-FUNC-001']]
      )
    );

    expect(result.rows.map((row) => [row.requirement.id, row.count, row.covered])).toEqual([
      ['REQ-AGRO-FUNC-001', 2, true],
      ['REQ-AGRO-FUNC-002', 0, false]
    ]);
    expect(result.total_requirements).toBe(2);
    expect(result.covered_requirements).toBe(1);
    expect(result.coverage_percent).toBe(50);
  });

  it('should turn each undeclared identifier into one orphan finding and never a row', () => {
    const result = buildTraceability(
      'agro',
      requirementsOf('REQ-AGRO-FUNC-001'),
      verificationsOf(
        ['tests/test_x.py::test_a', ['REQ-AGRO-FUNC-999']],
        ['tests/test_x.py::test_b', ['REQ-AGRO-FUNC-999']]
      )
    );

    expect(result.findings).toEqual([
      {
        code: AuditReasonCode.ORPHAN_VERIFICATION,
        id: 'REQ-AGRO-FUNC-999',
        tests: ['tests/test_x.py::test_a', 'tests/test_x.py::test_b']
      }
    ]);
    expect(result.rows.map((row) => row.requirement.id)).toEqual(['REQ-AGRO-FUNC-001']);
  });

  it('should report zero coverage when nothing is declared', () => {
    expect(coveragePercent(0, 0)).toBe(0);
    expect(buildTraceability('empty', requirementsOf(), verificationsOf()).coverage_percent).toBe(0);
  });

  it('should roll up (3 requirements, 2 covered) and (1, 1) to 75%', () => {
    const rollup = buildRollup([repositoryWith('alpha', 3, 2), repositoryWith('beta', 1, 1)]);

    expect(rollup.total_requirements).toBe(4);
    expect(rollup.covered_requirements).toBe(3);
    expect(rollup.coverage_percent).toBe(75);
    expect(rollup.rows.map((row) => row.repository)).toEqual(['alpha', 'alpha', 'alpha', 'beta']);
  });

  describe('traceRepository', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir();
    });

    afterEach(() => {
      removeDir(root);
    });

    it('should link a documented requirement to the test that tags it', async () => {
      writeTree(root, {
        'website/docs/requirements/functional.md': '# Functional\n\n## REQ-AGRO-FUNC-001: Crop registry\n',
        'tests/test_x.py': [
          'import pytest',
          '',
          '@pytest.mark.requirement("REQ-AGRO-FUNC-001")',
          'def test_something():',
          '    assert True',
          '',
          '@pytest.mark.requirement("REQ-AGRO-FUNC-999")',
          'def test_orphan():',
          '    assert True',
          ''
        ].join('\n')
      });

      const result = await traceRepository(classifiedRef('agro', root, 'sector'), new RunContext({ cwd: root }));

      expect(result.rows).toEqual([
        {
          requirement: {
            id: 'REQ-AGRO-FUNC-001',
            file: 'website/docs/requirements/functional.md',
            line: 3,
            description: 'Crop registry'
          },
          count: 1,
          tests: ['tests/test_x.py::test_something'],
          covered: true
        }
      ]);
      expect(result.findings).toEqual([
        { code: AuditReasonCode.ORPHAN_VERIFICATION, id: 'REQ-AGRO-FUNC-999', tests: ['tests/test_x.py::test_orphan'] }
      ]);
      expect(result.coverage_percent).toBe(100);
    });
  });
});
