/**
 * Verification Extractor
 * - Tag grammar and malformed tags
 * - Attachment to the next test, qualified by suite
 * - Dangling tags
 */

import { AuditReasonCode } from '../reason-codes';
import { extractVerifications, isTestFile, parseTags, parseVerificationTags } from '../verification';
import { extractorOptions } from '../requirements';
import { defaultConfig } from '../config';
import { makeTempDir, removeDir, writeTree } from './fixtures';

describe('Verification Extractor', () => {
  describe('isTestFile', () => {
    const testDirs = ['tests', 'test', '__tests__', 'spec'];

    it('should recognise test sources by name or directory', () => {
      expect(isTestFile('tests/test_x.py', testDirs)).toBe(true);
      expect(isTestFile('api/src/forecast_test.py', testDirs)).toBe(true);
      expect(isTestFile('src/auth.test.ts', testDirs)).toBe(true);
      expect(isTestFile('tests/helpers.ts', testDirs)).toBe(true);
    });

    it('should ignore application code and non-source files', () => {
      expect(isTestFile('src/app.py', testDirs)).toBe(false);
      expect(isTestFile('tests/data.json', testDirs)).toBe(false);
      expect(isTestFile('src/contest.ts', testDirs)).toBe(false);
    });
  });

  describe('parseTags', () => {
    it('should accept quoted and bare identifiers', () => {
      expect(parseTags('@pytest.mark.requirement("REQ-AGRO-FUNC-001", \'REQ-AGRO-FUNC-002\')')).toEqual([
        {
          ok: true,
          ids: ['REQ-AGRO-FUNC-001', 'REQ-AGRO-FUNC-002'],
          text: 'requirement("REQ-AGRO-FUNC-001", \'REQ-AGRO-FUNC-002\')'
        }
      ]);
      expect(parseTags('// requirement(REQ-CORE-FUNC-001)')).toEqual([
        { ok: true, ids: ['REQ-CORE-FUNC-001'], text: 'requirement(REQ-CORE-FUNC-001)' }
      ]);
    });

    it('should report malformed tags with a reason', () => {
      expect(parseTags('# requirement()')).toEqual([{ ok: false, reason: 'empty identifier list', text: 'requirement()' }]);
      expect(parseTags('# requirement(REQ-AGRO-FUNC-01)')).toEqual([
        { ok: false, reason: "invalid identifier 'REQ-AGRO-FUNC-01'", text: 'requirement(REQ-AGRO-FUNC-01)' }
      ]);
      expect(parseTags('# requirement(REQ-AGRO-FUNC-001')).toEqual([
        { ok: false, reason: 'unclosed tag', text: 'requirement(REQ-AGRO-FUNC-001' }
      ]);
    });

    it('should ignore calls whose name merely ends in requirement', () => {
      expect(parseTags('check_requirement(REQ-AGRO-FUNC-001)')).toEqual([]);
    });
  });

  describe('parseVerificationTags', () => {
    it('should attach python tags to the next test, qualified by class', () => {
      const source = [
        'import pytest',
        '',
        '@pytest.mark.requirement("REQ-AGRO-FUNC-001")',
        'def test_something():',
        '    assert True',
        '',
        '',
        'class TestForecast:',
        '    @pytest.mark.requirement("REQ-AGRO-FUNC-002", "REQ-AGRO-PERF-001")',
        '    def test_horizon(self):',
        '        pass'
      ].join('\n');

      const parsed = parseVerificationTags(source, 'tests/test_x.py');

      expect(parsed.links).toEqual([
        { test: 'tests/test_x.py::test_something', file: 'tests/test_x.py', line: 4, requirementIds: ['REQ-AGRO-FUNC-001'] },
        {
          test: 'tests/test_x.py::TestForecast::test_horizon',
          file: 'tests/test_x.py',
          line: 10,
          requirementIds: ['REQ-AGRO-FUNC-002', 'REQ-AGRO-PERF-001']
        }
      ]);
      expect(parsed.malformed).toEqual([]);
      expect(parsed.dangling).toEqual([]);
    });

    it('should attach comment tags to it/test calls inside nested describe blocks', () => {
      const source = [
        "describe('tokens', () => {",
        '  // requirement(REQ-CORE-FUNC-001)',
        "  it('issues a token', () => {});",
        '',
        "  describe('refresh', () => {",
        '    // requirement(REQ-CORE-FUNC-002)',
        "    test('rotates', () => {});",
        '  });',
        '});'
      ].join('\n');

      const parsed = parseVerificationTags(source, 'src/auth.test.ts');

      expect(parsed.links.map((link) => [link.test, link.requirementIds])).toEqual([
        ['src/auth.test.ts::tokens::issues a token', ['REQ-CORE-FUNC-001']],
        ['src/auth.test.ts::tokens::refresh::rotates', ['REQ-CORE-FUNC-002']]
      ]);
    });

    it('should exclude the test of a malformed tag and name it in the finding', () => {
      const source = ['# requirement(REQ-AGRO-FUNC-01)', 'def test_bad():', '    pass'].join('\n');

      const parsed = parseVerificationTags(source, 'tests/test_y.py');

      expect(parsed.links).toEqual([]);
      expect(parsed.malformed).toEqual([
        {
          code: AuditReasonCode.MALFORMED_TAG,
          file: 'tests/test_y.py',
          line: 1,
          tag: 'requirement(REQ-AGRO-FUNC-01)',
          reason: "invalid identifier 'REQ-AGRO-FUNC-01'",
          test: 'tests/test_y.py::test_bad'
        }
      ]);
    });

    it('should report tags followed by a helper or end of file as dangling', () => {
      const source = [
        '# requirement(REQ-AGRO-FUNC-003)',
        'def helper():',
        '    return 1',
        '',
        '# requirement(REQ-AGRO-FUNC-004)'
      ].join('\n');

      const parsed = parseVerificationTags(source, 'tests/test_z.py');

      expect(parsed.links).toEqual([]);
      expect(parsed.dangling).toEqual([
        { code: AuditReasonCode.DANGLING_TAG, file: 'tests/test_z.py', line: 1, requirementIds: ['REQ-AGRO-FUNC-003'] },
        { code: AuditReasonCode.DANGLING_TAG, file: 'tests/test_z.py', line: 5, requirementIds: ['REQ-AGRO-FUNC-004'] }
      ]);
    });
  });

  describe('extractVerifications', () => {
    let root: string;

    beforeEach(() => {
      root = makeTempDir();
    });

    afterEach(() => {
      removeDir(root);
    });

    it('should scan only test sources outside excluded directories', async () => {
      writeTree(root, {
        'tests/test_x.py': '@pytest.mark.requirement("REQ-AGRO-FUNC-001")\ndef test_something():\n    pass\n',
        'src/app.py': '# requirement(REQ-AGRO-FUNC-002)\ndef test_not_really():\n    pass\n',
        'node_modules/lib/tests/test_vendor.py': '# requirement(REQ-AGRO-FUNC-003)\ndef test_vendor():\n    pass\n'
      });

      const extraction = await extractVerifications(root, extractorOptions(defaultConfig()));

      expect(extraction.filesScanned).toEqual(['tests/test_x.py']);
      expect(extraction.links.map((link) => link.test)).toEqual(['tests/test_x.py::test_something']);
    });
  });
});
