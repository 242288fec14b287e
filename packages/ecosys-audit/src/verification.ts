/**
 * Verification Extractor
 *
 * Finds requirement(<id>[, <id>...]) tags in test sources and attaches each
 * tag to the next test definition. Line-oriented: suites are tracked by
 * indentation, not by parsing the language.
 *
 *   @pytest.mark.requirement("REQ-AGRO-FUNC-001")
 *   def test_registers_crop(): ...
 *
 *   // requirement(REQ-CORE-FUNC-001, REQ-CORE-FUNC-002)
 *   it('issues a token', ...)
 */

import * as path from 'path';
import { AuditReasonCode } from './reason-codes';
import {
  DanglingTagFinding,
  MalformedTagFinding,
  VerificationExtraction,
  VerificationLink
} from './types';
import { listFiles, readTextFile, splitLines } from './files';
import { DEFAULT_GRAMMAR, ExtractorOptions, IdentifierGrammar, isRequirementId } from './requirements';
import { Logger, silentLogger } from './logger';

const TEST_EXTENSIONS = new Set(['.py', '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs']);
const TEST_FILENAMES = [/^test_.*\.py$/, /_test\.py$/, /\.(test|spec)\.[cm]?[jt]sx?$/];

const TAG_START = /(?<![\w$])requirement\(/g;

const PY_TEST = /^(\s*)(?:async\s+)?def\s+(test\w*)\s*\(/;
const PY_DEF = /^(\s*)(?:async\s+)?def\s+(\w+)/;
const PY_CLASS = /^(\s*)class\s+(\w+)/;
const JS_SUITE = /^(\s*)describe(?:\.\w+)?\s*\(\s*(['"`])(.+?)\2/;
const JS_TEST = /^(\s*)(?:it|test)(?:\.\w+)?\s*\(\s*(['"`])(.+?)\2/;

export function isTestFile(relativePath: string, testDirs: readonly string[]): boolean {
  if (!TEST_EXTENSIONS.has(path.posix.extname(relativePath).toLowerCase())) {
    return false;
  }
  const segments = relativePath.split('/');
  const basename = segments[segments.length - 1];
  if (TEST_FILENAMES.some((pattern) => pattern.test(basename))) {
    return true;
  }
  return segments.slice(0, -1).some((segment) => testDirs.includes(segment));
}

export type ParsedTag =
  | { ok: true; ids: string[]; text: string }
  | { ok: false; reason: string; text: string };

/**
 * All verification tags on one line
 */
export function parseTags(line: string, grammar: IdentifierGrammar = DEFAULT_GRAMMAR): ParsedTag[] {
  const tags: ParsedTag[] = [];
  TAG_START.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = TAG_START.exec(line)) !== null) {
    const open = match.index + match[0].length;
    const close = line.indexOf(')', open);
    if (close < 0) {
      tags.push({ ok: false, reason: 'unclosed tag', text: line.slice(match.index).trim() });
      break;
    }

    const text = line.slice(match.index, close + 1);
    const inner = line.slice(open, close);
    TAG_START.lastIndex = close + 1;

    if (inner.trim() === '') {
      tags.push({ ok: false, reason: 'empty identifier list', text });
      continue;
    }

    const ids: string[] = [];
    let invalid: string | undefined;
    for (const item of inner.split(',')) {
      const trimmed = item.trim();
      const unquoted = /^(['"`])(.*)\1$/.exec(trimmed)?.[2] ?? trimmed;
      if (!isRequirementId(unquoted, grammar)) {
        invalid = trimmed;
        break;
      }
      ids.push(unquoted);
    }

    if (invalid !== undefined) {
      tags.push({ ok: false, reason: `invalid identifier '${invalid}'`, text });
    } else {
      tags.push({ ok: true, ids, text });
    }
  }

  return tags;
}

interface PendingTags {
  line: number;
  ids: string[];
  malformed: MalformedTagFinding[];
}

export interface FileVerification {
  links: VerificationLink[];
  malformed: MalformedTagFinding[];
  dangling: DanglingTagFinding[];
}

/**
 * Extract verification links from one test source
 */
export function parseVerificationTags(
  text: string,
  file: string,
  grammar: IdentifierGrammar = DEFAULT_GRAMMAR
): FileVerification {
  const python = file.endsWith('.py');
  const result: FileVerification = { links: [], malformed: [], dangling: [] };
  const suites: Array<{ indent: number; name: string }> = [];
  let pending: PendingTags | null = null;

  const popTo = (indent: number) => {
    while (suites.length > 0 && suites[suites.length - 1].indent >= indent) {
      suites.pop();
    }
  };

  const dropPending = () => {
    if (!pending) return;
    result.malformed.push(...pending.malformed);
    if (pending.ids.length > 0) {
      result.dangling.push({
        code: AuditReasonCode.DANGLING_TAG,
        file,
        line: pending.line,
        requirementIds: [...new Set(pending.ids)]
      });
    }
    pending = null;
  };

  const attach = (testName: string, line: number) => {
    if (!pending) return;
    const qualified = [file, ...suites.map((suite) => suite.name), testName].join('::');
    if (pending.malformed.length > 0) {
      result.malformed.push(...pending.malformed.map((finding) => ({ ...finding, test: qualified })));
    } else {
      result.links.push({ test: qualified, file, line, requirementIds: [...new Set(pending.ids)] });
    }
    pending = null;
  };

  splitLines(text).forEach((line, index) => {
    const lineNumber = index + 1;

    for (const tag of parseTags(line, grammar)) {
      pending ??= { line: lineNumber, ids: [], malformed: [] };
      if (tag.ok) {
        pending.ids.push(...tag.ids);
      } else {
        pending.malformed.push({
          code: AuditReasonCode.MALFORMED_TAG,
          file,
          line: lineNumber,
          tag: tag.text,
          reason: tag.reason
        });
      }
    }

    if (python) {
      const test = PY_TEST.exec(line);
      if (test) {
        popTo(test[1].length);
        attach(test[2], lineNumber);
        return;
      }
      const suite = PY_CLASS.exec(line);
      if (suite) {
        dropPending();
        popTo(suite[1].length);
        suites.push({ indent: suite[1].length, name: suite[2] });
        return;
      }
      const def = PY_DEF.exec(line);
      if (def) {
        dropPending();
        popTo(def[1].length);
      }
      return;
    }

    const test = JS_TEST.exec(line);
    if (test) {
      popTo(test[1].length);
      attach(test[3], lineNumber);
      return;
    }
    const suite = JS_SUITE.exec(line);
    if (suite) {
      dropPending();
      popTo(suite[1].length);
      suites.push({ indent: suite[1].length, name: suite[3] });
    }
  });

  dropPending();
  return result;
}

export async function extractVerifications(
  repositoryPath: string,
  options: ExtractorOptions,
  logger: Logger = silentLogger
): Promise<VerificationExtraction> {
  const files = (await listFiles(repositoryPath, options.excludeDirs)).filter((file) =>
    isTestFile(file, options.testDirs)
  );

  const extraction: VerificationExtraction = {
    links: [],
    malformed: [],
    dangling: [],
    warnings: [],
    filesScanned: files
  };

  for (const file of files) {
    const read = await readTextFile(path.join(repositoryPath, file), file);
    if (!read.ok) {
      logger.warn(`[TRACE] ⚠️  Skipping ${file}: ${read.warning.message}`);
      extraction.warnings.push(read.warning);
      continue;
    }

    const parsed = parseVerificationTags(read.text, file, options.grammar);
    extraction.links.push(...parsed.links);
    extraction.malformed.push(...parsed.malformed);
    extraction.dangling.push(...parsed.dangling);
  }

  logger.debug(`[TRACE] ${extraction.links.length} tagged tests in ${files.length} test files`);
  return extraction;
}
