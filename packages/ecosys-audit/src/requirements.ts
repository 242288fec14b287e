/**
 * Requirement Extractor
 *
 * Scans the documentation corpus for requirement declarations of the form
 * REQ-<AREA>-<KIND>-<NNN>. A declaration is an identifier leading a line,
 * optionally after a heading marker, list bullet, table pipe or bold marker:
 *
 *   ## REQ-AGRO-FUNC-001: Crop registry
 *   - **REQ-AGRO-FUNC-002** - Harvest forecast
 *   | REQ-AGRO-PERF-001 | Forecast under 2s | High |
 *
 * The first declaration of an identifier wins; later ones are reported as
 * DUPLICATE_REQUIREMENT findings.
 */

import * as path from 'path';
import { DevtoolsConfig } from './config';
import { AuditReasonCode } from './reason-codes';
import { DuplicateRequirementFinding, FileWarning, Requirement, RequirementExtraction } from './types';
import { listFiles, readTextFile, splitLines } from './files';
import { Logger, silentLogger } from './logger';

export interface IdentifierGrammar {
  areaWidth: number;
  kindWidth: number;
  numberWidth: number;
}

export const DEFAULT_GRAMMAR: IdentifierGrammar = { areaWidth: 4, kindWidth: 4, numberWidth: 3 };

export interface ExtractorOptions {
  grammar: IdentifierGrammar;
  docPaths: readonly string[];
  testDirs: readonly string[];
  excludeDirs: readonly string[];
}

export function extractorOptions(config: DevtoolsConfig): ExtractorOptions {
  return {
    grammar: config.requirementId,
    docPaths: config.docPaths,
    testDirs: config.testDirs,
    excludeDirs: config.excludeDirs
  };
}

/**
 * Regex source (unanchored) for one identifier
 */
export function identifierSource(grammar: IdentifierGrammar): string {
  return `REQ-[A-Z]{${grammar.areaWidth}}-[A-Z]{${grammar.kindWidth}}-\\d{${grammar.numberWidth}}`;
}

export function isRequirementId(value: string, grammar: IdentifierGrammar = DEFAULT_GRAMMAR): boolean {
  return new RegExp(`^${identifierSource(grammar)}$`).test(value);
}

function declarationPattern(grammar: IdentifierGrammar): RegExp {
  return new RegExp(
    `^\\s*(#{1,6}\\s+|[-*+]\\s+|\\|\\s*)?(?:\\*\\*|__)?(${identifierSource(grammar)})(?![\\w-])(?:\\*\\*|__)?(.*)$`
  );
}

const MARKDOWN_EXTENSIONS = new Set(['.md', '.mdx']);
const REQUIREMENT_FILENAME = /^requirements.*\.mdx?$/i;

/**
 * Markdown under a documentation path, or any requirements*.md file
 */
export function isDocumentationFile(relativePath: string, docPaths: readonly string[]): boolean {
  if (!MARKDOWN_EXTENSIONS.has(path.posix.extname(relativePath).toLowerCase())) {
    return false;
  }
  if (REQUIREMENT_FILENAME.test(path.posix.basename(relativePath))) {
    return true;
  }
  return docPaths.some((docPath) => {
    const prefix = docPath.replace(/\/+$/, '');
    return relativePath.startsWith(`${prefix}/`);
  });
}

function describe(rest: string, tableRow: boolean): string {
  let text = rest;
  if (tableRow) {
    text = text.replace(/^\s*\|/, '');
    const end = text.indexOf('|');
    if (end >= 0) {
      text = text.slice(0, end);
    }
  }
  return text
    .replace(/^[\s:\-–—|]+/, '')
    .replace(/[\s*]+$/, '')
    .trim();
}

/**
 * Parse declarations from one document's text
 */
export function parseRequirementDeclarations(
  text: string,
  file: string,
  grammar: IdentifierGrammar = DEFAULT_GRAMMAR
): Requirement[] {
  const pattern = declarationPattern(grammar);
  const declarations: Requirement[] = [];

  splitLines(text).forEach((line, index) => {
    const match = pattern.exec(line);
    if (!match) {
      return;
    }
    const prefix = match[1] ?? '';
    declarations.push({
      id: match[2],
      file,
      line: index + 1,
      description: describe(match[3], prefix.trim().startsWith('|'))
    });
  });

  return declarations;
}

export async function extractRequirements(
  repositoryPath: string,
  options: ExtractorOptions,
  logger: Logger = silentLogger
): Promise<RequirementExtraction> {
  const files = (await listFiles(repositoryPath, options.excludeDirs)).filter((file) =>
    isDocumentationFile(file, options.docPaths)
  );

  const requirements: Requirement[] = [];
  const duplicates: DuplicateRequirementFinding[] = [];
  const warnings: FileWarning[] = [];
  const firstSeen = new Map<string, Requirement>();

  for (const file of files) {
    logger.debug(`[TRACE] Reading ${file}`);
    const read = await readTextFile(path.join(repositoryPath, file), file);
    if (!read.ok) {
      logger.warn(`[TRACE] ⚠️  Skipping ${file}: ${read.warning.message}`);
      warnings.push(read.warning);
      continue;
    }

    for (const declaration of parseRequirementDeclarations(read.text, file, options.grammar)) {
      const first = firstSeen.get(declaration.id);
      if (first) {
        duplicates.push({
          code: AuditReasonCode.DUPLICATE_REQUIREMENT,
          id: declaration.id,
          file: declaration.file,
          line: declaration.line,
          firstDeclared: { file: first.file, line: first.line }
        });
        continue;
      }
      firstSeen.set(declaration.id, declaration);
      requirements.push(declaration);
    }
  }

  logger.debug(`[TRACE] ${requirements.length} requirements in ${files.length} documents`);
  return { requirements, duplicates, warnings, filesScanned: files };
}
