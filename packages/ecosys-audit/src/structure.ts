/**
 * Structural Auditor
 *
 * Read-only check of a repository tree against the golden template of its
 * role. Monorepo templates are expanded once per discovered service.
 * Only a missing required pattern makes a repository non-compliant.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  GoldenTemplate,
  RepositoryRef,
  RepositoryStructureResult,
  Severity,
  StructuralFinding,
  StructureVerdict
} from './types';
import { RunContext } from './context';
import { SERVICE_PLACEHOLDER } from './templates';
import { entryKind, listSubdirectories, wildcardToRegExp } from './files';

export interface ExpandedPattern {
  pattern: string;
  path: string;
  severity: Severity;
  service?: string;
}

/**
 * Service subdirectories for a monorepo template; empty for root-only.
 * Directories in excludeDirs (dependencies, build output) are never services.
 */
export async function discoverServices(
  repositoryPath: string,
  template: GoldenTemplate,
  excludeDirs: readonly string[] = []
): Promise<string[]> {
  if (template.layout !== 'monorepo' || !template.services) {
    return [];
  }
  const servicesRoot = path.join(repositoryPath, template.services.root);
  if ((await entryKind(servicesRoot)) !== 'directory') {
    return [];
  }
  const excluded = new Set([...template.services.exclude, ...excludeDirs]);
  return (await listSubdirectories(servicesRoot)).filter((name) => !excluded.has(name));
}

/**
 * Expand {service} patterns per service. With no services a placeholder
 * pattern is kept unexpanded so it reports as missing.
 */
export function expandTemplate(template: GoldenTemplate, services: readonly string[]): ExpandedPattern[] {
  const servicesRoot = template.services?.root ?? '.';
  const expanded: ExpandedPattern[] = [];

  for (const pattern of template.patterns) {
    if (!pattern.path.includes(SERVICE_PLACEHOLDER)) {
      expanded.push({ pattern: pattern.path, path: pattern.path, severity: pattern.severity });
      continue;
    }

    if (services.length === 0) {
      expanded.push({ pattern: pattern.path, path: pattern.path, severity: pattern.severity });
      continue;
    }

    for (const service of services) {
      const serviceDir = servicesRoot === '.' ? service : path.posix.join(servicesRoot, service);
      expanded.push({
        pattern: pattern.path,
        path: pattern.path.split(SERVICE_PLACEHOLDER).join(serviceDir),
        severity: pattern.severity,
        service
      });
    }
  }

  return expanded;
}

async function isPresent(repositoryPath: string, expanded: ExpandedPattern): Promise<boolean> {
  if (expanded.path.includes(SERVICE_PLACEHOLDER)) {
    return false;
  }
  const wantsDirectory = expanded.path.endsWith('/');
  const kind = await entryKind(path.join(repositoryPath, expanded.path.replace(/\/+$/, '')));
  if (kind === null) {
    return false;
  }
  return wantsDirectory ? kind === 'directory' : true;
}

async function findDeniedEntries(repositoryPath: string, template: GoldenTemplate): Promise<StructuralFinding[]> {
  if (template.denylist.length === 0) {
    return [];
  }
  const rules = template.denylist.map((entry) => ({ entry, regex: wildcardToRegExp(entry) }));
  const names = (await fs.readdir(repositoryPath)).sort();
  const findings: StructuralFinding[] = [];

  for (const name of names) {
    const rule = rules.find((candidate) => candidate.regex.test(name));
    if (rule) {
      findings.push({ pattern: rule.entry, path: name, severity: 'recommended', status: 'unexpected-extra' });
    }
  }
  return findings;
}

export function structureVerdict(findings: readonly StructuralFinding[]): Exclude<StructureVerdict, 'skipped'> {
  const requiredMissing = findings.some((f) => f.status === 'missing' && f.severity === 'required');
  return requiredMissing ? 'non-compliant' : 'compliant';
}

/**
 * Audit one repository. Unclassified repositories are skipped, not failed.
 */
export async function auditStructure(ref: RepositoryRef, ctx: RunContext): Promise<RepositoryStructureResult> {
  if (ref.classification.kind === 'unclassified') {
    return {
      repository: ref.name,
      verdict: 'skipped',
      services: [],
      findings: [],
      reason: ref.classification.error.message
    };
  }

  const role = ref.classification.role;
  const template = ctx.registry.get(role);
  const services = await discoverServices(ref.path, template, ctx.config.excludeDirs);

  ctx.logger.info(`[AUDIT] 🔍 Auditing ${ref.name} (${role}, ${template.layout})`);
  if (template.layout === 'monorepo') {
    ctx.logger.debug(`[AUDIT] ${ref.name}: services ${services.length > 0 ? services.join(', ') : '(none)'}`);
  }

  const findings: StructuralFinding[] = [];
  for (const expanded of expandTemplate(template, services)) {
    const present = await isPresent(ref.path, expanded);
    findings.push({
      pattern: expanded.pattern,
      path: expanded.path,
      severity: expanded.severity,
      status: present ? 'present' : 'missing',
      ...(expanded.service ? { service: expanded.service } : {})
    });
  }
  findings.push(...(await findDeniedEntries(ref.path, template)));

  const verdict = structureVerdict(findings);
  if (verdict === 'compliant') {
    ctx.logger.info(`[AUDIT] ✅ ${ref.name} complies with the ${role} template`);
  } else {
    ctx.logger.warn(`[AUDIT] ❌ ${ref.name}: drift detected`);
  }

  return { repository: ref.name, role, verdict, services, findings };
}
