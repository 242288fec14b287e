/**
 * Template Registry
 *
 * Role -> GoldenTemplate lookup. Templates are data (golden-templates.json
 * or a replacement file from configuration), validated once at load and
 * frozen for the rest of the process.
 */

import * as fs from 'fs';
import { z } from 'zod';
import builtinTemplates from './templates/golden-templates.json';
import { ROLES, GoldenTemplate, Role } from './types';
import { TemplateRegistryError } from './errors';
import { isRole } from './roles';

export const SERVICE_PLACEHOLDER = '{service}';

const TemplatePatternSchema = z.object({
  path: z.string().min(1),
  severity: z.enum(['required', 'recommended']),
  description: z.string().optional()
});

const TemplateEntrySchema = z
  .object({
    layout: z.enum(['monorepo', 'root-only']),
    services: z
      .object({
        root: z.string().min(1).default('.'),
        exclude: z.array(z.string()).default([])
      })
      .optional(),
    patterns: z.array(TemplatePatternSchema).min(1),
    denylist: z.array(z.string()).default([])
  })
  .superRefine((entry, ctx) => {
    const placeholderPatterns = entry.patterns.filter((p) => p.path.includes(SERVICE_PLACEHOLDER));
    if (entry.layout === 'root-only' && placeholderPatterns.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `root-only template cannot use ${SERVICE_PLACEHOLDER} (${placeholderPatterns[0].path})`
      });
    }
  });

const TemplateFileSchema = z.object({
  version: z.literal(1),
  templates: z.record(z.string(), TemplateEntrySchema)
});

export class TemplateRegistry {
  private readonly templates: ReadonlyMap<Role, GoldenTemplate>;
  readonly source: string;

  private constructor(templates: Map<Role, GoldenTemplate>, source: string) {
    this.templates = templates;
    this.source = source;
  }

  /**
   * Validate a template definition; every role must map to exactly one template
   */
  static fromDefinition(definition: unknown, source: string): TemplateRegistry {
    const parsed = TemplateFileSchema.safeParse(definition);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new TemplateRegistryError(`Invalid golden templates (${source}): ${details}`);
    }

    const templates = new Map<Role, GoldenTemplate>();
    for (const [key, entry] of Object.entries(parsed.data.templates)) {
      if (!isRole(key)) {
        throw new TemplateRegistryError(`Unknown role '${key}' in golden templates (${source})`);
      }
      const template: GoldenTemplate = {
        role: key,
        layout: entry.layout,
        services:
          entry.layout === 'monorepo'
            ? entry.services ?? { root: '.', exclude: [] }
            : undefined,
        patterns: entry.patterns,
        denylist: entry.denylist
      };
      templates.set(key, deepFreeze(template));
    }

    const missing = ROLES.filter((role) => !templates.has(role));
    if (missing.length > 0) {
      throw new TemplateRegistryError(`Golden templates (${source}) missing roles: ${missing.join(', ')}`);
    }

    return new TemplateRegistry(templates, source);
  }

  static builtin(): TemplateRegistry {
    return TemplateRegistry.fromDefinition(builtinTemplates, 'builtin');
  }

  static fromFile(templatesPath: string): TemplateRegistry {
    let definition: unknown;
    try {
      definition = JSON.parse(fs.readFileSync(templatesPath, 'utf-8'));
    } catch (error) {
      throw new TemplateRegistryError(
        `Cannot read golden templates ${templatesPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return TemplateRegistry.fromDefinition(definition, templatesPath);
  }

  static load(templatesPath?: string): TemplateRegistry {
    return templatesPath ? TemplateRegistry.fromFile(templatesPath) : TemplateRegistry.builtin();
  }

  get(role: Role): GoldenTemplate {
    const template = this.templates.get(role);
    if (!template) {
      // fromDefinition guarantees coverage; reaching here means ROLES changed
      throw new TemplateRegistryError(`No golden template for role '${role}'`);
    }
    return template;
  }

  roles(): Role[] {
    return ROLES.filter((role) => this.templates.has(role));
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
