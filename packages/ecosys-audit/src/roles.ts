/**
 * Role Classifier
 *
 * Maps a repository's declared topic tags onto one architectural role.
 * When several role topics are present the first role in the precedence
 * list wins; precedence and topic aliases come from configuration.
 */

import { ROLES, Role, RoleClassification } from './types';
import { UnknownRoleError } from './errors';

export const DEFAULT_ROLE_PRECEDENCE: readonly Role[] = [
  'worker',
  'sector',
  'enabler',
  'core',
  'tooling',
  'governance',
  'meta'
];

/** Topics used across the organisation that name a role indirectly */
export const DEFAULT_TOPIC_ALIASES: Readonly<Record<string, Role>> = {
  ecosystem: 'core',
  product: 'sector',
  devtools: 'tooling'
};

export interface ClassifierOptions {
  precedence: readonly Role[];
  aliases: Readonly<Record<string, Role>>;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  precedence: DEFAULT_ROLE_PRECEDENCE,
  aliases: DEFAULT_TOPIC_ALIASES
};

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

/**
 * Roles indicated by a topic list (direct names and aliases)
 */
export function rolesFromTopics(topics: readonly string[], aliases: Readonly<Record<string, Role>>): Set<Role> {
  const roles = new Set<Role>();
  for (const raw of topics) {
    const topic = raw.trim().toLowerCase();
    if (isRole(topic)) {
      roles.add(topic);
    } else if (Object.prototype.hasOwnProperty.call(aliases, topic)) {
      roles.add(aliases[topic]);
    }
  }
  return roles;
}

export function classifyRole(
  repository: string,
  topics: readonly string[],
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS
): RoleClassification {
  const indicated = rolesFromTopics(topics, options.aliases);

  for (const role of options.precedence) {
    if (indicated.has(role)) {
      return { kind: 'classified', role };
    }
  }

  // A role topic outside the configured precedence list still classifies
  for (const role of ROLES) {
    if (indicated.has(role)) {
      return { kind: 'classified', role };
    }
  }

  return { kind: 'unclassified', error: new UnknownRoleError(repository, topics) };
}
