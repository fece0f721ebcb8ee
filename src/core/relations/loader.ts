/**
 * Relation rule documents
 *
 * Rules are kept in YAML (see rules/default-relations.yaml) and validated
 * once when loaded.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { formatArktypeError, RuleValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { RelationRule } from '../types/relations.js';
import { type RelationRuleInput, RelationRuleDocumentSchema } from './schema.js';

const logger = getComponentLogger('relation-rules');

const DEFAULT_RULES_URL = new URL('../../../rules/default-relations.yaml', import.meta.url);

function normalizeRule(input: RelationRuleInput, index: number, source: string): RelationRule {
  const match = input.match ?? 'name';
  if (match !== 'name' && (input.namePath !== undefined || input.namespacePath !== undefined)) {
    throw new RuleValidationError(
      `Relation rule '${input.name}' in ${source} uses namePath or namespacePath with match '${match}'`,
      `rules.${index}.match`,
      ["Use match 'name', or drop namePath and namespacePath"]
    );
  }

  return Object.freeze({
    name: input.name,
    source: Object.freeze({ group: input.source.group ?? '', kind: input.source.kind }),
    target: Object.freeze({ group: input.target.group ?? '', kind: input.target.kind }),
    path: input.path,
    ...(input.namePath !== undefined && { namePath: input.namePath }),
    ...(input.namespacePath !== undefined && { namespacePath: input.namespacePath }),
    match,
    direction: input.direction ?? 'dependsOn',
  });
}

/**
 * Parse and validate a YAML (or JSON) relation rule document
 */
export function loadRelationRules(text: string, source = 'relation rules'): RelationRule[] {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleValidationError(`Failed to parse ${source}: ${reason}`, undefined, [
      'Check the document for YAML syntax errors',
    ]);
  }

  const result = RelationRuleDocumentSchema(document);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, source);
  }

  const rules = result.rules.map((rule, index) => normalizeRule(rule, index, source));

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.name)) {
      throw new RuleValidationError(
        `Duplicate relation rule name '${rule.name}' in ${source}`,
        'rules.name',
        ['Give every rule a unique name']
      );
    }
    seen.add(rule.name);
  }

  logger.debug('Loaded relation rules', { source, count: rules.length });
  return rules;
}

export function loadRelationRulesFile(path: string): RelationRule[] {
  return loadRelationRules(readFileSync(path, 'utf8'), path);
}

let defaultRules: readonly RelationRule[] | undefined;

/**
 * The built-in relation rules, read once per process
 */
export function loadDefaultRelationRules(): readonly RelationRule[] {
  if (!defaultRules) {
    defaultRules = Object.freeze(loadRelationRulesFile(fileURLToPath(DEFAULT_RULES_URL)));
  }
  return defaultRules;
}
