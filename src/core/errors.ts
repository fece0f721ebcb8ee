/**
 * Error types for lineage resolution and rendering
 *
 * Hard failures are thrown (or returned alongside partial results) as
 * LineageError subclasses. Problems local to a single object or edge are
 * recorded as LineageDiagnostic values instead.
 */

import type { type } from 'arktype';

export class LineageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LineageError';
  }
}

/**
 * A field-path template that cannot be parsed
 */
export class PathExpressionError extends LineageError {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly position?: number
  ) {
    super(message, 'PATH_EXPRESSION_ERROR', { expression, position });
    this.name = 'PathExpressionError';
  }
}

export class RuleValidationError extends LineageError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'RULE_VALIDATION_ERROR', { field, suggestions });
    this.name = 'RuleValidationError';
  }
}

/**
 * A UID that the NodeMap was expected to hold but does not
 */
export class NodeMapReferenceError extends LineageError {
  constructor(
    message: string,
    public readonly uid: string,
    public readonly referencedBy?: string
  ) {
    super(message, 'NODE_MAP_REFERENCE', { uid, referencedBy });
    this.name = 'NodeMapReferenceError';
  }
}

export class RenderDepthExceededError extends LineageError {
  constructor(
    public readonly maxDepth: number,
    public readonly uid: string
  ) {
    super(
      `Lineage depth exceeded the limit of ${maxDepth} at object '${uid}'`,
      'RENDER_DEPTH_EXCEEDED',
      { maxDepth, uid }
    );
    this.name = 'RenderDepthExceededError';
  }
}

export class ObjectSourceError extends LineageError {
  constructor(
    message: string,
    public readonly failures: { apiVersion: string; kind: string; message: string }[]
  ) {
    super(message, 'OBJECT_SOURCE_ERROR', { failures });
    this.name = 'ObjectSourceError';
  }
}

export type DiagnosticCode =
  | 'UNRESOLVED_OWNER'
  | 'MALFORMED_RULE'
  | 'CYCLE_DROPPED'
  | 'MISSING_UID'
  | 'DANGLING_EDGE';

/**
 * A non-fatal problem met while resolving or assembling the lineage graph
 */
export interface LineageDiagnostic {
  code: DiagnosticCode;
  message: string;
  context?: Record<string, unknown>;
}

export function diagnostic(
  code: DiagnosticCode,
  message: string,
  context?: Record<string, unknown>
): LineageDiagnostic {
  return context ? { code, message, context } : { code, message };
}

/**
 * Format arktype validation errors for a relation rule document
 */
export function formatArktypeError(
  errors: InstanceType<typeof type.errors>,
  source: string
): RuleValidationError {
  const problems = [...errors];
  const first = problems[0];

  if (!first) {
    return new RuleValidationError(`Invalid relation rules in ${source}: ${errors.summary}`, undefined, [
      'Check the rule document against the relation rule schema',
    ]);
  }

  const fieldPath = first.path.length > 0 ? first.path.map(String).join('.') : 'root';
  let message = `Invalid relation rules in ${source} at field '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  const code: string = first.code;
  if (code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}'`);
  } else if (code === 'unit' || code === 'union') {
    suggestions.push(`Use one of the allowed values for '${fieldPath}'`);
  }

  if (problems.length > 1) {
    message += '\n\nAdditional validation errors:';
    problems.slice(1).forEach((problem, index) => {
      const path = problem.path.length > 0 ? problem.path.map(String).join('.') : 'root';
      message += `\n  ${index + 2}. ${path}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${problems.length} validation errors listed above`);
  }

  return new RuleValidationError(message, fieldPath, suggestions);
}
