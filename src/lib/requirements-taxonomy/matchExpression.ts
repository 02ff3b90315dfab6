/**
 * Requirements Taxonomy - Match Expressions
 *
 * Raw rule objects from the taxonomy are parsed once into a tagged tree:
 *
 *   { any: [...] }                  → combinator (OR)
 *   { all: [...] }                  → combinator (AND)
 *   { field, op, value }            → leaf comparison
 *   anything else                   → invalid node
 *
 * Parsing never throws. Invalid nodes, empty combinators and unknown
 * operators all evaluate to false.
 */

import { ABSENT, semanticValueSchema } from './semanticValue';
import type { Resolved, SemanticMapping } from './semanticValue';
import { resolvePath } from './pathResolver';
import { evaluateMatch, isMatchOperator } from './matchEvaluator';
import type { MatchOperator } from './matchEvaluator';

// ============================================
// Types
// ============================================

export type CombinatorKind = 'any' | 'all';

export interface CombinatorExpression {
  type: CombinatorKind;
  children: MatchExpression[];
}

export interface LeafExpression {
  type: 'leaf';
  field: string;
  op: MatchOperator;
  /** ABSENT when the rule has no `value` key */
  value: Resolved;
}

export interface InvalidExpression {
  type: 'invalid';
  reason: string;
}

export type MatchExpression = CombinatorExpression | LeafExpression | InvalidExpression;

// ============================================
// Parsing
// ============================================

const COMBINATOR_KEYS: readonly CombinatorKind[] = ['any', 'all'];
const LEAF_KEYS = ['field', 'op', 'value'] as const;

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function invalid(reason: string): InvalidExpression {
  return { type: 'invalid', reason };
}

/**
 * Parse a raw rule value into a MatchExpression tree.
 */
export function parseMatchExpression(raw: unknown): MatchExpression {
  if (!isRecord(raw)) return invalid('expression is not an object');

  const combinators = COMBINATOR_KEYS.filter((key) => key in raw);
  const hasLeafKeys = LEAF_KEYS.some((key) => key in raw);

  if (combinators.length > 1) return invalid('node declares both any and all');
  if (combinators.length === 1 && hasLeafKeys) {
    return invalid(`node mixes ${combinators[0]} with leaf fields`);
  }

  if (combinators.length === 1) {
    const kind = combinators[0];
    const body = raw[kind];
    if (!Array.isArray(body)) return invalid(`${kind} body is not a list`);
    return { type: kind, children: body.map(parseMatchExpression) };
  }

  const { field, op } = raw;
  if (typeof field !== 'string') return invalid('leaf is missing field');
  if (typeof op !== 'string') return invalid('leaf is missing op');
  if (!isMatchOperator(op)) return invalid(`unknown operator "${op}"`);

  let value: Resolved = ABSENT;
  if ('value' in raw) {
    const parsed = semanticValueSchema.safeParse(raw.value);
    if (!parsed.success) return invalid('leaf value is not JSON data');
    value = parsed.data;
  }

  return { type: 'leaf', field, op, value };
}

/**
 * Walk a parsed tree and list the reasons of every invalid node, with a
 * JSON-pointer-like location.
 */
export function collectExpressionIssues(expr: MatchExpression, location = ''): string[] {
  switch (expr.type) {
    case 'invalid':
      return [`${location || '/'}: ${expr.reason}`];
    case 'leaf':
      return [];
    case 'any':
    case 'all':
      return expr.children.flatMap((child, i) =>
        collectExpressionIssues(child, `${location}/${expr.type}/${i}`)
      );
  }
}

// ============================================
// Evaluation
// ============================================

/**
 * Evaluate a parsed expression against a requirement.
 *
 * Combinators with no children are false for both `any` and `all`.
 */
export function evaluateExpression(requirement: SemanticMapping, expr: MatchExpression): boolean {
  switch (expr.type) {
    case 'any':
      return expr.children.length > 0 && expr.children.some((child) => evaluateExpression(requirement, child));
    case 'all':
      return expr.children.length > 0 && expr.children.every((child) => evaluateExpression(requirement, child));
    case 'leaf':
      return evaluateMatch(resolvePath(requirement, expr.field), expr.op, expr.value);
    case 'invalid':
      return false;
  }
}

/**
 * OR across a section's match list. An empty list never matches.
 */
export function evaluateMatchList(requirement: SemanticMapping, rules: readonly MatchExpression[]): boolean {
  return rules.some((rule) => evaluateExpression(requirement, rule));
}
