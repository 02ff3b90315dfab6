/**
 * Requirements Taxonomy - Match Evaluator
 *
 * Single typed comparison between a resolved field value and the rule's
 * expected value. Unknown operators never match.
 */

import { isAbsent, isSequence, semanticEquals } from './semanticValue';
import type { Resolved, SemanticValue } from './semanticValue';

export const MATCH_OPERATORS = ['exists', 'eq', 'in', 'contains', 'containsText'] as const;

export type MatchOperator = (typeof MATCH_OPERATORS)[number];

export function isMatchOperator(op: unknown): op is MatchOperator {
  return typeof op === 'string' && MATCH_OPERATORS.some((known) => known === op);
}

/**
 * Evaluate `value <op> expected`.
 *
 * `expected` is ABSENT when the rule carries no `value` at all.
 */
export function evaluateMatch(value: Resolved, op: string, expected: Resolved): boolean {
  if (!isMatchOperator(op)) return false;

  switch (op) {
    case 'exists':
      return matchExists(value, expected);
    case 'eq':
      return !isAbsent(value) && !isAbsent(expected) && semanticEquals(value, expected);
    case 'in':
      return !isAbsent(value) && isSequence(expected) && includesValue(expected, value);
    case 'contains':
      return matchContains(value, expected);
    case 'containsText':
      return matchContainsText(value, expected);
  }
}

function matchExists(value: Resolved, expected: Resolved): boolean {
  const present = !isAbsent(value);
  return typeof expected === 'boolean' ? present === expected : present;
}

function includesValue(items: SemanticValue[], needle: SemanticValue): boolean {
  return items.some((item) => semanticEquals(item, needle));
}

function matchContains(value: Resolved, expected: Resolved): boolean {
  if (isAbsent(expected)) return false;
  if (isSequence(value)) return includesValue(value, expected);
  if (typeof value === 'string' && typeof expected === 'string') {
    return value.includes(expected);
  }
  return false;
}

function matchContainsText(value: Resolved, expected: Resolved): boolean {
  if (typeof expected !== 'string') return false;
  const needle = expected.toLowerCase();

  if (typeof value === 'string') return value.toLowerCase().includes(needle);
  if (isSequence(value)) {
    return value.some((item) => typeof item === 'string' && item.toLowerCase().includes(needle));
  }
  return false;
}
