/**
 * Requirements Taxonomy - Semantic Values
 *
 * Typed view of arbitrary parsed JSON. Requirement records and rule operands
 * are both expressed as SemanticValue; a missing field is the ABSENT symbol,
 * never `null` or `undefined`.
 */

import { z } from 'zod';

// ============================================
// Types
// ============================================

export type SemanticScalar = string | number | boolean | null;

export type SemanticValue = SemanticScalar | SemanticValue[] | SemanticMapping;

export interface SemanticMapping {
  [key: string]: SemanticValue;
}

export const ABSENT: unique symbol = Symbol('absent');

export type Absent = typeof ABSENT;

/** Result of a lookup that may not find anything */
export type Resolved = SemanticValue | Absent;

// ============================================
// Schema
// ============================================

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const semanticValueSchema: z.ZodType<SemanticValue> = z.lazy(() =>
  z.union([scalarSchema, z.array(semanticValueSchema), z.record(semanticValueSchema)])
);

// ============================================
// Normalization
// ============================================

/**
 * True for `{}` literals and `Object.create(null)`; false for arrays and
 * class instances such as Date.
 */
export function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return false;
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert arbitrary in-memory data to a SemanticValue.
 *
 * Returns undefined for anything JSON cannot carry: undefined, functions,
 * symbols, bigints, non-finite numbers and class instances. Such values are
 * dropped from the enclosing array or mapping, so they read as absent.
 */
export function toSemanticValue(raw: unknown): SemanticValue | undefined {
  if (raw === null || typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;

  if (Array.isArray(raw)) {
    const items: SemanticValue[] = [];
    for (const item of raw) {
      const value = toSemanticValue(item);
      if (value !== undefined) items.push(value);
    }
    return items;
  }

  return isPlainObject(raw) ? toSemanticMapping(raw) : undefined;
}

export function toSemanticMapping(raw: Record<string, unknown>): SemanticMapping {
  const mapping: SemanticMapping = {};
  for (const [key, value] of Object.entries(raw)) {
    const converted = toSemanticValue(value);
    if (converted !== undefined) mapping[key] = converted;
  }
  return mapping;
}

// ============================================
// Guards
// ============================================

export function isAbsent(value: Resolved): value is Absent {
  return value === ABSENT;
}

export function isMapping(value: Resolved | undefined): value is SemanticMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: Resolved | undefined): value is SemanticValue[] {
  return Array.isArray(value);
}

/**
 * Returns the trimmed string if the value is a non-blank string.
 */
export function nonBlankString(value: Resolved | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// ============================================
// Structural equality
// ============================================

/**
 * Deep structural equality. Mapping key order is irrelevant; sequence order is not.
 */
export function semanticEquals(a: SemanticValue, b: SemanticValue): boolean {
  if (a === b) return true;

  if (isSequence(a) || isSequence(b)) {
    if (!isSequence(a) || !isSequence(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => semanticEquals(item, b[i]));
  }

  if (isMapping(a) && isMapping(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && semanticEquals(a[key], b[key])
    );
  }

  return false;
}

/**
 * Compare two strings by UTF-16 code unit, independent of locale.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
