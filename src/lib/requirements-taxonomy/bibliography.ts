/**
 * Requirements Taxonomy - Bibliography
 *
 * Two-phase build:
 * 1. Collect every distinct source path touched by a classified requirement
 *    (its origin document key plus its own references[].relativePath).
 * 2. Sort the set and number it 1..N.
 *
 * Numbers depend only on the set of paths, never on encounter order.
 */

import { compareCodeUnits, isMapping, isSequence, nonBlankString } from './semanticValue';
import type { BibliographyTable, ClassificationIndex, Requirement } from './types';

/**
 * Trimmed, non-blank `references[].relativePath` values of a requirement, in
 * order of first appearance.
 */
export function referencePathsOf(requirement: Requirement): string[] {
  const references = requirement.references;
  if (!isSequence(references)) return [];

  const paths: string[] = [];
  for (const reference of references) {
    if (!isMapping(reference)) continue;
    const path = nonBlankString(reference.relativePath);
    if (path && !paths.includes(path)) paths.push(path);
  }
  return paths;
}

/**
 * All citation paths of one requirement: its references, then its origin.
 */
export function citationPathsOf(requirement: Requirement, originDocumentKey: string | undefined): string[] {
  const paths = referencePathsOf(requirement);
  const origin = nonBlankString(originDocumentKey);
  if (origin && !paths.includes(origin)) paths.push(origin);
  return paths;
}

/**
 * Number a set of paths in sorted order.
 */
export function numberPaths(paths: Iterable<string>): BibliographyTable {
  const sorted = [...new Set(paths)].sort(compareCodeUnits);
  const numberByPath = new Map<string, number>();
  sorted.forEach((path, i) => numberByPath.set(path, i + 1));
  return { paths: sorted, numberByPath };
}

/**
 * Build the bibliography from a complete classification index.
 */
export function buildBibliography(index: ClassificationIndex): BibliographyTable {
  const collected = new Set<string>();

  for (const byKind of index.values()) {
    for (const bucket of byKind.values()) {
      for (const entry of bucket) {
        for (const path of citationPathsOf(entry.requirement, entry.originDocumentKey)) {
          collected.add(path);
        }
      }
    }
  }

  return numberPaths(collected);
}

/**
 * Ascending, de-duplicated citation numbers for a requirement.
 * Paths unknown to the table are ignored.
 */
export function citationNumbersFor(
  table: BibliographyTable,
  requirement: Requirement,
  originDocumentKey?: string
): number[] {
  const numbers = new Set<number>();
  for (const path of citationPathsOf(requirement, originDocumentKey)) {
    const n = table.numberByPath.get(path);
    if (n !== undefined) numbers.add(n);
  }
  return [...numbers].sort((a, b) => a - b);
}

/**
 * Inline markers such as `[1][3]`; empty string when there is nothing to cite.
 */
export function formatCitationMarkers(
  table: BibliographyTable,
  requirement: Requirement,
  originDocumentKey?: string
): string {
  return citationNumbersFor(table, requirement, originDocumentKey)
    .map((n) => `[${n}]`)
    .join('');
}
