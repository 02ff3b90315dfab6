/**
 * Requirements Taxonomy - Section Assigner
 *
 * Walks the taxonomy in order and picks the section a requirement belongs to.
 * The result is always a valid section id: unmatched requirements go to the
 * policy's unassigned section, invalid ids are coerced to the taxonomy fallback.
 */

import { evaluateMatchList } from './matchExpression';
import type { Requirement, SectionAssignment, Taxonomy } from './types';

/**
 * Raw assignment, before coercion.
 *
 * With firstMatchWins the walk stops at the first matching section. Without
 * it every section is evaluated, but output is still the first match; the
 * full list is returned for inspection only.
 */
export function assignSectionId(
  requirement: Requirement,
  taxonomy: Taxonomy
): { sectionId: string; matchedSectionIds: string[] } {
  const matchedSectionIds: string[] = [];

  for (const section of taxonomy.sections) {
    if (!evaluateMatchList(requirement, section.match)) continue;

    matchedSectionIds.push(section.id);
    if (taxonomy.policy.firstMatchWins) break;
  }

  return {
    sectionId: matchedSectionIds[0] ?? taxonomy.policy.unassignedSectionId,
    matchedSectionIds,
  };
}

/**
 * Replace an id the taxonomy does not know with the fallback section id.
 */
export function coerceSectionId(sectionId: string, taxonomy: Taxonomy): string {
  return taxonomy.validSectionIds.has(sectionId) ? sectionId : taxonomy.fallbackSectionId;
}

/**
 * Assign and coerce in one step.
 */
export function classifyRequirement(requirement: Requirement, taxonomy: Taxonomy): SectionAssignment {
  const { sectionId: rawId, matchedSectionIds } = assignSectionId(requirement, taxonomy);
  const sectionId = coerceSectionId(rawId, taxonomy);

  return {
    sectionId,
    matchedSectionIds,
    unmatched: matchedSectionIds.length === 0,
    coerced: sectionId !== rawId,
  };
}
