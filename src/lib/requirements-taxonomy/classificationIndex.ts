/**
 * Requirements Taxonomy - Classification Index
 *
 * Groups every requirement of every document into section → kind buckets.
 * Buckets keep encounter order; presentation order is applied separately by
 * orderSectionEntries().
 */

import { compareCodeUnits, nonBlankString } from './semanticValue';
import { classifyRequirement } from './sectionAssigner';
import { createClassifierConfig } from './config';
import type {
  ClassificationIndex,
  ClassifiedEntry,
  ClassifierConfig,
  LoadedDocument,
  Requirement,
  SectionAssignment,
  Taxonomy,
} from './types';

/**
 * Kind tag for bucketing: trimmed `kind` when it is a non-blank string.
 */
export function deriveKindTag(requirement: Requirement, defaultKind = 'Other'): string {
  return nonBlankString(requirement.kind) ?? defaultKind;
}

/**
 * Stable sort key for a requirement: its `id` as text, empty when missing.
 */
export function requirementSortKey(requirement: Requirement): string {
  const id = requirement.id;
  if (id === undefined || id === null) return '';
  if (typeof id === 'object') return JSON.stringify(id);
  return String(id);
}

export interface IndexBuildObserver {
  onAssigned?(entry: ClassifiedEntry, assignment: SectionAssignment): void;
}

/**
 * Build the index in a single pass.
 *
 * Every valid section id is present in the result, in taxonomy order, even
 * when nothing was assigned to it.
 */
export function buildClassificationIndex(
  documents: readonly LoadedDocument[],
  taxonomy: Taxonomy,
  config?: Partial<ClassifierConfig>,
  observer?: IndexBuildObserver
): ClassificationIndex {
  const finalConfig = createClassifierConfig(config);
  const index = new Map<string, Map<string, ClassifiedEntry[]>>();
  for (const section of taxonomy.sections) {
    index.set(section.id, new Map());
  }

  for (const doc of documents) {
    for (const requirement of doc.requirements) {
      const assignment = classifyRequirement(requirement, taxonomy);
      const kind = deriveKindTag(requirement, finalConfig.default_kind);
      const entry: ClassifiedEntry = { requirement, originDocumentKey: doc.key };

      let byKind = index.get(assignment.sectionId);
      if (!byKind) {
        byKind = new Map();
        index.set(assignment.sectionId, byKind);
      }
      let bucket = byKind.get(kind);
      if (!bucket) {
        bucket = [];
        byKind.set(kind, bucket);
      }
      bucket.push(entry);

      observer?.onAssigned?.(entry, assignment);
    }
  }

  return index;
}

/**
 * All entries of a section across kinds, stable-sorted by requirement id.
 */
export function orderSectionEntries(index: ClassificationIndex, sectionId: string): ClassifiedEntry[] {
  const byKind = index.get(sectionId);
  if (!byKind) return [];

  const entries = [...byKind.values()].flat();
  return entries.sort((a, b) =>
    compareCodeUnits(requirementSortKey(a.requirement), requirementSortKey(b.requirement))
  );
}

/**
 * Number of entries across all buckets.
 */
export function countIndexedRequirements(index: ClassificationIndex): number {
  let total = 0;
  for (const byKind of index.values()) {
    for (const bucket of byKind.values()) {
      total += bucket.length;
    }
  }
  return total;
}
