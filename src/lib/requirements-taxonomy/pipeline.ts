/**
 * Requirements Taxonomy - Pipeline
 *
 * Pipeline:
 * 1. Loading: normalize raw requirement documents
 * 2. Classification: assign every requirement to a section and kind bucket
 * 3. Bibliography: number every distinct source path
 *
 * Invariant checked on every run:
 * - Total coverage: indexed entries == object entries received
 *
 * Debug info is returned only when enable_debug is set.
 */

import { loadRequirementDocuments } from './documents';
import { buildClassificationIndex, countIndexedRequirements } from './classificationIndex';
import { buildBibliography } from './bibliography';
import { createClassifierConfig } from './config';
import type {
  ClassificationDebugInfo,
  ClassificationResult,
  ClassifierConfig,
  RequirementDocumentInput,
  Taxonomy,
} from './types';

/**
 * Classify a set of requirement documents against a loaded taxonomy.
 *
 * @param inputs - Already-parsed documents, in any order
 * @param taxonomy - Result of loadTaxonomy()
 * @param config - Optional configuration overrides
 */
export function classifyRequirementDocuments(
  inputs: readonly RequirementDocumentInput[],
  taxonomy: Taxonomy,
  config?: Partial<ClassifierConfig>
): ClassificationResult {
  const finalConfig = createClassifierConfig(config);

  // ============================================
  // Stage 1: Loading
  // ============================================
  const documents = loadRequirementDocuments(inputs);

  const debug: ClassificationDebugInfo = {
    documents_count: documents.length,
    requirements_count: 0,
    skipped_requirements: 0,
    unmatched_requirements: 0,
    coerced_section_ids: 0,
    requirements_by_section: {},
    bibliography_size: 0,
    invariant_total_coverage_holds: true,
  };
  let received = 0;
  for (const doc of documents) {
    received += doc.receivedRequirements;
    debug.requirements_count += doc.requirements.length;
    debug.skipped_requirements += doc.skippedRequirements;
  }

  // ============================================
  // Stage 2: Classification
  // ============================================
  const index = buildClassificationIndex(documents, taxonomy, finalConfig, {
    onAssigned(entry, assignment) {
      if (assignment.unmatched) debug.unmatched_requirements++;
      if (assignment.coerced) {
        debug.coerced_section_ids++;
        if (finalConfig.enable_debug) {
          console.warn('[SECTION_ID_COERCED] Assigned section id replaced by the fallback:', {
            requirementId: entry.requirement.id,
            originDocumentKey: entry.originDocumentKey,
            sectionId: assignment.sectionId,
          });
        }
      }
    },
  });

  for (const [sectionId, byKind] of index) {
    let count = 0;
    for (const bucket of byKind.values()) count += bucket.length;
    debug.requirements_by_section[sectionId] = count;
  }

  const indexed = countIndexedRequirements(index);
  if (indexed !== received) {
    debug.invariant_total_coverage_holds = false;
    console.error('[COVERAGE_INVARIANT_VIOLATED] Indexed requirements differ from those received:', {
      indexed,
      received,
    });
  }

  // ============================================
  // Stage 3: Bibliography
  // ============================================
  const bibliography = buildBibliography(index);
  debug.bibliography_size = bibliography.paths.length;

  return {
    documents,
    index,
    bibliography,
    debug: finalConfig.enable_debug ? debug : undefined,
  };
}
