/**
 * Requirements Taxonomy - Domain Types
 *
 * Deterministic classification of requirement records into taxonomy
 * sections, plus a stably numbered bibliography of their sources.
 */

import type { SemanticMapping } from './semanticValue';
import type { MatchExpression } from './matchExpression';

// ============================================
// External Input Types
// ============================================

/**
 * A single requirement record. Opaque nested JSON; the engine never mutates it.
 */
export type Requirement = SemanticMapping;

/**
 * One already-parsed requirements document as handed over by the caller
 */
export interface RequirementDocumentInput {
  /** File identifier, used as origin key when the document has no relative path */
  fileName: string;
  data: unknown;
}

// ============================================
// Taxonomy
// ============================================

export interface RenderingHints {
  includeReferences: boolean;
  includeQuotes: boolean;
}

export interface SectionDefinition {
  id: string;
  number?: string;
  title?: string;
  purpose?: string;
  /** OR-ed list of parsed rules */
  match: MatchExpression[];
  renderingHints: RenderingHints;
}

export interface AssignmentPolicy {
  firstMatchWins: boolean;
  unassignedSectionId: string;
}

/**
 * Validated, immutable taxonomy shared by every classification call of a run
 */
export interface Taxonomy {
  /** Sections in priority order */
  sections: readonly SectionDefinition[];
  policy: Readonly<AssignmentPolicy>;
  validSectionIds: ReadonlySet<string>;
  /** Always a member of validSectionIds */
  fallbackSectionId: string;
}

// ============================================
// Documents
// ============================================

/**
 * Source-system identifiers carried by a document (e.g. a wiki page id)
 */
export interface SourceIdentifiers {
  pageId?: string;
  space?: string;
  version?: string;
}

export interface LoadedDocument {
  /** Origin key: trimmed relative path, else fileName */
  key: string;
  fileName: string;
  title: string;
  relativePath?: string;
  sourceType?: string;
  url?: string;
  retrievedAt?: string;
  sourceIds: SourceIdentifiers;
  requirements: Requirement[];
  /** Object entries received, before normalization */
  receivedRequirements: number;
  /** Entries of `requirements` that were not objects */
  skippedRequirements: number;
  openQuestions: string[];
}

// ============================================
// Classification
// ============================================

export interface ClassifiedEntry {
  requirement: Requirement;
  originDocumentKey: string;
}

/** sectionId → kind → entries in encounter order */
export type ClassificationIndex = ReadonlyMap<string, ReadonlyMap<string, readonly ClassifiedEntry[]>>;

export interface SectionAssignment {
  /** Final, always valid, section id */
  sectionId: string;
  /** Ids whose rules matched, in taxonomy order (stops early under firstMatchWins) */
  matchedSectionIds: string[];
  /** True when no rule matched and the policy's unassigned id was used */
  unmatched: boolean;
  /** True when the raw assignment was not a valid id and had to be replaced */
  coerced: boolean;
}

// ============================================
// Bibliography
// ============================================

export interface BibliographyTable {
  /** Distinct paths, sorted; index + 1 is the citation number */
  paths: readonly string[];
  numberByPath: ReadonlyMap<string, number>;
}

// ============================================
// Configuration
// ============================================

export interface ClassifierConfig {
  /** Kind tag used when a requirement has no non-blank `kind` */
  default_kind: string;
  /** Fallback used when the policy names no usable unassigned section */
  default_unassigned_section_id: string;
  enable_debug: boolean;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  default_kind: 'Other',
  default_unassigned_section_id: 'BRD-99',
  enable_debug: false,
};

// ============================================
// Pipeline Result
// ============================================

export interface ClassificationDebugInfo {
  documents_count: number;
  requirements_count: number;
  skipped_requirements: number;
  unmatched_requirements: number;
  coerced_section_ids: number;
  requirements_by_section: Record<string, number>;
  bibliography_size: number;
  // Invariant tracking
  invariant_total_coverage_holds: boolean;
}

export interface ClassificationResult {
  documents: LoadedDocument[];
  index: ClassificationIndex;
  bibliography: BibliographyTable;
  debug?: ClassificationDebugInfo;
}
