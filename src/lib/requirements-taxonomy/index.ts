/**
 * Requirements Taxonomy
 *
 * Deterministic classification of requirement records into the sections of
 * a configured taxonomy, with a stably numbered bibliography for citations.
 *
 * Pipeline:
 * 1. loadTaxonomy(): validate sections, parse match rules, resolve fallback
 * 2. classifyRequirementDocuments(): load documents, build the index, number sources
 * 3. buildSectionViews() / formatRequirementText(): renderer-facing views
 */

// Re-export types
export * from './types';

export {
  ABSENT,
  isAbsent,
  isMapping,
  isSequence,
  semanticEquals,
  semanticValueSchema,
  isPlainObject,
  toSemanticValue,
  toSemanticMapping,
} from './semanticValue';
export type { Absent, Resolved, SemanticMapping, SemanticScalar, SemanticValue } from './semanticValue';

// Rule language
export { resolvePath } from './pathResolver';
export { evaluateMatch, isMatchOperator, MATCH_OPERATORS } from './matchEvaluator';
export type { MatchOperator } from './matchEvaluator';
export {
  parseMatchExpression,
  evaluateExpression,
  evaluateMatchList,
  collectExpressionIssues,
} from './matchExpression';
export type {
  MatchExpression,
  CombinatorExpression,
  CombinatorKind,
  LeafExpression,
  InvalidExpression,
} from './matchExpression';

// Configuration
export { createClassifierConfig, validateClassifierConfig } from './config';
export {
  loadTaxonomy,
  resolveFallbackSectionId,
  TaxonomyConfigError,
  TaxonomyDocumentSchema,
} from './taxonomyConfig';
export type { TaxonomyDocument } from './taxonomyConfig';

// Documents
export { loadRequirementDocument, loadRequirementDocuments, formatSourceMetadata } from './documents';

// Classification
export { assignSectionId, coerceSectionId, classifyRequirement } from './sectionAssigner';
export {
  buildClassificationIndex,
  orderSectionEntries,
  countIndexedRequirements,
  deriveKindTag,
  requirementSortKey,
} from './classificationIndex';
export type { IndexBuildObserver } from './classificationIndex';

// Bibliography
export {
  buildBibliography,
  numberPaths,
  citationNumbersFor,
  citationPathsOf,
  referencePathsOf,
  formatCitationMarkers,
} from './bibliography';

// Presentation
export {
  buildSectionViews,
  formatSectionHeading,
  formatRequirementText,
  formatStorySummary,
  formatBddSummary,
  buildBibliographyEntries,
  formatBibliographyEntry,
  collectOpenQuestions,
} from './presentation';
export type { SectionView, BibliographyEntry, OpenQuestionGroup } from './presentation';

// Pipeline
export { classifyRequirementDocuments } from './pipeline';
