/**
 * Requirements Taxonomy - Taxonomy Configuration
 *
 * Validates the raw taxonomy document (ordered sections + assignment policy)
 * and turns it into an immutable Taxonomy. Rules are parsed here, once, so
 * classification never re-inspects raw configuration.
 *
 * Accepted shapes:
 *   { "sections": [...], "assignmentPolicy": { ... } }
 *   [ ...sections ]                                      (default policy)
 */

import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { compareCodeUnits } from './semanticValue';
import { collectExpressionIssues, parseMatchExpression } from './matchExpression';
import { createClassifierConfig } from './config';
import type { AssignmentPolicy, ClassifierConfig, SectionDefinition, Taxonomy } from './types';

// ============================================
// Errors
// ============================================

/**
 * Raised only when the taxonomy cannot be used at all: wrong top-level shape,
 * or no valid section id to classify into.
 */
export class TaxonomyConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'TaxonomyConfigError';
    this.issues = issues;
  }
}

// ============================================
// Schemas
// ============================================

const optionalText = z.string().optional().catch(undefined);

const RenderingHintsSchema = z
  .object({
    includeReferences: z.boolean().optional().catch(undefined),
    includeQuotes: z.boolean().optional().catch(undefined),
  })
  .optional()
  .catch(undefined);

export const SectionSchema = z.object({
  id: z.string().trim().min(1),
  number: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  title: optionalText,
  purpose: optionalText,
  match: z.unknown(),
  renderingHints: RenderingHintsSchema,
});

export const AssignmentPolicySchema = z.object({
  firstMatchWins: z.boolean().optional().catch(undefined),
  unassignedSectionId: z.string().trim().min(1).optional().catch(undefined),
});

export const TaxonomyDocumentSchema = z.object({
  sections: z.array(z.unknown()),
  assignmentPolicy: AssignmentPolicySchema.optional().catch(undefined),
});

export type TaxonomyDocument = z.infer<typeof TaxonomyDocumentSchema>;

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ============================================
// Fallback resolution
// ============================================

/**
 * Pick the section id that unassigned or invalid assignments end up in.
 *
 * Order of preference: the policy's id, the configured default id, then the
 * lexicographically smallest valid id.
 */
export function resolveFallbackSectionId(
  policyId: string,
  validSectionIds: ReadonlySet<string>,
  defaultId: string
): string {
  if (validSectionIds.has(policyId)) return policyId;
  if (validSectionIds.has(defaultId)) return defaultId;

  const [smallest] = [...validSectionIds].sort(compareCodeUnits);
  if (smallest === undefined) {
    throw new TaxonomyConfigError('Taxonomy defines no valid section id');
  }
  return smallest;
}

// ============================================
// Loading
// ============================================

function toSectionDefinition(section: z.infer<typeof SectionSchema>): SectionDefinition {
  const rawRules = Array.isArray(section.match) ? section.match : [];
  return {
    id: section.id,
    number: section.number,
    title: section.title,
    purpose: section.purpose,
    match: rawRules.map(parseMatchExpression),
    renderingHints: {
      includeReferences: section.renderingHints?.includeReferences !== false,
      includeQuotes: section.renderingHints?.includeQuotes !== false,
    },
  };
}

/**
 * Validate a raw taxonomy value and build the immutable Taxonomy.
 *
 * Malformed sections are skipped with a warning; malformed rules are kept as
 * never-matching nodes with a warning. A section without `match` has no rules. Throws TaxonomyConfigError when the
 * structure is unusable.
 */
export function loadTaxonomy(raw: unknown, config?: Partial<ClassifierConfig>): Taxonomy {
  const finalConfig = createClassifierConfig(config);

  const parsed = TaxonomyDocumentSchema.safeParse(Array.isArray(raw) ? { sections: raw } : raw);
  if (!parsed.success) {
    throw new TaxonomyConfigError(
      'Invalid taxonomy configuration (expected a list of sections)',
      formatIssues(parsed.error.issues)
    );
  }

  const sections: SectionDefinition[] = [];
  const validSectionIds = new Set<string>();

  parsed.data.sections.forEach((rawSection, index) => {
    const result = SectionSchema.safeParse(rawSection);
    if (!result.success) {
      console.warn('[TAXONOMY_SECTION_SKIPPED] Section failed validation:', {
        index,
        issues: formatIssues(result.error.issues),
      });
      return;
    }

    const section = toSectionDefinition(result.data);
    if (validSectionIds.has(section.id)) {
      console.warn('[TAXONOMY_DUPLICATE_SECTION_ID] Later definition ignored:', { index, sectionId: section.id });
      return;
    }

    const rawMatch = result.data.match;
    const ruleIssues =
      rawMatch !== undefined && !Array.isArray(rawMatch)
        ? ['/match: not a list']
        : section.match.flatMap((rule, i) => collectExpressionIssues(rule, `/match/${i}`));
    if (ruleIssues.length > 0) {
      console.warn('[MATCH_EXPRESSION_INVALID] Section has malformed match rules:', {
        sectionId: section.id,
        issues: ruleIssues,
      });
    }

    validSectionIds.add(section.id);
    sections.push(section);
  });

  if (validSectionIds.size === 0) {
    throw new TaxonomyConfigError('Taxonomy defines no valid section id');
  }

  const rawPolicy = parsed.data.assignmentPolicy;
  const policy: AssignmentPolicy = {
    firstMatchWins: rawPolicy?.firstMatchWins ?? true,
    unassignedSectionId: rawPolicy?.unassignedSectionId ?? finalConfig.default_unassigned_section_id,
  };

  const fallbackSectionId = resolveFallbackSectionId(
    policy.unassignedSectionId,
    validSectionIds,
    finalConfig.default_unassigned_section_id
  );
  if (fallbackSectionId !== policy.unassignedSectionId) {
    console.warn('[TAXONOMY_FALLBACK_SUBSTITUTED] Unassigned section id is not a valid section:', {
      configured: policy.unassignedSectionId,
      substituted: fallbackSectionId,
    });
  }

  return Object.freeze({
    sections: Object.freeze(sections),
    policy: Object.freeze(policy),
    validSectionIds,
    fallbackSectionId,
  });
}
