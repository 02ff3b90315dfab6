/**
 * Requirements Taxonomy - Requirement Documents
 *
 * Normalizes one already-parsed requirements document into its requirement
 * records and the metadata used for origin keys and the bibliography.
 */

import { z } from 'zod';
import { isPlainObject, toSemanticMapping } from './semanticValue';
import type { LoadedDocument, Requirement, RequirementDocumentInput } from './types';

// ============================================
// Schemas
// ============================================

const optionalText = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .catch(undefined);

const optionalIdentifier = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .optional()
  .catch(undefined);

const SourceSystemSchema = z
  .object({
    pageId: optionalIdentifier,
    space: optionalIdentifier,
    version: optionalIdentifier,
    url: optionalText,
  })
  .optional()
  .catch(undefined);

const SourceDocumentSchema = z
  .object({
    title: optionalText,
    relativePath: optionalText,
    sourceType: optionalText,
    retrievedAt: optionalText,
    confluence: SourceSystemSchema,
  })
  .optional()
  .catch(undefined);

export const RequirementDocumentSchema = z.object({
  sourceDocument: SourceDocumentSchema,
  requirements: z.array(z.unknown()).catch([]),
  openQuestions: z.array(z.unknown()).catch([]),
});

export type RequirementDocument = z.infer<typeof RequirementDocumentSchema>;

// ============================================
// Helpers
// ============================================

/** Empty strings from the schema count as missing */
function present(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function baseName(relativePath: string): string {
  const parts = relativePath.split('/').filter((p) => p.length > 0);
  return parts[parts.length - 1] ?? relativePath;
}

// ============================================
// Loading
// ============================================

/**
 * Load one document. Never throws: an unusable envelope yields a document
 * with no requirements.
 */
export function loadRequirementDocument(input: RequirementDocumentInput): LoadedDocument {
  const parsed = RequirementDocumentSchema.safeParse(input.data);
  if (!parsed.success) {
    console.warn('[REQUIREMENT_DOCUMENT_INVALID] Document is not an object, loading it empty:', {
      fileName: input.fileName,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  const data: RequirementDocument = parsed.success
    ? parsed.data
    : { sourceDocument: undefined, requirements: [], openQuestions: [] };
  const source = data.sourceDocument;
  const relativePath = present(source?.relativePath);

  const requirements: Requirement[] = [];
  let receivedRequirements = 0;
  let skippedRequirements = 0;
  data.requirements.forEach((raw, index) => {
    if (!isPlainObject(raw)) {
      skippedRequirements++;
      console.warn('[REQUIREMENT_SKIPPED] Requirement entry is not an object:', {
        fileName: input.fileName,
        index,
      });
      return;
    }
    receivedRequirements++;
    // Non-JSON field values (undefined, Date, functions) are dropped, not the record
    requirements.push(toSemanticMapping(raw));
  });

  const openQuestions = data.openQuestions
    .filter((q): q is string => typeof q === 'string')
    .map((q) => q.trim())
    .filter((q) => q.length > 0);

  return {
    key: relativePath ?? input.fileName,
    fileName: input.fileName,
    title: present(source?.title) ?? (relativePath ? baseName(relativePath) : input.fileName),
    relativePath,
    sourceType: present(source?.sourceType),
    url: present(source?.confluence?.url),
    retrievedAt: present(source?.retrievedAt),
    sourceIds: {
      pageId: present(source?.confluence?.pageId),
      space: present(source?.confluence?.space),
      version: present(source?.confluence?.version),
    },
    requirements,
    receivedRequirements,
    skippedRequirements,
    openQuestions,
  };
}

export function loadRequirementDocuments(inputs: readonly RequirementDocumentInput[]): LoadedDocument[] {
  return inputs.map(loadRequirementDocument);
}

/**
 * Human-readable source line for a document, one fact per line.
 */
export function formatSourceMetadata(doc: LoadedDocument): string {
  const parts: string[] = [];
  if (doc.sourceType) parts.push(`Source type: ${doc.sourceType}`);
  if (doc.relativePath) parts.push(`Source: ${doc.relativePath}`);
  if (doc.sourceIds.pageId) parts.push(`Page id: ${doc.sourceIds.pageId}`);
  if (doc.sourceIds.space) parts.push(`Space: ${doc.sourceIds.space}`);
  if (doc.sourceIds.version) parts.push(`Version: ${doc.sourceIds.version}`);
  if (doc.url) parts.push(`URL: ${doc.url}`);
  if (doc.retrievedAt) parts.push(`Retrieved at: ${doc.retrievedAt}`);
  return parts.join('\n');
}
