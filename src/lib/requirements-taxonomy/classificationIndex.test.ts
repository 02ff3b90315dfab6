import { describe, it, expect } from 'vitest';
import {
  buildClassificationIndex,
  countIndexedRequirements,
  deriveKindTag,
  orderSectionEntries,
  requirementSortKey,
} from './classificationIndex';
import { loadTaxonomy } from './taxonomyConfig';
import { loadRequirementDocuments } from './documents';
import { SAMPLE_DOCUMENTS, SAMPLE_TAXONOMY } from './requirements-fixtures';
import type { ClassificationIndex } from './types';

function bucketIds(index: ClassificationIndex): Record<string, Record<string, unknown[]>> {
  const out: Record<string, Record<string, unknown[]>> = {};
  for (const [sectionId, byKind] of index) {
    out[sectionId] = {};
    for (const [kind, entries] of byKind) {
      out[sectionId][kind] = entries.map((e) => e.requirement.id);
    }
  }
  return out;
}

describe('deriveKindTag', () => {
  it('uses a trimmed non-blank kind', () => {
    expect(deriveKindTag({ kind: ' Business ' })).toBe('Business');
  });

  it('defaults to Other for missing, blank or non-string kinds', () => {
    expect(deriveKindTag({})).toBe('Other');
    expect(deriveKindTag({ kind: '   ' })).toBe('Other');
    expect(deriveKindTag({ kind: 3 })).toBe('Other');
  });

  it('accepts a configured default', () => {
    expect(deriveKindTag({}, 'Misc')).toBe('Misc');
  });
});

describe('requirementSortKey', () => {
  it('stringifies ids and treats missing ids as empty', () => {
    expect(requirementSortKey({ id: 'REQ-1' })).toBe('REQ-1');
    expect(requirementSortKey({ id: 7 })).toBe('7');
    expect(requirementSortKey({})).toBe('');
    expect(requirementSortKey({ id: null })).toBe('');
  });
});

describe('buildClassificationIndex', () => {
  const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
  const documents = loadRequirementDocuments(SAMPLE_DOCUMENTS);

  it('groups requirements by section and kind in encounter order', () => {
    const index = buildClassificationIndex(documents, taxonomy);
    expect(bucketIds(index)).toEqual({
      'BRD-01': { Business: ['REQ-001', 'REQ-020'] },
      'BRD-02': { Functional: ['REQ-003'] },
      'BRD-03': { Other: ['REQ-002'] },
      'BRD-99': { Other: ['REQ-010'], NonFunctional: ['REQ-004'] },
    });
  });

  it('records the origin document key of each entry', () => {
    const index = buildClassificationIndex(documents, taxonomy);
    const business = index.get('BRD-01')?.get('Business') ?? [];
    expect(business.map((e) => e.originDocumentKey)).toEqual(['docs/login.md', 'notes.requirements.json']);
  });

  it('seeds every section, even empty ones, in taxonomy order', () => {
    const index = buildClassificationIndex([], taxonomy);
    expect([...index.keys()]).toEqual(['BRD-01', 'BRD-02', 'BRD-03', 'BRD-99']);
    expect(countIndexedRequirements(index)).toBe(0);
  });

  it('places every requirement in exactly one bucket', () => {
    const index = buildClassificationIndex(documents, taxonomy);
    const loaded = documents.reduce((sum, doc) => sum + doc.requirements.length, 0);
    expect(countIndexedRequirements(index)).toBe(loaded);
    expect(loaded).toBe(6);
  });

  it('does not mutate the requirements', () => {
    const snapshot = JSON.stringify(documents.map((d) => d.requirements));
    buildClassificationIndex(documents, taxonomy);
    expect(JSON.stringify(documents.map((d) => d.requirements))).toBe(snapshot);
  });

  it('uses the configured default kind', () => {
    const index = buildClassificationIndex(documents, taxonomy, { default_kind: 'Unspecified' });
    expect([...(index.get('BRD-03')?.keys() ?? [])]).toEqual(['Unspecified']);
  });

  it('notifies the observer once per requirement', () => {
    const seen: string[] = [];
    buildClassificationIndex(documents, taxonomy, undefined, {
      onAssigned(entry, assignment) {
        seen.push(`${String(entry.requirement.id)}→${assignment.sectionId}`);
      },
    });
    expect(seen).toEqual([
      'REQ-003→BRD-02',
      'REQ-001→BRD-01',
      'REQ-002→BRD-03',
      'REQ-010→BRD-99',
      'REQ-004→BRD-99',
      'REQ-020→BRD-01',
    ]);
  });
});

describe('orderSectionEntries', () => {
  const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);

  it('flattens kinds and sorts by id', () => {
    const index = buildClassificationIndex(loadRequirementDocuments(SAMPLE_DOCUMENTS), taxonomy);
    expect(orderSectionEntries(index, 'BRD-99').map((e) => e.requirement.id)).toEqual(['REQ-004', 'REQ-010']);
  });

  it('keeps encounter order for equal ids across kinds', () => {
    const index = buildClassificationIndex(
      loadRequirementDocuments([
        {
          fileName: 'dupes.json',
          data: {
            requirements: [
              { id: 'B', kind: 'Zeta', statement: 'first b' },
              { id: 'A', kind: 'Alpha', statement: 'a' },
              { id: 'B', kind: 'Alpha', statement: 'second b' },
            ],
          },
        },
      ]),
      taxonomy
    );
    expect(orderSectionEntries(index, 'BRD-99').map((e) => e.requirement.statement)).toEqual([
      'a',
      'first b',
      'second b',
    ]);
  });

  it('returns an empty list for unknown sections', () => {
    const index = buildClassificationIndex([], taxonomy);
    expect(orderSectionEntries(index, 'nope')).toEqual([]);
  });
});
