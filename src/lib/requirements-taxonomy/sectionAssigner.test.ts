import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { assignSectionId, classifyRequirement, coerceSectionId } from './sectionAssigner';
import { loadTaxonomy } from './taxonomyConfig';
import { SAMPLE_TAXONOMY } from './requirements-fixtures';
import type { Requirement } from './types';

const EVERYTHING = { field: 'requirement', op: 'exists', value: true };

const STORY: Requirement = {
  id: 'REQ-003',
  kind: 'Functional',
  statement: 'Users must reset passwords every 90 days',
  story: { asA: 'user' },
};

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('assignSectionId', () => {
  it('lands every requirement in the first of two catch-all sections', () => {
    const taxonomy = loadTaxonomy({
      sections: [
        { id: 'S1', match: [EVERYTHING] },
        { id: 'S2', match: [EVERYTHING] },
      ],
      assignmentPolicy: { firstMatchWins: true, unassignedSectionId: 'S2' },
    });

    const requirements: Requirement[] = [{ id: 'a' }, { id: 'b', kind: 'Business' }, {}];
    for (const requirement of requirements) {
      expect(assignSectionId(requirement, taxonomy)).toEqual({ sectionId: 'S1', matchedSectionIds: ['S1'] });
    }
  });

  it('follows taxonomy order, not rule specificity', () => {
    const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
    expect(assignSectionId(STORY, taxonomy).sectionId).toBe('BRD-02');
  });

  it('still returns the first match when firstMatchWins is false', () => {
    const taxonomy = loadTaxonomy({
      ...SAMPLE_TAXONOMY,
      assignmentPolicy: { firstMatchWins: false, unassignedSectionId: 'BRD-99' },
    });
    expect(assignSectionId(STORY, taxonomy)).toEqual({
      sectionId: 'BRD-02',
      matchedSectionIds: ['BRD-02', 'BRD-03'],
    });
  });

  it('returns the policy unassigned id when nothing matches', () => {
    const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
    expect(assignSectionId({ id: 'REQ-004', kind: 'NonFunctional' }, taxonomy)).toEqual({
      sectionId: 'BRD-99',
      matchedSectionIds: [],
    });
  });

  it('ignores the legacy classification hint', () => {
    const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
    const requirement: Requirement = { id: 'REQ-5', classification: { primary: 'Business' } };
    expect(assignSectionId(requirement, taxonomy).sectionId).toBe('BRD-99');
  });
});

describe('coerceSectionId', () => {
  it('keeps valid ids and replaces unknown ones with the fallback', () => {
    const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
    expect(coerceSectionId('BRD-03', taxonomy)).toBe('BRD-03');
    expect(coerceSectionId('BRD-404', taxonomy)).toBe('BRD-99');
  });
});

describe('classifyRequirement', () => {
  it('coerces an unknown unassigned id to a valid section', () => {
    const taxonomy = loadTaxonomy({
      sections: [
        { id: 'S2', match: [{ field: 'kind', op: 'eq', value: 'Business' }] },
        { id: 'S1', match: [] },
      ],
      assignmentPolicy: { unassignedSectionId: 'missing' },
    });

    expect(classifyRequirement({ id: 'x' }, taxonomy)).toEqual({
      sectionId: 'S1',
      matchedSectionIds: [],
      unmatched: true,
      coerced: true,
    });
  });

  it('reports a clean assignment', () => {
    const taxonomy = loadTaxonomy(SAMPLE_TAXONOMY);
    expect(classifyRequirement(STORY, taxonomy)).toEqual({
      sectionId: 'BRD-02',
      matchedSectionIds: ['BRD-02'],
      unmatched: false,
      coerced: false,
    });
  });
});
