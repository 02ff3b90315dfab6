/**
 * Shared fixtures for requirements taxonomy tests.
 *
 * SAMPLE_TAXONOMY puts a story-shaped functional requirement in BRD-02 even
 * though its statement also matches BRD-03, so first-match priority is
 * visible in every pipeline test.
 */

import type { RequirementDocumentInput } from './types';

export const SAMPLE_TAXONOMY = {
  sections: [
    {
      id: 'BRD-01',
      number: '1',
      title: 'Business Objectives',
      purpose: 'Why the work exists.',
      match: [{ field: 'requirement.kind', op: 'eq', value: 'Business' }],
    },
    {
      id: 'BRD-02',
      number: '2',
      title: 'User Stories',
      match: [
        {
          all: [
            { field: 'requirement.story.asA', op: 'exists', value: true },
            { field: 'requirement.kind', op: 'in', value: ['Functional', 'Story'] },
          ],
        },
      ],
    },
    {
      id: 'BRD-03',
      number: '3',
      title: 'Security',
      match: [
        { field: 'requirement.statement', op: 'containsText', value: 'password' },
        { field: 'requirement.tags', op: 'contains', value: 'security' },
      ],
      renderingHints: { includeQuotes: false },
    },
    {
      id: 'BRD-99',
      number: '99',
      title: 'Unassigned',
      match: [],
    },
  ],
  assignmentPolicy: { firstMatchWins: true, unassignedSectionId: 'BRD-99' },
};

export const LOGIN_DOCUMENT: RequirementDocumentInput = {
  fileName: 'login.requirements.json',
  data: {
    sourceDocument: {
      title: 'Login Flow',
      relativePath: 'docs/login.md',
      sourceType: 'wiki',
      confluence: { pageId: 1001, space: 'AUTH', url: 'https://wiki.example/login' },
    },
    requirements: [
      {
        id: 'REQ-003',
        kind: 'Functional',
        statement: 'Users must reset passwords every 90 days',
        story: { asA: 'user', iWant: 'to reset my password' },
        references: [{ relativePath: 'policies/security.md' }],
      },
      { id: 'REQ-001', kind: 'Business', statement: 'Reduce support tickets' },
      { id: 'REQ-002', statement: 'Lock account after failed password attempts', tags: ['security'] },
    ],
  },
};

export const BILLING_DOCUMENT: RequirementDocumentInput = {
  fileName: 'billing.requirements.json',
  data: {
    sourceDocument: { title: 'Billing', relativePath: 'docs/billing.md' },
    requirements: [
      {
        id: 'REQ-010',
        kind: '  ',
        statement: 'Invoices are emailed monthly',
        references: [{ relativePath: 'docs/login.md' }, { relativePath: '  ' }],
      },
      { id: 'REQ-004', kind: 'NonFunctional', statement: 'Pages load within two seconds' },
    ],
  },
};

export const NOTES_DOCUMENT: RequirementDocumentInput = {
  fileName: 'notes.requirements.json',
  data: {
    requirements: [
      {
        id: 'REQ-020',
        kind: 'Business',
        statement: 'Expand to new markets',
        references: [{ relativePath: 'research/market.md' }],
      },
      'not-a-requirement',
    ],
    openQuestions: ['  Who owns billing?  ', '', 42],
  },
};

export const SAMPLE_DOCUMENTS: RequirementDocumentInput[] = [
  LOGIN_DOCUMENT,
  BILLING_DOCUMENT,
  NOTES_DOCUMENT,
];
