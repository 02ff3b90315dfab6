/**
 * Requirements Taxonomy - Presentation Helper
 *
 * Renderer-facing views over the classification index and bibliography.
 * Pure helpers: no layout, no pagination, no escaping for a target format.
 *
 * buildSectionViews() returns one view per taxonomy section, in taxonomy
 * order, with entries sorted by requirement id across all kinds.
 */

import { compareCodeUnits, isMapping, isSequence, nonBlankString } from './semanticValue';
import type { Resolved } from './semanticValue';
import { orderSectionEntries, requirementSortKey } from './classificationIndex';
import { formatCitationMarkers } from './bibliography';
import type {
  BibliographyTable,
  ClassificationIndex,
  ClassifiedEntry,
  LoadedDocument,
  SectionDefinition,
  Taxonomy,
} from './types';

const EMPTY_SUMMARY = '—';

// ============================================
// Types
// ============================================

export interface SectionView {
  section: SectionDefinition;
  heading: string;
  entries: ClassifiedEntry[];
  isEmpty: boolean;
}

export interface BibliographyEntry {
  number: number;
  relativePath: string;
  title?: string;
  url?: string;
}

export interface OpenQuestionGroup {
  documentKey: string;
  title: string;
  questions: string[];
}

// ============================================
// Sections
// ============================================

/**
 * "3. Scope" when both number and title exist, otherwise the title, otherwise the id.
 */
export function formatSectionHeading(section: SectionDefinition): string {
  const number = nonBlankString(section.number);
  const title = nonBlankString(section.title);
  if (number && title) return `${number}. ${title}`;
  return title ?? section.id;
}

export function buildSectionViews(index: ClassificationIndex, taxonomy: Taxonomy): SectionView[] {
  return taxonomy.sections.map((section) => {
    const entries = orderSectionEntries(index, section.id);
    return {
      section,
      heading: formatSectionHeading(section),
      entries,
      isEmpty: entries.length === 0,
    };
  });
}

// ============================================
// Requirements
// ============================================

/**
 * Statement text followed by the requirement id tag and citation markers.
 *
 * Falls back to a story sentence when there is no statement. Returns
 * undefined when the requirement has neither.
 */
export function formatRequirementText(
  entry: ClassifiedEntry,
  bibliography: BibliographyTable
): string | undefined {
  const { requirement, originDocumentKey } = entry;

  let text = nonBlankString(requirement.statement);
  if (!text) {
    const story = requirement.story;
    if (!isMapping(story)) return undefined;

    const asA = nonBlankString(story.asA);
    const iWant = nonBlankString(story.iWant);
    const soThat = nonBlankString(story.soThat);
    const parts: string[] = [];
    if (asA && iWant) parts.push(`As ${asA}, I want ${iWant}.`);
    if (soThat) parts.push(`So that ${soThat}.`);
    if (parts.length === 0) return undefined;
    text = parts.join(' ');
  }

  const id = requirementSortKey(requirement).trim();
  const tag = id ? ` [${id}]` : '';
  const citations = formatCitationMarkers(bibliography, requirement, originDocumentKey);
  return `${text}${tag}${citations ? ` ${citations}` : ''}`;
}

/**
 * One line per story field, or an em dash when there is nothing to show.
 */
export function formatStorySummary(story: Resolved | undefined): string {
  if (!isMapping(story)) return EMPTY_SUMMARY;

  const lines: string[] = [];
  const asA = nonBlankString(story.asA);
  const iWant = nonBlankString(story.iWant);
  const soThat = nonBlankString(story.soThat);
  if (asA) lines.push(`As a: ${asA}`);
  if (iWant) lines.push(`I want: ${iWant}`);
  if (soThat) lines.push(`So that: ${soThat}`);
  return lines.length > 0 ? lines.join('\n') : EMPTY_SUMMARY;
}

export function formatBddSummary(bdd: Resolved | undefined): string {
  if (!isMapping(bdd)) return EMPTY_SUMMARY;

  const lines: string[] = [];
  const feature = nonBlankString(bdd.feature);
  const scenario = nonBlankString(bdd.scenario);
  if (feature) lines.push(`Feature: ${feature}`);
  if (scenario) lines.push(`Scenario: ${scenario}`);

  const steps = isSequence(bdd.steps) ? bdd.steps : [];
  const stepLines: string[] = [];
  for (const step of steps) {
    if (!isMapping(step)) continue;
    const keyword = nonBlankString(step.keyword);
    const text = nonBlankString(step.text);
    if (keyword && text) stepLines.push(`${keyword} ${text}`);
  }
  if (stepLines.length > 0) {
    lines.push('Steps:', ...stepLines);
  }

  return lines.length > 0 ? lines.join('\n') : EMPTY_SUMMARY;
}

// ============================================
// Bibliography
// ============================================

/**
 * Bibliography rows in citation order, enriched with document titles and
 * URLs where a loaded document has that path as its key.
 */
export function buildBibliographyEntries(
  bibliography: BibliographyTable,
  documents: readonly LoadedDocument[]
): BibliographyEntry[] {
  const docByKey = new Map<string, LoadedDocument>();
  for (const doc of documents) {
    if (!docByKey.has(doc.key)) docByKey.set(doc.key, doc);
  }

  return bibliography.paths.map((relativePath, i) => {
    const doc = docByKey.get(relativePath);
    return {
      number: i + 1,
      relativePath,
      title: doc?.title,
      url: doc?.url,
    };
  });
}

/**
 * "[2] Login Flow — docs/login.md — https://wiki.example/login"
 */
export function formatBibliographyEntry(entry: BibliographyEntry): string {
  const bits: string[] = [];
  if (entry.title) bits.push(entry.title);
  bits.push(entry.relativePath);
  if (entry.url) bits.push(entry.url);
  return `[${entry.number}] ${bits.join(' — ')}`;
}

// ============================================
// Open questions
// ============================================

export function collectOpenQuestions(documents: readonly LoadedDocument[]): OpenQuestionGroup[] {
  return documents
    .filter((doc) => doc.openQuestions.length > 0)
    .map((doc) => ({ documentKey: doc.key, title: doc.title, questions: [...doc.openQuestions] }))
    .sort((a, b) => compareCodeUnits(a.documentKey, b.documentKey));
}
