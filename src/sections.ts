import { getConfig } from './config.js';
import { DepthExceededError, MissingContentError, NotFoundError, ValidationError } from './errors.js';
import { checkWellFormed } from './html.js';
import {
  AllHtmlContent,
  FhirComposition,
  FhirNarrative,
  FhirSection,
  SectionHtmlRecord,
  TraversalOptions,
  isRecord,
} from './types.js';

interface ResolvedOptions {
  maxDepth: number;
  untitledTitle: string;
}

function resolveOptions(options: TraversalOptions): ResolvedOptions {
  const config = getConfig();
  return {
    maxDepth: options.maxDepth ?? config.maxSectionDepth,
    untitledTitle: options.untitledTitle ?? config.untitledSectionTitle,
  };
}

function isSection(value: unknown): value is FhirSection {
  return isRecord(value);
}

/**
 * Section entries of a list, skipping anything that is not an object.
 */
function sectionsOf(value: unknown): FhirSection[] {
  return Array.isArray(value) ? value.filter(isSection) : [];
}

function narrativeOf(owner: { text?: FhirNarrative }): string | undefined {
  const text = owner.text;
  return isRecord(text) && typeof text.div === 'string' ? text.div : undefined;
}

/**
 * Set the narrative div, keeping an existing narrative's status.
 */
function setNarrative(owner: { text?: FhirNarrative }, html: string): void {
  if (isRecord(owner.text)) {
    owner.text.div = html;
  } else {
    owner.text = { status: 'generated', div: html };
  }
}

function requireWellFormed(html: string): void {
  if (typeof html !== 'string') {
    throw new ValidationError('HTML content must be a string');
  }
  const { wellFormed, error } = checkWellFormed(html);
  if (!wellFormed) {
    throw new ValidationError(`HTML content is not well-formed: ${error}`);
  }
}

function checkDepth(level: number, maxDepth: number): void {
  if (level >= maxDepth) {
    throw new DepthExceededError(maxDepth);
  }
}

/**
 * Bound the nesting of an untrusted section tree before anything recurses
 * into it. Uses an explicit work stack, so the check itself cannot run out
 * of call stack however deep the input goes.
 */
export function assertSectionDepth(sections: unknown, options: TraversalOptions = {}): void {
  const { maxDepth } = resolveOptions(options);
  const pending: Array<{ sections: unknown; level: number }> = [{ sections, level: 0 }];

  let next = pending.pop();
  while (next) {
    const { sections: list, level } = next;
    if (Array.isArray(list)) {
      for (const section of list) {
        if (!isRecord(section)) {
          continue;
        }
        checkDepth(level, maxDepth);
        pending.push({ sections: section['section'], level: level + 1 });
      }
    }
    next = pending.pop();
  }
}

function collectRecords(
  sections: FhirSection[],
  level: number,
  options: ResolvedOptions,
  records: SectionHtmlRecord[]
): void {
  for (const section of sections) {
    checkDepth(level, options.maxDepth);

    const children = sectionsOf(section.section);
    const record: SectionHtmlRecord = {
      title: typeof section.title === 'string' ? section.title : options.untitledTitle,
      level,
      html: narrativeOf(section) ?? '',
      hasSubsections: children.length > 0,
    };
    if (isRecord(section.code)) {
      record.code = section.code;
    }
    records.push(record);

    collectRecords(children, level + 1, options, records);
  }
}

/**
 * Pre-order walk of a section list. Top-level entries are level 0 and
 * records come out in document order.
 */
export function extractAllHtmlFromSections(
  sections: FhirSection[] | undefined,
  options: TraversalOptions = {}
): SectionHtmlRecord[] {
  const records: SectionHtmlRecord[] = [];
  collectRecords(sectionsOf(sections), 0, resolveOptions(options), records);
  return records;
}

export function countSections(sections: FhirSection[] | undefined, options: TraversalOptions = {}): number {
  return extractAllHtmlFromSections(sections, options).length;
}

/**
 * The Composition narrative plus every section record.
 */
export function getAllHtmlContent(composition: FhirComposition, options: TraversalOptions = {}): AllHtmlContent {
  const sections = extractAllHtmlFromSections(composition.section, options);
  return {
    compositionHtml: narrativeOf(composition) ?? '',
    sections,
    totalSections: sections.length,
    maxNestingLevel: sections.reduce((max, record) => Math.max(max, record.level), 0),
  };
}

export function getHtmlContent(composition: FhirComposition): string {
  const html = narrativeOf(composition);
  if (html === undefined) {
    throw new MissingContentError('Composition has no narrative (text.div)');
  }
  return html;
}

/**
 * Replace the Composition narrative. Markup must be well-formed.
 */
export function updateHtmlContent(composition: FhirComposition, newHtml: string): void {
  requireWellFormed(newHtml);
  setNarrative(composition, newHtml);
}

/**
 * First section titled exactly `title`. All siblings at a level are checked
 * before descending; children are searched in sibling order.
 */
function locateSection(
  sections: FhirSection[],
  title: string,
  recursive: boolean,
  level: number,
  maxDepth: number
): FhirSection | undefined {
  if (sections.length === 0) {
    return undefined;
  }
  checkDepth(level, maxDepth);

  const match = sections.find(section => section.title === title);
  if (match || !recursive) {
    return match;
  }

  for (const section of sections) {
    const found = locateSection(sectionsOf(section.section), title, true, level + 1, maxDepth);
    if (found) {
      return found;
    }
  }
  return undefined;
}

export function findSectionByTitle(
  sections: FhirSection[] | undefined,
  title: string,
  recursive = true,
  options: TraversalOptions = {}
): FhirSection | undefined {
  const { maxDepth } = resolveOptions(options);
  return locateSection(sectionsOf(sections), title, recursive, 0, maxDepth);
}

/**
 * Replace the narrative of the first section titled `sectionTitle`.
 * Without `recursive` only the given list is searched.
 */
export function updateSectionHtml(
  sections: FhirSection[] | undefined,
  sectionTitle: string,
  newHtml: string,
  recursive = true,
  options: TraversalOptions = {}
): void {
  requireWellFormed(newHtml);

  const target = findSectionByTitle(sections, sectionTitle, recursive, options);
  if (!target) {
    const scope = recursive ? 'section tree' : 'top-level sections';
    throw new NotFoundError(`No section titled "${sectionTitle}" in ${scope}`);
  }
  setNarrative(target, newHtml);
}
