import { InvalidBundleError } from './errors.js';
import {
  addHtmlElementLink,
  getHtmlElementLink,
  listHtmlElementLinks,
  removeHtmlElementLink,
} from './extension-links.js';
import { getHtmlStructureSummary, HtmlStructureSummary } from './html.js';
import {
  assertSectionDepth,
  findSectionByTitle,
  getAllHtmlContent,
  getHtmlContent,
  updateHtmlContent,
  updateSectionHtml,
} from './sections.js';
import {
  AllHtmlContent,
  FhirBundle,
  FhirBundleEntry,
  FhirComposition,
  FhirSection,
  HtmlElementLink,
  LinkConcept,
  TraversalOptions,
  isRecord,
} from './types.js';

function isBundle(value: unknown): value is FhirBundle {
  return isRecord(value) && value['resourceType'] === 'Bundle' && Array.isArray(value['entry']);
}

function isComposition(value: unknown): value is FhirComposition {
  return isRecord(value) && value['resourceType'] === 'Composition';
}

function copyOf<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch (err) {
    if (err instanceof Error && err.name === 'DataCloneError') {
      throw new InvalidBundleError('Bundle must be plain JSON data');
    }
    throw err;
  }
}

function findCompositions(bundle: FhirBundle): FhirComposition[] {
  const compositions: FhirComposition[] = [];
  for (const entry of bundle.entry) {
    if (isRecord(entry) && isComposition(entry.resource)) {
      compositions.push(entry.resource);
    }
  }
  return compositions;
}

/**
 * An ePI document Bundle owned by a single request.
 *
 * The Bundle is deep-copied on the way in and on the way out, so nothing the
 * caller holds is aliased by the section tree being edited.
 */
export class FhirEPI {
  private constructor(
    private readonly bundle: FhirBundle,
    private readonly composition: FhirComposition,
    private readonly options: TraversalOptions
  ) {}

  /**
   * Wrap a decoded Bundle. Exactly one entry must hold a Composition.
   */
  static fromDict(bundle: unknown, options: TraversalOptions = {}): FhirEPI {
    if (!isRecord(bundle)) {
      throw new InvalidBundleError('Bundle must be a JSON object');
    }
    if (bundle['resourceType'] !== 'Bundle') {
      throw new InvalidBundleError(`Expected resourceType "Bundle", got "${String(bundle['resourceType'])}"`);
    }
    if (!isBundle(bundle)) {
      throw new InvalidBundleError('Bundle.entry must be an array');
    }

    const found = findCompositions(bundle);
    if (found.length !== 1) {
      throw new InvalidBundleError(
        `Bundle must contain exactly one Composition, found ${found.length}`
      );
    }
    // The copy recurses, so the section tree is bounded first.
    assertSectionDepth(found[0].section, options);

    const copy = copyOf(bundle);
    const [composition] = findCompositions(copy);
    return new FhirEPI(copy, composition, options);
  }

  toDict(): FhirBundle {
    return copyOf(this.bundle);
  }

  getComposition(): FhirComposition {
    return this.composition;
  }

  getEntriesByResourceType(resourceType: string): FhirBundleEntry[] {
    return this.bundle.entry.filter(
      entry => isRecord(entry) && isRecord(entry.resource) && entry.resource.resourceType === resourceType
    );
  }

  getAllHtmlContent(): AllHtmlContent {
    return getAllHtmlContent(this.composition, this.options);
  }

  getHtmlContent(): string {
    return getHtmlContent(this.composition);
  }

  updateHtmlContent(newHtml: string): void {
    updateHtmlContent(this.composition, newHtml);
  }

  findSection(title: string, recursive = true): FhirSection | undefined {
    return findSectionByTitle(this.composition.section, title, recursive, this.options);
  }

  updateSectionHtml(sectionTitle: string, newHtml: string, recursive = true): void {
    updateSectionHtml(this.composition.section, sectionTitle, newHtml, recursive, this.options);
  }

  /**
   * Structure of the Composition's own narrative.
   */
  getHtmlStructureSummary(): HtmlStructureSummary {
    return getHtmlStructureSummary(this.getHtmlContent());
  }

  listHtmlElementLinks(): HtmlElementLink[] {
    return listHtmlElementLinks(this.composition);
  }

  getHtmlElementLink(elementClass: string): HtmlElementLink {
    return getHtmlElementLink(this.composition, elementClass);
  }

  addHtmlElementLink(elementClass: string, concept: LinkConcept, replaceIfExists = false): HtmlElementLink {
    return addHtmlElementLink(this.composition, elementClass, concept, replaceIfExists);
  }

  removeHtmlElementLink(elementClass: string): HtmlElementLink {
    return removeHtmlElementLink(this.composition, elementClass);
  }

  toString(): string {
    return `FhirEPI(type=${this.bundle.type ?? 'unknown'}, entries=${this.bundle.entry.length})`;
  }
}
