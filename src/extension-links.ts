import {
  decodeExtension,
  decodeHtmlElementLink,
  encodeHtmlElementLink,
} from './extension-codec.js';
import { ConflictError, NotFoundError, ValidationError } from './errors.js';
import { FhirComposition, FhirExtension, HtmlElementLink, LinkConcept } from './types.js';

function extensionList(composition: FhirComposition): FhirExtension[] {
  return Array.isArray(composition.extension) ? composition.extension : [];
}

/**
 * The extension list an edit may rebuild. Anything other than an array is
 * someone else's data and is left alone.
 */
function editableExtensionList(composition: FhirComposition): FhirExtension[] {
  if (composition.extension !== undefined && !Array.isArray(composition.extension)) {
    throw new ValidationError('Composition.extension must be an array');
  }
  return extensionList(composition);
}

function linkIndex(extensions: FhirExtension[], elementClass: string): number {
  return extensions.findIndex(entry => decodeHtmlElementLink(entry)?.elementClass === elementClass);
}

function validateElementClass(elementClass: string): void {
  if (!elementClass || /\s/.test(elementClass)) {
    throw new ValidationError(`elementClass must be a single non-empty class name, got "${elementClass}"`);
  }
}

function normalizeConcept(concept: LinkConcept): LinkConcept {
  if (typeof concept.code !== 'string' || !concept.code.trim()) {
    throw new ValidationError('concept.code must be a non-empty string');
  }
  const normalized: LinkConcept = { code: concept.code, display: concept.display ?? '' };
  if (concept.system !== undefined) {
    normalized.system = concept.system;
  }
  return normalized;
}

/**
 * All well-formed HtmlElementLinks of a Composition, in list order.
 * Entries with the link url but missing required parts are skipped.
 */
export function listHtmlElementLinks(composition: FhirComposition): HtmlElementLink[] {
  const links: HtmlElementLink[] = [];

  extensionList(composition).forEach((entry, index) => {
    const decoded = decodeExtension(entry);
    if (decoded.kind === 'htmlElementLink') {
      links.push(decoded.link);
    } else if (decoded.kind === 'malformedLink') {
      console.warn(`Skipping malformed HtmlElementLink at extension[${index}]: ${decoded.reason}`);
    }
  });

  return links;
}

export function getHtmlElementLink(composition: FhirComposition, elementClass: string): HtmlElementLink {
  const link = listHtmlElementLinks(composition).find(l => l.elementClass === elementClass);
  if (!link) {
    throw new NotFoundError(`No HtmlElementLink for class: ${elementClass}`);
  }
  return link;
}

/**
 * Link `elementClass` to `concept`. A new link goes to the end of the
 * extension list; with `replaceIfExists` an existing one is overwritten at
 * its current position, otherwise it is a ConflictError.
 */
export function addHtmlElementLink(
  composition: FhirComposition,
  elementClass: string,
  concept: LinkConcept,
  replaceIfExists = false
): HtmlElementLink {
  validateElementClass(elementClass);
  const link: HtmlElementLink = { elementClass, concept: normalizeConcept(concept) };

  const extensions = editableExtensionList(composition);
  const index = linkIndex(extensions, elementClass);
  const encoded = encodeHtmlElementLink(link);

  if (index === -1) {
    composition.extension = [...extensions, encoded];
    return link;
  }

  if (!replaceIfExists) {
    throw new ConflictError(`HtmlElementLink already exists for class: ${elementClass}`);
  }

  const next = extensions.slice();
  next[index] = encoded;
  composition.extension = next;
  return link;
}

/**
 * Remove the link(s) for `elementClass` and return the first one removed.
 * Foreign extensions stay where they are.
 */
export function removeHtmlElementLink(composition: FhirComposition, elementClass: string): HtmlElementLink {
  const extensions = editableExtensionList(composition);
  const index = linkIndex(extensions, elementClass);
  const removed = index === -1 ? undefined : decodeHtmlElementLink(extensions[index]);

  if (!removed) {
    throw new NotFoundError(`No HtmlElementLink for class: ${elementClass}`);
  }

  const remaining = extensions.filter(entry => decodeHtmlElementLink(entry)?.elementClass !== elementClass);
  if (remaining.length > 0) {
    composition.extension = remaining;
  } else {
    delete composition.extension;
  }
  return removed;
}
