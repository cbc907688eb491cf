import { FhirExtension, HtmlElementLink, LinkConcept, isRecord } from './types.js';

/**
 * Canonical url that marks an extension as an HtmlElementLink.
 * Extensions with any other url are foreign and are never touched.
 */
export const HTML_ELEMENT_LINK_URL =
  'http://hl7.eu/fhir/ig/gravitate-health/StructureDefinition/HtmlElementLink';

const ELEMENT_CLASS_URL = 'elementClass';
const CONCEPT_URL = 'concept';

/**
 * Tagged view of one entry of an extension list.
 */
export type DecodedExtension =
  | { kind: 'htmlElementLink'; link: HtmlElementLink }
  | { kind: 'malformedLink'; reason: string }
  | { kind: 'foreign' };

function findSubExtension(parts: unknown[], url: string): Record<string, unknown> | undefined {
  for (const part of parts) {
    if (isRecord(part) && part['url'] === url) {
      return part;
    }
  }
  return undefined;
}

function decodeCoding(value: unknown): LinkConcept | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { code, display, system } = value;
  if (typeof code !== 'string' || !code.trim()) {
    return undefined;
  }
  const concept: LinkConcept = {
    code,
    display: typeof display === 'string' ? display : '',
  };
  if (typeof system === 'string') {
    concept.system = system;
  }
  return concept;
}

function firstCoding(codeableConcept: unknown): LinkConcept | undefined {
  if (!isRecord(codeableConcept)) {
    return undefined;
  }
  const codings = codeableConcept['coding'];
  return Array.isArray(codings) ? decodeCoding(codings[0]) : undefined;
}

/**
 * The concept may arrive as valueCodeableReference.concept (R5 shape),
 * valueCodeableConcept or a bare valueCoding.
 */
function decodeConcept(part: Record<string, unknown>): LinkConcept | undefined {
  const reference = part['valueCodeableReference'];
  if (isRecord(reference)) {
    return firstCoding(reference['concept']);
  }
  if ('valueCodeableConcept' in part) {
    return firstCoding(part['valueCodeableConcept']);
  }
  return decodeCoding(part['valueCoding']);
}

/**
 * Decode one extension list entry without trusting its shape.
 */
export function decodeExtension(value: unknown): DecodedExtension {
  if (!isRecord(value) || value['url'] !== HTML_ELEMENT_LINK_URL) {
    return { kind: 'foreign' };
  }

  const parts = value['extension'];
  if (!Array.isArray(parts)) {
    return { kind: 'malformedLink', reason: 'no sub-extensions' };
  }

  const classPart = findSubExtension(parts, ELEMENT_CLASS_URL);
  const elementClass = classPart?.['valueString'];
  if (typeof elementClass !== 'string' || !elementClass.trim()) {
    return { kind: 'malformedLink', reason: 'missing elementClass' };
  }

  const conceptPart = findSubExtension(parts, CONCEPT_URL);
  const concept = conceptPart ? decodeConcept(conceptPart) : undefined;
  if (!concept) {
    return { kind: 'malformedLink', reason: 'missing concept code' };
  }

  return { kind: 'htmlElementLink', link: { elementClass, concept } };
}

/**
 * Decode an entry and return the link, or undefined when it is not a
 * well-formed HtmlElementLink.
 */
export function decodeHtmlElementLink(value: unknown): HtmlElementLink | undefined {
  const decoded = decodeExtension(value);
  return decoded.kind === 'htmlElementLink' ? decoded.link : undefined;
}

export function encodeHtmlElementLink(link: HtmlElementLink): FhirExtension {
  const coding: Record<string, string> = {};
  if (link.concept.system !== undefined) {
    coding['system'] = link.concept.system;
  }
  coding['code'] = link.concept.code;
  coding['display'] = link.concept.display;

  return {
    url: HTML_ELEMENT_LINK_URL,
    extension: [
      { url: ELEMENT_CLASS_URL, valueString: link.elementClass },
      { url: CONCEPT_URL, valueCodeableReference: { concept: { coding: [coding] } } },
    ],
  };
}
