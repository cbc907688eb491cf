import { FhirEPI } from './epi.js';
import { ValidationError } from './errors.js';
import { FhirBundle, HtmlElementLink, LinkConcept, TraversalOptions, isRecord } from './types.js';

/**
 * One edit requested against an ePI bundle.
 */
export type EpiOperation =
  | { op: 'updateHtmlContent'; html: string }
  | { op: 'updateSectionHtml'; sectionTitle: string; html: string; recursive: boolean }
  | { op: 'addHtmlElementLink'; elementClass: string; concept: LinkConcept; replaceIfExists: boolean }
  | { op: 'removeHtmlElementLink'; elementClass: string };

export interface OperationResult {
  op: EpiOperation['op'];
  /** The link added, replaced or removed */
  link?: HtmlElementLink;
}

export interface ProcessResult {
  bundle: FhirBundle;
  results: OperationResult[];
}

function requireString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = raw[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, where: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${where}: "${key}" must be a boolean`);
  }
  return value;
}

function parseConcept(raw: unknown, where: string): LinkConcept {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: "concept" must be an object`);
  }
  const concept: LinkConcept = {
    code: requireString(raw, 'code', `${where}.concept`),
    display: raw['display'] === undefined ? '' : requireString(raw, 'display', `${where}.concept`),
  };
  if (raw['system'] !== undefined) {
    concept.system = requireString(raw, 'system', `${where}.concept`);
  }
  return concept;
}

export function parseOperation(raw: unknown, index: number): EpiOperation {
  const where = `operations[${index}]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be an object`);
  }

  switch (raw['op']) {
    case 'updateHtmlContent':
      return { op: 'updateHtmlContent', html: requireString(raw, 'html', where) };
    case 'updateSectionHtml':
      return {
        op: 'updateSectionHtml',
        sectionTitle: requireString(raw, 'sectionTitle', where),
        html: requireString(raw, 'html', where),
        recursive: optionalBoolean(raw, 'recursive', where, true),
      };
    case 'addHtmlElementLink':
      return {
        op: 'addHtmlElementLink',
        elementClass: requireString(raw, 'elementClass', where),
        concept: parseConcept(raw['concept'], where),
        replaceIfExists: optionalBoolean(raw, 'replaceIfExists', where, false),
      };
    case 'removeHtmlElementLink':
      return { op: 'removeHtmlElementLink', elementClass: requireString(raw, 'elementClass', where) };
    default:
      throw new ValidationError(`${where}: unknown op "${String(raw['op'])}"`);
  }
}

export function parseOperations(raw: unknown): EpiOperation[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ValidationError('"operations" must be an array');
  }
  return raw.map((entry, index) => parseOperation(entry, index));
}

export function applyOperation(epi: FhirEPI, operation: EpiOperation): OperationResult {
  switch (operation.op) {
    case 'updateHtmlContent':
      epi.updateHtmlContent(operation.html);
      return { op: operation.op };
    case 'updateSectionHtml':
      epi.updateSectionHtml(operation.sectionTitle, operation.html, operation.recursive);
      return { op: operation.op };
    case 'addHtmlElementLink':
      return {
        op: operation.op,
        link: epi.addHtmlElementLink(operation.elementClass, operation.concept, operation.replaceIfExists),
      };
    case 'removeHtmlElementLink':
      return { op: operation.op, link: epi.removeHtmlElementLink(operation.elementClass) };
  }
}

/**
 * Parse a bundle, apply the operations in order and re-serialize it.
 * The first failing operation throws; the caller's bundle is never touched.
 */
export function processBundle(
  bundle: unknown,
  rawOperations: unknown,
  options: TraversalOptions = {}
): ProcessResult {
  const operations = parseOperations(rawOperations);
  const epi = FhirEPI.fromDict(bundle, options);
  const results = operations.map(operation => applyOperation(epi, operation));
  return { bundle: epi.toDict(), results };
}
