/**
 * FHIR Coding structure
 */
export interface FhirCoding {
  system?: string;
  code?: string;
  display?: string;
}

/**
 * FHIR CodeableConcept structure
 */
export interface FhirCodeableConcept {
  coding?: FhirCoding[];
  text?: string;
}

/**
 * Narrative carried by a Composition or a Section.
 * `div` holds the XHTML fragment.
 */
export interface FhirNarrative {
  status?: string;
  div?: string;
}

/**
 * Generic FHIR extension. Either a primitive `value*` or nested sub-extensions.
 * Unknown fields are kept as they were received.
 */
export interface FhirExtension {
  url: string;
  extension?: FhirExtension[];
  valueString?: string;
  [key: string]: unknown;
}

/**
 * A node of the Composition section tree.
 */
export interface FhirSection {
  title?: string;
  code?: FhirCodeableConcept;
  text?: FhirNarrative;
  section?: FhirSection[];
  [key: string]: unknown;
}

/**
 * Base FHIR resource structure
 */
export interface FhirResource {
  resourceType: string;
  id?: string;
  [key: string]: unknown;
}

/**
 * The ePI document resource: root narrative plus the section tree.
 */
export interface FhirComposition extends FhirResource {
  resourceType: 'Composition';
  title?: string;
  status?: string;
  text?: FhirNarrative;
  section?: FhirSection[];
  extension?: FhirExtension[];
}

export interface FhirBundleEntry {
  fullUrl?: string;
  resource?: FhirResource;
  [key: string]: unknown;
}

/**
 * FHIR Bundle wrapping the ePI Composition and its referenced resources.
 */
export interface FhirBundle extends FhirResource {
  resourceType: 'Bundle';
  type?: string;
  entry: FhirBundleEntry[];
}

/**
 * The coded concept an HTML class is linked to.
 */
export interface LinkConcept {
  code: string;
  display: string;
  system?: string;
}

/**
 * Decoded HtmlElementLink extension. Identity key is `elementClass`.
 */
export interface HtmlElementLink {
  elementClass: string;
  concept: LinkConcept;
}

/**
 * Per-section view produced by the section walk. Derived, never persisted.
 */
export interface SectionHtmlRecord {
  /** Section title, or the configured placeholder when the section has none */
  title: string;
  /** 0-based depth; top-level sections are level 0 */
  level: number;
  /** The section's own narrative, or '' */
  html: string;
  hasSubsections: boolean;
  code?: FhirCodeableConcept;
}

/**
 * Aggregate returned by getAllHtmlContent.
 */
export interface AllHtmlContent {
  /** The Composition's own narrative, reported apart from the sections */
  compositionHtml: string;
  sections: SectionHtmlRecord[];
  totalSections: number;
  maxNestingLevel: number;
}

/**
 * Traversal limits shared by the section operations.
 */
export interface TraversalOptions {
  /** Levels at or beyond this depth raise DepthExceededError */
  maxDepth?: number;
  /** Title reported for sections without one */
  untitledTitle?: string;
}

/**
 * Narrow an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
