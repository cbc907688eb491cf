import { FhirBundle, FhirComposition, FhirSection } from '../types.js';

export const XHTML_NS = 'http://www.w3.org/1999/xhtml';

export function xhtml(inner: string): string {
  return `<div xmlns="${XHTML_NS}">${inner}</div>`;
}

/**
 * Leaflet with three top-level sections, nested two levels deep, one
 * untitled section and one foreign extension.
 */
export function sampleComposition(): FhirComposition {
  return {
    resourceType: 'Composition',
    id: 'comp-1',
    title: 'Package leaflet',
    status: 'final',
    text: { status: 'generated', div: xhtml('<p class="intro">Package leaflet</p>') },
    extension: [
      { url: 'http://example.org/fhir/foreign', valueString: 'keep me' },
    ],
    section: [
      {
        title: 'What it is',
        code: { coding: [{ system: 'http://example.org/sections', code: 'S1' }] },
        text: { status: 'additional', div: xhtml('What it is') },
        section: [
          { title: 'Ingredients', text: { status: 'additional', div: xhtml('Ingredients') } },
        ],
      },
      {
        title: 'How to take',
        text: { status: 'additional', div: xhtml('How to take') },
        section: [
          {
            title: 'Dosage',
            section: [
              { title: 'Deep', text: { status: 'additional', div: xhtml('Old deep') } },
            ],
          },
        ],
      },
      {
        text: { status: 'additional', div: xhtml('No title here') },
      },
    ],
  };
}

export function sampleBundle(): FhirBundle {
  return {
    resourceType: 'Bundle',
    id: 'epi-1',
    type: 'document',
    timestamp: '2024-01-01T00:00:00Z',
    entry: [
      { fullUrl: 'urn:uuid:comp-1', resource: sampleComposition() },
      { fullUrl: 'urn:uuid:med-1', resource: { resourceType: 'MedicinalProductDefinition', id: 'med-1' } },
    ],
  };
}

/**
 * A -> A1 -> A1a, one section per level.
 */
export function chainSections(): FhirSection[] {
  return [
    {
      title: 'A',
      section: [
        {
          title: 'A1',
          section: [
            { title: 'A1a', text: { status: 'additional', div: xhtml('leaf') } },
          ],
        },
      ],
    },
  ];
}

/**
 * Bundle JSON text whose Composition nests one section per level, `levels`
 * levels deep. Built as a string so nothing recurses while making it.
 */
export function deepBundleJson(levels: number): string {
  const open = '{"title":"s","section":['.repeat(levels);
  const close = ']}'.repeat(levels);
  return '{"resourceType":"Bundle","type":"document","entry":[{"resource":'
    + `{"resourceType":"Composition","section":[${open}${close}]}}]}`;
}
