import * as test from 'node:test';
import * as assert from 'node:assert';
import { FhirEPI } from '../epi.js';
import { HTML_ELEMENT_LINK_URL } from '../extension-codec.js';
import { DepthExceededError, InvalidBundleError, NotFoundError } from '../errors.js';
import { chainSections, deepBundleJson, sampleBundle, sampleComposition, xhtml } from './fixtures.js';

const { describe, it } = test;

describe('FhirEPI.fromDict', () => {
  it('should reject a bundle without a Composition', () => {
    const bundle = sampleBundle();
    bundle.entry = bundle.entry.slice(1);
    assert.throws(() => FhirEPI.fromDict(bundle), InvalidBundleError);
  });

  it('should reject a bundle with two Compositions', () => {
    const bundle = sampleBundle();
    bundle.entry.push({ resource: sampleComposition() });
    assert.throws(() => FhirEPI.fromDict(bundle), InvalidBundleError);
  });

  it('should reject input that is not a Bundle', () => {
    assert.throws(() => FhirEPI.fromDict(null), InvalidBundleError);
    assert.throws(() => FhirEPI.fromDict([sampleBundle()]), InvalidBundleError);
    assert.throws(() => FhirEPI.fromDict({ resourceType: 'Composition' }), InvalidBundleError);
    assert.throws(() => FhirEPI.fromDict({ resourceType: 'Bundle', entry: {} }), InvalidBundleError);
  });

  it('should reject values that are not JSON data', () => {
    const bundle = { ...sampleBundle(), meta: () => 'not data' };
    assert.throws(() => FhirEPI.fromDict(bundle), InvalidBundleError);
  });

  it('should report a very deep section chain as DepthExceeded', () => {
    const bundle: unknown = JSON.parse(deepBundleJson(20000));
    assert.throws(() => FhirEPI.fromDict(bundle), DepthExceededError);
  });

  it('should bound the section chain by its maxDepth option', () => {
    const bundle: unknown = JSON.parse(deepBundleJson(3));
    assert.throws(() => FhirEPI.fromDict(bundle, { maxDepth: 2 }), DepthExceededError);
    assert.strictEqual(FhirEPI.fromDict(bundle, { maxDepth: 3 }).getAllHtmlContent().totalSections, 3);
  });

  it('should find the Composition wherever it sits in the entry list', () => {
    const bundle = sampleBundle();
    bundle.entry.reverse();
    assert.strictEqual(FhirEPI.fromDict(bundle).getComposition().id, 'comp-1');
  });

  it('should not alias the caller\'s bundle', () => {
    const bundle = sampleBundle();
    const epi = FhirEPI.fromDict(bundle);

    epi.updateHtmlContent('<div>changed</div>');

    assert.deepStrictEqual(bundle, sampleBundle());
  });
});

describe('FhirEPI.toDict', () => {
  it('should round-trip an untouched bundle unchanged', () => {
    const bundle = sampleBundle();
    assert.deepStrictEqual(FhirEPI.fromDict(bundle).toDict(), bundle);
  });

  it('should change only the field an edit touched', () => {
    const epi = FhirEPI.fromDict(sampleBundle());
    epi.updateSectionHtml('Deep', xhtml('New deep'));

    const expected = sampleBundle();
    const composition = sampleComposition();
    const deep = composition.section?.[1].section?.[0].section?.[0];
    assert.ok(deep?.text);
    deep.text.div = xhtml('New deep');
    expected.entry[0] = { fullUrl: 'urn:uuid:comp-1', resource: composition };

    assert.deepStrictEqual(epi.toDict(), expected);
  });

  it('should reflect added links in the serialized Composition', () => {
    const epi = FhirEPI.fromDict(sampleBundle());
    epi.addHtmlElementLink('pregnancy', { code: 'P', display: 'Pregnancy' });

    const resource = epi.toDict().entry[0].resource;
    assert.ok(resource);
    const extensions = resource['extension'];
    assert.ok(Array.isArray(extensions));
    assert.strictEqual(extensions.length, 2);
    assert.strictEqual(extensions[1].url, HTML_ELEMENT_LINK_URL);
  });
});

describe('FhirEPI operations', () => {
  it('should aggregate section content', () => {
    const content = FhirEPI.fromDict(sampleBundle()).getAllHtmlContent();
    assert.strictEqual(content.totalSections, 6);
    assert.strictEqual(content.maxNestingLevel, 2);
  });

  it('should apply its traversal options', () => {
    const bundle = sampleBundle();
    const composition = sampleComposition();
    composition.section = chainSections();
    bundle.entry[0] = { resource: composition };

    assert.throws(() => FhirEPI.fromDict(bundle, { maxDepth: 2 }).getAllHtmlContent(), DepthExceededError);
  });

  it('should filter entries by resource type', () => {
    const epi = FhirEPI.fromDict(sampleBundle());
    assert.deepStrictEqual(epi.getEntriesByResourceType('MedicinalProductDefinition').map(e => e.fullUrl), ['urn:uuid:med-1']);
    assert.deepStrictEqual(epi.getEntriesByResourceType('Patient'), []);
  });

  it('should manage links through the held Composition', () => {
    const epi = FhirEPI.fromDict(sampleBundle());
    epi.addHtmlElementLink('allergy', { code: 'ALG', display: 'Allergy' });

    assert.deepStrictEqual(epi.getHtmlElementLink('allergy').concept, { code: 'ALG', display: 'Allergy' });
    epi.removeHtmlElementLink('allergy');
    assert.deepStrictEqual(epi.listHtmlElementLinks(), []);
    assert.throws(() => epi.getHtmlElementLink('allergy'), NotFoundError);
  });

  it('should summarise the Composition narrative', () => {
    const summary = FhirEPI.fromDict(sampleBundle()).getHtmlStructureSummary();
    assert.deepStrictEqual(summary.tagCounts, { div: 1, p: 1 });
    assert.deepStrictEqual(summary.classCounts, { intro: 1 });
  });

  it('should describe itself', () => {
    assert.strictEqual(String(FhirEPI.fromDict(sampleBundle())), 'FhirEPI(type=document, entries=2)');
  });
});
