import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FactExtractor } from '../src/services/fact-extractor.js';
import { CURRENT_INCUMBENT, FIELDS, POLAR_RADIUS, measurementField } from '../src/services/fields.js';
import { ExtractionError } from '../src/utils/errors.js';
import { FixturePageSource, fixturePages } from './helpers.js';

function isKind(kind: ExtractionError['kind'], message?: string) {
  return (error: unknown) => {
    assert.ok(error instanceof ExtractionError);
    assert.equal(error.kind, kind);
    if (message !== undefined) {
      assert.equal(error.message, message);
    }
    return true;
  };
}

describe('FactExtractor', () => {
  const extractor = new FactExtractor(fixturePages());

  it('normalizes the infobox text before matching', async () => {
    const text = await extractor.infoboxText('abraham lincoln');
    assert.ok(text.includes('In officeMarch 4, 1861 April 15, 1865'));
  });

  it('extracts a birth date in YYYY-MM-DD form', async () => {
    assert.equal(await extractor.extract('abraham lincoln', FIELDS.birthDate), '1809-02-12');
  });

  it('extracts term start and end from the "In office" layout', async () => {
    assert.equal(await extractor.extract('abraham lincoln', FIELDS.incumbencyStart), 'March 4, 1861');
    assert.equal(await extractor.extract('abraham lincoln', FIELDS.incumbencyEnd), 'April 15, 1865');
  });

  it('falls back to the "Incumbent Assumed office" layout', async () => {
    assert.equal(await extractor.extract('jane doe', FIELDS.incumbencyStart), 'January 20, 2025');
    assert.equal(await extractor.extract('jane doe', FIELDS.incumbencyEnd), CURRENT_INCUMBENT);
  });

  it('uses the first "In office" block for the most recent term', async () => {
    assert.equal(await extractor.extract('grover cleveland', FIELDS.incumbencyStart), 'March 4, 1893');
    assert.equal(await extractor.extract('grover cleveland', FIELDS.incumbencyEnd), 'March 4, 1897');
  });

  it('collects every ordinal in document order', async () => {
    assert.deepEqual(await extractor.extractAll('abraham lincoln', FIELDS.presidentialNumber), ['16']);
    assert.deepEqual(await extractor.extractAll('grover cleveland', FIELDS.presidentialNumber), ['22', '24', '24']);
  });

  it('reads labelled measurements up to their unit', async () => {
    assert.equal(await extractor.extract('mars', POLAR_RADIUS), '3376.2');
    assert.equal(await extractor.extract('mars', measurementField('Equatorial radius', 'km')), '3396.2');
  });

  it('skips an uncertainty between the value and its unit', async () => {
    const pages = new FixturePageSource({
      mars: '<table class="infobox"><tr><th>Polar radius</th><td>3376.2&plusmn;0.1&nbsp;km<sup>[5]</sup></td></tr></table>'
    });
    const uncertain = new FactExtractor(pages);

    assert.equal(await uncertain.infoboxText('mars'), 'Polar radius3376.2 0.1 km[5]');
    assert.equal(await uncertain.extract('mars', POLAR_RADIUS), '3376.2');
  });

  it('rejects with no-infobox when the page has no summary box', async () => {
    await assert.rejects(extractor.extract('plain page', FIELDS.birthDate), isKind('no-infobox', 'Page has no infobox'));
  });

  it('rejects with pattern-mismatch after every layout fails', async () => {
    await assert.rejects(
      extractor.extract('jane doe', FIELDS.birthDate),
      isKind('pattern-mismatch', 'Page infobox has no birth information (at least none in xxxx-xx-xx format)')
    );
    await assert.rejects(
      extractor.extractAll('mars', FIELDS.presidentialNumber),
      isKind('pattern-mismatch', 'Page infobox has no presidential number information')
    );
  });

  it('propagates page lookup failures', async () => {
    await assert.rejects(extractor.extract('nobody', FIELDS.birthDate), isKind('no-page'));
  });

  it('fetches the page again for every extraction', async () => {
    const pages = new FixturePageSource({ mars: '<table class="infobox"><tr><td>Polar radius 10 km</td></tr></table>' });
    const uncached = new FactExtractor(pages);

    await uncached.extract('mars', POLAR_RADIUS);
    await uncached.extract('mars', POLAR_RADIUS);

    assert.deepEqual(pages.requests, ['mars', 'mars']);
  });
});
