import { describe, it } from 'node:test';
import assert from 'node:assert';
import { LinkDistinctionPolicy } from '../../../article/redirect/link-distinction.policy.js';
import { SuffixPreferredPolicy } from '../../../article/redirect/suffix-preferred.policy.js';
import { FANDOM_STAGES, WOOKIEEPEDIA_STAGES } from '../../../article/rewrite/fandom-stages.js';
import { detectLanguageFromUrl, isRightToLeftLanguage } from '../../language.js';
import { getVariantProfile, resolveVariant } from '../mediawiki-variants.js';

describe('resolveVariant', () => {
  it('picks the variant from the configured URL', () => {
    assert.deepStrictEqual(resolveVariant('https://en.wikipedia.org/w'), { variant: 'mediawiki', url: 'https://en.wikipedia.org/w' });
    assert.deepStrictEqual(resolveVariant('https://muppet.fandom.com'), { variant: 'fandom', url: 'https://muppet.fandom.com' });
    assert.deepStrictEqual(resolveVariant('https://memory-alpha.wikia.com'), { variant: 'fandom', url: 'https://memory-alpha.wikia.com' });
    assert.deepStrictEqual(resolveVariant('https://starwars.fandom.com'), { variant: 'wookieepedia', url: 'https://starwars.fandom.com' });
    assert.deepStrictEqual(resolveVariant('http://starwars.wikia.com'), { variant: 'wookieepedia', url: 'http://starwars.wikia.com' });
  });

  it('chops the Legends marker', () => {
    assert.deepStrictEqual(resolveVariant('https://starwars.fandom.com (Legends)'), {
      variant: 'wookieepedia-legends',
      url: 'https://starwars.fandom.com',
    });
    assert.deepStrictEqual(resolveVariant('https://starwars.wikia.com (Legends)'), {
      variant: 'wookieepedia-legends',
      url: 'https://starwars.wikia.com',
    });
  });
});

describe('getVariantProfile', () => {
  it('gives Legends both policies and fresh instances per lookup', () => {
    const profile = getVariantProfile('wookieepedia-legends');
    const first = profile.createPolicies();
    const second = profile.createPolicies();

    assert.strictEqual(first.length, 2);
    assert.ok(first[0] instanceof LinkDistinctionPolicy);
    assert.ok(first[1] instanceof SuffixPreferredPolicy);
    assert.notStrictEqual(first[1], second[1]);
    assert.strictEqual(profile.preprocess, WOOKIEEPEDIA_STAGES);
  });

  it('gives plain wikis no stages and no policies', () => {
    const profile = getVariantProfile('mediawiki');
    assert.deepStrictEqual(profile.preprocess, []);
    assert.deepStrictEqual(profile.createPolicies(), []);
    assert.strictEqual(getVariantProfile('fandom').preprocess, FANDOM_STAGES);
  });
});

describe('language detection', () => {
  it('reads the language from the first host label', () => {
    assert.strictEqual(detectLanguageFromUrl('https://en.wikipedia.org/w'), 'en');
    assert.strictEqual(detectLanguageFromUrl('http://he.wiktionary.org/w'), 'he');
    assert.strictEqual(detectLanguageFromUrl('de.wikipedia.org/w'), 'de');
  });

  it('finds nothing for other hosts', () => {
    assert.strictEqual(detectLanguageFromUrl('https://starwars.fandom.com'), undefined);
    assert.strictEqual(detectLanguageFromUrl('https://www.mediawiki.org/w'), undefined);
  });

  it('knows right-to-left languages', () => {
    assert.strictEqual(isRightToLeftLanguage('he'), true);
    assert.strictEqual(isRightToLeftLanguage('AR'), true);
    assert.strictEqual(isRightToLeftLanguage('en'), false);
    assert.strictEqual(isRightToLeftLanguage(undefined), false);
  });
});
