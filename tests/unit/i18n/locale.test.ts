/**
 * Locale Tests
 *
 * Tests for tag parsing, interning and fallback relationships.
 */

import { describe, it, expect } from 'vitest';
import { Locale, toLocale } from '../../../src/i18n/locale';
import { LocaleParseError } from '../../../src/errors/TranslationError';

describe('Locale', () => {
  describe('fromTag', () => {
    it('should parse a base language', () => {
      const locale = Locale.fromTag('fr');

      expect(locale.language).toBe('fr');
      expect(locale.region).toBeNull();
      expect(locale.toTag()).toBe('fr');
    });

    it('should parse a regional variant with either separator', () => {
      expect(Locale.fromTag('en-GB').toTag()).toBe('en-GB');
      expect(Locale.fromTag('en_GB').toTag()).toBe('en-GB');
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(Locale.fromTag(' PT_br ').toTag()).toBe('pt-BR');
      expect(Locale.fromTag('ZH').toTag()).toBe('zh');
    });

    it('should intern locales', () => {
      expect(Locale.fromTag('de-AT')).toBe(Locale.fromTag('de_at'));
      expect(Locale.fromTag('de-AT').equals(Locale.fromTag('DE-at'))).toBe(true);
    });

    it('should throw LocaleParseError for unknown tags', () => {
      expect(() => Locale.fromTag('xx')).toThrow(LocaleParseError);
      expect(() => Locale.fromTag('xx')).toThrow("Invalid locale: expected a valid locale code but found 'xx'");
    });

    it('should reject regions that are not supported for the language', () => {
      expect(() => Locale.fromTag('de-DE')).toThrow(LocaleParseError);
      expect(Locale.tryFromTag('ja-JP')).toBeUndefined();
    });

    it('should reject tags with more than two subtags', () => {
      expect(Locale.isValidTag('zh-Hant-TW')).toBe(false);
      expect(Locale.isValidTag('')).toBe(false);
    });

    it('should record the rejected tag on the error', () => {
      try {
        Locale.fromTag('klingon');
        expect.fail('expected LocaleParseError');
      } catch (error) {
        expect(error).toBeInstanceOf(LocaleParseError);
        if (error instanceof LocaleParseError) {
          expect(error.tag).toBe('klingon');
          expect(error.code).toBe('INVALID_LOCALE');
        }
      }
    });
  });

  describe('of', () => {
    it('should build a locale from language and region codes', () => {
      expect(Locale.of('fr', 'CA')).toBe(Locale.fromTag('fr-CA'));
      expect(Locale.of('ja')).toBe(Locale.fromTag('ja'));
    });
  });

  describe('all', () => {
    it('should list every supported language and variant', () => {
      const all = Locale.all();

      expect(all).toHaveLength(244);
      expect(all.filter((locale) => locale.kind === 'regional')).toHaveLength(63);
    });

    it('should return locales in canonical order', () => {
      const all = Locale.all();
      const sorted = [...all].sort((a, b) => a.compare(b));

      expect(sorted).toEqual(all);
    });
  });

  describe('displayName', () => {
    it('should name base languages and variants', () => {
      expect(Locale.fromTag('fr').displayName).toBe('French');
      expect(Locale.fromTag('en-GB').displayName).toBe('English (United Kingdom)');
      expect(Locale.fromTag('ar-AE').displayName).toBe('Arabic (United Arab Emirates)');
    });
  });

  describe('fallback', () => {
    it('should fall back from a variant to its base language', () => {
      expect(Locale.fromTag('fr-CA').parentFallback()).toBe(Locale.fromTag('fr'));
    });

    it('should have no parent for a base language', () => {
      expect(Locale.fromTag('fr').parentFallback()).toBeNull();
    });

    it('should build the chain from most to least specific', () => {
      expect(Locale.fromTag('es-MX').fallbackChain().map((locale) => locale.toTag())).toEqual(['es-MX', 'es']);
      expect(Locale.fromTag('ja').fallbackChain().map((locale) => locale.toTag())).toEqual(['ja']);
    });

    it('should produce finite chains ending at a base language for every locale', () => {
      for (const locale of Locale.all()) {
        const chain = locale.fallbackChain();

        expect(chain[0]).toBe(locale);
        expect(chain.length).toBeLessThanOrEqual(2);
        expect(new Set(chain).size).toBe(chain.length);
        expect(chain[chain.length - 1].kind).toBe('base');
        expect(chain[chain.length - 1].parentFallback()).toBeNull();
      }
    });
  });

  describe('variants', () => {
    it('should report whether a locale is a regional variant', () => {
      expect(Locale.fromTag('en-US').hasVariant()).toBe(true);
      expect(Locale.fromTag('en').hasVariant()).toBe(false);
    });

    it('should strip the variant', () => {
      expect(Locale.fromTag('en-US').withDefaultVariant()).toBe(Locale.fromTag('en'));
      expect(Locale.fromTag('en').withDefaultVariant()).toBe(Locale.fromTag('en'));
    });
  });

  describe('serialization', () => {
    it('should serialize to its canonical tag', () => {
      expect(JSON.stringify({ locale: Locale.fromTag('pt_br') })).toBe('{"locale":"pt-BR"}');
      expect(`${Locale.fromTag('sv-FI')}`).toBe('sv-FI');
    });

    it('should round-trip through its tag', () => {
      for (const locale of Locale.all()) {
        expect(Locale.fromTag(locale.toTag())).toBe(locale);
      }
    });
  });

  describe('toLocale', () => {
    it('should accept a locale or a tag', () => {
      const locale = Locale.fromTag('it-CH');

      expect(toLocale(locale)).toBe(locale);
      expect(toLocale('it_ch')).toBe(locale);
    });

    it('should parse tags strictly', () => {
      expect(() => toLocale('it-IT')).toThrow(LocaleParseError);
    });
  });
});
