/**
 * Unit tests for the text normalization steps
 */

import {
  collapseWhitespace,
  normalizeText,
  normalizeUnicode,
  removeControlCharacters,
  replaceTypography,
  stripMarkup
} from '../text';

describe('Text normalization', () => {
  describe('stripMarkup', () => {
    it('should remove tags and keep their text', () => {
      expect(stripMarkup('<p>Hello <b>world</b></p>')).toBe('Hello world');
    });

    it('should remove entity-encoded markup instead of keeping it as literal text', () => {
      expect(stripMarkup('&lt;script&gt;alert(1)&lt;/script&gt;')).toBe('alert(1)');
    });

    it('should decode numeric entities', () => {
      expect(stripMarkup('It&#39;s &#x27;here&#x27;')).toBe("It's 'here'");
    });
  });

  describe('normalizeUnicode', () => {
    it('should compose decomposed characters', () => {
      expect(normalizeUnicode('Cafe\u0301')).toBe('Caf\u00e9');
    });
  });

  describe('replaceTypography', () => {
    it('should replace smart quotes, dashes and non-breaking spaces', () => {
      expect(replaceTypography('\u2018a\u2019 \u201Cb\u201D c\u2013d e\u2014f\u00A0g')).toBe('\'a\' "b" c-d e-f g');
    });
  });

  describe('removeControlCharacters', () => {
    it('should drop control and replacement characters but keep tabs', () => {
      expect(removeControlCharacters('a\u0000b\u0007c\uFFFDd\te')).toBe('abcd\te');
    });
  });

  describe('collapseWhitespace', () => {
    it('should collapse runs and trim', () => {
      expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
    });
  });

  describe('normalizeText', () => {
    it('should decode entities, collapse spaces and convert nbsp', () => {
      expect(normalizeText('Tom &amp; Jerry  went&nbsp;home')).toBe('Tom & Jerry went home');
    });

    it('should turn curly quotes from numeric entities into ASCII', () => {
      expect(normalizeText('It&#39;s &#8220;fine&#8221;')).toBe('It\'s "fine"');
    });

    it('should keep words on separate lines apart', () => {
      expect(normalizeText('Line one\nLine two')).toBe('Line one Line two');
    });

    it('should fully decode double-encoded entities', () => {
      expect(normalizeText('Fish &amp;amp; Chips')).toBe('Fish & Chips');
    });

    it('should fully decode deeply nested entity encodings in one call', () => {
      const nested = 'Fish &' + 'amp;'.repeat(8) + ' Chips';
      const once = normalizeText(nested);

      expect(once).toBe('Fish & Chips');
      expect(normalizeText(once)).toBe(once);
    });

    it('should reduce whitespace-only values to an empty string', () => {
      expect(normalizeText(' \u00A0\t ')).toBe('');
    });

    it('should be idempotent', () => {
      const samples = [
        'Tom &amp; Jerry  went&nbsp;home',
        '&amp;lt;b&amp;gt;bold&amp;lt;/b&amp;gt; text',
        '<div>\u201CQuoted\u201D \u2014 <i>news</i></div>',
        'Cafe\u0301\u0000 menu\uFFFD',
        'a <> b < c > d'
      ];

      for (const sample of samples) {
        const once = normalizeText(sample);
        expect(normalizeText(once)).toBe(once);
      }
    });
  });
});
