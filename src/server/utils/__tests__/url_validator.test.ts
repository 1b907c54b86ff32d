import { describe, test, expect, beforeEach } from '@jest/globals';
import {
  UrlValidationError,
  VALIDATION_MESSAGES,
  clearValidationCache,
  extractHandle,
  normalize,
  toChannelReference,
  validate
} from '../url_validator';

describe('url_validator', () => {
  beforeEach(() => {
    clearValidationCache();
  });

  describe('validate', () => {
    test.each([
      'https://www.twitch.tv/xqc',
      'http://twitch.tv/xqc',
      'https://twitch.tv/Shroud/',
      'HTTPS://WWW.TWITCH.TV/Some_User_42',
      '  https://www.twitch.tv/abc  '
    ])('accepts %s', (url) => {
      expect(validate(url)).toEqual({ valid: true, reason: '' });
    });

    test('accepts handles of 3 and 25 characters', () => {
      expect(validate('https://www.twitch.tv/abc').valid).toBe(true);
      expect(validate(`https://www.twitch.tv/${'a'.repeat(25)}`).valid).toBe(true);
    });

    test('rejects handles of 2 and 26 characters as malformed', () => {
      for (const handle of ['ab', 'a'.repeat(26)]) {
        expect(validate(`https://www.twitch.tv/${handle}`)).toEqual({
          valid: false,
          reason: VALIDATION_MESSAGES[UrlValidationError.MALFORMED_FORMAT],
          code: UrlValidationError.MALFORMED_FORMAT
        });
      }
    });

    test('rejects blank input', () => {
      const result = validate('   ');
      expect(result.valid).toBe(false);
      expect(result.reason).toBe('Please enter a Twitch stream URL');
    });

    test('rejects other sites', () => {
      const result = validate('https://www.youtube.com/watch?v=abc');
      expect(result).toEqual({
        valid: false,
        reason: 'URL must be from Twitch (twitch.tv)',
        code: UrlValidationError.NOT_FROM_PLATFORM
      });
    });

    test('rejects a missing scheme', () => {
      const result = validate('www.twitch.tv/xqc');
      expect(result).toEqual({
        valid: false,
        reason: 'URL must start with http:// or https://',
        code: UrlValidationError.MISSING_SCHEME
      });
    });

    test('rejects extra path segments and bad characters', () => {
      expect(validate('https://www.twitch.tv/xqc/videos').valid).toBe(false);
      expect(validate('https://www.twitch.tv/bad-name').valid).toBe(false);
    });

    test('returns the same answer from cache', () => {
      const first = validate('https://www.twitch.tv/xqc');
      const second = validate('https://www.twitch.tv/xqc');
      expect(second).toEqual(first);
    });
  });

  describe('extractHandle', () => {
    test('capitalizes only the first letter', () => {
      expect(extractHandle('https://www.twitch.tv/xQC')).toBe('Xqc');
      expect(extractHandle('https://twitch.tv/some_user/')).toBe('Some_user');
    });

    test('returns empty string for non-channel input', () => {
      expect(extractHandle('')).toBe('');
      expect(extractHandle('https://www.twitch.tv/ab')).toBe('');
      expect(extractHandle('https://example.com/xqc')).toBe('');
    });
  });

  describe('normalize', () => {
    test('produces the canonical lowercase form', () => {
      expect(normalize('http://TWITCH.tv/XQC/')).toBe('https://www.twitch.tv/xqc');
    });

    test('is idempotent', () => {
      const once = normalize('https://twitch.tv/Shroud');
      expect(normalize(once)).toBe(once);
    });

    test('leaves invalid input unchanged', () => {
      expect(normalize('not a url')).toBe('not a url');
      expect(normalize('')).toBe('');
    });
  });

  describe('toChannelReference', () => {
    test('builds handle, display name and canonical URL', () => {
      expect(toChannelReference('https://twitch.tv/XqC/')).toEqual({
        handle: 'xqc',
        displayName: 'Xqc',
        canonicalUrl: 'https://www.twitch.tv/xqc'
      });
    });

    test('returns null for invalid input', () => {
      expect(toChannelReference('https://www.twitch.tv/ab')).toBeNull();
    });
  });
});
