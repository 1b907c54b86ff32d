import type { ChannelReference } from '../../types/stream.js';
import { BoundedCache } from './bounded_cache.js';

export const PLATFORM_DOMAIN = 'twitch.tv';
export const CHANNEL_URL_PATTERN = /^https?:\/\/(?:www\.)?twitch\.tv\/([a-zA-Z0-9_]{3,25})\/?$/i;

export enum UrlValidationError {
  EMPTY_INPUT = 'EmptyInput',
  NOT_FROM_PLATFORM = 'NotFromPlatform',
  MISSING_SCHEME = 'MissingScheme',
  MALFORMED_FORMAT = 'MalformedFormat'
}

export const VALIDATION_MESSAGES: Record<UrlValidationError, string> = {
  [UrlValidationError.EMPTY_INPUT]: 'Please enter a Twitch stream URL',
  [UrlValidationError.NOT_FROM_PLATFORM]: 'URL must be from Twitch (twitch.tv)',
  [UrlValidationError.MISSING_SCHEME]: 'URL must start with http:// or https://',
  [UrlValidationError.MALFORMED_FORMAT]:
    'Invalid Twitch URL format.\nExample: https://www.twitch.tv/streamer_name'
};

export type ValidationResult =
  | { valid: true; reason: '' }
  | { valid: false; reason: string; code: UrlValidationError };

const validationCache = new BoundedCache<string, ValidationResult>({ maxSize: 100 });
const handleCache = new BoundedCache<string, string>({ maxSize: 50 });

function capitalize(handle: string): string {
  return handle.charAt(0).toUpperCase() + handle.slice(1).toLowerCase();
}

function invalid(code: UrlValidationError): ValidationResult {
  return { valid: false, reason: VALIDATION_MESSAGES[code], code };
}

/**
 * Check that a user-supplied link points at a Twitch channel.
 */
export function validate(raw: string): ValidationResult {
  const url = raw.trim();
  if (!url) {
    return invalid(UrlValidationError.EMPTY_INPUT);
  }

  const cached = validationCache.get(url);
  if (cached) return cached;

  let result: ValidationResult;
  if (CHANNEL_URL_PATTERN.test(url)) {
    result = { valid: true, reason: '' };
  } else if (!url.toLowerCase().includes(PLATFORM_DOMAIN)) {
    result = invalid(UrlValidationError.NOT_FROM_PLATFORM);
  } else if (!/^https?:\/\//i.test(url)) {
    result = invalid(UrlValidationError.MISSING_SCHEME);
  } else {
    result = invalid(UrlValidationError.MALFORMED_FORMAT);
  }

  validationCache.set(url, result);
  return result;
}

/**
 * Capitalized channel handle ("Xqc"), or '' when the link is not a channel URL.
 */
export function extractHandle(raw: string): string {
  if (!raw) return '';

  const cached = handleCache.get(raw);
  if (cached !== undefined) return cached;

  const match = CHANNEL_URL_PATTERN.exec(raw.trim());
  const result = match ? capitalize(match[1]) : '';

  handleCache.set(raw, result);
  return result;
}

/**
 * Canonical https://www.twitch.tv/<handle> form. Input that does not match is
 * returned untouched, so callers must validate before use.
 */
export function normalize(raw: string): string {
  if (!raw) return '';
  const match = CHANNEL_URL_PATTERN.exec(raw.trim());
  return match ? canonicalUrlFor(match[1]) : raw;
}

export function canonicalUrlFor(handle: string): string {
  return `https://www.${PLATFORM_DOMAIN}/${handle.toLowerCase()}`;
}

export function toChannelReference(raw: string): ChannelReference | null {
  const displayName = extractHandle(raw);
  if (!displayName) return null;
  const handle = displayName.toLowerCase();
  return { handle, displayName, canonicalUrl: canonicalUrlFor(handle) };
}

export function sameChannel(a: ChannelReference, b: ChannelReference): boolean {
  return a.handle === b.handle;
}

export function clearValidationCache(): void {
  validationCache.clear();
  handleCache.clear();
}
