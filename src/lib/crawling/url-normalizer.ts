/**
 * URL Normalization Utilities
 * Every frontier and graph identity goes through normalizeUrl()
 */

import { InvalidUrlError, errorMessage } from '../rendering/errors';
import { ScopeRule, Url } from './crawling.types';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Normalize a URL so that the same logical page always maps to the same string.
 *
 * Rules:
 * 1. Resolve against baseUrl when the input is relative
 * 2. Lowercase scheme and hostname
 * 3. Remove fragment
 * 4. Sort query parameters by key (stable for repeated keys)
 * 5. Remove trailing slash (except for root)
 *
 * @throws InvalidUrlError when the input cannot be parsed or is not http(s)
 */
export function normalizeUrl(url: string, baseUrl?: string): Url {
  const input = url.trim();
  if (!input) {
    throw new InvalidUrlError(url, 'must be a non-empty string');
  }

  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(input, baseUrl) : new URL(input);
  } catch (error) {
    throw new InvalidUrlError(url, errorMessage(error));
  }

  if (!SUPPORTED_PROTOCOLS.has(urlObj.protocol)) {
    throw new InvalidUrlError(url, `unsupported protocol "${urlObj.protocol}"`);
  }

  urlObj.hostname = urlObj.hostname.toLowerCase();
  urlObj.hash = '';
  urlObj.searchParams.sort();

  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.replace(/\/+$/, '') || '/';
  }

  return urlObj.href;
}

/**
 * Like normalizeUrl(), but returns null instead of throwing
 */
export function tryNormalizeUrl(url: string, baseUrl?: string): Url | null {
  try {
    return normalizeUrl(url, baseUrl);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}

/**
 * Extract the lowercase hostname of an absolute URL
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Check whether a URL is crawlable under the scope rule.
 * The seed host is always in scope.
 */
export function inScope(url: Url, seed: Url, scope: ScopeRule = { type: 'same-host' }): boolean {
  const host = extractHost(url);
  if (!host) {
    return false;
  }

  if (host === extractHost(seed)) {
    return true;
  }

  if (scope.type === 'allow-list') {
    return scope.domains.some((domain) => {
      const allowed = domain.trim().toLowerCase();
      return allowed.length > 0 && (host === allowed || host.endsWith(`.${allowed}`));
    });
  }

  return false;
}
