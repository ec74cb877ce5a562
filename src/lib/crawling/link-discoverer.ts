/**
 * Link Discoverer
 * Turns raw hrefs from a rendered page into normalized, de-duplicated URLs
 */

import * as cheerio from 'cheerio';
import { Url } from './crawling.types';
import { tryNormalizeUrl } from './url-normalizer';

// Documents the renderer cannot analyse as pages
const NON_PAGE_EXTENSIONS = [
  '.pdf',
  '.zip',
  '.gz',
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.svg',
  '.webp',
  '.ico',
  '.css',
  '.js',
  '.xml',
  '.mp4',
  '.mp3',
];

export interface DiscoveredLinks {
  /**
   * Normalized page links in first-seen order, without duplicates
   */
  links: Url[];
  /**
   * Raw hrefs that failed normalization (bad syntax, mailto:, javascript:, ...)
   */
  invalid: string[];
  /**
   * Normalized links to non-page resources
   */
  resources: Url[];
  /**
   * Raw hrefs that normalized to a link already in `links`
   */
  duplicates: number;
}

export class LinkDiscoverer {
  /**
   * Collect raw href values of anchors in document order
   */
  extractRawLinks(html: string): string[] {
    const $ = cheerio.load(html);
    const hrefs: string[] = [];

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (href) {
        hrefs.push(href);
      }
    });

    return hrefs;
  }

  /**
   * Resolve raw hrefs against the page they were found on
   */
  discoverLinks(rawLinks: readonly string[], pageUrl: Url): DiscoveredLinks {
    const result: DiscoveredLinks = { links: [], invalid: [], resources: [], duplicates: 0 };
    const seen = new Set<Url>();

    for (const raw of rawLinks) {
      const normalized = tryNormalizeUrl(raw, pageUrl);
      if (normalized === null) {
        result.invalid.push(raw);
        continue;
      }

      if (seen.has(normalized)) {
        result.duplicates++;
        continue;
      }
      seen.add(normalized);

      if (this.isNonPageResource(normalized)) {
        result.resources.push(normalized);
      } else {
        result.links.push(normalized);
      }
    }

    return result;
  }

  private isNonPageResource(url: Url): boolean {
    const pathname = new URL(url).pathname.toLowerCase();
    return NON_PAGE_EXTENSIONS.some((ext) => pathname.endsWith(ext));
  }
}

export const linkDiscoverer = new LinkDiscoverer();
