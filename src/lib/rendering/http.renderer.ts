/**
 * HTTP Renderer
 * Lightweight rendering for static pages: no JavaScript, no layout, no screenshots
 */

import * as cheerio from 'cheerio';
import { env } from '../../config/env';
import { Url } from '../crawling/crawling.types';
import { countElementsInHtml } from '../crawling/element-inventory';
import { linkDiscoverer } from '../crawling/link-discoverer';
import { classifyError, RenderError, RenderTimeoutError } from './errors';
import type { PageRenderer, RenderResult } from './renderer.types';

export interface HttpRendererOptions {
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

export class HttpRenderer implements PageRenderer {
  readonly name = 'http';
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRendererOptions = {}) {
    this.userAgent = options.userAgent ?? env.USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async render(url: Url, timeoutMs: number): Promise<RenderResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new RenderError(url, `HTTP ${response.status}`);
      }

      const contentType = response.headers.get('content-type') || '';
      if (contentType && !/html/i.test(contentType)) {
        throw new RenderError(url, `Unsupported content type "${contentType}"`);
      }

      const html = await response.text();
      const $ = cheerio.load(html);

      return {
        finalUrl: response.url || url,
        title: $('title').first().text().trim(),
        widthPx: 0,
        heightPx: 0,
        inventory: countElementsInHtml(html),
        links: linkDiscoverer.extractRawLinks(html),
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new RenderTimeoutError(url, timeoutMs, { cause: error });
      }
      throw classifyError(error, url, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
