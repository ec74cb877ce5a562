/**
 * Renderer interface and shared types
 */

import { DetectedElement, ElementInventory, PageDimensions, Url } from '../crawling/crawling.types';

/**
 * Viewport-sized screenshot taken at one scroll position
 */
export interface SectionScreenshot {
  /**
   * 1-based, top to bottom
   */
  number: number;
  scrollTop: number;
  image: Buffer;
}

export interface RenderResult {
  /**
   * URL after redirects; links are resolved against it
   */
  finalUrl?: string;
  title: string;
  widthPx: number;
  heightPx: number;
  inventory: ElementInventory;
  /**
   * Raw href values in document order
   */
  links: string[];
  screenshot?: Buffer;
  /**
   * Viewport the page was laid out in; present when the renderer has a layout engine
   */
  viewport?: PageDimensions;
  sections?: SectionScreenshot[];
  elements?: DetectedElement[];
}

/**
 * Loads a page and reports what is on it.
 * Fails with RenderTimeoutError when the page does not load in time and
 * RenderError for anything structural.
 */
export interface PageRenderer {
  readonly name: string;
  render(url: Url, timeoutMs: number): Promise<RenderResult>;
  close?(): Promise<void>;
}
