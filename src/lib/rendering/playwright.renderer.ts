/**
 * Playwright Renderer
 * Full browser rendering: page dimensions, visible interactive elements, links and screenshots.
 *
 * Each render has one deadline. Steps after navigation get only the time left, and the
 * browser context is closed when the deadline passes.
 */

import { chromium, errors, Browser, BrowserContext, Page } from 'playwright';
import { env } from '../../config/env';
import { DetectedElement, Url } from '../crawling/crawling.types';
import { sectionCount } from '../crawling/element-details';
import { createInventory, ELEMENT_SELECTORS, isElementCategory } from '../crawling/element-inventory';
import { classifyError, RenderError, RenderTimeoutError } from './errors';
import type { PageRenderer, RenderResult, SectionScreenshot } from './renderer.types';

const BLOCKED_RESOURCE_TYPES = ['font', 'media'];
const MAX_SCROLL_STEPS = 20;
const SCROLL_SETTLE_MS = 250;
const MAX_SECTIONS = 50;

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-blink-features=AutomationControlled',
  '--no-first-run',
];

export interface PlaywrightRendererOptions {
  headless?: boolean;
  viewport?: { width: number; height: number };
  userAgent?: string;
  screenshots?: boolean;
  fullPageScreenshots?: boolean;
  /**
   * Also capture one viewport-sized screenshot per section of the page
   */
  sectionScreenshots?: boolean;
  /**
   * Report position, size and text of every visible interactive element
   */
  elementDetails?: boolean;
  blockResources?: boolean;
}

interface InspectArgs {
  selectors: Record<string, string>;
  details: boolean;
}

interface InspectedElement {
  category: string;
  tagName: string;
  text: string;
  attributes: Record<string, string>;
  box: { x: number; y: number; width: number; height: number };
}

interface Inspection {
  counts: Record<string, number>;
  elements: InspectedElement[];
}

export class PlaywrightRenderer implements PageRenderer {
  readonly name = 'playwright';
  private readonly options: Required<PlaywrightRendererOptions>;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(options: PlaywrightRendererOptions = {}) {
    this.options = {
      headless: options.headless ?? env.HEADLESS,
      viewport: options.viewport ?? { width: env.VIEWPORT_WIDTH, height: env.VIEWPORT_HEIGHT },
      userAgent: options.userAgent ?? env.USER_AGENT,
      screenshots: options.screenshots ?? env.SCREENSHOT_ENABLED,
      fullPageScreenshots: options.fullPageScreenshots ?? env.SCREENSHOT_FULL_PAGE,
      sectionScreenshots: options.sectionScreenshots ?? env.SCREENSHOT_SECTIONS,
      elementDetails: options.elementDetails ?? env.ELEMENT_DETAILS,
      blockResources: options.blockResources ?? env.BLOCK_RESOURCES,
    };
  }

  async render(url: Url, timeoutMs: number): Promise<RenderResult> {
    const deadline = Date.now() + timeoutMs;
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      viewport: this.options.viewport,
      userAgent: this.options.userAgent,
    });

    let closing: Promise<void> | null = null;
    const closeContext = (): Promise<void> => {
      if (!closing) {
        closing = context.close().catch((closeError: unknown) => {
          console.warn(`⚠️  Failed to close browser context for ${url}:`, closeError);
        });
      }
      return closing;
    };

    try {
      return await withDeadline(this.renderPage(context, url, deadline), url, timeoutMs, deadline, () => {
        void closeContext();
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new RenderTimeoutError(url, timeoutMs, { cause: error });
      }
      throw classifyError(error, url, timeoutMs);
    } finally {
      await closeContext();
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.launching = null;
    if (browser) {
      await browser.close();
    }
  }

  private async renderPage(context: BrowserContext, url: Url, deadline: number): Promise<RenderResult> {
    const remaining = (): number => Math.max(1, deadline - Date.now());

    const page = await context.newPage();
    page.setDefaultTimeout(remaining());

    if (this.options.blockResources) {
      await page.route('**/*', (route) => {
        if (BLOCKED_RESOURCE_TYPES.includes(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });
    }

    const response = await page.goto(url, { waitUntil: 'load', timeout: remaining() });
    if (response && response.status() >= 400) {
      throw new RenderError(url, `HTTP ${response.status()}`);
    }
    page.setDefaultTimeout(remaining());

    await this.scrollThroughPage(page, deadline);

    const title = await page.title();
    const dimensions = await page.evaluate(() => ({
      width: Math.max(
        document.documentElement.scrollWidth,
        document.body ? document.body.scrollWidth : 0
      ),
      height: Math.max(
        document.documentElement.scrollHeight,
        document.body ? document.body.scrollHeight : 0
      ),
    }));
    const inspection = await page.evaluate(inspectElements, {
      selectors: { ...ELEMENT_SELECTORS },
      details: this.options.elementDetails,
    });
    const links = await page.$$eval('a[href]', (anchors) =>
      anchors
        .map((anchor) => (anchor.getAttribute('href') || '').trim())
        .filter((href) => href.length > 0)
    );

    const screenshot = this.options.screenshots
      ? await page.screenshot({ fullPage: this.options.fullPageScreenshots, type: 'png', timeout: remaining() })
      : undefined;
    const sections =
      this.options.screenshots && this.options.sectionScreenshots
        ? await this.captureSections(page, dimensions.height, deadline)
        : undefined;

    return {
      finalUrl: page.url(),
      title,
      widthPx: dimensions.width,
      heightPx: dimensions.height,
      inventory: createInventory(inspection.counts),
      links,
      screenshot,
      viewport: { ...this.options.viewport },
      sections,
      elements: this.options.elementDetails ? toDetectedElements(inspection.elements) : undefined,
    };
  }

  /**
   * Launch once and reuse the browser across pages
   */
  private async getBrowser(): Promise<Browser> {
    if (this.browser && this.browser.isConnected()) {
      return this.browser;
    }

    if (!this.launching) {
      console.log('🌐 Launching browser...');
      this.launching = chromium
        .launch({ headless: this.options.headless, args: LAUNCH_ARGS })
        .then((browser) => {
          this.browser = browser;
          browser.on('disconnected', () => {
            if (this.browser === browser) {
              this.browser = null;
            }
          });
          return browser;
        })
        .finally(() => {
          this.launching = null;
        });
    }

    return this.launching;
  }

  /**
   * Scroll to the bottom until the height stops growing so lazy content is loaded.
   * Stops early when the render budget would not cover another settle pause.
   */
  private async scrollThroughPage(page: Page, deadline: number): Promise<void> {
    let lastHeight = await page.evaluate(() => document.body?.scrollHeight ?? 0);

    for (let step = 0; step < MAX_SCROLL_STEPS && deadline - Date.now() > SCROLL_SETTLE_MS; step++) {
      await page.evaluate(() => window.scrollTo(0, document.body?.scrollHeight ?? 0));
      await page.waitForTimeout(SCROLL_SETTLE_MS);

      const newHeight = await page.evaluate(() => document.body?.scrollHeight ?? 0);
      if (newHeight === lastHeight) {
        break;
      }
      lastHeight = newHeight;
    }

    await page.evaluate(() => window.scrollTo(0, 0));
  }

  /**
   * One viewport screenshot per section, top to bottom
   */
  private async captureSections(page: Page, pageHeight: number, deadline: number): Promise<SectionScreenshot[]> {
    const viewportHeight = this.options.viewport.height;
    const count = Math.min(MAX_SECTIONS, sectionCount(pageHeight, viewportHeight));
    const sections: SectionScreenshot[] = [];

    for (let index = 0; index < count; index++) {
      const scrollTop = index * viewportHeight;
      await page.evaluate((top) => window.scrollTo(0, top), scrollTop);
      if (deadline - Date.now() > SCROLL_SETTLE_MS) {
        await page.waitForTimeout(SCROLL_SETTLE_MS);
      }

      const image = await page.screenshot({ type: 'png', timeout: Math.max(1, deadline - Date.now()) });
      sections.push({ number: index + 1, scrollTop, image });
    }

    await page.evaluate(() => window.scrollTo(0, 0));
    return sections;
  }
}

/**
 * Reject with RenderTimeoutError once the deadline passes, after calling onExpire.
 * A late result or error of the work is discarded.
 */
function withDeadline<T>(
  work: Promise<T>,
  url: Url,
  timeoutMs: number,
  deadline: number,
  onExpire: () => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onExpire();
      reject(new RenderTimeoutError(url, timeoutMs));
    }, Math.max(0, deadline - Date.now()));

    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function toDetectedElements(elements: InspectedElement[]): DetectedElement[] {
  return elements.flatMap((element) =>
    isElementCategory(element.category) ? [{ ...element, category: element.category }] : []
  );
}

/**
 * Runs inside the page. Counts elements per selector that are effectively visible,
 * and with `details` also returns their text, key attributes and document-relative boxes.
 */
function inspectElements({ selectors, details }: InspectArgs): Inspection {
  const detailAttributes = ['id', 'name', 'type', 'href', 'role', 'aria-label', 'title', 'placeholder'];

  const isVisible = (element: Element): boolean => {
    if (!element.isConnected) return false;

    const style = window.getComputedStyle(element);
    if (style.display === 'none' || style.visibility === 'hidden' || style.opacity === '0') {
      return false;
    }

    const rect = element.getBoundingClientRect();
    if (rect.width === 0 && rect.height === 0) {
      return false;
    }

    if (style.position === 'fixed' || style.position === 'absolute') {
      const scrollWidth = document.documentElement.scrollWidth;
      const scrollHeight = document.documentElement.scrollHeight;
      if (
        rect.right < 0 ||
        rect.bottom + window.scrollY < 0 ||
        rect.left > scrollWidth ||
        rect.top + window.scrollY > scrollHeight
      ) {
        return false;
      }
    }

    return true;
  };

  const counts: Record<string, number> = {};
  const elements: InspectedElement[] = [];

  for (const [category, selector] of Object.entries(selectors)) {
    let visible: Element[];
    try {
      visible = Array.from(document.querySelectorAll(selector)).filter(isVisible);
    } catch {
      visible = [];
    }
    counts[category] = visible.length;

    if (!details) continue;
    for (const element of visible) {
      const rect = element.getBoundingClientRect();
      const attributes: Record<string, string> = {};
      for (const name of detailAttributes) {
        const value = element.getAttribute(name);
        if (value !== null) attributes[name] = value;
      }
      elements.push({
        category,
        tagName: element.tagName.toLowerCase(),
        text: (element.textContent || '').replace(/\s+/g, ' ').trim().slice(0, 100),
        attributes,
        box: {
          x: rect.left + window.scrollX,
          y: rect.top + window.scrollY,
          width: rect.width,
          height: rect.height,
        },
      });
    }
  }

  return { counts, elements };
}
