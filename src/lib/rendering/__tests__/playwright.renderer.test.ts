/**
 * Playwright Renderer Tests
 * The browser is replaced by an in-process fake; no Chromium is launched.
 */

import { chromium, errors } from 'playwright';
import { PlaywrightRenderer } from '../playwright.renderer';
import { createInventory } from '../../crawling/element-inventory';
import { RenderError, RenderTimeoutError } from '../errors';

interface GotoOptions {
  waitUntil?: string;
  timeout?: number;
}

interface ScreenshotOptions {
  fullPage?: boolean;
  type?: string;
  timeout?: number;
}

const inspectedButton = {
  category: 'buttons',
  tagName: 'button',
  text: 'Sign up',
  attributes: { id: 'signup' },
  box: { x: 40, y: 780, width: 120, height: 40 },
};

const mockPage = {
  setDefaultTimeout: jest.fn((_timeout: number) => undefined),
  route: jest.fn(async () => undefined),
  goto: jest.fn(
    async (_url: string, _options?: GotoOptions): Promise<{ status: () => number }> => ({ status: () => 200 })
  ),
  waitForTimeout: jest.fn(async (_ms: number) => undefined),
  title: jest.fn(async (): Promise<string> => 'Fake Page'),
  evaluate: jest.fn(async (fn: () => unknown, arg?: unknown): Promise<unknown> => {
    if (typeof arg === 'number') return undefined;
    if (typeof arg === 'object' && arg !== null) {
      return {
        counts: { buttons: 2, links: 3 },
        elements: [inspectedButton, { ...inspectedButton, category: 'not-a-category' }],
      };
    }
    const source = fn.toString();
    if (source.includes('scrollWidth')) return { width: 1280, height: 3400 };
    if (source.includes('scrollTo')) return undefined;
    return 3400;
  }),
  $$eval: jest.fn(async () => ['/a', 'https://other.com/x']),
  screenshot: jest.fn(async (_options?: ScreenshotOptions) => Buffer.from('png')),
  url: jest.fn(() => 'https://example.com/'),
};

const mockContext = {
  newPage: jest.fn(async () => mockPage),
  close: jest.fn(async () => undefined),
};

const mockBrowser = {
  newContext: jest.fn(async () => mockContext),
  isConnected: jest.fn(() => true),
  on: jest.fn(),
  close: jest.fn(async () => undefined),
};

jest.mock('playwright', () => {
  class TimeoutError extends Error {}
  return {
    chromium: { launch: jest.fn(async () => mockBrowser) },
    errors: { TimeoutError },
  };
});

describe('PlaywrightRenderer', () => {
  const url = 'https://example.com/';
  const viewport = { width: 1280, height: 1000 };

  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should collect title, dimensions, inventory, links and a screenshot', async () => {
    const renderer = new PlaywrightRenderer({
      screenshots: true,
      sectionScreenshots: false,
      elementDetails: false,
      blockResources: false,
      viewport,
    });

    const result = await renderer.render(url, 5000);

    expect(result).toEqual({
      finalUrl: 'https://example.com/',
      title: 'Fake Page',
      widthPx: 1280,
      heightPx: 3400,
      inventory: createInventory({ buttons: 2, links: 3 }),
      links: ['/a', 'https://other.com/x'],
      screenshot: Buffer.from('png'),
      viewport,
    });
    expect(mockPage.goto).toHaveBeenCalledWith(url, { waitUntil: 'load', timeout: expect.any(Number) });
    expect(mockPage.goto.mock.calls[0][1]?.timeout).toBeLessThanOrEqual(5000);
    expect(mockContext.close).toHaveBeenCalledTimes(1);
  });

  it('should reuse one browser across renders', async () => {
    const renderer = new PlaywrightRenderer({ screenshots: false, blockResources: false });

    await renderer.render(url, 5000);
    await renderer.render('https://example.com/a', 5000);

    expect(chromium.launch).toHaveBeenCalledTimes(1);
    expect(mockBrowser.newContext).toHaveBeenCalledTimes(2);
    expect(mockPage.screenshot).not.toHaveBeenCalled();
  });

  it('should fail with a render error on an error status', async () => {
    mockPage.goto.mockImplementationOnce(async () => ({ status: () => 404 }));
    const renderer = new PlaywrightRenderer({ blockResources: false });

    await expect(renderer.render(url, 5000)).rejects.toThrow(new RenderError(url, 'HTTP 404').message);
    expect(mockContext.close).toHaveBeenCalledTimes(1);
  });

  it('should map a navigation timeout to a render timeout', async () => {
    mockPage.goto.mockImplementationOnce(async () => {
      throw new errors.TimeoutError('page.goto: Timeout 5000ms exceeded.');
    });
    const renderer = new PlaywrightRenderer({ blockResources: false });

    await expect(renderer.render(url, 5000)).rejects.toThrow(RenderTimeoutError);
  });

  it('should give the steps after a slow navigation only the time left', async () => {
    mockPage.goto.mockImplementationOnce(async () => {
      await new Promise((resolve) => setTimeout(resolve, 60));
      return { status: () => 200 };
    });
    const renderer = new PlaywrightRenderer({ screenshots: true, sectionScreenshots: false, blockResources: false });

    const result = await renderer.render(url, 200);

    expect(result.title).toBe('Fake Page');
    expect(mockPage.waitForTimeout).not.toHaveBeenCalled();
    const lastDefault = mockPage.setDefaultTimeout.mock.calls[mockPage.setDefaultTimeout.mock.calls.length - 1][0];
    expect(lastDefault).toBeLessThanOrEqual(140);
    const screenshotTimeout = mockPage.screenshot.mock.calls[0][0]?.timeout;
    expect(screenshotTimeout).toBeGreaterThan(0);
    expect(screenshotTimeout).toBeLessThanOrEqual(140);
    expect(mockContext.close).toHaveBeenCalledTimes(1);
  });

  it('should close its context and time out when a step outlives the deadline', async () => {
    mockPage.title.mockImplementationOnce(() => new Promise<string>(() => undefined));
    const renderer = new PlaywrightRenderer({ blockResources: false });

    await expect(renderer.render(url, 50)).rejects.toThrow(RenderTimeoutError);
    expect(mockContext.close).toHaveBeenCalledTimes(1);
  });

  it('should capture one screenshot per viewport section', async () => {
    const renderer = new PlaywrightRenderer({
      screenshots: true,
      sectionScreenshots: true,
      blockResources: false,
      viewport,
    });

    const result = await renderer.render(url, 5000);

    expect(result.sections?.map((section) => [section.number, section.scrollTop])).toEqual([
      [1, 0],
      [2, 1000],
      [3, 2000],
      [4, 3000],
    ]);
    expect(mockPage.screenshot).toHaveBeenCalledTimes(5);
    expect(mockPage.screenshot).toHaveBeenLastCalledWith({ type: 'png', timeout: expect.any(Number) });
  });

  it('should report visible elements with known categories', async () => {
    const renderer = new PlaywrightRenderer({ screenshots: false, elementDetails: true, blockResources: false });

    const result = await renderer.render(url, 5000);

    expect(result.elements).toEqual([inspectedButton]);
  });

  it('should block font and media requests when asked to', async () => {
    const renderer = new PlaywrightRenderer({ blockResources: true });

    await renderer.render(url, 5000);

    expect(mockPage.route).toHaveBeenCalledWith('**/*', expect.any(Function));
  });

  it('should close the browser', async () => {
    const renderer = new PlaywrightRenderer({ blockResources: false });
    await renderer.render(url, 5000);

    await renderer.close();

    expect(mockBrowser.close).toHaveBeenCalledTimes(1);
  });
});
