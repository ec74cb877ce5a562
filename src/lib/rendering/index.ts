/**
 * Rendering System
 * Page renderers and the crawl error taxonomy
 */

export * from './errors';
export * from './renderer.types';
export * from './http.renderer';
export * from './playwright.renderer';
