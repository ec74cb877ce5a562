/**
 * Reporting System
 * Crawl event reporters, graph renderings and screenshot output
 */

export * from './reporter.types';
export * from './reporter-dispatcher';
export * from './format';
export * from './graph.visualizer';
export * from './markdown.reporter';
export * from './json-graph.reporter';
export * from './console.reporter';
export * from './screenshot.writer';
export * from './section.writer';
export * from './element-detail.writer';
