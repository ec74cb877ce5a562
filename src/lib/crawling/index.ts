/**
 * Crawling System
 * Main export file for crawl frontier, graph and retry utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './element-inventory';
export * from './element-details';
export * from './link-discoverer';
export * from './crawl-frontier';
export * from './graph-builder';
export * from './retry-policy';
export * from './crawling-statistics';
