import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Crawl bounds
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '50', 10),
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '3', 10),
  CRAWL_CONCURRENCY: parseInt(process.env.CRAWL_CONCURRENCY || '1', 10),
  CRAWL_SCOPE: process.env.CRAWL_SCOPE || 'same-host', // same-host | allow-list
  CRAWL_ALLOWED_DOMAINS: process.env.CRAWL_ALLOWED_DOMAINS || '', // Comma-separated domains

  // Resilience
  MAX_ATTEMPTS: parseInt(process.env.MAX_ATTEMPTS || '3', 10),
  PAGE_TIMEOUT_SECONDS: parseFloat(process.env.PAGE_TIMEOUT_SECONDS || '60'),

  // Renderer
  RENDERER: process.env.RENDERER || 'playwright', // playwright | http
  HEADLESS: process.env.HEADLESS !== 'false', // Default true
  VIEWPORT_WIDTH: parseInt(process.env.VIEWPORT_WIDTH || '1280', 10),
  VIEWPORT_HEIGHT: parseInt(process.env.VIEWPORT_HEIGHT || '800', 10),
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  BLOCK_RESOURCES: process.env.BLOCK_RESOURCES === 'true', // Default false, screenshots need images

  // Output
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'output',
  SCREENSHOT_ENABLED: process.env.SCREENSHOT_ENABLED !== 'false', // Default true
  SCREENSHOT_FULL_PAGE: process.env.SCREENSHOT_FULL_PAGE !== 'false', // Default true
  SCREENSHOT_SECTIONS: process.env.SCREENSHOT_SECTIONS === 'true', // Default false, one png per viewport
  ELEMENT_DETAILS: process.env.ELEMENT_DETAILS !== 'false', // Default true, <timestamp>_elements.json per page
  PROGRESS_EVERY: parseInt(process.env.PROGRESS_EVERY || '1', 10), // Progress section every N pages
} as const;

export default env;
