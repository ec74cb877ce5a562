/**
 * Screenshot handling utilities
 */

import * as fs from 'fs';
import * as path from 'path';
import { Url } from '../crawling/crawling.types';
import { cleanFilename, timestampSlug, UniqueNames } from './format';

export interface ScreenshotWriter {
  /**
   * Persist a screenshot and return where it was written
   */
  save(url: Url, screenshot: Buffer, takenAt: Date): Promise<string>;
}

/**
 * Writes `<YYYYMMDD_HHMMSS>_<sanitized-url>.png` files into one directory
 */
export class FileScreenshotWriter implements ScreenshotWriter {
  private readonly names = new UniqueNames();

  /**
   * @param directory - Absolute or cwd-relative screenshot directory
   * @param linkPrefix - Prefix of the returned location, relative to the crawl log
   */
  constructor(
    private readonly directory: string,
    private readonly linkPrefix: string = 'screenshots'
  ) {}

  async save(url: Url, screenshot: Buffer, takenAt: Date): Promise<string> {
    const filename = this.names.claim(`${timestampSlug(takenAt)}_${cleanFilename(url)}`, '.png');
    const filepath = path.join(this.directory, filename);

    // Ensure directory exists
    await fs.promises.mkdir(this.directory, { recursive: true });

    await fs.promises.writeFile(filepath, screenshot);
    return `${this.linkPrefix}/${filename}`;
  }
}
