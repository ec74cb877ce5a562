/**
 * Element detail export
 * Writes `<YYYYMMDD_HHMMSS>_<sanitized-url>_elements.json`: every visible interactive element
 * of a page with its location, size, center point and screenshot sections.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PageDimensions, Url } from '../crawling/crawling.types';
import { ElementDetail, ElementDetailReport, groupByCategory } from '../crawling/element-details';
import { cleanFilename, timestampSlug, UniqueNames } from './format';
import { writeJson } from './json-graph.reporter';

export interface ElementDetailWriter {
  save(url: Url, viewport: PageDimensions, elements: ElementDetail[], takenAt: Date): Promise<string>;
}

export class FileElementDetailWriter implements ElementDetailWriter {
  private readonly names = new UniqueNames();

  constructor(
    private readonly directory: string,
    private readonly linkPrefix: string = 'elements'
  ) {}

  async save(url: Url, viewport: PageDimensions, elements: ElementDetail[], takenAt: Date): Promise<string> {
    const filename = this.names.claim(`${timestampSlug(takenAt)}_${cleanFilename(url)}`, '_elements.json');
    await fs.promises.mkdir(this.directory, { recursive: true });

    const report: ElementDetailReport = {
      url,
      timestamp: takenAt.toISOString(),
      viewport: { ...viewport },
      elements: groupByCategory(elements),
    };
    await writeJson(path.join(this.directory, filename), report);

    return `${this.linkPrefix}/${filename}`;
  }
}
