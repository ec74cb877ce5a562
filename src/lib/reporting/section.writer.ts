/**
 * Section screenshot output
 * One directory per page: `section_<n>.png` and `section_<n>_info.json` per viewport section,
 * plus `page_info.json` describing the whole page.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PageDimensions, Url } from '../crawling/crawling.types';
import { ElementDetail, elementsInSection } from '../crawling/element-details';
import type { SectionScreenshot } from '../rendering/renderer.types';
import { cleanFilename, timestampSlug, UniqueNames } from './format';
import { writeJson } from './json-graph.reporter';

export interface SectionedPage {
  viewport: PageDimensions;
  page: PageDimensions;
  sections: SectionScreenshot[];
  elements: ElementDetail[];
}

export interface SectionWriter {
  /**
   * Persist the sections of one page and return the directory they were written to
   */
  save(url: Url, capture: SectionedPage, takenAt: Date): Promise<string>;
}

export class FileSectionWriter implements SectionWriter {
  private readonly names = new UniqueNames();

  constructor(
    private readonly directory: string,
    private readonly linkPrefix: string = 'screenshots'
  ) {}

  async save(url: Url, capture: SectionedPage, takenAt: Date): Promise<string> {
    const dirName = this.names.claim(`${timestampSlug(takenAt)}_${cleanFilename(url)}`);
    const pageDir = path.join(this.directory, dirName);
    await fs.promises.mkdir(pageDir, { recursive: true });

    const screenshots: Array<{ name: string; scrollPosition: number }> = [];
    for (const section of capture.sections) {
      const name = `section_${section.number}.png`;
      await fs.promises.writeFile(path.join(pageDir, name), section.image);
      await writeJson(path.join(pageDir, `section_${section.number}_info.json`), {
        sectionNumber: section.number,
        scrollTop: section.scrollTop,
        viewportWidth: capture.viewport.width,
        viewportHeight: capture.viewport.height,
        interactiveElements: elementsInSection(capture.elements, section.scrollTop, capture.viewport.height),
      });
      screenshots.push({ name, scrollPosition: section.scrollTop });
    }

    await writeJson(path.join(pageDir, 'page_info.json'), {
      url,
      timestamp: takenAt.toISOString(),
      totalWidth: capture.page.width,
      totalHeight: capture.page.height,
      viewportWidth: capture.viewport.width,
      viewportHeight: capture.viewport.height,
      numSections: capture.sections.length,
      screenshots,
      interactiveElements: capture.elements,
    });

    return `${this.linkPrefix}/${dirName}`;
  }
}
