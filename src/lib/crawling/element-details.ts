/**
 * Element Details
 * Positions of interactive elements and the screenshot sections they fall in.
 * Sections are viewport-sized slices of the page, numbered from 1 at the top.
 */

import { DetectedElement, ElementCategory, PageDimensions } from './crawling.types';

export interface SectionSpan {
  startSection: number;
  endSection: number;
  spansSections: boolean;
}

export interface ElementDetail {
  elementId: string;
  category: ElementCategory;
  tagName: string;
  text: string;
  attributes: Record<string, string>;
  location: { top: number; left: number; bottom: number; right: number };
  size: { width: number; height: number };
  centerPoint: { x: number; y: number };
  clickableArea: number;
  /**
   * width / height, null for zero-height elements
   */
  aspectRatio: number | null;
  screenshotSections: SectionSpan;
}

export interface ElementDetailReport {
  url: string;
  timestamp: string;
  viewport: PageDimensions;
  elements: Record<ElementCategory, ElementDetail[]>;
}

/**
 * Number of viewport-sized sections needed to cover a page
 */
export function sectionCount(pageHeight: number, viewportHeight: number): number {
  if (viewportHeight <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(pageHeight / viewportHeight));
}

function sectionSpan(top: number, bottom: number, viewportHeight: number): SectionSpan {
  const section = (y: number): number =>
    viewportHeight > 0 ? Math.max(1, Math.floor(y / viewportHeight) + 1) : 1;
  const startSection = section(top);
  const endSection = Math.max(startSection, section(bottom));
  return { startSection, endSection, spansSections: startSection !== endSection };
}

/**
 * Add computed geometry and section numbers. Ids are `<category>-<n>`, counted per category.
 */
export function describeElements(elements: DetectedElement[], viewportHeight: number): ElementDetail[] {
  const counters = new Map<ElementCategory, number>();

  return elements.map((element) => {
    const n = (counters.get(element.category) ?? 0) + 1;
    counters.set(element.category, n);

    const { x, y, width, height } = element.box;
    return {
      elementId: `${element.category}-${n}`,
      category: element.category,
      tagName: element.tagName,
      text: element.text,
      attributes: { ...element.attributes },
      location: { top: y, left: x, bottom: y + height, right: x + width },
      size: { width, height },
      centerPoint: { x: x + width / 2, y: y + height / 2 },
      clickableArea: width * height,
      aspectRatio: height !== 0 ? width / height : null,
      screenshotSections: sectionSpan(y, y + height, viewportHeight),
    };
  });
}

/**
 * Elements at least partly inside the viewport scrolled to scrollTop
 */
export function elementsInSection(
  details: ElementDetail[],
  scrollTop: number,
  viewportHeight: number
): ElementDetail[] {
  return details.filter(
    (detail) => scrollTop <= detail.location.bottom && detail.location.top < scrollTop + viewportHeight
  );
}

export function groupByCategory(details: ElementDetail[]): Record<ElementCategory, ElementDetail[]> {
  const grouped: Record<ElementCategory, ElementDetail[]> = {
    buttons: [],
    links: [],
    inputs: [],
    selects: [],
    checkboxes: [],
    radioButtons: [],
    clickable: [],
    iframes: [],
    tabs: [],
    menus: [],
    tooltips: [],
    modals: [],
    expandable: [],
  };
  for (const detail of details) {
    grouped[detail.category].push(detail);
  }
  return grouped;
}
