/**
 * Element Details Tests
 */

import { describeElements, elementsInSection, groupByCategory, sectionCount } from '../element-details';
import { DetectedElement } from '../crawling.types';
import { ELEMENT_CATEGORIES } from '../element-inventory';
import { detectedElements } from '../../../__tests__/helpers/fixtures';

describe('element details', () => {
  const viewportHeight = 800;

  describe('sectionCount', () => {
    it('should cover the page with viewport-sized sections', () => {
      expect(sectionCount(2400, viewportHeight)).toBe(3);
      expect(sectionCount(2401, viewportHeight)).toBe(4);
    });

    it('should count at least one section', () => {
      expect(sectionCount(0, viewportHeight)).toBe(1);
      expect(sectionCount(500, 0)).toBe(1);
    });
  });

  describe('screenshot sections', () => {
    function sectionsAt(y: number, height: number) {
      const element: DetectedElement = {
        category: 'links',
        tagName: 'a',
        text: '',
        attributes: {},
        box: { x: 0, y, width: 10, height },
      };
      return describeElements([element], viewportHeight)[0].screenshotSections;
    }

    it('should report an element crossing a section break', () => {
      expect(sectionsAt(780, 40)).toEqual({ startSection: 1, endSection: 2, spansSections: true });
    });

    it('should place an element inside one section', () => {
      expect(sectionsAt(1700, 20)).toEqual({ startSection: 3, endSection: 3, spansSections: false });
    });

    it('should clamp positions above the page to the first section', () => {
      expect(sectionsAt(-20, 30)).toEqual({ startSection: 1, endSection: 1, spansSections: false });
    });
  });

  describe('describeElements', () => {
    const details = describeElements(detectedElements, viewportHeight);

    it('should number elements per category', () => {
      expect(details.map((detail) => detail.elementId)).toEqual(['buttons-1', 'links-1', 'buttons-2']);
    });

    it('should compute location, size, center and area', () => {
      expect(details[0]).toEqual({
        elementId: 'buttons-1',
        category: 'buttons',
        tagName: 'button',
        text: 'Sign up',
        attributes: { id: 'signup' },
        location: { top: 780, left: 40, bottom: 820, right: 160 },
        size: { width: 120, height: 40 },
        centerPoint: { x: 100, y: 800 },
        clickableArea: 4800,
        aspectRatio: 3,
        screenshotSections: { startSection: 1, endSection: 2, spansSections: true },
      });
    });

    it('should leave the aspect ratio out for zero-height elements', () => {
      expect(details[2].aspectRatio).toBeNull();
      expect(details[2].clickableArea).toBe(0);
    });
  });

  describe('elementsInSection', () => {
    const details = describeElements(detectedElements, viewportHeight);

    it('should keep elements at least partly inside the viewport', () => {
      expect(elementsInSection(details, 0, viewportHeight).map((detail) => detail.elementId)).toEqual([
        'buttons-1',
        'buttons-2',
      ]);
      expect(elementsInSection(details, 800, viewportHeight).map((detail) => detail.elementId)).toEqual([
        'buttons-1',
      ]);
      expect(elementsInSection(details, 1600, viewportHeight).map((detail) => detail.elementId)).toEqual([
        'links-1',
      ]);
    });
  });

  describe('groupByCategory', () => {
    it('should list every category, empty ones included', () => {
      const grouped = groupByCategory(describeElements(detectedElements, viewportHeight));

      expect(Object.keys(grouped).sort()).toEqual([...ELEMENT_CATEGORIES].sort());
      expect(grouped.buttons.map((detail) => detail.elementId)).toEqual(['buttons-1', 'buttons-2']);
      expect(grouped.links.map((detail) => detail.elementId)).toEqual(['links-1']);
      expect(grouped.inputs).toEqual([]);
    });
  });
});
