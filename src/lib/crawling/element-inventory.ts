/**
 * Element Inventory
 * Fixed categories of interactive elements and helpers to count and summarize them
 */

import * as cheerio from 'cheerio';
import { ElementCategory, ElementInventory } from './crawling.types';

/**
 * CSS selectors per category. Shared by the browser renderer and static counting.
 * An element may fall in several categories (a button with a title is also a tooltip).
 */
export const ELEMENT_SELECTORS: Readonly<Record<ElementCategory, string>> = {
  buttons: "button, input[type='button'], input[type='submit']",
  links: 'a[href]',
  inputs:
    "input:not([type]), input[type='text'], input[type='password'], input[type='email'], input[type='number'], input[type='search'], textarea",
  selects: 'select',
  checkboxes: "input[type='checkbox']",
  radioButtons: "input[type='radio']",
  clickable:
    "[onclick], [role='button'], [role='link'], [role='tab'], [role='menuitem'], [class*='btn'], [class*='button']",
  iframes: 'iframe',
  tabs: "[role='tab']",
  menus: "[role='menu'], [role='menubar']",
  tooltips: '[title], [data-tooltip], [aria-describedby]',
  modals: "[role='dialog'], [class*='modal']",
  expandable: '[aria-expanded], [data-toggle], .accordion, .collapse',
};

export const ELEMENT_CATEGORIES: readonly ElementCategory[] = [
  'buttons',
  'links',
  'inputs',
  'selects',
  'checkboxes',
  'radioButtons',
  'clickable',
  'iframes',
  'tabs',
  'menus',
  'tooltips',
  'modals',
  'expandable',
];

const CATEGORY_LABELS: Readonly<Record<ElementCategory, string>> = {
  buttons: 'Buttons',
  links: 'Links',
  inputs: 'Inputs',
  selects: 'Selects',
  checkboxes: 'Checkboxes',
  radioButtons: 'Radio buttons',
  clickable: 'Clickable',
  iframes: 'Iframes',
  tabs: 'Tabs',
  menus: 'Menus',
  tooltips: 'Tooltips',
  modals: 'Modals',
  expandable: 'Expandable',
};

const HIDDEN_STYLE = /(display\s*:\s*none|visibility\s*:\s*hidden)/i;

export function emptyInventory(): ElementInventory {
  return {
    buttons: 0,
    links: 0,
    inputs: 0,
    selects: 0,
    checkboxes: 0,
    radioButtons: 0,
    clickable: 0,
    iframes: 0,
    tabs: 0,
    menus: 0,
    tooltips: 0,
    modals: 0,
    expandable: 0,
  };
}

export function isElementCategory(value: string): value is ElementCategory {
  return ELEMENT_CATEGORIES.some((category) => category === value);
}

/**
 * Build an inventory from partial counts; missing or invalid counts become 0
 */
export function createInventory(counts: Partial<Record<ElementCategory, number>> = {}): ElementInventory {
  const inventory = emptyInventory();
  for (const category of ELEMENT_CATEGORIES) {
    const value = counts[category];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      inventory[category] = Math.floor(value);
    }
  }
  return inventory;
}

/**
 * Count interactive elements in static HTML.
 * Without a layout engine, only `hidden` attributes and inline styles mark an element invisible.
 */
export function countElementsInHtml(html: string): ElementInventory {
  const $ = cheerio.load(html);
  const inventory = emptyInventory();

  for (const category of ELEMENT_CATEGORIES) {
    inventory[category] = $(ELEMENT_SELECTORS[category])
      .filter((_, el) => {
        const $el = $(el);
        if ($el.closest('[hidden]').length > 0) return false;
        return !$el
          .parents()
          .addBack()
          .toArray()
          .some((node) => HIDDEN_STYLE.test($(node).attr('style') ?? ''));
      }).length;
  }

  return inventory;
}

export function totalElements(inventory: ElementInventory): number {
  return ELEMENT_CATEGORIES.reduce((sum, category) => sum + inventory[category], 0);
}

/**
 * Non-zero categories with display labels, in category order
 */
export function summarizeInventory(inventory: ElementInventory): Array<{ label: string; count: number }> {
  return ELEMENT_CATEGORIES.filter((category) => inventory[category] > 0).map((category) => ({
    label: CATEGORY_LABELS[category],
    count: inventory[category],
  }));
}
