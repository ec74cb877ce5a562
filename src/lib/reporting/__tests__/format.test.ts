/**
 * Format Helper Tests
 */

import { cleanFilename, formatDateTime, shortUrl, timestampSlug, UniqueNames } from '../format';

describe('format helpers', () => {
  const date = new Date(2024, 2, 5, 9, 7, 3);

  it('should format local date and time', () => {
    expect(formatDateTime(date)).toBe('2024-03-05 09:07:03');
    expect(timestampSlug(date)).toBe('20240305_090703');
  });

  it('should shorten URLs without their scheme', () => {
    expect(shortUrl('https://example.com/abc', 15)).toBe('example.com/abc');
    expect(shortUrl('http://example.com/abcdef', 11)).toBe('example.com');
  });

  it('should make URLs safe as file names', () => {
    expect(cleanFilename('https://example.com/a/b?x=1')).toBe('example.com_a_b_x_1');
    expect(cleanFilename(`https://example.com/${'x'.repeat(60)}`)).toHaveLength(50);
  });

  it('should number repeated names before their extension', () => {
    const names = new UniqueNames();

    expect(names.claim('page', '.png')).toBe('page.png');
    expect(names.claim('page', '.png')).toBe('page_2.png');
    expect(names.claim('page', '.png')).toBe('page_3.png');
    expect(names.claim('page')).toBe('page');
    expect(names.claim('page')).toBe('page_2');
  });
});
