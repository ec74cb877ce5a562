/**
 * Formatting helpers for logs and artifact names
 */

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Local time as `YYYYMMDD_HHMMSS`, used to key artifacts
 */
export function timestampSlug(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * URL without scheme, cut to maxLength characters
 */
export function shortUrl(url: string, maxLength: number = 50): string {
  return url.replace(/^https?:\/\//i, '').slice(0, maxLength);
}

/**
 * File-system safe form of a URL: scheme dropped, `/` and other unsafe characters become `_`
 */
export function cleanFilename(url: string, maxLength: number = 50): string {
  return url
    .replace(/^https?:\/\//i, '')
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .slice(0, maxLength);
}

/**
 * Hands out names that are unique within one run: `base.ext`, then `base_2.ext`, `base_3.ext`...
 */
export class UniqueNames {
  private readonly used: Set<string> = new Set();

  claim(base: string, extension: string = ''): string {
    let name = `${base}${extension}`;
    for (let n = 2; this.used.has(name); n++) {
      name = `${base}_${n}${extension}`;
    }
    this.used.add(name);
    return name;
  }
}
