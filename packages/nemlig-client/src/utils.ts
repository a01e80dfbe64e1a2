/**
 * Utility functions for the Nemlig client.
 *
 * @module utils
 */

/**
 * Site root used to build absolute product URLs.
 */
export const SITE_URL = 'https://www.nemlig.com';

/**
 * Format an amount with two decimals and the krone suffix (e.g., "12.50 kr").
 *
 * @param amount - Amount in kroner
 */
export function formatKroner(amount: number): string {
  return `${amount.toFixed(2)} kr`;
}

/**
 * Remove HTML tags from text, returning plain text.
 * Entities are left as they are.
 *
 * @example
 * stripHtmlTags('<b>Hello</b> world'); // "Hello world"
 */
export function stripHtmlTags(html: string): string {
  return html.replace(/<[^>]+>/g, '').trim();
}

/**
 * Word-wrap text to a fixed width, prefixing every line with an indent.
 *
 * Words longer than the width get a line of their own rather than being split.
 */
export function wrapText(text: string, width = 80, indent = '  '): string[] {
  const lines: string[] = [];
  let current = indent;

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current === indent) {
      current += word;
    } else if (current.length + word.length + 1 > width) {
      lines.push(current);
      current = indent + word;
    } else {
      current += ` ${word}`;
    }
  }

  if (current.trim()) {
    lines.push(current);
  }

  return lines;
}

/**
 * Date portion of an ISO 8601 timestamp as sent by the API ("2025-11-25T06:07:18Z" → "2025-11-25").
 * Returns an empty string when the value has no time separator.
 */
export function isoDatePart(iso: string): string {
  const separator = iso.indexOf('T');
  return separator === -1 ? '' : iso.slice(0, separator);
}

/**
 * Clock time (HH:MM) of an ISO 8601 timestamp, as written by the API (no timezone shift).
 */
export function isoTimePart(iso: string): string {
  const separator = iso.indexOf('T');
  return separator === -1 ? '' : iso.slice(separator + 1, separator + 6);
}
