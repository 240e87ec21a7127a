/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

const WORD = /[\w-]+/;

/**
 * First run of word characters or hyphens in `s`, ignoring everything else.
 * e.g. 'cpu_busy (percent)' → 'cpu_busy', '=> read-ops' → 'read-ops'
 */
export function simpleName(s: string): string {
  const match = s.match(WORD);
  return match ? match[0] : '';
}

/**
 * Replace the five predefined markup entities, then spaces and hyphens with underscores.
 * e.g. 'read &amp; write-ops' → 'read_&_write_ops'
 */
export function decodeHtml(s: string): string {
  return s
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&apos;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/ /g, '_')
    .replace(/-/g, '_');
}
