/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { simpleName, decodeHtml } from './text';

describe('text', () => {
  describe('simpleName', () => {
    it('returns the first word', () => {
      expect(simpleName('cpu_busy (percent)')).toBe('cpu_busy');
      expect(simpleName('  total_ops')).toBe('total_ops');
    });
    it('keeps hyphens and skips leading punctuation', () => {
      expect(simpleName('=> read-ops, write-ops')).toBe('read-ops');
    });
    it('returns empty when there is no word', () => {
      expect(simpleName('')).toBe('');
      expect(simpleName('!!! ...')).toBe('');
    });
  });

  describe('decodeHtml', () => {
    it('replaces entities, spaces and hyphens', () => {
      expect(decodeHtml('read &amp; write-ops')).toBe('read_&_write_ops');
      expect(decodeHtml('&lt;x&gt;')).toBe('<x>');
      expect(decodeHtml('&quot;a&apos;')).toBe('"a\'');
    });
  });
});
