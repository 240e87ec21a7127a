/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi, afterEach } from 'vitest';
import { encodeTemplate } from './encoder';
import { decodeTemplate } from './decoder';
import { Node } from './node';
import { setTreeLogger } from './log';
import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';

describe('encodeTemplate', () => {
  afterEach(() => {
    setTreeLogger(new ConsoleLogger('off'));
  });

  it('writes a decoded template back', () => {
    const { root } = decodeTemplate('<root id="r"><a>1</a><b/></root>');
    expect(root).toBeDefined();
    if (root) expect(encodeTemplate(root)).toBe('<root id="r"><a>1</a><b/></root>');
  });

  it('writes anonymous children as text', () => {
    const list = Node.newQualified('list');
    list.newChild('', 'x');
    list.newChild('b', '2');
    expect(encodeTemplate(list)).toBe('<list>x<b>2</b></list>');
  });

  it('keeps entities of decoded content and attributes', () => {
    const xml = '<root k="a&amp;b"><a>x &amp; y &lt; z</a></root>';
    const { root } = decodeTemplate(xml);
    expect(root?.getAttrValue('k')).toBe('a&b');
    if (root) expect(encodeTemplate(root)).toBe(xml);
  });

  it('writes trimmed content verbatim and escapes attribute values', () => {
    const root = Node.newQualified('root');
    root.newAttr('k', 'a<"b"');
    root.newChild('n', ' 7 ');
    root.newChild('m', 'a &amp; b');
    expect(encodeTemplate(root)).toBe('<root k="a&lt;&quot;b&quot;"><n>7</n><m>a &amp; b</m></root>');
  });

  it('writes the first of duplicate attributes and logs the rest', () => {
    const debug = vi.fn();
    const logger: Logger = {
      clone: () => logger,
      setContext: vi.fn(),
      trace: vi.fn(),
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    setTreeLogger(logger);
    const root = Node.newQualified('r');
    root.newAttr('k', '1');
    root.newAttr('k', '2');
    expect(encodeTemplate(root)).toBe('<r k="1"/>');
    expect(debug).toHaveBeenCalledWith('encode: dropping duplicate attribute "k" on "r"');
  });

  it('rejects a root without a name', () => {
    expect(() => encodeTemplate(Node.newQualified(''))).toThrow('encodeTemplate: root node has no name');
  });
});
