/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XMLBuilder } from 'fast-xml-parser';
import type { Node } from './node';
import { treeLogger } from './log';

const TEXT = '#text';
const ATTRS = ':@';
const ATTR_PREFIX = '@_';

// Attribute values are decoded by the parser, so they are escaped again on the way out.
function escapeAttrValue(_name: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

type OrderedEntry = { [key: string]: OrderedEntry[] | Record<string, string> | string };

const builderOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT,
  suppressEmptyNode: true,
  format: false,
  // content is raw inner markup with entities still encoded
  processEntities: false,
  attributeValueProcessor: escapeAttrValue,
};

function toOrdered(node: Node): OrderedEntry {
  const name = node.getName();
  if (name === '') return { [TEXT]: node.getContent() };

  const body: OrderedEntry[] =
    node.getChildren().length > 0
      ? node.getChildren().map(toOrdered)
      : node.getContent() !== ''
        ? [{ [TEXT]: node.getContent() }]
        : [];
  const entry: OrderedEntry = { [name]: body };
  if (node.getAttrs().length > 0) {
    const attrs: Record<string, string> = {};
    for (const attr of node.getAttrs()) {
      const key = ATTR_PREFIX + attr.name;
      if (key in attrs) {
        treeLogger().debug(`encode: dropping duplicate attribute "${attr.name}" on "${name}"`);
        continue;
      }
      attrs[key] = attr.value;
    }
    entry[ATTRS] = attrs;
  }
  return entry;
}

/**
 * Serialize a tree to markup: attributes on elements, effective content as text,
 * anonymous children as bare text and empty leaves self-closing.
 * Content is written verbatim, so entities kept encoded by the decoder survive a round trip.
 * Markup has no duplicate attributes: only the first of several same-named attributes is written.
 */
export function encodeTemplate(node: Node): string {
  if (node.getName() === '') {
    throw new Error('encodeTemplate: root node has no name');
  }
  const builder = new XMLBuilder(builderOptions);
  const xml: string = builder.build([toOrdered(node)]);
  return xml;
}
