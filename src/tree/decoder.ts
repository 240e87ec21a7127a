/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { Node } from './node';
import { treeLogger } from './log';

export interface DecodeError {
  line: number;
  column: number;
  message: string;
}

/**
 * Result of decoding a markup template: the root node (undefined if the input has no element)
 * and the parse errors.
 */
export interface DecodeResult {
  root: Node | undefined;
  errors: DecodeError[];
}

interface OpenElement {
  node: Node;
  /** Offset just after the opening tag's '>'. */
  innerStart: number;
  selfClosing: boolean;
}

/**
 * Decode a markup template into qualified nodes.
 * Uses sax for events and position tracking; each element keeps its attributes in document order
 * and its raw inner markup as content, so containers carry nested markup and leaves their text.
 */
export function decodeTemplate(text: string): DecodeResult {
  const errors: DecodeError[] = [];
  const stack: OpenElement[] = [];
  let root: Node | undefined;

  const parser = sax.parser(true, { trim: false, position: true });
  parser.onerror = (err: Error) => {
    const error = { line: parser.line, column: parser.column, message: err.message.split('\n')[0] };
    treeLogger().warn(`decode: ${error.message} at ${error.line}:${error.column}`);
    errors.push(error);
    parser.resume();
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    const top = stack[stack.length - 1];
    let node: Node;
    if (top) {
      node = top.node.newChild(tag.name);
    } else if (!root) {
      node = Node.newQualified(tag.name);
      root = node;
    } else {
      // a second top-level element stays out of the tree
      node = Node.newQualified(tag.name);
    }
    for (const [name, value] of Object.entries(tag.attributes)) {
      node.newAttr(name, typeof value === 'string' ? value : value.value);
    }
    stack.push({ node, innerStart: parser.position, selfClosing: tag.isSelfClosing });
  };

  parser.onclosetag = () => {
    const open = stack.pop();
    if (!open || open.selfClosing) return;
    // startTagPosition points just past the '<' of the closing tag
    const innerEnd = parser.startTagPosition - 1;
    open.node.setContent(text.slice(open.innerStart, Math.max(open.innerStart, innerEnd)));
  };

  parser.write(text).close();

  return { root, errors };
}
