/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Attribute-bearing template tree: construction, lookup, union/merge of templates,
  path search and flattening.
*/

import type { Attribute, NameKind, SearchResult } from './types';
import {
  ACCUMULATE_SEPARATOR,
  COUNTERS,
  LABEL_AGENT,
  MARKUP_MARKER,
  PRINT_CONTENT_WIDTH,
  PRINT_INDENT,
  PRINT_NAME_WIDTH,
} from './constants';
import { simpleName } from './text';
import { treeLogger } from './log';

function samePath(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((seg, i) => seg === b[i]);
}

/**
 * A vertex in a template tree.
 *
 * Children are owned top-down. The parent link is a non-owning back-reference set only by
 * {@link Node.newChild}; nodes attached with {@link Node.addChild}, or adopted by
 * {@link Node.union} / {@link Node.merge}, keep whatever parent link they had.
 */
export class Node {
  private kind: NameKind;
  private name: string;
  private parent: Node | undefined;
  private attrs: Attribute[];
  private content: string;
  private children: Node[];

  private constructor(kind: NameKind, name: string) {
    this.kind = kind;
    this.name = name;
    this.parent = undefined;
    this.attrs = [];
    this.content = '';
    this.children = [];
  }

  /** Node with a plain name. */
  static newPlain(name: string): Node {
    return new Node('plain', name);
  }

  /** Node with a markup-qualified name, for trees that round-trip through markup. */
  static newQualified(name: string): Node {
    return new Node('qualified', name);
  }

  getName(): string {
    return this.name;
  }

  /** Rename, keeping the node's name kind. */
  setName(name: string): void {
    this.name = name;
  }

  getNameKind(): NameKind {
    return this.kind;
  }

  isQualified(): boolean {
    return this.kind === 'qualified';
  }

  setQualifiedName(name: string): void {
    this.kind = 'qualified';
    this.name = name;
  }

  getParent(): Node | undefined {
    return this.parent;
  }

  // Attributes

  getAttrs(): readonly Attribute[] {
    return this.attrs;
  }

  getAttr(name: string): Attribute | undefined {
    return this.attrs.find((attr) => attr.name === name);
  }

  getAttrValue(name: string): string | undefined {
    return this.getAttr(name)?.value;
  }

  addAttr(attr: Attribute): void {
    this.attrs.push(attr);
  }

  newAttr(name: string, value: string): void {
    this.addAttr({ name, value });
  }

  // Children

  getChildren(): readonly Node[] {
    return this.children;
  }

  getChild(name: string): Node | undefined {
    return this.children.find((child) => child.getName() === name);
  }

  hasChild(name: string): boolean {
    return this.getChild(name) !== undefined;
  }

  /** Detach and return the first child named `name`; sibling order is kept. */
  popChild(name: string): Node | undefined {
    const idx = this.children.findIndex((child) => child.getName() === name);
    if (idx < 0) return undefined;
    const [child] = this.children.splice(idx, 1);
    return child;
  }

  /** Append `child` as is; its parent link is not touched. */
  addChild(child: Node): void {
    this.children.push(child);
  }

  /**
   * Create a child of the same name kind as this node, link it back to this node and append it.
   */
  newChild(name: string, content = ''): Node {
    const child = new Node(this.kind, name);
    child.parent = this;
    child.content = content;
    this.addChild(child);
    return child;
  }

  // Content

  /**
   * Trimmed content, or '' when the content is nested markup.
   */
  getContent(): string {
    const content = this.content.trim();
    if (content.length > 0 && !content.startsWith(MARKUP_MARKER)) return content;
    return '';
  }

  getRawContent(): string {
    return this.content;
  }

  setContent(content: string): void {
    this.content = content;
  }

  /** Raw content of the first child named `name`, '' when there is none. */
  getChildContent(name: string): string {
    return this.getChild(name)?.getRawContent() ?? '';
  }

  getChildByContent(content: string): Node | undefined {
    return this.children.find((child) => child.getRawContent() === content);
  }

  setChildContent(name: string, content: string): void {
    const child = this.getChild(name);
    if (child) child.setContent(content);
    else this.newChild(name, content);
  }

  getAllChildContent(): string[] {
    return this.children.map((child) => child.getRawContent());
  }

  getAllChildNames(): string[] {
    return this.children.map((child) => child.getName());
  }

  // Structure

  /**
   * Deep copy: name kind, name, attributes, effective content and children.
   * Copied children are linked to their copied parent.
   */
  copy(): Node {
    const clone = new Node(this.kind, this.name);
    clone.content = this.getContent();
    clone.attrs = this.attrs.map((attr) => ({ ...attr }));
    for (const child of this.children) {
      const childCopy = child.copy();
      childCopy.parent = clone;
      clone.children.push(childCopy);
    }
    return clone;
  }

  /**
   * Merge `source` into this node, keeping what this node already defines.
   * - Missing children are adopted by reference from `source`.
   * - A same-named child with children of its own is unioned recursively.
   * - A same-named leaf takes the source child's content.
   */
  union(source: Node | undefined): void {
    if (!source) return;
    if (this.getContent().length === 0) {
      this.setContent(source.getContent());
    }
    for (const child of [...source.children]) {
      const existing = this.getChild(child.getName());
      if (!existing) {
        this.addChild(child);
      } else if (existing.children.length > 0) {
        existing.union(child);
      } else {
        existing.setContent(child.getRawContent());
      }
    }
  }

  /**
   * Return the node below `ancestor` on the way up, i.e. the node whose parent is named
   * `ancestor`, or undefined when no ancestor has that name.
   */
  searchAncestor(ancestor: string): Node | undefined {
    const parent = this.parent;
    if (!parent) return undefined;
    if (parent.getName() === ancestor) return this;
    return parent.searchAncestor(ancestor);
  }

  /**
   * Below a {@link LABEL_AGENT} ancestor, move inline content into an anonymous child so
   * every value is a list entry.
   */
  preprocessTemplate(): void {
    for (const child of [...this.children]) {
      const name = child.getName();
      const mine = this.getChild(name);
      if (!mine || name.length === 0) continue;
      if (mine.searchAncestor(LABEL_AGENT) && mine.getRawContent().length > 0) {
        treeLogger().trace(`preprocess: moving content of "${name}" into an anonymous entry`);
        mine.newChild('', child.getRawContent());
        mine.setContent('');
      }
      mine.preprocessTemplate();
    }
  }

  /**
   * Merge `subtemplate` into this node, modifying it in place. Subtemplate values replace
   * existing ones, except below parents named in `skipOverwrite`, where they are appended.
   * Anonymous entries are added once per distinct content.
   */
  merge(subtemplate: Node | undefined, skipOverwrite: Iterable<string> = []): void {
    this.mergeWith(subtemplate, new Set(skipOverwrite));
  }

  private mergeWith(subtemplate: Node | undefined, skipOverwrite: ReadonlySet<string>): void {
    if (!subtemplate) return;
    if (this.content.length === 0) {
      this.content = subtemplate.content;
    }
    for (const child of [...subtemplate.children]) {
      const name = child.getName();
      const content = child.getRawContent();
      const mine = this.getChild(name);
      if (name.length === 0) {
        const mineParent = mine?.parent;
        if (mineParent && !mineParent.getChildByContent(content)) {
          treeLogger().debug(`merge: adding entry "${content}" under "${mineParent.getName()}"`);
          mineParent.addChild(child);
        } else if (!this.getChildByContent(content)) {
          treeLogger().debug(`merge: adding entry "${content}" under "${this.name}"`);
          this.addChild(child);
        }
      } else if (!mine) {
        this.addChild(child);
      } else {
        const mineParent = mine.parent;
        if (mineParent && skipOverwrite.has(mineParent.getName())) {
          treeLogger().debug(`merge: appending to "${name}" under "${mineParent.getName()}"`);
          mine.setContent(mine.getRawContent() + ACCUMULATE_SEPARATOR + content);
        } else {
          mine.setContent(content);
        }
        mine.mergeWith(child, skipOverwrite);
      }
    }
  }

  // Search

  /**
   * Collect the content of every node whose name path equals one of `paths`.
   * The name path starts at the first node named `prefix[0]`.
   */
  searchContent(prefix: readonly string[], paths: readonly (readonly string[])[]): SearchResult<string> {
    if (prefix.length === 0) {
      throw new Error('searchContent: prefix must not be empty');
    }
    const first = prefix[0];
    const maxLen = paths.reduce((max, path) => Math.max(max, path.length), 0);
    const matches: string[] = [];

    const search = (node: Node, currentPath: readonly string[]): void => {
      const newPath =
        currentPath.length > 0 || node.getName() === first ? [...currentPath, node.getName()] : currentPath;
      if (paths.some((path) => samePath(newPath, path))) {
        matches.push(node.getRawContent());
      }
      if (newPath.length < maxLen) {
        for (const child of node.children) search(child, newPath);
      }
    };

    search(this, []);
    return { matches, found: matches.length > 0 };
  }

  /**
   * Collect every node whose name path equals `path`, starting at the first node named `path[0]`.
   */
  searchChildren(path: readonly string[]): SearchResult<Node> {
    if (path.length === 0) {
      throw new Error('searchChildren: path must not be empty');
    }
    const first = path[0];
    const matches: Node[] = [];

    const search = (node: Node, currentPath: readonly string[]): void => {
      const newPath =
        currentPath.length > 0 || node.getName() === first ? [...currentPath, node.getName()] : currentPath;
      if (samePath(newPath, path)) {
        matches.push(node);
      } else if (newPath.length < path.length) {
        for (const child of node.children) search(child, newPath);
      }
    };

    search(this, []);
    return { matches, found: matches.length > 0 };
  }

  // Output

  /**
   * Append one line per leaf: the names of its ancestors (from this node down, 'counters' left
   * out) followed by the first word of its content.
   */
  flatList(list: string[], prefix = ''): string[] {
    if (this.children.length === 0) {
      const word = simpleName(this.content);
      list.push(prefix.length > 0 ? `${prefix} ${word}` : word);
      return list;
    }
    let childPrefix = prefix;
    if (this.name.length > 0 && this.name !== COUNTERS) {
      childPrefix = prefix === '' ? this.name : `${prefix} ${this.name}`;
    }
    for (const child of this.children) {
      child.flatList(list, childPrefix);
    }
    return list;
  }

  /** Indented dump for debugging. */
  print(depth = 0): string {
    const lines: string[] = [];
    this.printLines(depth, lines);
    return lines.join('');
  }

  private printLines(depth: number, lines: string[]): void {
    const name = this.name !== '' ? this.name : '* ';
    const content = this.content.length > 0 && !this.content.startsWith(MARKUP_MARKER) ? this.content : ' *';
    const label = `${PRINT_INDENT.repeat(depth)}[${name}]`;
    lines.push(`${label.padEnd(PRINT_NAME_WIDTH)} - ${content.padStart(PRINT_CONTENT_WIDTH)}\n`);
    for (const child of this.children) {
      child.printLines(depth + 1, lines);
    }
  }
}
