/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { Node } from './node';
export { decodeTemplate } from './decoder';
export { encodeTemplate } from './encoder';
export { simpleName, decodeHtml } from './text';
export { setTreeLogger, treeLogger } from './log';
export { LABEL_AGENT, COUNTERS, ACCUMULATE_SEPARATOR } from './constants';
export type { Attribute, NameKind, SearchResult } from './types';
export type { DecodeError, DecodeResult } from './decoder';
