/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Fixed labels and layout constants used by tree operations.
*/

/** Ancestor name that turns inline content into anonymous child entries. */
export const LABEL_AGENT = 'LabelAgent';
/** Container name left out of flattened paths. */
export const COUNTERS = 'counters';
/** Joins accumulated content during merge. */
export const ACCUMULATE_SEPARATOR = ',';
/** Raw content starting with this is nested markup, not a value. */
export const MARKUP_MARKER = '<';

export const PRINT_NAME_WIDTH = 50;
export const PRINT_CONTENT_WIDTH = 35;
export const PRINT_INDENT = '  ';
