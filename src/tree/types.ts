/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Shared types of the template tree.
*/

/**
 * How a node was constructed. Qualified nodes come from (and go back to) markup;
 * children created under a node inherit its kind.
 */
export type NameKind = 'plain' | 'qualified';

/** One attribute; a node keeps them in insertion order, duplicates allowed. */
export interface Attribute {
  name: string;
  value: string;
}

/**
 * Result of a path search: matches in pre-order, and whether there was any.
 */
export interface SearchResult<T> {
  matches: T[];
  found: boolean;
}
