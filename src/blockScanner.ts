/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview Delimiter-depth scanner used to find where a block really ends
 * @module blockScanner
 *
 * Not a parser: it only knows about string literals (single, double and
 * triple quoted, raw `r'...'` included), line and block comments, and the
 * two delimiter pairs it is given.
 */

import type { BlockLocation, DelimiterPair } from "./types/rewrite.js";

export type BlockScan =
  | { status: "found"; location: BlockLocation }
  | { status: "not-found"; candidates: number }
  | { status: "unbalanced"; candidates: number; start: number };

export interface BlockScanOptions {
  openMatcher: RegExp;
  delimiters: DelimiterPair;
  groupDelimiters: DelimiterPair;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;

/**
 * Every index at which the opener matches, in order
 */
export function findOpenerOffsets(text: string, openMatcher: RegExp): number[] {
  const flags = openMatcher.flags.includes("g")
    ? openMatcher.flags.replace("y", "")
    : openMatcher.flags.replace("y", "") + "g";
  const pattern = new RegExp(openMatcher.source, flags);
  const offsets: number[] = [];
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    offsets.push(match.index);
    // Prevent infinite loop for zero-width matches
    if (match[0].length === 0) {
      pattern.lastIndex++;
    }
  }

  return offsets;
}

/**
 * Index just past the string literal opening at `index`, or -1 if it never closes
 */
export function skipStringLiteral(text: string, index: number): number {
  const quote = text[index];
  const triple = text.startsWith(quote.repeat(3), index);
  const closing = triple ? quote.repeat(3) : quote;
  const raw =
    index > 0 &&
    text[index - 1] === "r" &&
    !IDENTIFIER_CHAR.test(text[index - 2] ?? "");

  let i = index + closing.length;
  while (i < text.length) {
    if (!raw && text[i] === "\\") {
      i += 2;
      continue;
    }
    if (!triple && text[i] === "\n") {
      return -1;
    }
    if (text.startsWith(closing, i)) {
      return i + closing.length;
    }
    i++;
  }

  return -1;
}

/**
 * Index just past the comment opening at `index`, -1 for an unclosed block
 * comment, or `index` itself when no comment starts there
 */
export function skipComment(text: string, index: number): number {
  if (text.startsWith("//", index)) {
    const newline = text.indexOf("\n", index);
    return newline === -1 ? text.length : newline + 1;
  }
  if (text.startsWith("/*", index)) {
    const close = text.indexOf("*/", index + 2);
    return close === -1 ? -1 : close + 2;
  }
  return index;
}

/**
 * Locates the first block introduced by `openMatcher`.
 *
 * The body is the first `delimiters.open` met outside any
 * `groupDelimiters` pair; the block ends at the matching
 * `delimiters.close`, nested pairs included. A statement terminator met
 * before any body means the opener introduced a bodiless declaration.
 */
export function scanBlock(text: string, options: BlockScanOptions): BlockScan {
  const { delimiters, groupDelimiters } = options;
  const offsets = findOpenerOffsets(text, options.openMatcher);
  const candidates = offsets.length;

  if (candidates === 0) {
    return { status: "not-found", candidates };
  }

  const start = offsets[0];
  let groupDepth = 0;
  let depth = 0;
  let bodyStart = -1;
  let i = start;

  while (i < text.length) {
    const char = text[i];

    if (char === "/") {
      const next = skipComment(text, i);
      if (next === -1) break;
      if (next !== i) {
        i = next;
        continue;
      }
    }

    if (char === "'" || char === '"') {
      const next = skipStringLiteral(text, i);
      if (next === -1) break;
      i = next;
      continue;
    }

    if (bodyStart === -1) {
      if (text.startsWith(groupDelimiters.open, i)) {
        groupDepth++;
        i += groupDelimiters.open.length;
        continue;
      }
      if (text.startsWith(groupDelimiters.close, i)) {
        groupDepth = Math.max(0, groupDepth - 1);
        i += groupDelimiters.close.length;
        continue;
      }
      if (groupDepth === 0 && char === ";") {
        return { status: "not-found", candidates };
      }
      if (groupDepth === 0 && text.startsWith(delimiters.open, i)) {
        bodyStart = i;
        depth = 1;
        i += delimiters.open.length;
        continue;
      }
      i++;
      continue;
    }

    if (text.startsWith(delimiters.open, i)) {
      depth++;
      i += delimiters.open.length;
      continue;
    }

    if (text.startsWith(delimiters.close, i)) {
      depth--;
      i += delimiters.close.length;
      if (depth === 0) {
        return {
          status: "found",
          location: { start, bodyStart, end: i, candidates },
        };
      }
      continue;
    }

    i++;
  }

  return { status: "unbalanced", candidates, start };
}
