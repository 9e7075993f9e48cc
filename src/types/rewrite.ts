/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview Shared types for the rewrite engine
 * @module types/rewrite
 */

/** Per-entity values substituted into rule and block templates */
export interface EntityParameters {
  /** Class name of the target, e.g. `PostProcessingLayer` */
  name: string;
  /** Human-readable description inserted into the description accessor */
  description: string;
  /** Member of the priority enum, e.g. `postProcessing` */
  priorityLabel: string;
}

/** Placeholder names usable as `{{field}}` in templates */
export type EntityPlaceholder = keyof EntityParameters;

/** One configured rewrite target */
export interface EntityTarget extends EntityParameters {
  filePath: string;
}

/**
 * A single find/replace rule.
 *
 * `template` supports `$1..$n`, `$&`, `$$` and `{{name}}`-style placeholders.
 */
export interface RewriteRule {
  /** Stable identifier used in reports */
  id: string;
  description: string;
  /** A string matcher is matched literally */
  matcher: RegExp | string;
  template: string;
  /** Let `.` cross newlines and `^`/`$` match at line breaks */
  multiline?: boolean;
}

export interface DelimiterPair {
  open: string;
  close: string;
}

/**
 * Locates one delimited block and the text that replaces it
 */
export interface BlockSpec {
  id: string;
  description: string;
  /** Marks where the block starts; only the first match is used */
  openMatcher: RegExp;
  /** Delimiters of the block body */
  delimiters: DelimiterPair;
  /** Delimiters of the signature's parameter list, skipped when looking for the body */
  groupDelimiters: DelimiterPair;
  newBlockTemplate: string;
}

/** How many times one rule matched during a pass */
export interface RuleApplication {
  ruleId: string;
  matchCount: number;
}

export interface RuleSetResult {
  text: string;
  applications: RuleApplication[];
}

export type BlockOutcome = "replaced" | "not-found" | "unbalanced";

/** Half-open span `[start, end)` of a located block */
export interface BlockLocation {
  start: number;
  /** Offset of the body's opening delimiter */
  bodyStart: number;
  end: number;
  /** Number of places the opener matched */
  candidates: number;
}

export interface BlockReplacementResult {
  text: string;
  blockId: string;
  outcome: BlockOutcome;
  candidates: number;
  /** Replaced span in the input text, when outcome is `replaced` */
  span?: { start: number; end: number };
}

/** Everything the engine did to one buffer */
export interface RewriteReport {
  text: string;
  changed: boolean;
  rules: RuleApplication[];
  block: BlockReplacementResult;
}
