/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { scanBlock } from "./blockScanner.js";
import { RuleDefinitionError } from "./errors.js";
import {
  escapeSingleQuoted,
  expandPlaceholders,
  validatePlaceholders,
  type ValueEscaper,
} from "./templates.js";
import type {
  BlockReplacementResult,
  BlockSpec,
  EntityParameters,
} from "./types/rewrite.js";

/**
 * Checks a block spec once, when it is defined
 */
export function validateBlockSpec(spec: BlockSpec): void {
  const pairs = [spec.delimiters, spec.groupDelimiters];
  for (const pair of pairs) {
    if (!pair.open || !pair.close || pair.open === pair.close) {
      throw new RuleDefinitionError(
        `Block "${spec.id}" needs distinct, non-empty delimiters`,
        spec.id,
      );
    }
  }

  if (spec.openMatcher.test("")) {
    throw new RuleDefinitionError(
      `Block "${spec.id}" opener matches the empty string`,
      spec.id,
    );
  }

  validatePlaceholders(spec.newBlockTemplate, spec.id);
}

/**
 * Replaces the first block `spec` locates with its instantiated template.
 * Returns the text unchanged when no complete block is found.
 */
export function replaceBlockWithReport(
  text: string,
  spec: BlockSpec,
  params: EntityParameters,
  escape: ValueEscaper = escapeSingleQuoted,
): BlockReplacementResult {
  const scan = scanBlock(text, spec);

  if (scan.status !== "found") {
    return {
      text,
      blockId: spec.id,
      outcome: scan.status,
      candidates: scan.candidates,
    };
  }

  const { start, end, candidates } = scan.location;
  const replacement = expandPlaceholders(spec.newBlockTemplate, params, escape);

  return {
    text: text.slice(0, start) + replacement + text.slice(end),
    blockId: spec.id,
    outcome: "replaced",
    candidates,
    span: { start, end },
  };
}

export function replaceBlock(
  text: string,
  spec: BlockSpec,
  params: EntityParameters,
): string {
  return replaceBlockWithReport(text, spec, params).text;
}

/**
 * A block spec checked once and reused for every entity
 */
export class BlockReplacer {
  private readonly spec: Readonly<BlockSpec>;
  private readonly escape: ValueEscaper;

  constructor(spec: BlockSpec, escape: ValueEscaper = escapeSingleQuoted) {
    validateBlockSpec(spec);
    this.spec = Object.freeze({ ...spec });
    this.escape = escape;
  }

  getSpec(): Readonly<BlockSpec> {
    return this.spec;
  }

  replace(text: string, params: EntityParameters): BlockReplacementResult {
    return replaceBlockWithReport(text, this.spec, params, this.escape);
  }
}
