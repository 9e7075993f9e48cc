/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { BlockReplacer } from "./blockReplacer.js";
import type { PatternRuleSet } from "./patternRuleSet.js";
import type { EntityParameters, RewriteReport } from "./types/rewrite.js";

/**
 * Pure composition of the rule pass and the block pass over one buffer.
 * The block pass always sees the fully rewritten text.
 */
export class RewriteEngine {
  constructor(
    private readonly ruleSet: PatternRuleSet,
    private readonly blockReplacer: BlockReplacer,
  ) {}

  rewrite(text: string, params: EntityParameters): RewriteReport {
    const ruleResult = this.ruleSet.applyWithReport(text, params);
    const block = this.blockReplacer.replace(ruleResult.text, params);

    return {
      text: block.text,
      changed: block.text !== text,
      rules: ruleResult.applications,
      block,
    };
  }
}
