/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Ordered find/replace rules over a text buffer.
 *
 * Rules run in declaration order and each one scans the whole current
 * buffer, so later rules see what earlier ones produced. A rule that finds
 * nothing leaves the buffer as it is.
 */

import { RuleDefinitionError } from "./errors.js";
import {
  countCaptureGroups,
  escapeSingleQuoted,
  expandTemplate,
  validateTemplate,
  type ValueEscaper,
} from "./templates.js";
import type {
  EntityParameters,
  RewriteRule,
  RuleApplication,
  RuleSetResult,
} from "./types/rewrite.js";

export interface PatternRuleSetOptions {
  /** Escaper applied to entity values before they enter the text */
  escape?: ValueEscaper;
}

interface CompiledRule {
  readonly rule: Readonly<RewriteRule>;
  readonly pattern: RegExp;
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds the global pattern a rule is applied with
 */
export function compileMatcher(rule: RewriteRule): RegExp {
  if (typeof rule.matcher === "string") {
    if (rule.matcher.length === 0) {
      throw new RuleDefinitionError(
        `Rule "${rule.id}" has an empty literal matcher`,
        rule.id,
      );
    }
    return new RegExp(escapeRegex(rule.matcher), rule.multiline ? "gms" : "g");
  }

  const flags = new Set(rule.matcher.flags.replace("y", ""));
  flags.add("g");
  if (rule.multiline) {
    flags.add("m");
    flags.add("s");
  }
  return new RegExp(rule.matcher.source, [...flags].join(""));
}

function compileRule(rule: RewriteRule): CompiledRule {
  if (!rule.id || rule.id.trim() === "") {
    throw new RuleDefinitionError("Rule ID is required");
  }

  let pattern: RegExp;
  try {
    pattern = compileMatcher(rule);
  } catch (error) {
    if (error instanceof RuleDefinitionError) throw error;
    throw new RuleDefinitionError(
      `Rule "${rule.id}" has an invalid matcher`,
      rule.id,
      error instanceof Error ? error : undefined,
    );
  }

  if (pattern.test("")) {
    throw new RuleDefinitionError(
      `Rule "${rule.id}" matches the empty string`,
      rule.id,
    );
  }

  validateTemplate(rule.template, countCaptureGroups(pattern), rule.id);

  return Object.freeze({ rule: Object.freeze({ ...rule }), pattern });
}

export class PatternRuleSet {
  private readonly compiled: readonly CompiledRule[];
  private readonly escape: ValueEscaper;

  /**
   * @throws RuleDefinitionError when a rule is malformed or an ID repeats
   */
  constructor(rules: readonly RewriteRule[], options: PatternRuleSetOptions = {}) {
    const seen = new Set<string>();
    const compiled: CompiledRule[] = [];

    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new RuleDefinitionError(`Duplicate rule ID "${rule.id}"`, rule.id);
      }
      seen.add(rule.id);
      compiled.push(compileRule(rule));
    }

    this.compiled = Object.freeze(compiled);
    this.escape = options.escape ?? escapeSingleQuoted;
  }

  get size(): number {
    return this.compiled.length;
  }

  getRules(): readonly Readonly<RewriteRule>[] {
    return this.compiled.map((entry) => entry.rule);
  }

  apply(text: string, params: EntityParameters): string {
    return this.applyWithReport(text, params).text;
  }

  applyWithReport(text: string, params: EntityParameters): RuleSetResult {
    const applications: RuleApplication[] = [];
    let buffer = text;

    for (const entry of this.compiled) {
      const { text: next, matchCount } = this.applyRule(buffer, entry, params);
      applications.push({ ruleId: entry.rule.id, matchCount });
      buffer = next;
    }

    return { text: buffer, applications };
  }

  private applyRule(
    text: string,
    entry: CompiledRule,
    params: EntityParameters,
  ): { text: string; matchCount: number } {
    // Fresh instance: the compiled pattern is shared and lastIndex is state
    const pattern = new RegExp(entry.pattern.source, entry.pattern.flags);
    let output = "";
    let cursor = 0;
    let matchCount = 0;
    let match: RegExpExecArray | null;

    while ((match = pattern.exec(text)) !== null) {
      output += text.slice(cursor, match.index);
      output += expandTemplate(entry.rule.template, match, params, this.escape);
      cursor = match.index + match[0].length;
      matchCount++;
      if (match[0].length === 0) {
        pattern.lastIndex++;
      }
    }

    if (matchCount === 0) {
      return { text, matchCount };
    }

    return { text: output + text.slice(cursor), matchCount };
  }
}
