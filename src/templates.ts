/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { RuleDefinitionError } from "./errors.js";
import type { EntityParameters, EntityPlaceholder } from "./types/rewrite.js";

/**
 * Escapes a value for use inside a single-quoted string literal of the
 * rewritten source (backslash, quote, `$` interpolation and line breaks).
 */
export function escapeSingleQuoted(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/\$/g, "\\$")
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n");
}

export type ValueEscaper = (value: string) => string;

const ENTITY_PLACEHOLDERS: readonly EntityPlaceholder[] = [
  "name",
  "description",
  "priorityLabel",
];

const TEMPLATE_TOKEN = /\$(\$|&|\d+)|\{\{\s*(\w+)\s*\}\}/g;
const PLACEHOLDER_TOKEN = /\{\{\s*(\w+)\s*\}\}/g;

function isEntityPlaceholder(name: string): name is EntityPlaceholder {
  return ENTITY_PLACEHOLDERS.some((placeholder) => placeholder === name);
}

function unknownPlaceholder(placeholder: string, ownerId: string): RuleDefinitionError {
  return new RuleDefinitionError(
    `Template of "${ownerId}" uses unknown placeholder {{${placeholder}}}`,
    ownerId,
    undefined,
    { placeholder, allowed: ENTITY_PLACEHOLDERS.join(", ") },
  );
}

/**
 * Number of capture groups (named ones included) in a pattern
 */
export function countCaptureGroups(pattern: RegExp): number {
  const probe = new RegExp(`${pattern.source}|`, pattern.flags.replace(/[gy]/g, ""));
  const match = probe.exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Checks every `$n` reference and `{{field}}` placeholder of a template.
 * Throws RuleDefinitionError on the first reference that cannot resolve.
 */
export function validateTemplate(
  template: string,
  groupCount: number,
  ownerId: string,
): void {
  for (const token of template.matchAll(TEMPLATE_TOKEN)) {
    const [, reference, placeholder] = token;

    if (reference !== undefined && /^\d+$/.test(reference)) {
      const index = Number(reference);
      if (index === 0 || index > groupCount) {
        throw new RuleDefinitionError(
          `Template of "${ownerId}" references capture group $${index} but the matcher has ${groupCount}`,
          ownerId,
          undefined,
          { reference: `$${index}`, groupCount },
        );
      }
    }

    if (placeholder !== undefined && !isEntityPlaceholder(placeholder)) {
      throw unknownPlaceholder(placeholder, ownerId);
    }
  }
}

/**
 * Checks the `{{field}}` placeholders of a template that has no captures
 */
export function validatePlaceholders(template: string, ownerId: string): void {
  for (const [, placeholder] of template.matchAll(PLACEHOLDER_TOKEN)) {
    if (!isEntityPlaceholder(placeholder)) {
      throw unknownPlaceholder(placeholder, ownerId);
    }
  }
}

/**
 * Substitutes only `{{field}}` placeholders; `$` is left untouched
 */
export function expandPlaceholders(
  template: string,
  params: EntityParameters,
  escape: ValueEscaper = escapeSingleQuoted,
): string {
  return template.replace(PLACEHOLDER_TOKEN, (token, field: string) =>
    isEntityPlaceholder(field) ? escape(params[field]) : token,
  );
}

/**
 * Expands a rule template for one match in a single pass, so substituted
 * values are never re-read as template syntax.
 */
export function expandTemplate(
  template: string,
  match: RegExpExecArray | RegExpMatchArray,
  params: EntityParameters,
  escape: ValueEscaper = escapeSingleQuoted,
): string {
  return template.replace(
    TEMPLATE_TOKEN,
    (token, reference: string | undefined, placeholder: string | undefined) => {
      if (reference === "$") return "$";
      if (reference === "&") return match[0];
      if (reference !== undefined) return match[Number(reference)] ?? "";
      if (placeholder !== undefined && isEntityPlaceholder(placeholder)) {
        return escape(params[placeholder]);
      }
      return token;
    },
  );
}
