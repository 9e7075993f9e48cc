import { describe, it, expect } from "vitest";
import { RuleDefinitionError } from "../src/errors.js";
import {
  countCaptureGroups,
  escapeSingleQuoted,
  expandPlaceholders,
  expandTemplate,
  validatePlaceholders,
  validateTemplate,
} from "../src/templates.js";
import type { EntityParameters } from "../src/types/rewrite.js";

const params: EntityParameters = {
  name: "WordOrderLayer",
  description: "Reorders words",
  priorityLabel: "wordOrder",
};

const identity = (value: string): string => value;

describe("escapeSingleQuoted", () => {
  it("escapes quotes, backslashes, interpolation and line breaks", () => {
    expect(escapeSingleQuoted("it's")).toBe("it\\'s");
    expect(escapeSingleQuoted("a\\b")).toBe("a\\\\b");
    expect(escapeSingleQuoted("cost $5")).toBe("cost \\$5");
    expect(escapeSingleQuoted("one\ntwo\r")).toBe("one\\ntwo\\r");
  });

  it("leaves plain text alone", () => {
    expect(escapeSingleQuoted("Word order layer (SVO, SOV)")).toBe(
      "Word order layer (SVO, SOV)",
    );
  });
});

describe("countCaptureGroups", () => {
  it("counts numbered and named groups but not non-capturing ones", () => {
    expect(countCaptureGroups(/(a)(?:b)(?<tail>c)/)).toBe(2);
    expect(countCaptureGroups(/plain/g)).toBe(0);
  });
});

describe("validateTemplate", () => {
  it("accepts references within the group count", () => {
    expect(() => validateTemplate("$1 and $2 and $&", 2, "ok")).not.toThrow();
  });

  it("rejects a reference past the last group", () => {
    expect(() => validateTemplate("$2", 1, "too-far")).toThrow(
      RuleDefinitionError,
    );
  });

  it("rejects $0", () => {
    expect(() => validateTemplate("$0", 1, "zero")).toThrow(
      'Template of "zero" references capture group $0 but the matcher has 1',
    );
  });

  it("treats $$ as a literal dollar", () => {
    expect(() => validateTemplate("$$2", 0, "dollar")).not.toThrow();
  });

  it("rejects unknown placeholders", () => {
    expect(() => validateTemplate("{{label}}", 0, "unknown")).toThrow(
      'Template of "unknown" uses unknown placeholder {{label}}',
    );
  });

  it("carries the owning rule id on the error", () => {
    try {
      validateTemplate("$3", 0, "owner");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RuleDefinitionError);
      if (error instanceof RuleDefinitionError) {
        expect(error.ruleId).toBe("owner");
        expect(error.code).toBe("RULE_DEFINITION_ERROR");
      }
    }
  });
});

describe("validatePlaceholders", () => {
  it("ignores $ references", () => {
    expect(() => validatePlaceholders("$1 {{name}}", "block")).not.toThrow();
  });

  it("rejects unknown placeholders", () => {
    expect(() => validatePlaceholders("{{ priority }}", "block")).toThrow(
      RuleDefinitionError,
    );
  });
});

describe("expandTemplate", () => {
  it("substitutes captures, the whole match, dollars and placeholders", () => {
    const match = /x(\d)/.exec("x7");
    expect(match).not.toBeNull();
    if (!match) return;

    expect(
      expandTemplate("a $1 b $$ c $& {{name}}", match, params, identity),
    ).toBe("a 7 b $ c x7 WordOrderLayer");
  });

  it("accepts whitespace inside placeholder braces", () => {
    const match = /y/.exec("y");
    if (!match) throw new Error("no match");

    expect(expandTemplate("{{ priorityLabel }}", match, params)).toBe(
      "wordOrder",
    );
  });

  it("never re-reads substituted values as template syntax", () => {
    const match = /(q)/.exec("q");
    if (!match) throw new Error("no match");
    const tricky = { ...params, description: "$1 {{name}}" };

    expect(expandTemplate("{{description}}", match, tricky, identity)).toBe(
      "$1 {{name}}",
    );
    expect(expandTemplate("{{description}}", match, tricky)).toBe(
      "\\$1 {{name}}",
    );
  });

  it("expands an unmatched optional group to the empty string", () => {
    const match = /a(b)?/.exec("a");
    if (!match) throw new Error("no match");

    expect(expandTemplate("[$1]", match, params)).toBe("[]");
  });
});

describe("expandPlaceholders", () => {
  it("leaves $ sequences untouched", () => {
    expect(
      expandPlaceholders("'$1' {{description}}", params, identity),
    ).toBe("'$1' Reorders words");
  });
});
