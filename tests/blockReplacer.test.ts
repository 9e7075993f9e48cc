import { describe, it, expect } from "vitest";
import {
  BlockReplacer,
  replaceBlock,
  replaceBlockWithReport,
  validateBlockSpec,
} from "../src/blockReplacer.js";
import { RuleDefinitionError } from "../src/errors.js";
import type { BlockSpec, EntityParameters } from "../src/types/rewrite.js";

const params: EntityParameters = {
  name: "A1",
  description: "Builds things",
  priorityLabel: "first",
};

const spec: BlockSpec = {
  id: "build-method",
  description: "Replace build()",
  openMatcher: /Foo build\(/,
  delimiters: { open: "{", close: "}" },
  groupDelimiters: { open: "(", close: ")" },
  newBlockTemplate: "Foo build() => '{{name}}';",
};

const source = "class A {\n  Foo build(int x) {\n    return x;\n  }\n}\n";

describe("replaceBlockWithReport", () => {
  it("replaces the whole block including nested delimiters", () => {
    const nested =
      "class A {\n  Foo build(int x) {\n    if (x > 0) {\n      return x;\n    }\n    return 0;\n  }\n}\n";
    expect(replaceBlock(nested, spec, params)).toBe(
      "class A {\n  Foo build() => 'A1';\n}\n",
    );
  });

  it("reports the replaced span", () => {
    const result = replaceBlockWithReport(source, spec, params);

    expect(result).toEqual({
      text: "class A {\n  Foo build() => 'A1';\n}\n",
      blockId: "build-method",
      outcome: "replaced",
      candidates: 1,
      span: { start: 12, end: 48 },
    });
  });

  it("leaves the text untouched when the opener is missing", () => {
    const input = "class B {}\n";
    const result = replaceBlockWithReport(input, spec, params);

    expect(result.text).toBe(input);
    expect(result.outcome).toBe("not-found");
    expect(result.candidates).toBe(0);
    expect(result.span).toBeUndefined();
  });

  it("leaves the text untouched when the block never closes", () => {
    const input = "class A {\n  Foo build() {\n    return 1;\n";
    const result = replaceBlockWithReport(input, spec, params);

    expect(result.text).toBe(input);
    expect(result.outcome).toBe("unbalanced");
  });

  it("keeps $ sequences of the template literally", () => {
    const priced = { ...spec, newBlockTemplate: "Foo build() => '$1';" };
    expect(replaceBlock(source, priced, params)).toBe(
      "class A {\n  Foo build() => '$1';\n}\n",
    );
  });

  it("escapes entity values for single-quoted strings", () => {
    expect(replaceBlock(source, spec, { ...params, name: "it's" })).toBe(
      "class A {\n  Foo build() => 'it\\'s';\n}\n",
    );
  });
});

describe("validateBlockSpec", () => {
  it("rejects identical delimiters", () => {
    expect(() =>
      validateBlockSpec({ ...spec, delimiters: { open: "|", close: "|" } }),
    ).toThrow('Block "build-method" needs distinct, non-empty delimiters');
  });

  it("rejects an opener that matches the empty string", () => {
    expect(() => validateBlockSpec({ ...spec, openMatcher: /x*/ })).toThrow(
      RuleDefinitionError,
    );
  });

  it("rejects unknown placeholders", () => {
    expect(() =>
      validateBlockSpec({ ...spec, newBlockTemplate: "{{label}}" }),
    ).toThrow(RuleDefinitionError);
  });
});

describe("BlockReplacer", () => {
  it("validates the spec on construction", () => {
    expect(
      () => new BlockReplacer({ ...spec, newBlockTemplate: "{{bogus}}" }),
    ).toThrow(RuleDefinitionError);
  });

  it("keeps a frozen copy of its spec", () => {
    const replacer = new BlockReplacer(spec);

    expect(Object.isFrozen(replacer.getSpec())).toBe(true);
    expect(replacer.getSpec().id).toBe("build-method");
  });

  it("produces the same text when re-applied to its own output", () => {
    const replacer = new BlockReplacer({
      ...spec,
      newBlockTemplate: "Foo build() {\n    return '{{name}}';\n  }",
    });
    const once = replacer.replace(source, params).text;
    const twice = replacer.replace(once, params);

    expect(once).toBe("class A {\n  Foo build() {\n    return 'A1';\n  }\n}\n");
    expect(twice.text).toBe(once);
    expect(twice.outcome).toBe("replaced");
  });
});
