/**
 * Tests for contract validation and repair suggestions
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { classifySourceFile } from "../src/classifier.js";
import { validateContract, type ValidationOptions } from "../src/validator.js";
import { applyEdits } from "../src/apply-edits.js";

function validate(code: string, options?: ValidationOptions) {
  const sourceFile = ts.createSourceFile("model.ts", code, ts.ScriptTarget.Latest, true);
  const [host] = classifySourceFile(sourceFile);
  return validateContract(host, options);
}

function codes(code: string, options?: ValidationOptions): string[] {
  return validate(code, options).diagnostics.map((d) => d.code);
}

describe("validateContract", () => {
  describe("valid contracts", () => {
    const PERSON = `
@valueObject
export class Person extends ValueObject<Person> {
  @include() readonly city: string = "";
  @custom(1) readonly lastName: string = "";
  @sequence({ order: 2, orderMatters: false }) readonly tags: readonly string[] = [];
  @ignore() cachedLabel = "";
  @include(-1) readonly id: number = 0;

  static Equals_LastName(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
  }

  static GetHashCode_LastName(value: string): number {
    return value.length;
  }
}
`;

    it("reports nothing", () => {
      expect(validate(PERSON).diagnostics).toEqual([]);
    });

    it("orders entries by order, then declaration position", () => {
      const { contract } = validate(PERSON);
      expect(contract?.shape).toBe("composite");
      expect(contract?.entries.map((e) => e.member.name)).toEqual(["id", "city", "lastName", "tags"]);
    });

    it("resolves companions for custom members", () => {
      const { contract } = validate(PERSON);
      const lastName = contract?.entries.find((e) => e.member.name === "lastName");
      expect(lastName?.companion).toEqual({
        suffix: "LastName",
        equalsName: "Equals_LastName",
        hashName: "GetHashCode_LastName",
      });
    });

    it("breaks order ties by declaration position", () => {
      const { contract } = validate(`
@valueObject
export class Pair extends ValueObject<Pair> {
  @include() readonly b: number = 0;
  @include() readonly a: number = 0;
}
`);
      expect(contract?.entries.map((e) => e.member.name)).toEqual(["b", "a"]);
    });
  });

  describe("VO001 not exported", () => {
    const MONEY = `@valueObject
class Money extends ValueObject<Money> {
  @include() readonly amount: number = 0;
}
`;

    it("blocks the contract", () => {
      const result = validate(MONEY);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO001"]);
      expect(result.diagnostics[0].message).toBe(
        "The value object 'Money' must be exported so its equality members can be generated"
      );
      expect(result.contract).toBeUndefined();
    });

    it("suggests adding export", () => {
      const [diagnostic] = validate(MONEY).diagnostics;
      const [suggestion] = diagnostic.suggestions;
      expect(suggestion.id).toBe("add-export");
      expect(applyEdits(MONEY, suggestion.edits)).toContain("@valueObject\nexport class Money");
    });
  });

  describe("VO002 missing strategy", () => {
    const CODE = `@valueObject
export class Money extends ValueObject<Money> {
  readonly amount: number = 0;
  @include() readonly currency: string = "";
}
`;

    it("warns and still produces the contract without the member", () => {
      const result = validate(CODE);
      expect(result.diagnostics.map((d) => [d.code, d.severity])).toEqual([["VO002", "warning"]]);
      expect(result.diagnostics[0].message).toBe(
        "The field 'amount' in value object 'Money' should have an equality decorator"
      );
      expect(result.contract?.entries.map((e) => e.member.name)).toEqual(["currency"]);
    });

    it("suggests @include first", () => {
      const [diagnostic] = validate(CODE).diagnostics;
      expect(diagnostic.suggestions.map((s) => s.id)).toEqual(["add-include", "add-ignore"]);
      expect(applyEdits(CODE, diagnostic.suggestions[0].edits)).toContain(
        "  @include() readonly amount: number = 0;"
      );
    });

    it("offers @sequence for sequence members", () => {
      const [diagnostic] = validate(`@valueObject
export class Bag extends ValueObject<Bag> {
  readonly items: number[] = [];
}
`).diagnostics;
      expect(diagnostic.suggestions.map((s) => s.id)).toEqual(["add-include", "add-ignore", "add-sequence"]);
    });

    it("skips members matching an ignore pattern", () => {
      expect(
        codes(
          `@valueObject
export class Money extends ValueObject<Money> {
  readonly _cache: string = "";
}
`,
          { ignoreMembers: ["_*"] }
        )
      ).toEqual([]);
    });

    it("gives parameter properties help instead of edits", () => {
      const [diagnostic] = validate(`@valueObject
export class Id extends ValueObject<Id> {
  constructor(readonly raw: string) {
    super();
  }
}
`).diagnostics;
      expect(diagnostic.code).toBe("VO002");
      expect(diagnostic.suggestions).toEqual([]);
      expect(diagnostic.help).toBe(
        "Parameter properties cannot be decorated; declare it as a class field to annotate it"
      );
    });

    it("becomes blocking when escalated", () => {
      const result = validate(CODE, { severity: { VO002: "error" } });
      expect(result.diagnostics.map((d) => [d.code, d.severity])).toEqual([["VO002", "error"]]);
      expect(result.contract).toBeUndefined();
    });
  });

  describe("VO003 and VO004 missing companions", () => {
    const CODE = `@valueObject
export class Person extends ValueObject<Person> {
  @custom() readonly lastName: string = "";
}
`;

    it("reports each missing companion", () => {
      const result = validate(CODE);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO003", "VO004"]);
      expect(result.diagnostics[0].message).toBe(
        "The member 'lastName' has @custom but the class is missing 'static Equals_LastName(a: string, b: string): boolean'"
      );
      expect(result.contract).toBeUndefined();
    });

    it("inserts stubs before the closing brace", () => {
      const [equals] = validate(CODE).diagnostics;
      expect(applyEdits(CODE, equals.suggestions[0].edits)).toBe(`@valueObject
export class Person extends ValueObject<Person> {
  @custom() readonly lastName: string = "";

  static Equals_LastName(a: string, b: string): boolean {
    throw new Error("Equals_LastName is not implemented");
  }
}
`);
    });
  });

  describe("VO005 multiple strategies", () => {
    const CODE = `@valueObject
export class Money extends ValueObject<Money> {
  @include() @ignore() readonly amount: number = 0;
}
`;

    it("excludes the member and blocks the contract", () => {
      const result = validate(CODE);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO005"]);
      expect(result.diagnostics[0].related).toHaveLength(2);
      expect(result.contract).toBeUndefined();
    });

    it("offers to keep each decorator", () => {
      const [diagnostic] = validate(CODE).diagnostics;
      expect(diagnostic.suggestions.map((s) => s.id)).toEqual(["keep-include", "keep-ignore"]);
      expect(applyEdits(CODE, diagnostic.suggestions[0].edits)).toContain(
        "  @include() readonly amount: number = 0;"
      );
      expect(applyEdits(CODE, diagnostic.suggestions[1].edits)).toContain(
        "  @ignore() readonly amount: number = 0;"
      );
    });
  });

  describe("VO006 sequence on non-sequence", () => {
    it("rejects text members and suggests @include", () => {
      const code = `@valueObject
export class Name extends ValueObject<Name> {
  @sequence({ order: 3 }) readonly text: string = "";
}
`;
      const result = validate(code);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO006"]);
      expect(result.diagnostics[0].message).toBe(
        "The field 'text' has @sequence but its type 'string' is not an iterable sequence; consider @include instead"
      );
      expect(applyEdits(code, result.diagnostics[0].suggestions[0].edits)).toContain(
        "  @include(3) readonly text: string"
      );
    });
  });

  describe("VO007 strategy outside a contract", () => {
    it("reports each decorator on an unmarked class", () => {
      const result = validate(`export class Plain {
  @include() readonly x: number = 0;
  @ignore() readonly y: number = 0;
}
`);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "The field 'x' has @include but the containing class 'Plain' is not marked with @valueObject",
        "The field 'y' has @ignore but the containing class 'Plain' is not marked with @valueObject",
      ]);
      expect(result.contract).toBeUndefined();
    });
  });

  describe("VO008 missing base shape", () => {
    it("requires ValueObject as the base", () => {
      expect(
        codes(`@valueObject
export class Loose {
  @include() readonly x: number = 0;
}
`)
      ).toEqual(["VO008"]);
    });
  });

  describe("derived hosts", () => {
    function validateLast(code: string) {
      const sourceFile = ts.createSourceFile("model.ts", code, ts.ScriptTarget.Latest, true);
      const hosts = classifySourceFile(sourceFile);
      return validateContract(hosts[hosts.length - 1]);
    }

    it("accepts a value object derived from another one", () => {
      const result = validateLast(`
export class Money extends ValueObject<Money> {
  @include() readonly amount: number = 0;
}

@valueObject
export class Price extends Money {
  @include() readonly tax: number = 0;
}
`);
      expect(result.diagnostics).toEqual([]);
      expect(result.contract?.shape).toBe("composite");
      expect(result.contract?.entries.map((e) => e.member.name)).toEqual(["tax"]);
    });

    it("warns on extra members of a derived wrapper", () => {
      const result = validateLast(`
export class Email extends SimpleValueObject<Email, string> {}

export class WorkEmail extends Email {
  readonly department: string = "";
}
`);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO012"]);
      expect(result.diagnostics[0].message).toBe(
        "The simple value object 'WorkEmail' should not declare additional field 'department'; only 'value' takes part in equality"
      );
    });
  });

  describe("VO009 companion collision", () => {
    it("pairs the later member with the first", () => {
      const result = validate(`@valueObject
export class Price extends ValueObject<Price> {
  @custom() readonly _amount: number = 0;
  @custom() readonly amount: number = 0;

  static Equals_Amount(a: number, b: number): boolean {
    return a === b;
  }

  static GetHashCode_Amount(value: number): number {
    return value;
  }
}
`);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO009"]);
      expect(result.diagnostics[0].message).toBe(
        "The members '_amount' and 'amount' resolve to the same companion functions (Equals_Amount/GetHashCode_Amount); rename one of them"
      );
      expect(result.diagnostics[0].related.map((r) => r.location.line)).toEqual([3]);
      expect(result.contract).toBeUndefined();
    });
  });

  describe("VO010 and VO011 mutability", () => {
    it("warns on auto-accessors", () => {
      const result = validate(`@valueObject
export class Tag extends ValueObject<Tag> {
  @include() accessor label: string = "";
}
`);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO010"]);
      expect(result.contract?.entries.map((e) => e.member.name)).toEqual(["label"]);
    });

    it("warns on mutable fields and suggests readonly", () => {
      const code = `@valueObject
export class Counter extends ValueObject<Counter> {
  @include() count: number = 0;
}
`;
      const result = validate(code);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO011"]);
      expect(applyEdits(code, result.diagnostics[0].suggestions[0].edits)).toContain(
        "  @include() readonly count: number = 0;"
      );
    });
  });

  describe("VO012 and VO014 wrappers", () => {
    const EMAIL = `@valueObject
export class Email extends SimpleValueObject<Email, string> {
  readonly domain: string = "";
}
`;

    it("warns on the marker and on extra members", () => {
      const result = validate(EMAIL);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO014", "VO012"]);
      expect(result.diagnostics[1].message).toBe(
        "The simple value object 'Email' should not declare additional field 'domain'; only 'value' takes part in equality"
      );
    });

    it("produces a wrapper contract over value only", () => {
      const { contract } = validate(EMAIL);
      expect(contract?.shape).toBe("wrapper");
      expect(contract?.entries.map((e) => [e.member.name, e.member.builtin])).toEqual([["value", true]]);
    });

    it("suggests removing the marker", () => {
      const [marker] = validate(EMAIL).diagnostics;
      expect(applyEdits(EMAIL, marker.suggestions[0].edits)).toBe(`export class Email extends SimpleValueObject<Email, string> {
  readonly domain: string = "";
}
`);
    });

    it("does not treat wrapper member decorators as misplaced", () => {
      expect(
        codes(`export class Email extends SimpleValueObject<Email, string> {
  @include() readonly domain: string = "";
}
`)
      ).toEqual(["VO012"]);
    });
  });

  describe("VO013 duplicate order", () => {
    it("reports one warning per group, at the second member", () => {
      const result = validate(`@valueObject
export class Triple extends ValueObject<Triple> {
  @include(1) readonly a: number = 0;
  @include(1) readonly b: number = 0;
  @include(1) readonly c: number = 0;
  @include(2) readonly d: number = 0;
}
`);
      expect(result.diagnostics.map((d) => d.code)).toEqual(["VO013"]);
      const [diagnostic] = result.diagnostics;
      expect(diagnostic.message).toBe(
        "Members 'a', 'b', 'c' in value object 'Triple' share order 1; evaluation falls back to declaration order"
      );
      expect(diagnostic.location.line).toBe(4);
      expect(diagnostic.related.map((r) => r.location.line)).toEqual([3, 5]);
      expect(result.contract?.entries.map((e) => e.member.name)).toEqual(["a", "b", "c", "d"]);
    });

    it("ignores implicit orders", () => {
      expect(
        codes(`@valueObject
export class Pair extends ValueObject<Pair> {
  @include() readonly a: number = 0;
  @include() readonly b: number = 0;
}
`)
      ).toEqual([]);
    });
  });

  describe("VO015 unsupported members", () => {
    it("rejects annotated accessors", () => {
      const result = validate(`@valueObject
export class Label extends ValueObject<Label> {
  @include() readonly text: string = "";
  @include() get upper(): string {
    return this.text.toUpperCase();
  }
}
`);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "The equality decorator on 'upper' is invalid: get and set accessors compute their value. Only instance fields and auto-accessors are supported",
      ]);
      expect(result.contract).toBeUndefined();
    });
  });

  it("reports every independent violation of a declaration", () => {
    expect(
      codes(`@valueObject
class Broken {
  count: number = 0;
  @custom() readonly name: string = "";
}
`)
    ).toEqual(["VO001", "VO008", "VO002", "VO003", "VO004"]);
  });
});
