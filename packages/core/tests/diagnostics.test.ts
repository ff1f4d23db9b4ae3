import { describe, it, expect } from "vitest";
import {
  DiagnosticBag,
  DIAGNOSTIC_CATALOG,
  VO003,
  VO011,
  VO013,
  EN001,
  formatDiagnostic,
  getDiagnosticsByFamily,
  hasErrors,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  sortDiagnostics,
  toDiagnosticReport,
  type Diagnostic,
} from "../src/diagnostics.js";
import type { SourceLocation } from "../src/types.js";

function loc(fileName: string, start: number, end: number, line: number, column: number): SourceLocation {
  return { fileName, start, end, line, column };
}

const SOURCE = "class A {\n  x: number;\n}\n";

describe("diagnostic catalog", () => {
  it("registers every contract and enumeration code once", () => {
    expect(DIAGNOSTIC_CATALOG.size).toBe(18);
    expect(getDiagnosticsByFamily("contract")).toHaveLength(15);
    expect(getDiagnosticsByFamily("enumeration").map((d) => d.code)).toEqual(["EN001", "EN002", "EN003"]);
  });

  it("keeps ids unique within a family", () => {
    for (const family of ["contract", "enumeration"] as const) {
      const ids = getDiagnosticsByFamily(family).map((d) => d.id);
      expect(new Set(ids).size).toBe(ids.length);
    }
  });

  it("uses the documented severities", () => {
    const warnings = Array.from(DIAGNOSTIC_CATALOG.values())
      .filter((d) => d.severity === "warning")
      .map((d) => d.code);
    expect(warnings).toEqual(["VO002", "VO010", "VO011", "VO012", "VO013", "VO014"]);
  });
});

describe("DiagnosticBuilder", () => {
  it("interpolates every placeholder occurrence", () => {
    const bag = new DiagnosticBag();
    bag
      .diagnostic(VO003)
      .at(loc("a.ts", 12, 13, 2, 3))
      .withArgs({ member: "lastName", suffix: "LastName", memberType: "string" })
      .emit();

    const [d] = bag.toArray();
    expect(d.message).toBe(
      "The member 'lastName' has @custom but the class is missing 'static Equals_LastName(a: string, b: string): boolean'"
    );
    expect(d.code).toBe("VO003");
    expect(d.id).toBe("missing-companion-equals");
    expect(d.family).toBe("contract");
  });

  it("carries related locations, notes, help and suggestions", () => {
    const bag = new DiagnosticBag();
    bag
      .diagnostic(EN001)
      .at(loc("e.ts", 40, 50, 4, 1))
      .withArgs({ type: "Color", value: 1 })
      .related(loc("e.ts", 20, 30, 3, 1), "first declared here")
      .note("values must be unique")
      .help("pick another value")
      .suggestion("renumber", "Use 3", [{ fileName: "e.ts", start: 45, end: 46, newText: "3" }], true)
      .emit();

    const [d] = bag.toArray();
    expect(d.related).toEqual([{ location: loc("e.ts", 20, 30, 3, 1), message: "first declared here" }]);
    expect(d.notes).toEqual(["values must be unique"]);
    expect(d.help).toBe("pick another value");
    expect(d.suggestions).toEqual([
      {
        id: "renumber",
        description: "Use 3",
        edits: [{ fileName: "e.ts", start: 45, end: 46, newText: "3" }],
        isPreferred: true,
      },
    ]);
  });

  it("refuses to emit without a location", () => {
    const bag = new DiagnosticBag();
    expect(() => bag.diagnostic(VO011).emit()).toThrow("VO011");
  });
});

describe("DiagnosticBag", () => {
  it("escalates a warning through a severity override", () => {
    const bag = new DiagnosticBag({ VO011: "error" });
    bag.diagnostic(VO011).at(loc("a.ts", 12, 13, 2, 3)).withArgs({ member: "x", type: "A" }).emit();
    expect(bag.toArray()[0].severity).toBe("error");
    expect(bag.hasErrors).toBe(true);
  });

  it("never downgrades an error", () => {
    const bag = new DiagnosticBag({ VO003: "warning" });
    bag.diagnostic(VO003).at(loc("a.ts", 12, 13, 2, 3)).emit();
    expect(bag.toArray()[0].severity).toBe("error");
  });

  it("reports no errors when only warnings were collected", () => {
    const bag = new DiagnosticBag();
    bag.diagnostic(VO013).at(loc("a.ts", 1, 2, 1, 2)).emit();
    expect(bag.hasErrors).toBe(false);
    expect(bag.toArray()).toHaveLength(1);
  });

  it("sorts by file, start, then code", () => {
    const bag = new DiagnosticBag();
    bag.diagnostic(VO013).at(loc("b.ts", 5, 6, 1, 6)).emit();
    bag.diagnostic(VO011).at(loc("a.ts", 9, 10, 1, 10)).emit();
    bag.diagnostic(VO003).at(loc("a.ts", 9, 10, 1, 10)).emit();
    bag.diagnostic(VO013).at(loc("a.ts", 2, 3, 1, 3)).emit();

    expect(bag.toArray().map((d) => `${d.location.fileName}:${d.location.start}:${d.code}`)).toEqual([
      "a.ts:2:VO013",
      "a.ts:9:VO003",
      "a.ts:9:VO011",
      "b.ts:5:VO013",
    ]);
  });
});

describe("renderers", () => {
  function mutableField(): Diagnostic {
    const bag = new DiagnosticBag();
    bag
      .diagnostic(VO011)
      .at(loc("a.ts", 12, 13, 2, 3))
      .withArgs({ member: "x", type: "A" })
      .help("add `readonly`")
      .suggestion("add-readonly", "Make 'x' readonly", [])
      .emit();
    return bag.toArray()[0];
  }

  it("formats a single line", () => {
    expect(formatDiagnostic(mutableField())).toBe(
      "a.ts:2:3 - warning VO011: The field 'x' in value object 'A' should be declared readonly"
    );
  });

  it("renders the source excerpt with an underline", () => {
    const text = renderDiagnosticCLI(mutableField(), {
      colors: false,
      contextLines: 0,
      readSource: () => SOURCE,
    });
    expect(text.split("\n")).toEqual([
      "warning[VO011]: The field 'x' in value object 'A' should be declared readonly",
      "  --> a.ts:2:3",
      "    |",
      "   2 |   x: number;",
      "    |   ^",
      "    |",
      "   = help: add `readonly`",
      "   = suggestion: Make 'x' readonly",
    ]);
  });

  it("omits the excerpt when no source is available", () => {
    const text = renderDiagnosticCLI(mutableField(), { colors: false });
    expect(text.split("\n").slice(0, 3)).toEqual([
      "warning[VO011]: The field 'x' in value object 'A' should be declared readonly",
      "  --> a.ts:2:3",
      "   = help: add `readonly`",
    ]);
  });

  it("prints a summary line", () => {
    const out = renderDiagnosticsCLI([mutableField()], { colors: false });
    expect(out.split("\n").at(-1)).toBe("1 warning generated");
    expect(renderDiagnosticsCLI([], { colors: false })).toBe("");
  });

  it("builds a sorted JSON report", () => {
    const bag = new DiagnosticBag();
    bag.diagnostic(VO003).at(loc("b.ts", 1, 2, 1, 2)).emit();
    const diagnostics = [...bag.toArray(), mutableField()];

    const report = toDiagnosticReport(diagnostics);
    expect(report.version).toBe(1);
    expect(report.errorCount).toBe(1);
    expect(report.warningCount).toBe(1);
    expect(report.diagnostics.map((d) => d.code)).toEqual(["VO011", "VO003"]);
    expect(JSON.parse(JSON.stringify(report)).diagnostics[0].location).toEqual(loc("a.ts", 12, 13, 2, 3));
    expect(hasErrors(diagnostics)).toBe(true);
    expect(sortDiagnostics(diagnostics)[0].location.fileName).toBe("a.ts");
  });
});
