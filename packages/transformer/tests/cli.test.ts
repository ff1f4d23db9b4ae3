/**
 * Tests for the valuekit CLI
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { config } from "@valuekit/core";
import { HELP_TEXT, parseArgs, runCli, UsageError, type CliIO } from "../src/cli.js";

describe("parseArgs", () => {
  it("reads the command and its options", () => {
    expect(parseArgs(["generate", "-p", "app/tsconfig.json", "--out-dir", "gen", "-v"])).toEqual({
      command: "generate",
      project: "app/tsconfig.json",
      format: "pretty",
      verbose: true,
      explain: false,
      outDir: "gen",
      help: false,
    });
  });

  it("takes an optional cache directory", () => {
    expect(parseArgs(["check", "--cache"]).cache).toBe(true);
    expect(parseArgs(["check", "--cache", ".cache"]).cache).toBe(".cache");
    expect(parseArgs(["check", "--cache", "--format", "json"]).cache).toBe(true);
    expect(parseArgs(["check", "--no-cache"]).cache).toBe(false);
  });

  it("treats a bare invocation as a help request", () => {
    expect(parseArgs([]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("reads the explain flag", () => {
    expect(parseArgs(["check"]).explain).toBe(false);
    expect(parseArgs(["check", "--explain"]).explain).toBe(true);
  });

  it("rejects malformed command lines", () => {
    expect(() => parseArgs(["build"])).toThrow(new UsageError("Unknown command: build"));
    expect(() => parseArgs(["check", "--format", "xml"])).toThrow(
      "Unknown format: xml (expected pretty or json)"
    );
    expect(() => parseArgs(["check", "--out-dir", "gen"])).toThrow("--out-dir is only valid with generate");
    expect(() => parseArgs(["check", "-p"])).toThrow("-p requires a value");
    expect(() => parseArgs(["check", "--watch"])).toThrow("Unknown option: --watch");
  });
});

interface MemoryIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
  readonly files: Map<string, string>;
}

function memoryIO(cwd: string): MemoryIO {
  const out: string[] = [];
  const err: string[] = [];
  const files = new Map<string, string>();
  return {
    out,
    err,
    files,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    writeFile: (fileName, text) => files.set(fileName, text),
    cwd,
    env: {},
    colors: false,
  };
}

const TSCONFIG = JSON.stringify({
  compilerOptions: { target: "ES2022", module: "ESNext", moduleResolution: "Bundler", strict: true, noEmit: true },
  include: ["src"],
});

const MONEY = `import { ValueObject, include, valueObject } from "@valuekit/runtime";

@valueObject
export class Money extends ValueObject<Money> {
  @include() readonly amount: number = 0;
}
`;

const PERSON = `import { ValueObject, custom, valueObject } from "@valuekit/runtime";

@valueObject
export class Person extends ValueObject<Person> {
  @custom() readonly lastName: string = "";
}
`;

describe("runCli", () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory) fs.rmSync(directory, { recursive: true, force: true });
    directory = undefined;
    config.reset();
  });

  function project(sources: Record<string, string>): string {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "valuekit-cli-"));
    directory = root;
    fs.writeFileSync(path.join(root, "tsconfig.json"), TSCONFIG);
    fs.mkdirSync(path.join(root, "src"));
    for (const [name, text] of Object.entries(sources)) {
      fs.writeFileSync(path.join(root, "src", name), text);
    }
    return root;
  }

  it("prints help", () => {
    const io = memoryIO("/");
    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out).toEqual([HELP_TEXT]);
  });

  it("exits with 2 on a usage error", () => {
    const io = memoryIO("/");
    expect(runCli(["build"], io)).toBe(2);
    expect(io.err.join("")).toBe("Unknown command: build\nUsage: valuekit <check|generate> [options]\n");
  });

  it("exits with 2 when the tsconfig cannot be read", () => {
    const root = project({});
    const io = memoryIO(root);
    expect(runCli(["check", "-p", "missing.json"], io)).toBe(2);
    expect(io.err.join("").startsWith(`[valuekit] error: Error reading ${path.join(root, "missing.json")}: `)).toBe(
      true
    );
  });

  it("checks a clean project", () => {
    const io = memoryIO(project({ "money.ts": MONEY }));
    expect(runCli(["check"], io)).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.files.size).toBe(0);
  });

  it("renders errors to stderr and exits with 1", () => {
    const io = memoryIO(project({ "person.ts": PERSON }));
    expect(runCli(["check"], io)).toBe(1);

    const output = io.err.join("");
    expect(output.split("\n")[0]).toBe(
      "error[VO003]: The member 'lastName' has @custom but the class is missing 'static Equals_LastName(a: string, b: string): boolean'"
    );
    expect(output.endsWith("2 errors generated\n")).toBe(true);
  });

  it("explains each diagnostic when asked", () => {
    const io = memoryIO(project({ "person.ts": PERSON }));
    expect(runCli(["check", "--explain"], io)).toBe(1);

    const lines = io.err.join("").split("\n");
    const explanation = lines.indexOf("Explanation:");
    expect(explanation).toBeGreaterThan(0);
    expect(lines[explanation - 1]).toBe("");
    expect(lines[explanation + 1]).toBe("  @custom delegates equality to a static method named after the member.");
  });

  it("writes a JSON report to stdout", () => {
    const root = project({ "person.ts": PERSON, "money.ts": MONEY });
    const io = memoryIO(root);
    expect(runCli(["check", "--format", "json"], io)).toBe(1);

    const report: unknown = JSON.parse(io.out.join(""));
    expect(report).toMatchObject({ version: 1, errorCount: 2, warningCount: 0 });
    expect(report).toHaveProperty("diagnostics.0.code", "VO003");
    expect(report).toHaveProperty("diagnostics.0.location.fileName", path.join(root, "src", "person.ts"));
    expect(io.err).toEqual([]);
  });

  it("generates companion modules beside their sources", () => {
    const root = project({ "money.ts": MONEY, "person.ts": PERSON });
    const io = memoryIO(root);
    expect(runCli(["generate"], io)).toBe(1);

    expect([...io.files.keys()]).toEqual([path.join(root, "src", "money.valuekit.ts")]);
    expect(io.files.get(path.join(root, "src", "money.valuekit.ts"))).toContain(
      'import { Money } from "./money.js";'
    );
    expect(io.out).toEqual(["[valuekit] Generated 1 companion module\n"]);
  });

  it("generates under an output directory", () => {
    const root = project({ "money.ts": MONEY });
    const io = memoryIO(root);
    expect(runCli(["generate", "--out-dir", "gen"], io)).toBe(0);

    const output = path.join(root, "gen", "src", "money.valuekit.ts");
    expect([...io.files.keys()]).toEqual([output]);
    expect(io.files.get(output)).toContain('import { Money } from "../../src/money.js";');
  });

  it("applies configuration set programmatically", () => {
    const io = memoryIO(project({ "money.ts": MONEY.replace("@include() readonly amount", "readonly amount") }));
    config.set({ diagnostics: { severity: { VO002: "error" } } });
    expect(runCli(["check"], io)).toBe(1);
    expect(io.err.join("").split("\n")[0]).toBe(
      "error[VO002]: The field 'amount' in value object 'Money' should have an equality decorator"
    );
  });

  it("logs progress in verbose mode", () => {
    const io = memoryIO(project({ "money.ts": MONEY }));
    expect(runCli(["check", "-v"], io)).toBe(0);
    expect(io.out).toContain("[valuekit] Analyzing 1 files...\n");
  });

  it("persists the cache when asked", () => {
    const root = project({ "money.ts": MONEY });
    expect(runCli(["check", "--cache", ".cache"], memoryIO(root))).toBe(0);
    expect(fs.existsSync(path.join(root, ".cache", "declarations.json"))).toBe(true);

    const io = memoryIO(root);
    expect(runCli(["check", "-v", "--cache", ".cache"], io)).toBe(0);
    expect(io.out).toContain("[valuekit] Cache: 1 hits, 0 misses (100.0% hit rate), 0 evictions, 1 entries\n");
  });
});
