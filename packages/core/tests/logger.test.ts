import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../src/logger.js";

function capture(verbose: boolean, tag?: string) {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({ verbose, tag, out: (l) => out.push(l), err: (l) => err.push(l) });
  return { logger, out, err };
}

describe("createLogger", () => {
  it("prefixes every line with the tag", () => {
    const { logger, out, err } = capture(false);
    logger.info("Generated 2 companion modules");
    logger.warn("could not write cache");
    logger.error("boom");
    expect(out).toEqual(["[valuekit] Generated 2 companion modules"]);
    expect(err).toEqual(["[valuekit] warning: could not write cache", "[valuekit] error: boom"]);
  });

  it("drops debug output unless verbose", () => {
    const quiet = capture(false);
    quiet.logger.debug("hidden");
    expect(quiet.out).toEqual([]);

    const loud = capture(true, "valuekit cli");
    loud.logger.debug("shown");
    expect(loud.out).toEqual(["[valuekit cli] shown"]);
    expect(loud.logger.verbose).toBe(true);
  });

  it("has a silent variant", () => {
    expect(silentLogger.verbose).toBe(false);
    expect(() => silentLogger.error("ignored")).not.toThrow();
  });
});
