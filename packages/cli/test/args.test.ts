import { describe, expect, it } from "vitest";
import { parseArgs, UsageError } from "@wirekit/cli";

describe("parseArgs", () => {
  it("defaults every option", () => {
    expect(parseArgs([])).toEqual({
      help: false,
      config: null,
      project: null,
      outDir: null,
      check: false,
      verbose: false,
    });
  });

  it("reads long and short flags", () => {
    expect(parseArgs(["-p", "app/tsconfig.json", "--out-dir", "gen", "--check", "-v", "-c", "wk.json"])).toEqual({
      help: false,
      config: "wk.json",
      project: "app/tsconfig.json",
      outDir: "gen",
      check: true,
      verbose: true,
    });
    expect(parseArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--frobnicate"])).toThrow(new UsageError("Unknown option '--frobnicate'"));
  });

  it("rejects flags missing their value", () => {
    expect(() => parseArgs(["--config"])).toThrow("Option '--config' needs a value");
    expect(() => parseArgs(["-p", "--check"])).toThrow("Option '-p' needs a value");
  });
});
