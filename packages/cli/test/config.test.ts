import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import os from "node:os";
import { ConfigError, loadConfigFile, loadConfigFromPath, mergeConfigs, parseConfig } from "@wirekit/cli";

function createTempDir(): string {
  return mkdtempSync(join(os.tmpdir(), "wirekit-config-"));
}

function writeJson(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2), "utf-8");
}

describe("parseConfig", () => {
  it("accepts every option", () => {
    const raw = {
      defaultLifetime: "singleton",
      lifetimeValidation: false,
      environmentVariable: "APP_ENV",
      registrationFunctionName: "addServices",
      runtimeModule: "my-container",
      outFile: "src/di.generated.ts",
      outDir: "gen",
      diagnostics: {
        disabled: false,
        defaults: { impact: "degraded" },
        categories: { lifetime: { severity: "warning" } },
        codes: { "wirekit/registration/service-not-exported": { severity: "off" } },
      },
    };
    expect(parseConfig(raw)).toEqual(raw);
  });

  it("rejects values that are not objects", () => {
    expect(() => parseConfig([])).toThrow("config must export an object");
    expect(() => parseConfig("wirekit")).toThrow(ConfigError);
  });

  it("rejects unknown options", () => {
    expect(() => parseConfig({ outfile: "x.ts" })).toThrow("unknown option 'outfile'");
    expect(() => parseConfig({ diagnostics: { level: "error" } })).toThrow("unknown option 'diagnostics.level'");
  });

  it("prefixes messages with the config file", () => {
    expect(() => parseConfig({ lifetimeValidation: "no" }, "/repo/wirekit.config.json")).toThrow(
      "/repo/wirekit.config.json: 'lifetimeValidation' must be true or false",
    );
  });

  it("checks diagnostic categories, codes and overrides", () => {
    expect(() => parseConfig({ diagnostics: { categories: { style: {} } } })).toThrow(
      "unknown diagnostic category 'style'",
    );
    expect(() => parseConfig({ diagnostics: { codes: { "wirekit/nope": {} } } })).toThrow(
      "unknown diagnostic code 'wirekit/nope'",
    );
    expect(() => parseConfig({ diagnostics: { categories: { lifetime: { severity: "fatal" } } } })).toThrow(
      "'diagnostics.categories.lifetime.severity' must be one of error, warning, info, off",
    );
    expect(() => parseConfig({ diagnostics: { defaults: { impact: "huge" } } })).toThrow(
      "'diagnostics.defaults.impact' must be one of blocking, degraded, informational",
    );
  });
});

describe("mergeConfigs", () => {
  it("lets the override win field by field", () => {
    expect(
      mergeConfigs({ defaultLifetime: "Singleton", outDir: "gen" }, { defaultLifetime: "Transient" }),
    ).toEqual({ defaultLifetime: "Transient", outDir: "gen" });
  });

  it("keeps the base policy when the override has none", () => {
    expect(mergeConfigs({ diagnostics: { disabled: true } }, { outFile: "di.ts" })).toEqual({
      diagnostics: { disabled: true },
      outFile: "di.ts",
    });
  });

  it("merges diagnostics policies per section", () => {
    const merged = mergeConfigs(
      {
        diagnostics: {
          categories: { lifetime: { severity: "warning" }, cycle: { severity: "warning" } },
          codes: { "wirekit/emit/explicit-constructor": { severity: "off" } },
        },
      },
      { diagnostics: { categories: { lifetime: { severity: "error" } } } },
    );
    expect(merged.diagnostics).toEqual({
      defaults: {},
      categories: { lifetime: { severity: "error" }, cycle: { severity: "warning" } },
      codes: { "wirekit/emit/explicit-constructor": { severity: "off" } },
    });
  });

  it("returns the override without a base", () => {
    expect(mergeConfigs(null, { outDir: "gen" })).toEqual({ outDir: "gen" });
  });
});

describe("config file loading", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("finds the config by walking up", async () => {
    writeJson(join(tempDir, "wirekit.config.json"), { defaultLifetime: "Singleton" });
    const nested = join(tempDir, "apps", "api");
    mkdirSync(nested, { recursive: true });

    const loaded = await loadConfigFile(nested, tempDir);
    expect(loaded).toEqual({
      config: { defaultLifetime: "Singleton" },
      file: join(tempDir, "wirekit.config.json"),
    });
  });

  it("starts from the directory of a file", async () => {
    writeJson(join(tempDir, "wirekit.config.json"), { outDir: "gen" });
    writeJson(join(tempDir, "tsconfig.json"), {});

    const loaded = await loadConfigFile(join(tempDir, "tsconfig.json"), tempDir);
    expect(loaded?.config).toEqual({ outDir: "gen" });
  });

  it("returns null when no config file is found", async () => {
    const emptyDir = join(tempDir, "empty");
    mkdirSync(emptyDir, { recursive: true });
    expect(await loadConfigFile(emptyDir, emptyDir)).toBeNull();
  });

  it("prefers module configs over JSON", async () => {
    writeFileSync(join(tempDir, "wirekit.config.mjs"), 'export default { runtimeModule: "my-container" };', "utf-8");
    writeJson(join(tempDir, "wirekit.config.json"), { runtimeModule: "other" });

    const loaded = await loadConfigFile(tempDir, tempDir);
    expect(loaded?.file).toBe(join(tempDir, "wirekit.config.mjs"));
    expect(loaded?.config).toEqual({ runtimeModule: "my-container" });
  });

  it("reads a named `config` export", async () => {
    writeFileSync(join(tempDir, "wirekit.config.mjs"), 'export const config = { outDir: "gen" };', "utf-8");

    const loaded = await loadConfigFile(tempDir, tempDir);
    expect(loaded?.config).toEqual({ outDir: "gen" });
  });

  it("bundles TypeScript configs", async () => {
    writeFileSync(
      join(tempDir, "wirekit.config.ts"),
      ['const lifetime: string = "Transient";', "export default { defaultLifetime: lifetime };"].join("\n"),
      "utf-8",
    );

    const loaded = await loadConfigFile(tempDir, tempDir);
    expect(loaded?.config).toEqual({ defaultLifetime: "Transient" });
  });

  it("merges extends and resolves paths against each file", async () => {
    mkdirSync(join(tempDir, "shared"));
    mkdirSync(join(tempDir, "app"));
    writeJson(join(tempDir, "shared", "base.json"), {
      defaultLifetime: "Singleton",
      project: "./tsconfig.json",
      diagnostics: {
        categories: { lifetime: { severity: "warning" } },
        codes: { "wirekit/registration/service-not-exported": { severity: "off" } },
      },
    });
    writeJson(join(tempDir, "app", "wirekit.config.json"), {
      extends: "../shared/base",
      registrationFunctionName: "addServices",
      diagnostics: { categories: { lifetime: { severity: "error" } } },
    });

    const loaded = await loadConfigFile(join(tempDir, "app"), tempDir);
    expect(loaded?.config).toEqual({
      extends: "../shared/base",
      defaultLifetime: "Singleton",
      project: join(tempDir, "shared", "tsconfig.json"),
      registrationFunctionName: "addServices",
      diagnostics: {
        defaults: {},
        categories: { lifetime: { severity: "error" } },
        codes: { "wirekit/registration/service-not-exported": { severity: "off" } },
      },
    });
  });

  it("extends a directory", async () => {
    mkdirSync(join(tempDir, "base"));
    writeJson(join(tempDir, "base", "wirekit.config.json"), { runtimeModule: "my-container" });
    writeJson(join(tempDir, "wirekit.config.json"), { extends: "./base", outDir: "gen" });

    const loaded = await loadConfigFile(tempDir, tempDir);
    expect(loaded?.config).toEqual({ extends: "./base", runtimeModule: "my-container", outDir: "gen" });
  });

  it("extends an installed package through the config at its root", async () => {
    const presetDir = join(tempDir, "node_modules", "wirekit-preset");
    mkdirSync(presetDir, { recursive: true });
    writeJson(join(presetDir, "package.json"), { name: "wirekit-preset", version: "1.0.0" });
    writeJson(join(presetDir, "wirekit.config.json"), { runtimeModule: "preset-container" });
    writeJson(join(tempDir, "wirekit.config.json"), { extends: "wirekit-preset" });

    const loaded = await loadConfigFile(tempDir, tempDir);
    expect(loaded?.config).toEqual({ extends: "wirekit-preset", runtimeModule: "preset-container" });
  });

  it("throws when an extended package is not installed", async () => {
    writeJson(join(tempDir, "wirekit.config.json"), { extends: "wirekit-preset-absent" });

    await expect(loadConfigFile(tempDir, tempDir)).rejects.toThrow("extended config 'wirekit-preset-absent' not found");
  });

  it("throws on circular config extends", async () => {
    writeJson(join(tempDir, "wirekit.config.json"), { extends: "./alt.json" });
    writeJson(join(tempDir, "alt.json"), { extends: "./wirekit.config.json" });

    await expect(loadConfigFile(tempDir, tempDir)).rejects.toThrow("Circular config extends detected");
  });

  it("throws when an extended config is missing", async () => {
    writeJson(join(tempDir, "wirekit.config.json"), { extends: "./missing.json" });

    await expect(loadConfigFile(tempDir, tempDir)).rejects.toThrow("extended config './missing.json' not found");
  });

  it("reports invalid JSON", async () => {
    writeFileSync(join(tempDir, "wirekit.config.json"), "{ outDir: ", "utf-8");

    await expect(loadConfigFile(tempDir, tempDir)).rejects.toThrow(ConfigError);
  });

  it("loads an explicit path", async () => {
    writeJson(join(tempDir, "custom.json"), { rootDir: "./project" });

    const loaded = await loadConfigFromPath(join(tempDir, "custom.json"));
    expect(loaded.config).toEqual({ rootDir: join(tempDir, "project") });
    await expect(loadConfigFromPath(join(tempDir, "nope.json"))).rejects.toThrow("config file not found");
  });
});
