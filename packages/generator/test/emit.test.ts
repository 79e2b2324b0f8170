/**
 * Generator Package - Emission Tests
 *
 * Constructor members, source injection and the registration module.
 */

import { describe, it, expect } from "vitest";
import {
  applyEdits,
  emitConstructors,
  emitRegistrationModule,
  injectConstructors,
  insert,
  moduleSpecifier,
  normalizeOptions,
  planRegistrations,
  renderCondition,
  type ConditionalRule,
  type GeneratorOptions,
} from "@wirekit/generator";
import { graphFromMemory, idOf } from "./_helpers/inline-program.js";

const FILE = "/src/app.ts";

describe("emitConstructors", () => {
  const source = `
export interface ILogger {}
export interface IPlugin {}
@Singleton() export class Logger implements ILogger {}
@Singleton() export class Clock {}

@DependsOn<ILogger>()
export abstract class Base {}

@Scoped()
@DependsOn<IPlugin[]>()
export class Worker extends Base {
  @Inject() readonly clock: Clock;
}
`.trim();

  it("generates members for every class with dependencies", () => {
    const { graph } = graphFromMemory({ [FILE]: source });
    const report = emitConstructors(graph);

    expect(report.artifacts.map((a) => a.type)).toEqual([idOf(FILE, "Base"), idOf(FILE, "Worker")]);
    expect(report.diagnostics).toEqual([]);
  });

  it("passes inherited dependencies to super and assigns its own", () => {
    const { graph } = graphFromMemory({ [FILE]: source });
    const worker = emitConstructors(graph).artifacts.find((a) => a.type === idOf(FILE, "Worker"));

    expect(worker?.text).toBe(
      "\n" +
        "  protected readonly _plugins: IPlugin[];\n" +
        "\n" +
        '  static readonly inject = ["ILogger", { all: "IPlugin" }, "Clock"];\n' +
        "\n" +
        "  constructor(logger: ILogger, plugins: IPlugin[], clock: Clock) {\n" +
        "    super(logger);\n" +
        "    this._plugins = plugins;\n" +
        "    this.clock = clock;\n" +
        "  }\n",
    );
  });

  it("forwards every base parameter even when two share a type", () => {
    const { graph } = graphFromMemory({
      [FILE]: `
export interface ILogger {}
@Singleton() export class Logger implements ILogger {}

@DependsOn<T, ILogger>()
export abstract class Base<T> {}

@Scoped()
export class Derived extends Base<ILogger> {}
`.trim(),
    });
    const report = emitConstructors(graph);
    const derived = report.artifacts.find((a) => a.type === idOf(FILE, "Derived"));

    expect(derived?.text).toBe(
      "\n" +
        '  static readonly inject = ["ILogger", "ILogger"];\n' +
        "\n" +
        "  constructor(t: ILogger, logger: ILogger) {\n" +
        "    super(t, logger);\n" +
        "  }\n",
    );
    expect(report.diagnostics).toEqual([]);
  });

  it("omits super for a root class", () => {
    const { graph } = graphFromMemory({ [FILE]: source });
    const base = emitConstructors(graph).artifacts.find((a) => a.type === idOf(FILE, "Base"));

    expect(base?.text).toBe(
      "\n" +
        "  protected readonly _logger: ILogger;\n" +
        "\n" +
        '  static readonly inject = ["ILogger"];\n' +
        "\n" +
        "  constructor(logger: ILogger) {\n" +
        "    this._logger = logger;\n" +
        "  }\n",
    );
  });

  it("leaves a hand-written constructor alone", () => {
    const { graph } = graphFromMemory({
      [FILE]: `
@Singleton() export class Clock {}

@Scoped()
@DependsOn<Clock>()
export class Job {
  constructor() {}
}
`.trim(),
    });
    const report = emitConstructors(graph);

    expect(report.artifacts).toEqual([]);
    expect(report.diagnostics.map((d) => d.message)).toEqual([
      "'Job' declares its own constructor; no constructor is generated for its dependencies.",
    ]);
  });

  it("skips a class with clashing dependency names", () => {
    const { graph } = graphFromMemory({
      [FILE]: `
export interface ILogger {}
@Singleton() export class Logger implements ILogger {}

@Scoped()
@DependsOn<ILogger, Logger>()
export class X {}
`.trim(),
    });

    expect(emitConstructors(graph).artifacts).toEqual([]);
  });

  describe("configuration binding", () => {
    it("reads bound fields after assigning dependencies", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface ILogger {}
@Singleton() export class Logger implements ILogger {}

@Scoped()
@DependsOn<ILogger>()
export class Mailer {
  @InjectConfiguration("Smtp:Host") readonly host: string;
  @InjectConfiguration("Smtp:Port") readonly port: number;
  @InjectConfiguration("Smtp:Label") readonly label?: string;
  @InjectConfiguration("Smtp:UseTls") readonly tls: boolean | undefined;
}
`.trim(),
      });
      const mailer = emitConstructors(graph).artifacts.find((a) => a.type === idOf(FILE, "Mailer"));

      expect(mailer?.text).toBe(
        "\n" +
          "  protected readonly _logger: ILogger;\n" +
          "\n" +
          '  static readonly inject = ["ILogger", "Configuration"];\n' +
          "\n" +
          '  constructor(logger: ILogger, configuration: import("@wirekit/annotations").Configuration) {\n' +
          "    this._logger = logger;\n" +
          "    {\n" +
          '      const value = configuration.get("Smtp:Host");\n' +
          `      if (value === undefined) throw new Error("Missing configuration value 'Smtp:Host'.");\n` +
          "      this.host = value;\n" +
          "    }\n" +
          "    {\n" +
          '      const value = configuration.get("Smtp:Port");\n' +
          `      if (value === undefined) throw new Error("Missing configuration value 'Smtp:Port'.");\n` +
          "      this.port = Number(value);\n" +
          "    }\n" +
          '    this.label = configuration.get("Smtp:Label");\n' +
          "    {\n" +
          '      const value = configuration.get("Smtp:UseTls");\n' +
          '      this.tls = value === undefined ? undefined : value === "true";\n' +
          "    }\n" +
          "  }\n",
      );
    });

    it("forwards the configuration to a base that binds it", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
@Singleton() export class Clock {}

export abstract class Base {
  @InjectConfiguration("App:Name") readonly name: string;
}

@Scoped()
@DependsOn<Clock>()
export class Job extends Base {}
`.trim(),
      });
      const report = emitConstructors(graph, undefined, "my-container");
      const job = report.artifacts.find((a) => a.type === idOf(FILE, "Job"));

      expect(report.artifacts.map((a) => a.type)).toEqual([idOf(FILE, "Base"), idOf(FILE, "Job")]);
      expect(job?.text).toBe(
        "\n" +
          "  protected readonly _clock: Clock;\n" +
          "\n" +
          '  static readonly inject = ["Clock", "Configuration"];\n' +
          "\n" +
          '  constructor(clock: Clock, configuration: import("my-container").Configuration) {\n' +
          "    super(configuration);\n" +
          "    this._clock = clock;\n" +
          "  }\n",
      );
    });

    it("skips a class whose dependency takes the configuration parameter's name", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IConfiguration {}
@Singleton() export class Settings implements IConfiguration {}

@Scoped()
@DependsOn<IConfiguration>()
export class Reader {
  @InjectConfiguration("App:Name") readonly name: string;
}
`.trim(),
      });

      expect(emitConstructors(graph).artifacts).toEqual([]);
      expect(
        graph.diagnostics.filter((d) => d.code === "wirekit/dependency/duplicate-identifier").map((d) => d.message),
      ).toEqual(["'Reader' has more than one dependency named 'configuration'; its constructor is not generated."]);
    });
  });
});

describe("injectConstructors", () => {
  it("inserts the members after the class body's opening brace", () => {
    const text = `
@Singleton() export class Clock {}

@Scoped()
@DependsOn<Clock>()
export class Job {}
`.trim();
    const { graph } = graphFromMemory({ [FILE]: text });
    const { artifacts } = emitConstructors(graph);

    expect(injectConstructors({ fileName: FILE, text }, artifacts)).toBe(
      `
@Singleton() export class Clock {}

@Scoped()
@DependsOn<Clock>()
export class Job {
  protected readonly _clock: Clock;

  static readonly inject = ["Clock"];

  constructor(clock: Clock) {
    this._clock = clock;
  }
}
`.trim(),
    );
  });

  it("returns other files unchanged", () => {
    const text = `@Scoped() @DependsOn<Clock>() export class Job {}\n@Singleton() export class Clock {}`;
    const { graph } = graphFromMemory({ [FILE]: text });
    const { artifacts } = emitConstructors(graph);

    expect(injectConstructors({ fileName: "/src/other.ts", text: "export class Other {}" }, artifacts)).toBe(
      "export class Other {}",
    );
  });
});

describe("applyEdits", () => {
  it("keeps the given order of insertions at one position", () => {
    expect(applyEdits("abc", [insert(1, "X"), insert(1, "Y"), insert(3, "Z")])).toBe("aXYbcZ");
  });
});

describe("renderCondition", () => {
  const rule = (overrides: Partial<ConditionalRule>): ConditionalRule => ({
    environment: [],
    notEnvironment: [],
    configKey: null,
    equals: null,
    notEquals: [],
    location: { file: FILE, start: 0, end: 0 },
    ...overrides,
  });

  it("drops the parentheses of a lone environment list", () => {
    expect(renderCondition(rule({ environment: ["Dev", "Staging"] }))).toBe(
      'environment === "Dev" || environment === "Staging"',
    );
  });

  it("combines clauses with &&", () => {
    expect(renderCondition(rule({ environment: ["Dev"], notEnvironment: ["Test"] }))).toBe(
      'environment === "Dev" && environment !== "Test"',
    );
    expect(
      renderCondition(rule({ environment: ["A", "B"], configKey: "K", notEquals: ["off"] })),
    ).toBe('(environment === "A" || environment === "B") && (configuration.get("K") ?? "") !== "off"');
  });

  it("reads a trimmed configuration key", () => {
    expect(renderCondition(rule({ configKey: " Cache:Mode ", equals: "redis" }))).toBe(
      '(configuration.get("Cache:Mode") ?? "") === "redis"',
    );
  });
});

describe("moduleSpecifier", () => {
  it("maps TypeScript extensions to their output", () => {
    expect(moduleSpecifier("/src", "/src/services/cache.ts")).toBe("./services/cache.js");
    expect(moduleSpecifier("/src/gen", "/src/a.mts")).toBe("../a.mjs");
    expect(moduleSpecifier("/src", "/src/b.cts")).toBe("./b.cjs");
  });
});

describe("emitRegistrationModule", () => {
  function moduleFor(files: Record<string, string>, options: GeneratorOptions = {}): { fileName: string; text: string } {
    const { graph } = graphFromMemory(files);
    const plan = planRegistrations(graph);
    return emitRegistrationModule(plan, graph, normalizeOptions(options));
  }

  it("chains mutually exclusive registrations", () => {
    const artifact = moduleFor({
      "/src/email.ts": `
export interface IEmail {}

@Scoped()
@RegisterAs<IEmail>()
@ConditionalService({ environment: "Dev" })
export class DevEmail implements IEmail {}

@Scoped()
@RegisterAs<IEmail>()
@ConditionalService({ environment: "Prod" })
export class ProdEmail implements IEmail {}

@Scoped()
@RegisterAs<IEmail>()
export class FallbackEmail implements IEmail {}
`.trim(),
    });

    expect(artifact.fileName).toBe("/src/registrations.generated.ts");
    expect(artifact.text).toBe(
      [
        "// Generated by wirekit. Do not edit.",
        'import type { Configuration, ServiceCollection } from "@wirekit/annotations";',
        'import { DevEmail, FallbackEmail, ProdEmail } from "./email.js";',
        "",
        "export function registerServices(services: ServiceCollection, _configuration: Configuration): void {",
        '  const environment = process.env["NODE_ENV"] ?? "";',
        "",
        '  if (environment === "Dev") {',
        '    services.addScoped("DevEmail", DevEmail);',
        "  }",
        '  if (environment === "Dev") {',
        '    services.addScoped("IEmail", DevEmail);',
        '  } else if (environment === "Prod") {',
        '    services.addScoped("IEmail", ProdEmail);',
        "  }",
        '  services.addScoped("FallbackEmail", FallbackEmail);',
        '  services.addScoped("IEmail", FallbackEmail);',
        '  if (environment === "Prod") {',
        '    services.addScoped("ProdEmail", ProdEmail);',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("names the configuration parameter when a condition reads it", () => {
    const artifact = moduleFor(
      {
        "/src/app.ts": `
@Singleton()
@ConditionalService({ configValue: "Cache:Mode", equals: "redis" })
export class RedisCache {}
`.trim(),
      },
      { registrationFunctionName: "addAppServices", runtimeModule: "my-container" },
    );

    expect(artifact.text).toBe(
      [
        "// Generated by wirekit. Do not edit.",
        'import type { Configuration, ServiceCollection } from "my-container";',
        'import { RedisCache } from "./app.js";',
        "",
        "export function addAppServices(services: ServiceCollection, configuration: Configuration): void {",
        '  if ((configuration.get("Cache:Mode") ?? "") === "redis") {',
        '    services.addSingleton("RedisCache", RedisCache);',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("registers the configuration when a class binds it", () => {
    const artifact = moduleFor({
      "/src/app.ts": `
@Singleton()
export class Mailer {
  @InjectConfiguration("Smtp:Host") readonly host: string;
}
`.trim(),
    });

    expect(artifact.text).toBe(
      [
        "// Generated by wirekit. Do not edit.",
        'import type { Configuration, ServiceCollection } from "@wirekit/annotations";',
        'import { Mailer } from "./app.js";',
        "",
        "export function registerServices(services: ServiceCollection, configuration: Configuration): void {",
        '  services.addSingleton("Configuration", () => configuration);',
        "",
        '  services.addSingleton("Mailer", Mailer);',
        "}",
        "",
      ].join("\n"),
    );
  });

  it("forwards shared contracts and aliases clashing imports", () => {
    const artifact = moduleFor({
      "/src/a/cache.ts": `
export interface ICache {}

@Singleton()
@RegisterAsAll(RegistrationMode.All, InstanceSharing.Shared)
export class Cache implements ICache {}
`.trim(),
      "/src/b/cache.ts": `
@Transient()
export default class Cache {}
`.trim(),
    });

    expect(artifact.text).toBe(
      [
        "// Generated by wirekit. Do not edit.",
        'import type { Configuration, ServiceCollection } from "@wirekit/annotations";',
        'import { Cache } from "./a/cache.js";',
        'import Cache2 from "./b/cache.js";',
        "",
        "export function registerServices(services: ServiceCollection, _configuration: Configuration): void {",
        '  services.addSingleton("Cache", Cache);',
        '  services.addSingleton("ICache", (provider) => provider.get("Cache"));',
        '  services.addTransient("Cache", Cache2);',
        "}",
        "",
      ].join("\n"),
    );
  });

  it("imports classes under the names their module exports", () => {
    const artifact = moduleFor({
      "/src/impl.ts": `
@Singleton()
class Dep {}

@Scoped()
@DependsOn<Dep>()
class Impl {}

@Transient()
class Fallback {}

export { Dep, Impl as Service };
export { Fallback as default };
`.trim(),
    });

    const lines = artifact.text.split("\n");
    expect(lines[2]).toBe('import Fallback, { Dep, Service as Impl } from "./impl.js";');
    expect(lines).toContain('  services.addScoped("Impl", Impl);');
  });

  it("writes the module under the configured path", () => {
    const artifact = moduleFor(
      { "/project/src/app.ts": `@Scoped() export class App {}` },
      { rootDir: "/project/", outFile: "src/generated/services.ts" },
    );

    expect(artifact.fileName).toBe("/project/src/generated/services.ts");
    expect(artifact.text).toContain('import { App } from "../app.js";\n');
  });
});
