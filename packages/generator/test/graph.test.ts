/**
 * Generator Package - Dependency Graph Tests
 *
 * Merging, inheritance, generic substitution, naming and reachability.
 */

import { describe, it, expect } from "vitest";
import type { DependencyGraph, GraphNode } from "@wirekit/generator";
import { graphFromMemory, idOf } from "./_helpers/inline-program.js";

const FILE = "/src/app.ts";

function nodeOf(graph: DependencyGraph, name: string): GraphNode {
  const node = graph.nodes.get(idOf(FILE, name));
  if (!node) throw new Error(`missing node ${name}`);
  return node;
}

function messages(graph: DependencyGraph, code: string): string[] {
  return graph.diagnostics.filter((d) => d.code === code).map((d) => d.message);
}

describe("buildDependencyGraph", () => {
  describe("merging own declarations", () => {
    it("keeps one dependency and prefers the field declaration", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface ILogger {}

@Singleton()
export class Logger implements ILogger {}

@Scoped()
@DependsOn<ILogger, ILogger>()
@DependsOn<ILogger>()
export class Worker {
  @Inject() readonly _logger: ILogger;
}
`.trim(),
      });

      expect(graph.diagnostics.map((d) => d.code)).toEqual([
        "wirekit/dependency/duplicate-in-declaration",
        "wirekit/dependency/duplicate-across-declarations",
        "wirekit/dependency/conflicting-declaration-styles",
      ]);
      expect(graph.diagnostics.map((d) => d.message)).toEqual([
        "'ILogger' is listed more than once in one DependsOn on 'Worker'.",
        "'Worker' declares 'ILogger' more than once; a single dependency is kept.",
        "'Worker' declares 'ILogger' both in DependsOn and on field '_logger'; the field declaration is used.",
      ]);

      const worker = nodeOf(graph, "Worker");
      expect(worker.own.map((d) => [d.identifier, d.parameter])).toEqual([["_logger", "logger"]]);
      expect(worker.edges.map((e) => e.to)).toEqual([idOf(FILE, "Logger")]);
    });
  });

  describe("inheritance", () => {
    it("lists inherited dependencies root-most first", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
@Singleton() export class Clock {}
@Singleton() export class Timer {}
@Singleton() export class Queue {}

@DependsOn<Clock>()
export class Root {}

@DependsOn<Timer>()
export class Middle extends Root {}

@Scoped()
@DependsOn<Queue>()
export class Leaf extends Middle {}
`.trim(),
      });

      const leaf = nodeOf(graph, "Leaf");
      expect(leaf.inherited.map((d) => d.parameter)).toEqual(["clock", "timer"]);
      expect(leaf.inherited.map((d) => d.declaredBy)).toEqual([idOf(FILE, "Root"), idOf(FILE, "Middle")]);
      expect(leaf.own.map((d) => d.parameter)).toEqual(["queue"]);
      expect(leaf.bases.map((b) => b.name)).toEqual(["Middle", "Root"]);
      expect(graph.diagnostics).toEqual([]);
    });

    it("substitutes the derived class's type arguments", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IRepository<T> {}
export class User {}

@DependsOn<IRepository<T>>()
export abstract class ServiceBase<T> {}

@Scoped()
export class UserService extends ServiceBase<User> {}

@Scoped()
export class Broken extends ServiceBase {}
`.trim(),
      });

      const [closed] = nodeOf(graph, "UserService").inherited;
      expect(closed?.typeText).toBe("IRepository<User>");
      expect(closed?.token).toBe("IRepository<User>");
      expect(closed?.identifier).toBe("_repository");
      expect(closed?.parameter).toBe("repository");
      expect(closed?.inherited).toBe(true);
      expect(closed?.declaredBy).toBe(idOf(FILE, "ServiceBase"));

      const [failed] = nodeOf(graph, "Broken").inherited;
      expect(failed?.target).toBeNull();
      expect(failed?.typeText).toBe("unknown");
      expect(failed?.token).toBe("IRepository<T>");
      expect(messages(graph, "wirekit/dependency/generic-substitution-failed")).toEqual([
        "Cannot bind type parameter 'T' of 'ServiceBase' for 'Broken'; dependency 'IRepository<T>' is typed 'unknown'.",
      ]);
    });

    it("keeps every base slot when type arguments make two of them equal", () => {
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

      const derived = nodeOf(graph, "Derived");
      expect(derived.inherited.map((d) => [d.parameter, d.typeText])).toEqual([
        ["t", "ILogger"],
        ["logger", "ILogger"],
      ]);
      expect(derived.duplicateIdentifiers).toBe(false);
    });

    it("reports a dependency repeated from a base as a duplicate identifier", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface ILogger {}
@Singleton() export class Logger implements ILogger {}

@DependsOn<ILogger>()
export abstract class Base {}

@Scoped()
@DependsOn<ILogger>()
export class Derived extends Base {}
`.trim(),
      });

      expect(nodeOf(graph, "Derived").duplicateIdentifiers).toBe(true);
      expect(messages(graph, "wirekit/dependency/duplicate-identifier")).toEqual([
        "'Derived' has more than one dependency named 'logger'; its constructor is not generated.",
      ]);
    });

    it("collects interfaces of bases and extended interfaces", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IA {}
export interface IB extends IA {}
export interface IC {}
export class Base implements IC {}

@Scoped()
export class Impl extends Base implements IB {}
`.trim(),
      });

      expect(nodeOf(graph, "Impl").interfaces.map((i) => i.name)).toEqual(["IB", "IA", "IC"]);
    });

    it("reports an inheritance cycle", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export class A extends B {}
export class B extends A {}
`.trim(),
      });

      expect(messages(graph, "wirekit/dependency/inheritance-cycle")).toEqual([
        "Inheritance cycle detected while walking the base classes of 'A'.",
        "Inheritance cycle detected while walking the base classes of 'B'.",
      ]);
    });
  });

  describe("lifetimes", () => {
    it("distinguishes explicit, default and missing lifetimes", () => {
      const { graph } = graphFromMemory(
        {
          [FILE]: `
@Transient()
export class A {}

@DependsOn<A>()
export class B {}

export class C {}
`.trim(),
        },
        { defaultLifetime: "singleton" },
      );

      expect([nodeOf(graph, "A").lifetime, nodeOf(graph, "A").lifetimeSource]).toEqual(["Transient", "explicit"]);
      expect([nodeOf(graph, "B").lifetime, nodeOf(graph, "B").lifetimeSource]).toEqual(["Singleton", "default"]);
      expect([nodeOf(graph, "C").lifetime, nodeOf(graph, "C").lifetimeSource]).toEqual([null, "none"]);
    });
  });

  describe("naming", () => {
    it("reports two dependencies with the same generated name", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface ILogger {}

@Singleton()
export class Logger implements ILogger {}

@Scoped()
@DependsOn<ILogger, Logger>()
export class X {}
`.trim(),
      });

      expect(nodeOf(graph, "X").duplicateIdentifiers).toBe(true);
      expect(graph.diagnostics.map((d) => d.message)).toEqual([
        "'X' has more than one dependency named 'logger'; its constructor is not generated.",
      ]);
      expect(graph.diagnostics[0]?.data).toEqual({ identifier: "logger" });
    });
  });

  describe("edges and reachability", () => {
    it("links a collection to every implementation", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IPlugin {}
@Scoped() export class CachePlugin implements IPlugin {}
@Scoped() export class AuditPlugin implements IPlugin {}

@Scoped()
@DependsOn<IPlugin[]>()
export class Host {}
`.trim(),
      });

      const host = nodeOf(graph, "Host");
      expect(host.edges.map((e) => e.to)).toEqual([idOf(FILE, "AuditPlugin"), idOf(FILE, "CachePlugin")]);
      expect(host.edges.every((e) => e.viaCollection)).toBe(true);
      expect(host.own[0]?.identifier).toBe("_plugins");
      expect(host.own[0]?.typeText).toBe("IPlugin[]");
    });

    it("reports a dependency without implementation", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IMissing {}

@Scoped()
@DependsOn<IMissing>()
export class X {}
`.trim(),
      });

      expect(graph.diagnostics.map((d) => d.message)).toEqual([
        "'X' depends on 'IMissing', which has no implementation.",
      ]);
      expect(graph.diagnostics[0]?.types).toEqual([idOf(FILE, "X"), idOf(FILE, "IMissing")]);
    });

    it("reports implementations that are not registered", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface ILogger {}
export class Logger implements ILogger {}

@Scoped()
@DependsOn<ILogger>()
export class X {}
`.trim(),
      });

      expect(graph.diagnostics.map((d) => d.message)).toEqual([
        "'X' depends on 'ILogger'; it is implemented by 'Logger', but none is registered as a service.",
      ]);
    });

    it("does not check external and undeclared dependencies", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IMissing {}

@Scoped()
@DependsOn<IMissing>({ external: true })
@DependsOn<NotDeclaredAnywhere>()
export class X {}
`.trim(),
      });

      expect(graph.diagnostics).toEqual([]);
    });

    it("matches open generic implementations by definition", () => {
      const { graph } = graphFromMemory({
        [FILE]: `
export interface IRepository<T> {}
export class User {}

@Scoped()
export class Repository<T> implements IRepository<T> {}

@Scoped()
@DependsOn<IRepository<User>>()
export class UserService {}
`.trim(),
      });

      expect(nodeOf(graph, "UserService").edges.map((e) => e.to)).toEqual([idOf(FILE, "Repository")]);
      expect(graph.diagnostics).toEqual([]);
    });
  });
});
