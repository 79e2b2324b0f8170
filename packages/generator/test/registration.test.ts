/**
 * Generator Package - Registration Planning Tests
 *
 * Contract selection, instance sharing, skips and conditions.
 */

import { describe, it, expect } from "vitest";
import { planRegistrations, type PlannedService, type RegistrationPlan } from "@wirekit/generator";
import { graphFromMemory, idOf } from "./_helpers/inline-program.js";

const FILE = "/src/app.ts";

function plan(source: string): RegistrationPlan {
  const { graph } = graphFromMemory({ [FILE]: source.trim() });
  return planRegistrations(graph);
}

function serviceOf(result: RegistrationPlan, name: string): PlannedService {
  const service = result.services.find((s) => s.type === idOf(FILE, name));
  if (!service) throw new Error(`service ${name} was not planned`);
  return service;
}

function tokensOf(result: RegistrationPlan, name: string): string[] {
  return serviceOf(result, name).registrations.map((r) => r.token);
}

const CONTRACTS = `
export interface IA {}
export interface IB {}
export class Base {}
`;

describe("planRegistrations", () => {
  describe("contract selection", () => {
    it("registers the class and every interface by default", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
export class Impl implements IA, IB {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl", "IA", "IB"]);
      expect(serviceOf(result, "Impl").registrations.every((r) => r.forwardTo === null)).toBe(true);
      expect(result.diagnostics).toEqual([]);
    });

    it("leaves out skipped contracts", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@SkipRegistration<IA>()
export class Impl implements IA, IB {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl", "IB"]);
    });

    it("forwards interfaces to the concrete registration when shared", () => {
      const result = plan(`${CONTRACTS}
@Singleton()
@RegisterAsAll(RegistrationMode.All, InstanceSharing.Shared)
export class Impl implements IA, IB {}
`);

      const registrations = serviceOf(result, "Impl").registrations;
      expect(registrations.map((r) => [r.token, r.forwardTo])).toEqual([
        ["Impl", null],
        ["IA", "Impl"],
        ["IB", "Impl"],
      ]);
      expect(registrations.every((r) => r.lifetime === "Singleton")).toBe(true);
    });

    it("keeps the shared concrete registration even when skipped", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@RegisterAsAll(RegistrationMode.All, InstanceSharing.Shared)
@SkipRegistration<Impl>()
export class Impl implements IA {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl", "IA"]);
    });

    it("registers only interfaces when exclusionary", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@RegisterAsAll(RegistrationMode.Exclusionary)
export class Impl implements IA, IB {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["IA", "IB"]);
    });

    it("registers only the class when direct-only and reports a useless skip", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@RegisterAsAll("DirectOnly")
@SkipRegistration<IA>()
export class Impl implements IA, IB {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl"]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "'Impl' is registered DirectOnly; SkipRegistration has nothing to skip.",
      ]);
    });

    it("registers exactly the RegisterAs contracts", () => {
      const result = plan(`${CONTRACTS}
export interface IOther {}

@Scoped()
@RegisterAs<IA, IA, IOther, Base>()
export class Impl extends Base implements IA, IB {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl", "IA", "Base"]);
      expect(result.diagnostics.map((d) => d.code)).toEqual([
        "wirekit/registration/register-as-duplicate",
        "wirekit/registration/register-as-not-implemented",
        "wirekit/registration/register-as-non-interface",
      ]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "RegisterAs on 'Impl' lists 'IA' more than once.",
        "RegisterAs on 'Impl' lists 'IOther', which it does not implement.",
        "RegisterAs on 'Impl' lists class 'Base'; contracts are usually interfaces.",
      ]);
    });

    it("drops the arguments of open generic contracts", () => {
      const result = plan(`
export interface IRepository<T> {}

@Scoped()
export class Repository<T> implements IRepository<T> {}
`);

      expect(tokensOf(result, "Repository")).toEqual(["Repository<>", "IRepository<>"]);
    });
  });

  describe("services that are not planned", () => {
    it("skips the whole class", () => {
      const result = plan(`
@Scoped()
@SkipRegistration()
export class Impl {}
`);

      expect(result.services).toEqual([]);
      expect(result.diagnostics).toEqual([]);
    });

    it("skips abstract, external and lifetime-less classes", () => {
      const result = plan(`
@Scoped() export abstract class Base {}
@Scoped() @ExternalService() export class Gateway {}
export class Plain {}
`);

      expect(result.services).toEqual([]);
    });

    it("reports a service that is not exported", () => {
      const result = plan(`
@Scoped()
class Hidden {}
`);

      expect(result.services).toEqual([]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "Service 'Hidden' is not exported and cannot be registered.",
      ]);
    });
  });

  describe("diagnostics", () => {
    it("reports a skip of a contract the class does not implement", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@SkipRegistration<IB>()
export class Impl implements IA {}
`);

      expect(tokensOf(result, "Impl")).toEqual(["Impl", "IA"]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "SkipRegistration on 'Impl' names 'IB', which it does not implement.",
      ]);
    });

    it("reports RegisterAsAll without a lifetime marker", () => {
      const result = plan(`
@RegisterAsAll()
export class Impl {}
`);

      expect(serviceOf(result, "Impl").lifetime).toBe("Scoped");
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "'Impl' uses RegisterAsAll without a lifetime marker; it is registered as Scoped.",
      ]);
    });
  });

  describe("conditions", () => {
    it("attaches the rule to every registration", () => {
      const result = plan(`${CONTRACTS}
@Scoped()
@ConditionalService({ environment: "Dev" })
export class Impl implements IA {}
`);

      const registrations = serviceOf(result, "Impl").registrations;
      expect(registrations.map((r) => r.condition?.environment)).toEqual([["Dev"], ["Dev"]]);
    });

    it("drops a class whose condition contradicts itself", () => {
      const result = plan(`
@Scoped()
@ConditionalService({ environment: "Dev", notEnvironment: "Dev" })
export class A {}
`);

      expect(result.services).toEqual([]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "ConditionalService on 'A' both requires and excludes environment 'Dev'.",
      ]);
    });

    it("registers unconditionally when the condition is empty", () => {
      const result = plan(`
@Scoped()
@ConditionalService({})
export class A {}
`);

      expect(serviceOf(result, "A").condition).toBeNull();
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "ConditionalService on 'A' has no conditions; the class is registered unconditionally.",
      ]);
    });

    it("requires a comparison for a config key and a key for a comparison", () => {
      const result = plan(`
@Scoped()
@ConditionalService({ configValue: "Mode" })
export class A {}

@Scoped()
@ConditionalService({ equals: "on" })
export class B {}

@Scoped()
@ConditionalService({ configValue: " ", equals: "on" })
export class C {}
`);

      expect(result.services).toEqual([]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "ConditionalService on 'A' reads 'Mode' but sets neither equals nor notEquals.",
        "ConditionalService on 'B' sets equals or notEquals without configValue.",
        "ConditionalService on 'C' has a blank configValue.",
      ]);
    });

    it("uses the first of several conditions", () => {
      const result = plan(`
@Scoped()
@ConditionalService({ environment: "Dev" })
@ConditionalService({ environment: "Prod" })
export class A {}
`);

      expect(serviceOf(result, "A").condition?.environment).toEqual(["Dev"]);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "'A' has 2 ConditionalService markers; only the first is used.",
      ]);
    });

    it("groups conditional registrations of one token where it first appears", () => {
      const result = plan(`
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
`);

      const shape = result.entries.map((entry) =>
        entry.kind === "group"
          ? `group ${entry.group.token} (${entry.group.registrations.length}${entry.group.exclusive ? ", exclusive" : ""})`
          : `${entry.registration.token}`,
      );
      expect(shape).toEqual([
        "group DevEmail (1)",
        "group IEmail (2, exclusive)",
        "FallbackEmail",
        "IEmail",
        "group ProdEmail (1)",
      ]);
    });

    it("treats one config key compared against different values as exclusive", () => {
      const result = plan(`
export interface ICache {}

@Singleton()
@RegisterAs<ICache>()
@ConditionalService({ configValue: "Cache:Mode", equals: "memory" })
export class MemoryCache implements ICache {}

@Singleton()
@RegisterAs<ICache>()
@ConditionalService({ configValue: "Cache:Mode", equals: "redis" })
export class RedisCache implements ICache {}
`);

      const group = result.entries.flatMap((e) => (e.kind === "group" && e.group.token === "ICache" ? [e.group] : []));
      expect(group.map((g) => g.exclusive)).toEqual([true]);
    });
  });
});
