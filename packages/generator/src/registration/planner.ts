import type { InstanceSharing, TypeDescriptor, TypeRef } from "../model/types.js";
import { registrationToken, typeKey } from "../model/type-ref.js";
import { createGeneratorEmitter, type GeneratorEmitter } from "../diagnostics/emitter.js";
import type { DependencyGraph, GraphNode } from "../graph/types.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";
import { checkConditions, isMutuallyExclusive } from "./conditions.js";
import type { PlanEntry, PlannedRegistration, PlannedService, RegistrationPlan } from "./types.js";

/**
 * Decide, per class, which contracts are registered and how.
 *
 * Only concrete, exported, non-external classes with a lifetime are planned.
 */
export function planRegistrations(graph: DependencyGraph, logger: Logger = nullLogger): RegistrationPlan {
  const emitter = createGeneratorEmitter("registration");
  const services: PlannedService[] = [];

  for (const node of graph.nodes.values()) {
    const service = emitter.isolate(node.type.id, node.type.location, () => planService(node, graph, emitter));
    if (service) services.push(service);
  }

  const entries = orderEntries(services);
  const count = services.reduce((sum, s) => sum + s.registrations.length, 0);
  logger.info(`[wirekit] Planned ${count} registrations for ${services.length} services`);
  return { services, entries, diagnostics: emitter.diagnostics };
}

/* =============================================================================
 * PER CLASS
 * ============================================================================= */

function planService(node: GraphNode, graph: DependencyGraph, emitter: GeneratorEmitter): PlannedService | null {
  const type = node.type;
  if (type.kind !== "class" || type.abstract || type.external || node.lifetime === null) return null;
  const lifetime = node.lifetime;

  if (type.skip?.all) {
    debug.registration("skip-all", { type: type.id });
    return null;
  }

  if (node.lifetimeSource === "default" && (type.registration !== null || type.conditions.length > 0)) {
    const marker = type.registration !== null ? "RegisterAsAll" : "ConditionalService";
    emitter.emit("wirekit/registration/missing-lifetime", {
      message: `'${type.name}' uses ${marker} without a lifetime marker; it is registered as ${lifetime}.`,
      types: [type.id],
      location: type.location,
    });
  }

  if (type.exportType === "none") {
    emitter.emit("wirekit/registration/service-not-exported", {
      message: `Service '${type.name}' is not exported and cannot be registered.`,
      types: [type.id],
      location: type.location,
    });
    return null;
  }

  const check = checkConditions(type, emitter);
  if (check.kind === "invalid") return null;
  const condition = check.kind === "conditional" ? check.rule : null;

  const self = concreteRef(type);
  const implemented = implementedContracts(node, self);
  const skipped = readSkipped(type, implemented, emitter);
  const { contracts, sharing } = selectContracts(node, self, implemented, graph, emitter);

  const concreteToken = registrationToken(self);
  const selfKey = typeKey(self);
  const registrations: PlannedRegistration[] = [];
  for (const contract of contracts) {
    const key = typeKey(contract);
    const isSelf = key === selfKey;
    // a shared instance needs its concrete registration even when skipped
    if (skipped.has(key) && !(isSelf && sharing === "Shared")) continue;
    registrations.push({
      implementation: type.id,
      lifetime,
      contract,
      token: isSelf ? concreteToken : registrationToken(contract),
      forwardTo: sharing === "Shared" && !isSelf ? concreteToken : null,
      condition,
    });
  }

  debug.registration("service", {
    type: type.id,
    lifetime,
    sharing,
    tokens: registrations.map((r) => r.token),
    conditional: condition !== null,
  });
  return { type: type.id, lifetime, sharing, condition, registrations };
}

function selectContracts(
  node: GraphNode,
  self: TypeRef,
  implemented: ReadonlyMap<string, TypeRef>,
  graph: DependencyGraph,
  emitter: GeneratorEmitter,
): { contracts: TypeRef[]; sharing: InstanceSharing } {
  const type = node.type;

  if (type.registerAs) {
    const contracts: TypeRef[] = [self];
    const listed = new Set<string>([typeKey(self)]);
    for (const contract of type.registerAs.contracts) {
      const key = typeKey(contract);
      const shown = registrationToken(contract);
      if (listed.has(key)) {
        emitter.emit("wirekit/registration/register-as-duplicate", {
          message: `RegisterAs on '${type.name}' lists '${shown}' more than once.`,
          types: [type.id],
          location: type.registerAs.location,
        });
        continue;
      }
      listed.add(key);
      if (!implemented.has(key)) {
        emitter.emit("wirekit/registration/register-as-not-implemented", {
          message: `RegisterAs on '${type.name}' lists '${shown}', which it does not implement.`,
          types: [type.id],
          location: type.registerAs.location,
        });
        continue;
      }
      const declaration = contract.kind === "named" && contract.id !== null ? graph.types.get(contract.id) : undefined;
      if (declaration?.kind === "class") {
        emitter.emit("wirekit/registration/register-as-non-interface", {
          message: `RegisterAs on '${type.name}' lists class '${shown}'; contracts are usually interfaces.`,
          types: [type.id, declaration.id],
          location: type.registerAs.location,
        });
      }
      contracts.push(contract);
    }
    return { contracts, sharing: type.registerAs.sharing };
  }

  const directive = type.registration;
  const mode = directive?.mode ?? "All";
  const sharing = directive?.sharing ?? "Separate";

  switch (mode) {
    case "DirectOnly":
      if (type.skip && type.skip.contracts.length > 0) {
        emitter.emit("wirekit/registration/skip-has-no-effect", {
          message: `'${type.name}' is registered DirectOnly; SkipRegistration has nothing to skip.`,
          types: [type.id],
          location: type.skip.location,
        });
      }
      return { contracts: [self], sharing };
    case "All":
      return { contracts: [self, ...node.interfaces], sharing };
    case "Exclusionary":
      return { contracts: sharing === "Shared" ? [self, ...node.interfaces] : [...node.interfaces], sharing };
  }
}

function readSkipped(
  type: TypeDescriptor,
  implemented: ReadonlyMap<string, TypeRef>,
  emitter: GeneratorEmitter,
): Set<string> {
  const skipped = new Set<string>();
  for (const contract of type.skip?.contracts ?? []) {
    const key = typeKey(contract);
    if (!implemented.has(key)) {
      emitter.emit("wirekit/registration/skip-target-not-implemented", {
        message: `SkipRegistration on '${type.name}' names '${registrationToken(contract)}', which it does not implement.`,
        types: [type.id],
        location: type.skip?.location ?? type.location,
      });
      continue;
    }
    skipped.add(key);
  }
  return skipped;
}

/** The class itself, its bases and every interface, by type key. */
function implementedContracts(node: GraphNode, self: TypeRef): Map<string, TypeRef> {
  const implemented = new Map<string, TypeRef>();
  for (const ref of [self, ...node.bases, ...node.interfaces]) implemented.set(typeKey(ref), ref);
  return implemented;
}

function concreteRef(type: TypeDescriptor): TypeRef {
  return {
    kind: "named",
    name: type.name,
    id: type.id,
    args: type.typeParameters.map((name): TypeRef => ({ kind: "param", name })),
  };
}

/* =============================================================================
 * ORDERING
 * ============================================================================= */

function orderEntries(services: readonly PlannedService[]): PlanEntry[] {
  const slots: ({ kind: "registration"; registration: PlannedRegistration } | { kind: "group"; token: string })[] = [];
  const groups = new Map<string, PlannedRegistration[]>();

  for (const service of services) {
    for (const registration of service.registrations) {
      if (!registration.condition) {
        slots.push({ kind: "registration", registration });
        continue;
      }
      const members = groups.get(registration.token);
      if (members) {
        members.push(registration);
      } else {
        groups.set(registration.token, [registration]);
        slots.push({ kind: "group", token: registration.token });
      }
    }
  }

  return slots.map((slot): PlanEntry => {
    if (slot.kind === "registration") return slot;
    const registrations = groups.get(slot.token) ?? [];
    const exclusive = isMutuallyExclusive(registrations);
    debug.registration("group", { token: slot.token, members: registrations.length, exclusive });
    return { kind: "group", group: { token: slot.token, exclusive, registrations } };
  });
}
