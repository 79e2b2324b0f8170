import { LIFETIME_RANK, type Lifetime } from "../model/types.js";
import type { ResolvedGeneratorOptions } from "../config/options.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";
import { createGeneratorEmitter, type GeneratorEmitter } from "../diagnostics/emitter.js";
import type { DependencyGraph, GraphEdge, GraphNode } from "../graph/types.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";

export type LifetimeViolation = "error" | "warning";

export interface LifetimeReport {
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

/**
 * Can a `consumer` hold a `dependency` for its whole life?
 *
 * Only a Singleton is checked: capturing Scoped is an error, Transient a warning.
 */
export function compareLifetimes(consumer: Lifetime, dependency: Lifetime): LifetimeViolation | null {
  if (consumer !== "Singleton" || LIFETIME_RANK[dependency] >= LIFETIME_RANK[consumer]) return null;
  return dependency === "Scoped" ? "error" : "warning";
}

const CAPTURE_ADVICE: Readonly<Record<LifetimeViolation, string>> = {
  error: "Singleton services cannot capture shorter-lived dependencies.",
  warning: "Consider if this transient should be Singleton or if the dependency is appropriate.",
};

export function validateLifetimes(
  graph: DependencyGraph,
  options: Pick<ResolvedGeneratorOptions, "lifetimeValidation">,
  logger: Logger = nullLogger,
): LifetimeReport {
  const emitter = createGeneratorEmitter("lifetimes");
  if (!options.lifetimeValidation) {
    logger.info("[wirekit] Lifetime validation disabled");
    return { diagnostics: emitter.diagnostics };
  }

  for (const node of graph.nodes.values()) {
    if (node.type.external || node.lifetime === null) continue;
    const consumer = node.lifetime;
    emitter.isolate(node.type.id, node.type.location, () => {
      for (const edge of node.edges) {
        if (edge.external) continue;
        const candidate = graph.nodes.get(edge.to);
        if (!candidate || candidate.type.external || candidate.lifetime === null) continue;
        const violation = compareLifetimes(consumer, candidate.lifetime);
        if (violation) reportViolation(node, candidate, candidate.lifetime, edge, violation, graph, emitter);
      }
    });
  }

  return { diagnostics: emitter.diagnostics };
}

function reportViolation(
  node: GraphNode,
  candidate: GraphNode,
  dependencyLifetime: Lifetime,
  edge: GraphEdge,
  violation: LifetimeViolation,
  graph: DependencyGraph,
  emitter: GeneratorEmitter,
): void {
  const consumer = node.type.name;
  // collections are checked per element implementation
  const target = edge.viaCollection ? `${edge.dependency.typeText} -> ${candidate.type.name}` : candidate.type.name;
  const location = edge.dependency.descriptor.location;
  const types = [node.type.id, candidate.type.id];
  debug.lifetimes("violation", { consumer, target, dependencyLifetime, inherited: edge.inherited });

  if (edge.inherited) {
    const declaredBy = graph.nodes.get(edge.dependency.declaredBy)?.type.name ?? edge.dependency.declaredBy;
    emitter.emit("wirekit/lifetime/inheritance-mismatch", {
      message:
        `Singleton service '${consumer}' inherits a dependency on ${dependencyLifetime} service '${target}' ` +
        `from '${declaredBy}'. ${CAPTURE_ADVICE[violation]}`,
      types,
      location,
      severity: violation,
      data: { dependencyLifetime },
    });
    return;
  }

  const message = `Singleton service '${consumer}' depends on ${dependencyLifetime} service '${target}'. ${CAPTURE_ADVICE[violation]}`;
  if (violation === "error") {
    emitter.emit("wirekit/lifetime/singleton-captures-scoped", { message, types, location });
  } else {
    emitter.emit("wirekit/lifetime/singleton-captures-transient", { message, types, location });
  }
}
