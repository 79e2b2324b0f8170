import type { DependencyDescriptor, Lifetime, TypeDescriptor, TypeId, TypeRef } from "../model/types.js";
import {
  SubstitutionError,
  renderCollection,
  renderTypeRef,
  substitute,
  type Substitution,
} from "../model/type-ref.js";
import type { ResolvedGeneratorOptions } from "../config/options.js";
import { createGeneratorEmitter, type GeneratorEmitter } from "../diagnostics/emitter.js";
import type { ExtractionResult } from "../extraction/extractor.js";
import { fieldParameterName, parameterName, rawDependencyName, resolveIdentifier } from "../naming/naming.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";
import { ImplementationIndex } from "./candidates.js";
import { collectBases, collectInterfaces, identitySubstitution, walkBaseChain } from "./inheritance.js";
import { mergeOwnDependencies } from "./merge.js";
import {
  CONFIGURATION_PARAMETER,
  type DependencyGraph,
  type GraphEdge,
  type GraphNode,
  type LifetimeSource,
  type ResolvedDependency,
} from "./types.js";

type GraphOptions = Pick<ResolvedGeneratorOptions, "defaultLifetime">;

/** Node before edges are known; edges need every node's contracts first. */
type PartialNode = Omit<GraphNode, "edges">;

export function buildDependencyGraph(
  extraction: ExtractionResult,
  options: GraphOptions,
  logger: Logger = nullLogger,
): DependencyGraph {
  const emitter = createGeneratorEmitter("graph");
  const types = extraction.types;
  const classes = [...types.values()].filter((t) => t.kind === "class").sort((a, b) => compareIds(a.id, b.id));

  // Pass 1: each class's own declarations, merged once so merge diagnostics are not repeated per subclass
  const merged = new Map<TypeId, readonly DependencyDescriptor[]>();
  for (const type of classes) {
    const declared = extraction.dependencies.get(type.id) ?? [];
    const result = emitter.isolate(type.id, type.location, () => mergeOwnDependencies(type, declared, emitter));
    merged.set(type.id, result ?? []);
  }

  // Pass 2: inheritance, substitution, naming, lifetime
  const partials = new Map<TypeId, PartialNode>();
  const index = new ImplementationIndex(types);
  for (const type of classes) {
    const partial = emitter.isolate(type.id, type.location, () =>
      buildNode(type, extraction, merged, options, emitter),
    );
    if (!partial) continue;
    partials.set(type.id, partial);
    index.add(type, [...partial.bases, ...partial.interfaces]);
  }

  // Pass 3: edges and reachability diagnostics
  const nodes = new Map<TypeId, GraphNode>();
  for (const [id, partial] of partials) {
    const edges = emitter.isolate(id, partial.type.location, () => buildEdges(partial, partials, index, emitter));
    nodes.set(id, { ...partial, edges: edges ?? [] });
  }

  let edgeCount = 0;
  for (const node of nodes.values()) edgeCount += node.edges.length;
  logger.info(`[wirekit] Built dependency graph: ${nodes.size} classes, ${edgeCount} edges`);

  return { nodes, types, diagnostics: emitter.diagnostics };
}

/* =============================================================================
 * NODES
 * ============================================================================= */

function buildNode(
  type: TypeDescriptor,
  extraction: ExtractionResult,
  merged: ReadonlyMap<TypeId, readonly DependencyDescriptor[]>,
  options: GraphOptions,
  emitter: GeneratorEmitter,
): PartialNode {
  const chain = walkBaseChain(type, extraction.types);
  if (chain.cycleAt !== null) {
    emitter.emit("wirekit/dependency/inheritance-cycle", {
      message: `Inheritance cycle detected while walking the base classes of '${type.name}'.`,
      types: [type.id, chain.cycleAt],
      location: type.location,
    });
  }

  // Frames concatenate without de-duplication: the inherited part must match the
  // base constructor's parameter list slot for slot. Repeats surface as duplicate identifiers.
  const resolveFrame = (
    declaring: TypeDescriptor,
    substitution: Substitution,
    inherited: boolean,
  ): ResolvedDependency[] =>
    (merged.get(declaring.id) ?? []).map((dep) =>
      resolveDependency(type, declaring, dep, substitution, inherited, emitter),
    );

  const inherited = chain.frames.flatMap((frame) => resolveFrame(frame.type, frame.substitution, true));
  const own = resolveFrame(type, identitySubstitution(type), false);
  const baseTakesConfiguration = chain.frames.some((frame) => frame.type.configuration.length > 0);
  const reserved: ReservedNames = {
    parameters: type.configuration.length > 0 || baseTakesConfiguration ? [CONFIGURATION_PARAMETER] : [],
    identifiers: type.configuration.map((binding) => binding.fieldName),
  };
  const duplicateIdentifiers = reportDuplicateIdentifiers(type, [...inherited, ...own], reserved, emitter);

  const { lifetime, source } = resolveLifetime(type, extraction, options);
  debug.graph("node", {
    id: type.id,
    lifetime,
    lifetimeSource: source,
    inherited: inherited.length,
    own: own.length,
  });

  return {
    type,
    lifetime,
    lifetimeSource: source,
    bases: collectBases(type, chain),
    interfaces: collectInterfaces(type, chain, extraction.types),
    inherited,
    own,
    configuration: type.configuration,
    baseTakesConfiguration,
    duplicateIdentifiers,
  };
}

function resolveDependency(
  owner: TypeDescriptor,
  declaring: TypeDescriptor,
  dep: DependencyDescriptor,
  substitution: Substitution,
  inherited: boolean,
  emitter: GeneratorEmitter,
): ResolvedDependency {
  let target: TypeRef | null;
  try {
    target = substitute(dep.target, substitution);
  } catch (error) {
    if (!(error instanceof SubstitutionError)) throw error;
    target = null;
    emitter.emit("wirekit/dependency/generic-substitution-failed", {
      message:
        `Cannot bind type parameter '${error.parameter}' of '${declaring.name}' for '${owner.name}'; ` +
        `dependency '${renderTypeRef(dep.target)}' is typed 'unknown'.`,
      types: [owner.id, declaring.id],
      location: dep.location,
      data: { parameter: error.parameter },
    });
  }

  const source = dep.source;
  const raw = rawDependencyName(dep.target, dep.collection);
  const identifier =
    source.kind === "field"
      ? source.fieldName
      : resolveIdentifier(raw, dep.naming.convention, dep.naming.stripLeadingMarker, dep.naming.prefix);
  const parameter =
    source.kind === "field" ? fieldParameterName(source.fieldName) : parameterName(raw, dep.naming.stripLeadingMarker);

  return {
    descriptor: dep,
    declaredBy: declaring.id,
    inherited,
    target,
    collection: dep.collection,
    external: dep.external,
    identifier,
    parameter,
    typeText: target ? renderCollection(renderTypeRef(target), dep.collection) : "unknown",
    token: renderTypeRef(target ?? dep.target),
  };
}

/** Names the constructor uses besides the dependencies: the configuration parameter and bound fields. */
interface ReservedNames {
  readonly parameters: readonly string[];
  readonly identifiers: readonly string[];
}

/**
 * Generated names must be unique across the whole constructor. Returns true when a
 * collision was reported.
 */
function reportDuplicateIdentifiers(
  type: TypeDescriptor,
  deps: readonly ResolvedDependency[],
  reserved: ReservedNames,
  emitter: GeneratorEmitter,
): boolean {
  const parameters = new Set<string>(reserved.parameters);
  const identifiers = new Set<string>(reserved.identifiers);
  let duplicate = false;
  for (const dep of deps) {
    const clash = parameters.has(dep.parameter) ? dep.parameter : identifiers.has(dep.identifier) ? dep.identifier : null;
    parameters.add(dep.parameter);
    identifiers.add(dep.identifier);
    if (clash === null) continue;
    duplicate = true;
    emitter.emit("wirekit/dependency/duplicate-identifier", {
      message: `'${type.name}' has more than one dependency named '${clash}'; its constructor is not generated.`,
      types: [type.id],
      location: dep.descriptor.location,
      data: { identifier: clash },
    });
  }
  return duplicate;
}

function resolveLifetime(
  type: TypeDescriptor,
  extraction: ExtractionResult,
  options: GraphOptions,
): { lifetime: Lifetime | null; source: LifetimeSource } {
  if (type.lifetime) return { lifetime: type.lifetime, source: "explicit" };
  if (hasServiceIntent(type, extraction)) return { lifetime: options.defaultLifetime, source: "default" };
  return { lifetime: null, source: "none" };
}

/** Markers that only make sense on a service. */
export function hasServiceIntent(type: TypeDescriptor, extraction: Pick<ExtractionResult, "dependencies">): boolean {
  return (
    (extraction.dependencies.get(type.id)?.length ?? 0) > 0 ||
    type.registration !== null ||
    type.registerAs !== null ||
    type.conditions.length > 0 ||
    type.configuration.length > 0
  );
}

/* =============================================================================
 * EDGES
 * ============================================================================= */

function buildEdges(
  node: PartialNode,
  nodes: ReadonlyMap<TypeId, PartialNode>,
  index: ImplementationIndex,
  emitter: GeneratorEmitter,
): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const dep of [...node.inherited, ...node.own]) {
    const target = dep.target;
    if (!target) continue;
    const candidates = index.candidates(target);
    const external = node.type.external || dep.external;

    for (const to of candidates) {
      const candidate = nodes.get(to);
      const edge: GraphEdge = {
        from: node.type.id,
        to,
        target,
        viaCollection: dep.collection !== null,
        external: external || (candidate?.type.external ?? false),
        inherited: dep.inherited,
        dependency: dep,
      };
      edges.push(edge);
      debug.graph("edge", {
        from: edge.from,
        to: edge.to,
        viaCollection: edge.viaCollection,
        external: edge.external,
        inherited: edge.inherited,
      });
    }

    if (!dep.inherited && !external && dep.collection === null && node.lifetime !== null) {
      reportReachability(node, dep, target, candidates, nodes, emitter);
    }
  }
  return edges;
}

function reportReachability(
  node: PartialNode,
  dep: ResolvedDependency,
  target: TypeRef,
  candidates: readonly TypeId[],
  nodes: ReadonlyMap<TypeId, PartialNode>,
  emitter: GeneratorEmitter,
): void {
  // declared outside the analyzed sources, or still open
  if (target.kind !== "named" || target.id === null) return;

  if (candidates.length === 0) {
    emitter.emit("wirekit/dependency/unresolved", {
      message: `'${node.type.name}' depends on '${dep.token}', which has no implementation.`,
      types: [node.type.id, target.id],
      location: dep.descriptor.location,
    });
    return;
  }

  const satisfied = candidates.some((id) => {
    const impl = nodes.get(id);
    return impl !== undefined && (impl.type.external || impl.lifetime !== null);
  });
  if (satisfied) return;

  const names = candidates.map((id) => `'${nodes.get(id)?.type.name ?? id}'`).join(", ");
  emitter.emit("wirekit/dependency/unregistered-implementation", {
    message: `'${node.type.name}' depends on '${dep.token}'; it is implemented by ${names}, but none is registered as a service.`,
    types: [node.type.id, ...candidates],
    location: dep.descriptor.location,
  });
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
