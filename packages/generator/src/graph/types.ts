import type {
  CollectionKind,
  ConfigurationBinding,
  DependencyDescriptor,
  Lifetime,
  TypeDescriptor,
  TypeId,
  TypeRef,
} from "../model/types.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";

/**
 * A dependency as seen from one class: declared by the class itself or by a
 * base class, with the declaring frame's type parameters substituted.
 */
export interface ResolvedDependency {
  readonly descriptor: DependencyDescriptor;
  /** Class that declares the dependency. */
  readonly declaredBy: TypeId;
  readonly inherited: boolean;
  /** Substituted target; null when a type parameter had no binding. */
  readonly target: TypeRef | null;
  readonly collection: CollectionKind | null;
  readonly external: boolean;
  /** Field name (field declarations keep the user's name). */
  readonly identifier: string;
  readonly parameter: string;
  /** Parameter type as written in the generated constructor. */
  readonly typeText: string;
  /** Container token of the element type. */
  readonly token: string;
}

export interface GraphEdge {
  readonly from: TypeId;
  /** Candidate implementation. */
  readonly to: TypeId;
  /** Contract reference as declared, substituted. */
  readonly target: TypeRef;
  readonly viaCollection: boolean;
  readonly external: boolean;
  readonly inherited: boolean;
  readonly dependency: ResolvedDependency;
}

export type LifetimeSource = "explicit" | "default" | "none";

export interface GraphNode {
  readonly type: TypeDescriptor;
  readonly lifetime: Lifetime | null;
  readonly lifetimeSource: LifetimeSource;
  /** Base classes, nearest first, substituted. */
  readonly bases: readonly TypeRef[];
  /** Every implemented interface, including those of bases and extended interfaces. */
  readonly interfaces: readonly TypeRef[];
  /** Dependencies of base classes, root-most frame first. */
  readonly inherited: readonly ResolvedDependency[];
  readonly own: readonly ResolvedDependency[];
  /** One edge per dependency and candidate implementation. */
  readonly edges: readonly GraphEdge[];
  /** The class's own configuration-bound fields. */
  readonly configuration: readonly ConfigurationBinding[];
  /** A base class binds configuration, so `super(...)` forwards it. */
  readonly baseTakesConfiguration: boolean;
  /** Two dependencies would produce the same generated name. */
  readonly duplicateIdentifiers: boolean;
}

export interface DependencyGraph {
  /** Class nodes, sorted by id. */
  readonly nodes: ReadonlyMap<TypeId, GraphNode>;
  readonly types: ReadonlyMap<TypeId, TypeDescriptor>;
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

/** Constructor parameter carrying the configuration, last in the list. */
export const CONFIGURATION_PARAMETER = "configuration";

/** Container token the configuration is resolved under. */
export const CONFIGURATION_TOKEN = "Configuration";

export function takesConfiguration(node: Pick<GraphNode, "configuration" | "baseTakesConfiguration">): boolean {
  return node.configuration.length > 0 || node.baseTakesConfiguration;
}

/** Every dependency of a node in constructor order. */
export function allDependencies(node: GraphNode): readonly ResolvedDependency[] {
  return [...node.inherited, ...node.own];
}
