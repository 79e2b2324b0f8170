/**
 * Generator Data Model
 *
 * Descriptors are derived fresh from a `ts.Program` on every run and never mutated
 * after extraction. Everything downstream (graph, plan, emitted code) is computed
 * from these shapes.
 */

/* =============================================================================
 * IDENTITY
 * ============================================================================= */

/** `"<normalized file path>#<declared name>"`. */
export type TypeId = string;

export type Lifetime = "Singleton" | "Scoped" | "Transient";

export const LIFETIMES: readonly Lifetime[] = ["Singleton", "Scoped", "Transient"];

/** Larger lives longer. */
export const LIFETIME_RANK: Readonly<Record<Lifetime, number>> = {
  Singleton: 3,
  Scoped: 2,
  Transient: 1,
};

/**
 * Reference to a type as written in a marker, heritage clause or field annotation.
 *
 * `id` is null when the declaration lives outside the analyzed sources
 * (a `.d.ts`, an unresolved import, a global).
 */
export type TypeRef = NamedTypeRef | TypeParamRef;

export interface NamedTypeRef {
  readonly kind: "named";
  readonly name: string;
  readonly id: TypeId | null;
  readonly args: readonly TypeRef[];
}

export interface TypeParamRef {
  readonly kind: "param";
  readonly name: string;
}

export interface SourceLocation {
  readonly file: string;
  readonly start: number;
  readonly end: number;
}

/* =============================================================================
 * NAMING
 * ============================================================================= */

export type NamingConvention = "camelCase" | "PascalCase" | "snake_case";

export interface NamingOptions {
  readonly convention: NamingConvention;
  readonly stripLeadingMarker: boolean;
  readonly prefix: string;
}

export const DEFAULT_NAMING: NamingOptions = {
  convention: "camelCase",
  stripLeadingMarker: true,
  prefix: "_",
};

/* =============================================================================
 * REGISTRATION MARKERS
 * ============================================================================= */

export type RegistrationMode = "DirectOnly" | "All" | "Exclusionary";

export type InstanceSharing = "Separate" | "Shared";

export interface RegistrationDirective {
  readonly mode: RegistrationMode;
  readonly sharing: InstanceSharing;
  readonly location: SourceLocation;
}

export interface RegisterAsDirective {
  readonly contracts: readonly TypeRef[];
  readonly sharing: InstanceSharing;
  readonly location: SourceLocation;
}

export interface SkipDirective {
  /** Empty with `all: true` means "do not register this class at all". */
  readonly contracts: readonly TypeRef[];
  readonly all: boolean;
  readonly location: SourceLocation;
}

/**
 * Predicate over environment and configuration. Present clauses are AND-combined.
 * List-valued fields come from comma-separated marker strings.
 */
export interface ConditionalRule {
  readonly environment: readonly string[];
  readonly notEnvironment: readonly string[];
  /** Raw key as written; `""` is a blank key, `null` means absent. */
  readonly configKey: string | null;
  readonly equals: string | null;
  readonly notEquals: readonly string[];
  readonly location: SourceLocation;
}

/* =============================================================================
 * CONFIGURATION BINDING
 * ============================================================================= */

/** `string[]` values are read comma-separated. */
export type ConfigurationValueKind = "string" | "number" | "boolean" | "string-list";

/** `@InjectConfiguration("Section:Key")` on an instance field. */
export interface ConfigurationBinding {
  readonly owner: TypeId;
  readonly fieldName: string;
  readonly key: string;
  readonly valueKind: ConfigurationValueKind;
  /** `field?:` or `| undefined`: a missing key leaves the field undefined instead of throwing. */
  readonly optional: boolean;
  readonly location: SourceLocation;
}

/* =============================================================================
 * DESCRIPTORS
 * ============================================================================= */

export type TypeKind = "class" | "interface";

export type ExportType = "none" | "named" | "default";

export interface TypeDescriptor {
  readonly id: TypeId;
  readonly name: string;
  readonly kind: TypeKind;
  readonly file: string;
  readonly typeParameters: readonly string[];
  /** Explicit lifetime marker; null is Unassigned. */
  readonly lifetime: Lifetime | null;
  readonly external: boolean;
  readonly abstract: boolean;
  readonly exportType: ExportType;
  /** Name the module exports the declaration under: `"default"`, an alias, or its own name. */
  readonly exportName: string | null;
  /** `extends` for classes. */
  readonly base: TypeRef | null;
  /** `implements` for classes, `extends` for interfaces. */
  readonly interfaces: readonly TypeRef[];
  readonly registration: RegistrationDirective | null;
  readonly registerAs: RegisterAsDirective | null;
  readonly skip: SkipDirective | null;
  readonly conditions: readonly ConditionalRule[];
  readonly configuration: readonly ConfigurationBinding[];
  readonly hasExplicitConstructor: boolean;
  readonly location: SourceLocation;
  /** Offset just after the class body's `{`; -1 for interfaces. */
  readonly bodyStart: number;
}

export type CollectionKind = "array" | "readonly-array" | "iterable";

export type DependencySource =
  | { readonly kind: "field"; readonly fieldName: string }
  | { readonly kind: "bulk"; readonly declarationIndex: number };

export interface DependencyDescriptor {
  readonly owner: TypeId;
  /** Element type when collection-wrapped. */
  readonly target: TypeRef;
  readonly collection: CollectionKind | null;
  readonly source: DependencySource;
  readonly naming: NamingOptions;
  readonly external: boolean;
  readonly order: number;
  readonly location: SourceLocation;
}

export function arity(type: TypeDescriptor): number {
  return type.typeParameters.length;
}
