/**
 * Declarative markers read by the wirekit generator.
 *
 * Every decorator here is a no-op at run time. The generator reads them from
 * source, including their type arguments, so the type arguments ARE the data:
 *
 * ```typescript
 * @Singleton()
 * @DependsOn<IDatabase, Clock>()
 * export class Cache implements ICache {}
 * ```
 */

/* =============================================================================
 * ENUM-LIKE CONSTANTS
 * ============================================================================= */

export const RegistrationMode = {
  /** Register the concrete class only. */
  DirectOnly: "DirectOnly",
  /** Register the concrete class and every implemented interface. */
  All: "All",
  /** Register every implemented interface, without the concrete class. */
  Exclusionary: "Exclusionary",
} as const;

export type RegistrationMode = (typeof RegistrationMode)[keyof typeof RegistrationMode];

export const InstanceSharing = {
  /** Each contract gets its own registration. */
  Separate: "Separate",
  /** Interface contracts forward to the single concrete registration. */
  Shared: "Shared",
} as const;

export type InstanceSharing = (typeof InstanceSharing)[keyof typeof InstanceSharing];

export const NamingConvention = {
  CamelCase: "camelCase",
  PascalCase: "PascalCase",
  SnakeCase: "snake_case",
} as const;

export type NamingConvention = (typeof NamingConvention)[keyof typeof NamingConvention];

/* =============================================================================
 * OPTIONS
 * ============================================================================= */

export interface DependsOnOptions {
  namingConvention?: NamingConvention;
  /** Drop a leading `I` from interface names (`ILogger` → `_logger`). Default true. */
  stripI?: boolean;
  /** Field prefix. Default `"_"`. */
  prefix?: string;
  /** Resolved outside the analyzed sources; no diagnostics for these edges. */
  external?: boolean;
}

export interface InjectOptions {
  external?: boolean;
}

export interface ConditionalServiceOptions {
  /** Comma-separated environment names. */
  environment?: string;
  /** Comma-separated environment names. */
  notEnvironment?: string;
  /** Configuration key compared against `equals` / `notEquals`. */
  configValue?: string;
  equals?: string;
  /** Comma-separated values. */
  notEquals?: string;
}

/* =============================================================================
 * DECORATORS
 * ============================================================================= */

type ClassMarker = (target: abstract new (...args: never[]) => unknown) => void;
type FieldMarker = (target: object, propertyKey: string | symbol) => void;

const classMarker: ClassMarker = () => {};
const fieldMarker: FieldMarker = () => {};

export function Singleton(): ClassMarker {
  return classMarker;
}

export function Scoped(): ClassMarker {
  return classMarker;
}

export function Transient(): ClassMarker {
  return classMarker;
}

/**
 * Declare constructor dependencies without writing fields.
 * Repeatable; each declaration carries its own naming options.
 */
export function DependsOn<
  _T1,
  _T2 = never,
  _T3 = never,
  _T4 = never,
  _T5 = never,
  _T6 = never,
  _T7 = never,
  _T8 = never,
>(_options?: DependsOnOptions): ClassMarker {
  return classMarker;
}

/** Mark a field as a constructor-injected dependency. */
export function Inject(_options?: InjectOptions): FieldMarker {
  return fieldMarker;
}

/**
 * Bind a field to a configuration value read in the generated constructor.
 * Sections nest with `:` (`"Database:ConnectionString"`). The field's type picks
 * the conversion: `string`, `number`, `boolean` or comma-separated `string[]`.
 * An optional field (`?` or `| undefined`) tolerates a missing key.
 */
export function InjectConfiguration(_key: string): FieldMarker {
  return fieldMarker;
}

/** Exclude a class (or a field) from graph analysis and diagnostics. */
export function ExternalService(): ClassMarker & FieldMarker {
  return () => {};
}

export function RegisterAsAll(
  _mode: RegistrationMode = RegistrationMode.All,
  _sharing: InstanceSharing = InstanceSharing.Separate,
): ClassMarker {
  return classMarker;
}

/** Register the concrete class plus exactly the listed contracts. */
export function RegisterAs<
  _T1,
  _T2 = never,
  _T3 = never,
  _T4 = never,
  _T5 = never,
  _T6 = never,
  _T7 = never,
  _T8 = never,
>(_sharing: InstanceSharing = InstanceSharing.Separate): ClassMarker {
  return classMarker;
}

/** Exclude contracts from registration; without type arguments, skip the class entirely. */
export function SkipRegistration<
  _T1 = never,
  _T2 = never,
  _T3 = never,
  _T4 = never,
  _T5 = never,
  _T6 = never,
  _T7 = never,
  _T8 = never,
>(): ClassMarker {
  return classMarker;
}

export function ConditionalService(_options: ConditionalServiceOptions): ClassMarker {
  return classMarker;
}
