import type { ConfigurationBinding, ConfigurationValueKind, TypeId } from "../model/types.js";
import { DEFAULT_RUNTIME_MODULE } from "../config/options.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";
import { createGeneratorEmitter } from "../diagnostics/emitter.js";
import {
  CONFIGURATION_PARAMETER,
  CONFIGURATION_TOKEN,
  allDependencies,
  takesConfiguration,
  type DependencyGraph,
  type GraphNode,
  type ResolvedDependency,
} from "../graph/types.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";
import { INDENT, quote } from "./format.js";

export interface ConstructorArtifact {
  readonly type: TypeId;
  readonly file: string;
  /** Offset just after the class body's `{`. */
  readonly position: number;
  /** Members to insert: bulk fields, the `inject` token list and the constructor. */
  readonly text: string;
}

export interface ConstructorReport {
  readonly artifacts: readonly ConstructorArtifact[];
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

/**
 * Generated members for one class, or null when it has no dependencies and binds
 * no configuration.
 *
 * ```typescript
 * protected readonly _database: IDatabase;
 *
 * static readonly inject = ["ILogger", "IDatabase"];
 *
 * constructor(logger: ILogger, database: IDatabase) {
 *   super(logger);
 *   this._database = database;
 * }
 * ```
 *
 * Configuration-bound fields add a trailing `configuration` parameter, resolved
 * under the `"Configuration"` token and forwarded to a base that binds its own.
 */
export function emitConstructor(node: GraphNode, runtimeModule: string = DEFAULT_RUNTIME_MODULE): ConstructorArtifact | null {
  const deps = allDependencies(node);
  const configured = takesConfiguration(node);
  if ((deps.length === 0 && !configured) || node.type.bodyStart < 0) return null;

  const lines: string[] = [""];
  const fields = node.own.filter((dep) => dep.descriptor.source.kind === "bulk");
  for (const dep of fields) {
    lines.push(`${INDENT}protected readonly ${dep.identifier}: ${dep.typeText};`);
  }
  if (fields.length > 0) lines.push("");

  const tokens = deps.map(renderToken);
  const parameters = deps.map((dep) => `${dep.parameter}: ${dep.typeText}`);
  if (configured) {
    tokens.push(quote(CONFIGURATION_TOKEN));
    parameters.push(`${CONFIGURATION_PARAMETER}: import(${quote(runtimeModule)}).Configuration`);
  }
  lines.push(`${INDENT}static readonly inject = [${tokens.join(", ")}];`);
  lines.push("");

  lines.push(`${INDENT}constructor(${parameters.join(", ")}) {`);
  if (node.type.base !== null) {
    const forwarded = node.inherited.map((dep) => dep.parameter);
    if (node.baseTakesConfiguration) forwarded.push(CONFIGURATION_PARAMETER);
    lines.push(`${INDENT}${INDENT}super(${forwarded.join(", ")});`);
  }
  for (const dep of node.own) {
    lines.push(`${INDENT}${INDENT}this.${dep.identifier} = ${dep.parameter};`);
  }
  for (const binding of node.configuration) {
    lines.push(...renderBinding(binding).map((line) => INDENT + INDENT + line));
  }
  lines.push(`${INDENT}}`);
  lines.push("");

  return {
    type: node.type.id,
    file: node.type.file,
    position: node.type.bodyStart,
    text: lines.join("\n"),
  };
}

/**
 * Constructor artifacts for every class that can take one.
 */
export function emitConstructors(
  graph: DependencyGraph,
  logger: Logger = nullLogger,
  runtimeModule: string = DEFAULT_RUNTIME_MODULE,
): ConstructorReport {
  const emitter = createGeneratorEmitter("emit");
  const artifacts: ConstructorArtifact[] = [];

  for (const node of graph.nodes.values()) {
    const type = node.type;
    if (node.duplicateIdentifiers) continue;
    if (type.hasExplicitConstructor) {
      if (allDependencies(node).length > 0 || takesConfiguration(node)) {
        emitter.emit("wirekit/emit/explicit-constructor", {
          message: `'${type.name}' declares its own constructor; no constructor is generated for its dependencies.`,
          types: [type.id],
          location: type.location,
        });
      }
      continue;
    }
    const artifact = emitter.isolate(type.id, type.location, () => emitConstructor(node, runtimeModule));
    if (!artifact) continue;
    debug.emit("constructor", { type: type.id, parameters: allDependencies(node).length });
    artifacts.push(artifact);
  }

  logger.info(`[wirekit] Generated ${artifacts.length} constructors`);
  return { artifacts, diagnostics: emitter.diagnostics };
}

function renderToken(dep: ResolvedDependency): string {
  return dep.collection === null ? quote(dep.token) : `{ all: ${quote(dep.token)} }`;
}

/**
 * Assignment of one bound field. A required key throws when missing:
 *
 * ```typescript
 * {
 *   const value = configuration.get("Cache:TtlSeconds");
 *   if (value === undefined) throw new Error("Missing configuration value 'Cache:TtlSeconds'.");
 *   this._ttl = Number(value);
 * }
 * ```
 */
function renderBinding(binding: ConfigurationBinding): string[] {
  const read = `${CONFIGURATION_PARAMETER}.get(${quote(binding.key)})`;
  const field = `this.${binding.fieldName}`;
  if (binding.valueKind === "string" && binding.optional) return [`${field} = ${read};`];

  const converted = convertValue(binding.valueKind, "value");
  const assign = binding.optional
    ? [`${field} = value === undefined ? undefined : ${converted};`]
    : [
        `if (value === undefined) throw new Error(${quote(`Missing configuration value '${binding.key}'.`)});`,
        `${field} = ${converted};`,
      ];
  return ["{", `${INDENT}const value = ${read};`, ...assign.map((line) => INDENT + line), "}"];
}

function convertValue(kind: ConfigurationValueKind, value: string): string {
  switch (kind) {
    case "string":
      return value;
    case "number":
      return `Number(${value})`;
    case "boolean":
      return `${value} === "true"`;
    case "string-list":
      return `${value}.split(",").map((part) => part.trim()).filter((part) => part.length > 0)`;
  }
}
