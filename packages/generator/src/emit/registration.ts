import path from "node:path";
import type { ConditionalRule, TypeDescriptor, TypeId } from "../model/types.js";
import type { ResolvedGeneratorOptions } from "../config/options.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";
import { createGeneratorEmitter, type GeneratorEmitter } from "../diagnostics/emitter.js";
import { CONFIGURATION_TOKEN, takesConfiguration, type DependencyGraph } from "../graph/types.js";
import type { ConditionalGroup, PlannedRegistration, RegistrationPlan } from "../registration/types.js";
import { debug } from "../shared/debug.js";
import { INDENT, quote } from "./format.js";

export interface RegistrationArtifact {
  /** Absolute path of the module, `rootDir` joined with `outFile`. */
  readonly fileName: string;
  readonly text: string;
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

type ModuleOptions = Pick<
  ResolvedGeneratorOptions,
  "environmentVariable" | "registrationFunctionName" | "runtimeModule" | "outFile" | "rootDir"
>;

const HEADER = "// Generated by wirekit. Do not edit.";

/**
 * The registration module: imports of every planned implementation and one function
 * registering them with a `ServiceCollection`. When a class binds configuration,
 * the configuration itself is registered first under `"Configuration"`.
 */
export function emitRegistrationModule(
  plan: RegistrationPlan,
  graph: DependencyGraph,
  options: ModuleOptions,
): RegistrationArtifact {
  const emitter = createGeneratorEmitter("emit");
  const fileName = path.posix.join(options.rootDir, options.outFile);
  const imports = new ImportTable(path.posix.dirname(fileName));
  for (const service of plan.services) {
    const type = graph.types.get(service.type);
    if (type && service.registrations.some((r) => r.forwardTo === null)) imports.add(type);
  }

  const conditions = plan.entries.flatMap((entry) =>
    entry.kind === "group" ? entry.group.registrations.map((r) => r.condition) : [],
  );
  const readsEnvironment = conditions.some((c) => c !== null && (c.environment.length > 0 || c.notEnvironment.length > 0));
  const bindsConfiguration = [...graph.nodes.values()].some(takesConfiguration);
  const readsConfiguration = bindsConfiguration || conditions.some((c) => c !== null && c.configKey !== null);

  const body: string[] = [];
  if (bindsConfiguration) {
    body.push(`services.addSingleton(${quote(CONFIGURATION_TOKEN)}, () => configuration);`, "");
  }
  if (readsEnvironment) {
    body.push(`const environment = process.env[${quote(options.environmentVariable)}] ?? "";`, "");
  }
  for (const entry of plan.entries) {
    if (entry.kind === "registration") {
      const call = renderIsolated(entry.registration, imports, graph, emitter);
      if (call) body.push(call);
    } else {
      body.push(...renderGroup(entry.group, imports, graph, emitter));
    }
  }
  if (body[body.length - 1] === "") body.pop();

  const configuration = readsConfiguration ? "configuration" : "_configuration";
  const lines = [
    HEADER,
    `import type { Configuration, ServiceCollection } from ${quote(options.runtimeModule)};`,
    ...imports.render(),
    "",
    `export function ${options.registrationFunctionName}(services: ServiceCollection, ${configuration}: Configuration): void {`,
    ...body.map((line) => (line.length > 0 ? INDENT + line : line)),
    "}",
    "",
  ];

  debug.emit("registration-module", { fileName, entries: plan.entries.length, imports: imports.size });
  return { fileName, text: lines.join("\n"), diagnostics: emitter.diagnostics };
}

/* =============================================================================
 * CALLS
 * ============================================================================= */

function renderGroup(
  group: ConditionalGroup,
  imports: ImportTable,
  graph: DependencyGraph,
  emitter: GeneratorEmitter,
): string[] {
  const lines: string[] = [];
  let chained = false;
  for (const registration of group.registrations) {
    const call = renderIsolated(registration, imports, graph, emitter);
    if (!call || !registration.condition) continue;
    const test = renderCondition(registration.condition);
    if (group.exclusive && chained) {
      // reopen the previous branch's closing brace as `else if`
      lines.pop();
      lines.push(`} else if (${test}) {`);
    } else {
      lines.push(`if (${test}) {`);
    }
    lines.push(INDENT + call, "}");
    chained = true;
  }
  return lines;
}

function renderIsolated(
  registration: PlannedRegistration,
  imports: ImportTable,
  graph: DependencyGraph,
  emitter: GeneratorEmitter,
): string | undefined {
  const location = graph.types.get(registration.implementation)?.location ?? null;
  return emitter.isolate(registration.implementation, location, () => renderCall(registration, imports));
}

/**
 * `services.addScoped("ICache", Cache);`
 * `services.addScoped("ICache", (provider) => provider.get("Cache"));`
 */
export function renderCall(registration: PlannedRegistration, imports: ImportTable): string {
  const method = `add${registration.lifetime}`;
  const target =
    registration.forwardTo !== null
      ? `(provider) => provider.get(${quote(registration.forwardTo)})`
      : imports.localName(registration.implementation);
  return `services.${method}(${quote(registration.token)}, ${target});`;
}

/**
 * Clauses in fixed order, AND-combined: environment equals, environment not-equals,
 * config equals, config not-equals. A missing config value reads as `""`.
 */
export function renderCondition(rule: ConditionalRule): string {
  const clauses: string[] = [];
  for (const value of rule.notEnvironment) clauses.push(`environment !== ${quote(value)}`);
  if (rule.configKey !== null) {
    const read = `(configuration.get(${quote(rule.configKey.trim())}) ?? "")`;
    if (rule.equals !== null) clauses.push(`${read} === ${quote(rule.equals)}`);
    for (const value of rule.notEquals) clauses.push(`${read} !== ${quote(value)}`);
  }

  const environmentIn = rule.environment.map((value) => `environment === ${quote(value)}`).join(" || ");
  if (environmentIn === "") return clauses.join(" && ");
  // an OR list needs parentheses only next to other clauses
  if (clauses.length === 0) return environmentIn;
  const first = rule.environment.length > 1 ? `(${environmentIn})` : environmentIn;
  return [first, ...clauses].join(" && ");
}

/* =============================================================================
 * IMPORTS
 * ============================================================================= */

/**
 * Local names for implementation imports. A name already taken by another class
 * gets a numeric suffix: `Cache`, `Cache2`.
 */
export class ImportTable {
  private readonly names = new Map<TypeId, string>();
  private readonly used = new Set<string>(["Configuration", "ServiceCollection"]);
  private readonly bySpecifier = new Map<string, { defaultName: string | null; named: string[] }>();

  constructor(private readonly fromDir: string) {}

  get size(): number {
    return this.names.size;
  }

  add(type: TypeDescriptor): void {
    if (this.names.has(type.id)) return;
    let local = type.name;
    for (let n = 2; this.used.has(local); n++) local = `${type.name}${n}`;
    this.used.add(local);
    this.names.set(type.id, local);

    const specifier = moduleSpecifier(this.fromDir, type.file);
    let entry = this.bySpecifier.get(specifier);
    if (!entry) {
      entry = { defaultName: null, named: [] };
      this.bySpecifier.set(specifier, entry);
    }
    const exported = type.exportName ?? type.name;
    if (type.exportType === "default") entry.defaultName = local;
    else entry.named.push(local === exported ? local : `${exported} as ${local}`);
  }

  localName(id: TypeId): string {
    const local = this.names.get(id);
    if (local === undefined) throw new Error(`No import for '${id}'`);
    return local;
  }

  render(): string[] {
    return [...this.bySpecifier.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([specifier, { defaultName, named }]) => {
        const parts: string[] = [];
        if (defaultName !== null) parts.push(defaultName);
        if (named.length > 0) parts.push(`{ ${named.join(", ")} }`);
        return `import ${parts.join(", ")} from ${quote(specifier)};`;
      });
  }
}

/**
 * Relative ESM specifier from the module's directory.
 * "/src" → "/src/services/cache.ts" gives "./services/cache.js"
 */
export function moduleSpecifier(fromDir: string, file: string): string {
  let relative = path.posix.relative(fromDir, file);
  if (!relative.startsWith(".")) relative = `./${relative}`;
  return relative.replace(/\.(m|c)?tsx?$/, (_match, kind: string | undefined) => `.${kind ?? ""}js`);
}
