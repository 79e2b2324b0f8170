import ts from "typescript";
import type {
  ConditionalRule,
  ConfigurationBinding,
  DependencyDescriptor,
  InstanceSharing,
  Lifetime,
  NamingOptions,
  RegisterAsDirective,
  RegistrationDirective,
  SkipDirective,
  SourceLocation,
  TypeDescriptor,
  TypeId,
  TypeRef,
} from "../model/types.js";
import { DEFAULT_NAMING } from "../model/types.js";
import type { GeneratorEmitter } from "../diagnostics/emitter.js";
import {
  classBodyStart,
  decoratorsOf,
  getProp,
  hasModifier,
  locationOf,
  readDecorator,
  readLiteral,
  typeIdOf,
  type DecoratorCall,
} from "./ast-helpers.js";
import {
  LIFETIME_MARKERS,
  MARKERS,
  instanceSharingOf,
  namingConventionOf,
  registrationModeOf,
  splitList,
} from "./markers.js";
import { readDependencyType, readHeritageType, readTargetType, type TypeRefContext } from "./type-refs.js";
import { configurationKeyProblem, readConfigurationType } from "./configuration.js";

export interface DeclarationContext {
  readonly checker: ts.TypeChecker;
  readonly sourceFile: ts.SourceFile;
  /** Local names listed in `export { ... }` clauses of the file. */
  readonly exportedNames: ReadonlyMap<string, string>;
  readonly emitter: GeneratorEmitter;
}

export interface ExtractedDeclaration {
  readonly descriptor: TypeDescriptor;
  readonly dependencies: readonly DependencyDescriptor[];
}

/* =============================================================================
 * CLASSES
 * ============================================================================= */

/**
 * Read one class declaration. Anonymous classes (`export default class {}`) have no
 * name to register under and are skipped.
 */
export function extractClass(node: ts.ClassDeclaration, ctx: DeclarationContext): ExtractedDeclaration | null {
  if (!node.name) return null;
  const name = node.name.text;
  const sf = ctx.sourceFile;
  const id = typeIdOf(sf.fileName, name);
  const typeParameters = (node.typeParameters ?? []).map((p) => p.name.text);
  const refs: TypeRefContext = { checker: ctx.checker, typeParameters: new Set(typeParameters) };
  const reader = new MarkerReader(id, refs, ctx);

  for (const dec of decoratorsOf(node)) {
    const call = readDecorator(dec);
    if (call) reader.readClassMarker(call);
  }
  for (const member of node.members) {
    if (ts.isPropertyDeclaration(member)) reader.readField(member);
  }

  const heritage = readHeritage(node.heritageClauses, refs);
  const hasExplicitConstructor = node.members.some((m) => ts.isConstructorDeclaration(m) && m.body !== undefined);

  const descriptor: TypeDescriptor = {
    id,
    name,
    kind: "class",
    file: sf.fileName.replace(/\\/g, "/"),
    typeParameters,
    lifetime: reader.lifetime,
    external: reader.external,
    abstract: hasModifier(node, ts.SyntaxKind.AbstractKeyword),
    ...exportOf(node, name, ctx.exportedNames),
    base: heritage.base,
    interfaces: heritage.interfaces,
    registration: reader.registration,
    registerAs: reader.registerAs,
    skip: reader.skip,
    conditions: reader.conditions,
    configuration: reader.configuration,
    hasExplicitConstructor,
    location: locationOf(node.name, sf),
    bodyStart: classBodyStart(node, sf),
  };
  return { descriptor, dependencies: reader.dependencies };
}

/* =============================================================================
 * INTERFACES
 * ============================================================================= */

export function extractInterface(node: ts.InterfaceDeclaration, ctx: DeclarationContext): ExtractedDeclaration {
  const name = node.name.text;
  const sf = ctx.sourceFile;
  const typeParameters = (node.typeParameters ?? []).map((p) => p.name.text);
  const refs: TypeRefContext = { checker: ctx.checker, typeParameters: new Set(typeParameters) };
  const heritage = readHeritage(node.heritageClauses, refs);

  const descriptor: TypeDescriptor = {
    id: typeIdOf(sf.fileName, name),
    name,
    kind: "interface",
    file: sf.fileName.replace(/\\/g, "/"),
    typeParameters,
    lifetime: null,
    external: false,
    abstract: true,
    ...exportOf(node, name, ctx.exportedNames),
    base: null,
    // interfaces have only `extends`, read as the interface list
    interfaces: heritage.base ? [heritage.base, ...heritage.interfaces] : heritage.interfaces,
    registration: null,
    registerAs: null,
    skip: null,
    conditions: [],
    configuration: [],
    hasExplicitConstructor: false,
    location: locationOf(node.name, sf),
    bodyStart: -1,
  };
  return { descriptor, dependencies: [] };
}

/* =============================================================================
 * MARKER READING
 * ============================================================================= */

class MarkerReader {
  lifetime: Lifetime | null = null;
  external = false;
  registration: RegistrationDirective | null = null;
  registerAs: RegisterAsDirective | null = null;
  skip: SkipDirective | null = null;
  readonly conditions: ConditionalRule[] = [];
  readonly dependencies: DependencyDescriptor[] = [];
  readonly configuration: ConfigurationBinding[] = [];

  private readonly lifetimes: { lifetime: Lifetime; location: SourceLocation }[] = [];
  private bulkIndex = 0;

  constructor(
    private readonly owner: TypeId,
    private readonly refs: TypeRefContext,
    private readonly ctx: DeclarationContext,
  ) {}

  readClassMarker(call: DecoratorCall): void {
    const lifetime = LIFETIME_MARKERS[call.name];
    if (lifetime) {
      this.readLifetime(lifetime, call);
      return;
    }
    switch (call.name) {
      case MARKERS.dependsOn:
        this.readDependsOn(call);
        break;
      case MARKERS.externalService:
        this.external = true;
        break;
      case MARKERS.registerAsAll:
        this.readRegisterAsAll(call);
        break;
      case MARKERS.registerAs:
        this.readRegisterAs(call);
        break;
      case MARKERS.skipRegistration:
        this.readSkip(call);
        break;
      case MARKERS.conditionalService:
        this.readConditional(call);
        break;
    }
  }

  readField(field: ts.PropertyDeclaration): void {
    let injected = false;
    let external = false;
    let configuration: DecoratorCall | null = null;
    for (const dec of decoratorsOf(field)) {
      const call = readDecorator(dec);
      if (call?.name === MARKERS.inject) {
        injected = true;
        external ||= this.readExternalOption(call, MARKERS.inject);
      } else if (call?.name === MARKERS.externalService) {
        injected = true;
        external = true;
      } else if (call?.name === MARKERS.injectConfiguration) {
        configuration = call;
      }
    }

    const location = this.location(field);
    if (configuration) {
      if (injected) {
        this.malformed(MARKERS.injectConfiguration, `Field '${field.name.getText()}' is both injected and bound to configuration`, location);
        return;
      }
      this.readConfigurationField(field, configuration, location);
      return;
    }
    if (!injected) return;

    if (!ts.isIdentifier(field.name)) {
      this.malformed(MARKERS.inject, `Injected field '${field.name.getText()}' must have a plain identifier name`, location);
      return;
    }
    if (!field.type) {
      this.malformed(MARKERS.inject, `Injected field '${field.name.text}' needs a type annotation`, location);
      return;
    }
    const read = readDependencyType(field.type, this.refs);
    if (!read.ok) {
      this.malformed(MARKERS.inject, `Injected field '${field.name.text}': ${read.reason}`, location);
      return;
    }
    this.dependencies.push({
      owner: this.owner,
      target: read.ref,
      collection: read.collection,
      source: { kind: "field", fieldName: field.name.text },
      naming: DEFAULT_NAMING,
      external,
      order: this.dependencies.length,
      location,
    });
  }

  private readConfigurationField(field: ts.PropertyDeclaration, call: DecoratorCall, location: SourceLocation): void {
    const marker = MARKERS.injectConfiguration;
    if (!ts.isIdentifier(field.name)) {
      this.malformed(marker, `Configuration field '${field.name.getText()}' must have a plain identifier name`, location);
      return;
    }
    const fieldName = field.name.text;
    const member = `${simpleOwner(this.owner)}.${fieldName}`;
    const [keyArg] = call.args;
    const key = keyArg ? readLiteral(keyArg) : null;
    if (key?.kind !== "string") {
      this.malformed(marker, `'${fieldName}' needs a string literal configuration key`, location);
      return;
    }
    const problem = configurationKeyProblem(key.value);
    if (problem !== null) {
      this.ctx.emitter.emit("wirekit/configuration/invalid-key", {
        message: `Configuration key '${key.value}' on '${member}' is invalid: ${problem}.`,
        types: [this.owner],
        location,
        data: { key: key.value },
      });
      return;
    }
    if (hasModifier(field, ts.SyntaxKind.StaticKeyword)) {
      this.ctx.emitter.emit("wirekit/configuration/static-field", {
        message: `'${member}' is static; configuration is bound per instance, so the field is skipped.`,
        types: [this.owner],
        location,
      });
      return;
    }
    if (!field.type) {
      this.malformed(marker, `Configuration field '${fieldName}' needs a type annotation`, location);
      return;
    }
    const value = readConfigurationType(field.type);
    if (!value) {
      const typeText = field.type.getText();
      this.ctx.emitter.emit("wirekit/configuration/unsupported-type", {
        message: `'${member}' has type '${typeText}', which cannot be read from configuration; use string, number, boolean or string[].`,
        types: [this.owner],
        location,
        data: { typeText },
      });
      return;
    }
    this.configuration.push({
      owner: this.owner,
      fieldName,
      key: key.value,
      valueKind: value.kind,
      optional: value.optional || field.questionToken !== undefined,
      location,
    });
  }

  private readLifetime(lifetime: Lifetime, call: DecoratorCall): void {
    this.lifetimes.push({ lifetime, location: this.location(call.node) });
    if (this.lifetimes.length === 1) {
      this.lifetime = lifetime;
      return;
    }
    const names = this.lifetimes.map((l) => l.lifetime);
    this.ctx.emitter.emit("wirekit/marker/multiple-lifetimes", {
      message: `'${simpleOwner(this.owner)}' has more than one lifetime marker (${names.join(", ")}); using ${names[0] ?? lifetime}.`,
      types: [this.owner],
      location: this.location(call.node),
      data: { lifetimes: names },
    });
  }

  private readDependsOn(call: DecoratorCall): void {
    const declarationIndex = this.bulkIndex++;
    if (call.typeArgs.length === 0) {
      this.malformed(MARKERS.dependsOn, "DependsOn needs at least one type argument", this.location(call.node));
      return;
    }
    const options = this.readDependsOnOptions(call);
    for (const typeArg of call.typeArgs) {
      const location = this.location(typeArg);
      const read = readDependencyType(typeArg, this.refs);
      if (!read.ok) {
        this.malformed(MARKERS.dependsOn, read.reason, location);
        continue;
      }
      this.dependencies.push({
        owner: this.owner,
        target: read.ref,
        collection: read.collection,
        source: { kind: "bulk", declarationIndex },
        naming: options.naming,
        external: options.external,
        order: this.dependencies.length,
        location,
      });
    }
  }

  private readDependsOnOptions(call: DecoratorCall): { naming: NamingOptions; external: boolean } {
    const obj = this.optionsObject(call);
    if (!obj) return { naming: DEFAULT_NAMING, external: false };

    let { convention, stripLeadingMarker, prefix } = DEFAULT_NAMING;
    let external = false;

    const conventionProp = getProp(obj, "namingConvention");
    if (conventionProp) {
      const value = namingConventionOf(readLiteral(conventionProp.initializer));
      if (value) convention = value;
      else this.malformed(MARKERS.dependsOn, `Unknown naming convention '${conventionProp.initializer.getText()}'`, this.location(conventionProp));
    }
    const stripProp = getProp(obj, "stripI");
    if (stripProp) {
      const value = readLiteral(stripProp.initializer);
      if (value?.kind === "boolean") stripLeadingMarker = value.value;
      else this.malformed(MARKERS.dependsOn, "'stripI' must be true or false", this.location(stripProp));
    }
    const prefixProp = getProp(obj, "prefix");
    if (prefixProp) {
      const value = readLiteral(prefixProp.initializer);
      if (value?.kind === "string") prefix = value.value;
      else this.malformed(MARKERS.dependsOn, "'prefix' must be a string literal", this.location(prefixProp));
    }
    const externalProp = getProp(obj, "external");
    if (externalProp) {
      const value = readLiteral(externalProp.initializer);
      if (value?.kind === "boolean") external = value.value;
      else this.malformed(MARKERS.dependsOn, "'external' must be true or false", this.location(externalProp));
    }
    return { naming: { convention, stripLeadingMarker, prefix }, external };
  }

  private readExternalOption(call: DecoratorCall, marker: string): boolean {
    const obj = this.optionsObject(call);
    const prop = obj ? getProp(obj, "external") : undefined;
    if (!prop) return false;
    const value = readLiteral(prop.initializer);
    if (value?.kind === "boolean") return value.value;
    this.malformed(marker, "'external' must be true or false", this.location(prop));
    return false;
  }

  private readRegisterAsAll(call: DecoratorCall): void {
    const location = this.location(call.node);
    if (this.registration) {
      this.malformed(MARKERS.registerAsAll, "RegisterAsAll is repeated; the first one is used", location);
      return;
    }
    const [modeArg, sharingArg] = call.args;
    let mode = registrationModeOf(modeArg ? readLiteral(modeArg) : null);
    if (modeArg && !mode) {
      this.malformed(MARKERS.registerAsAll, `Unknown registration mode '${modeArg.getText()}'`, location);
    }
    mode ??= "All";
    const sharing = this.readSharing(sharingArg, MARKERS.registerAsAll, location);
    this.registration = { mode, sharing, location };
  }

  private readRegisterAs(call: DecoratorCall): void {
    const location = this.location(call.node);
    if (this.registerAs) {
      this.malformed(MARKERS.registerAs, "RegisterAs is repeated; the first one is used", location);
      return;
    }
    const contracts = this.readContracts(call, MARKERS.registerAs);
    const sharing = this.readSharing(call.args[0], MARKERS.registerAs, location);
    this.registerAs = { contracts, sharing, location };
  }

  private readSkip(call: DecoratorCall): void {
    const location = this.location(call.node);
    const contracts = this.readContracts(call, MARKERS.skipRegistration);
    const all = call.typeArgs.length === 0;
    // repeated skip markers accumulate
    this.skip = this.skip
      ? { contracts: [...this.skip.contracts, ...contracts], all: this.skip.all || all, location: this.skip.location }
      : { contracts, all, location };
  }

  private readConditional(call: DecoratorCall): void {
    const obj = this.optionsObject(call);
    this.conditions.push({
      environment: obj ? this.readListOption(obj, "environment") : [],
      notEnvironment: obj ? this.readListOption(obj, "notEnvironment") : [],
      configKey: obj ? this.readStringOption(obj, "configValue") : null,
      equals: obj ? this.readStringOption(obj, "equals") : null,
      notEquals: obj ? this.readListOption(obj, "notEquals") : [],
      location: this.location(call.node),
    });
  }

  private readListOption(obj: ts.ObjectLiteralExpression, name: string): string[] {
    const raw = this.readStringOption(obj, name);
    return raw === null ? [] : splitList(raw);
  }

  private readStringOption(obj: ts.ObjectLiteralExpression, name: string): string | null {
    const prop = getProp(obj, name);
    if (!prop) return null;
    const value = readLiteral(prop.initializer);
    if (value?.kind === "string") return value.value;
    this.malformed(MARKERS.conditionalService, `'${name}' must be a string literal`, this.location(prop));
    return null;
  }

  private readContracts(call: DecoratorCall, marker: string): TypeRef[] {
    const contracts: TypeRef[] = [];
    for (const typeArg of call.typeArgs) {
      const ref = readTargetType(typeArg, this.refs);
      if (typeof ref === "string") {
        this.malformed(marker, ref, this.location(typeArg));
        continue;
      }
      contracts.push(ref);
    }
    return contracts;
  }

  private readSharing(arg: ts.Expression | undefined, marker: string, location: SourceLocation): InstanceSharing {
    if (!arg) return "Separate";
    const sharing = instanceSharingOf(readLiteral(arg));
    if (sharing) return sharing;
    this.malformed(marker, `Unknown instance sharing '${arg.getText()}'`, location);
    return "Separate";
  }

  private optionsObject(call: DecoratorCall): ts.ObjectLiteralExpression | null {
    const [first] = call.args;
    if (!first) return null;
    if (ts.isObjectLiteralExpression(first)) return first;
    this.malformed(call.name, "Options must be an object literal", this.location(first));
    return null;
  }

  private malformed(marker: string, detail: string, location: SourceLocation): void {
    this.ctx.emitter.emit("wirekit/marker/malformed", {
      message: `Malformed ${marker} marker on '${simpleOwner(this.owner)}': ${detail}.`,
      types: [this.owner],
      location,
      data: { marker, detail },
    });
  }

  private location(node: ts.Node): SourceLocation {
    return locationOf(node, this.ctx.sourceFile);
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function readHeritage(
  clauses: ts.NodeArray<ts.HeritageClause> | undefined,
  refs: TypeRefContext,
): { base: TypeRef | null; interfaces: TypeRef[] } {
  let base: TypeRef | null = null;
  const interfaces: TypeRef[] = [];
  for (const clause of clauses ?? []) {
    for (const entry of clause.types) {
      const ref = readHeritageType(entry, refs);
      if (!ref) continue;
      if (clause.token === ts.SyntaxKind.ExtendsKeyword && base === null) base = ref;
      else interfaces.push(ref);
    }
  }
  return { base, interfaces };
}

function exportOf(
  node: ts.DeclarationStatement,
  name: string,
  exportedNames: ReadonlyMap<string, string>,
): Pick<TypeDescriptor, "exportType" | "exportName"> {
  if (hasModifier(node, ts.SyntaxKind.ExportKeyword)) {
    return hasModifier(node, ts.SyntaxKind.DefaultKeyword)
      ? { exportType: "default", exportName: "default" }
      : { exportType: "named", exportName: name };
  }
  const exported = exportedNames.get(name);
  if (exported === undefined) return { exportType: "none", exportName: null };
  return { exportType: exported === "default" ? "default" : "named", exportName: exported };
}

function simpleOwner(id: TypeId): string {
  return id.slice(id.lastIndexOf("#") + 1);
}
