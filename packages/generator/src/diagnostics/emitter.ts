import type { SourceLocation, TypeId } from "../model/types.js";
import type {
  DiagnosticDataRecord,
  DiagnosticSeverity,
  DiagnosticSpec,
  DiagnosticStage,
  DiagnosticStatus,
  DiagnosticsCatalog,
  RawDiagnostic,
} from "./types.js";
import { generatorDiagnostics, type GeneratorDiagnosticCode } from "./catalog.js";

export type EmitDiagnosticInput = {
  message: string;
  types?: readonly TypeId[];
  location?: SourceLocation | null;
  /** Overrides the catalog default for this instance only. */
  severity?: DiagnosticSeverity;
  data?: Readonly<DiagnosticDataRecord>;
};

export type DiagnosticEmitter<AllowedCodes extends string> = {
  /** Diagnostics emitted so far, in emission order. */
  readonly diagnostics: readonly RawDiagnostic<AllowedCodes>[];
  emit<Code extends AllowedCodes>(code: Code, input: EmitDiagnosticInput): RawDiagnostic<Code>;
};

export type GeneratorEmitter = DiagnosticEmitter<GeneratorDiagnosticCode> & {
  /** Run `fn`, turning a thrown error into an internal diagnostic for `type`. */
  isolate<T>(type: TypeId, location: SourceLocation | null, fn: () => T): T | undefined;
};

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(
  catalog: Catalog,
  options: { stage: DiagnosticStage },
): DiagnosticEmitter<AllowedCodes> {
  const stage = options.stage;
  const diagnostics: RawDiagnostic<AllowedCodes>[] = [];

  const emit = <Code extends AllowedCodes>(code: Code, input: EmitDiagnosticInput): RawDiagnostic<Code> => {
    const spec = catalog[code];
    if (spec && !ALLOWED_STATUSES.has(spec.status)) {
      throw new Error(`Diagnostic code '${code}' is ${spec.status} and cannot be emitted.`);
    }
    if (spec) checkData(code, spec, input.data);
    const diagnostic: RawDiagnostic<Code> = {
      code,
      message: input.message,
      stage,
      ...(input.severity ? { severity: input.severity } : {}),
      types: input.types ?? [],
      location: input.location ?? null,
      ...(input.data ? { data: input.data } : {}),
    };
    diagnostics.push(diagnostic);
    return diagnostic;
  };

  return { diagnostics, emit };
}

/** Emitter bound to the generator's own catalog. */
export function createGeneratorEmitter(stage: DiagnosticStage): GeneratorEmitter {
  const base = createDiagnosticEmitter(generatorDiagnostics, { stage });
  return {
    ...base,
    isolate(type, location, fn) {
      try {
        return fn();
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        base.emit("wirekit/internal/error", {
          message: `Internal error while processing '${type}' during ${stage}: ${detail}`,
          types: [type],
          location,
          data: { detail },
        });
        return undefined;
      }
    },
  };
}

function checkData(code: string, spec: DiagnosticSpec, data: Readonly<DiagnosticDataRecord> | undefined): void {
  const required = spec.data?.required ?? [];
  const allowed = new Set([...required, ...(spec.data?.optional ?? [])]);
  const keys = data ? Object.keys(data) : [];
  const missing = required.filter((key) => !keys.includes(key));
  if (missing.length > 0) {
    throw new Error(`Diagnostic code '${code}' requires data: ${missing.join(", ")}.`);
  }
  const unexpected = keys.filter((key) => !allowed.has(key));
  if (unexpected.length > 0) {
    throw new Error(`Diagnostic code '${code}' does not take data: ${unexpected.join(", ")}.`);
  }
}

const ALLOWED_STATUSES = new Set<DiagnosticStatus>(["canonical", "proposed"]);
