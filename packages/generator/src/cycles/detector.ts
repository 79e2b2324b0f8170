import type { SourceLocation, TypeId } from "../model/types.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";
import { createGeneratorEmitter, type GeneratorEmitter } from "../diagnostics/emitter.js";
import type { DependencyGraph } from "../graph/types.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";

export interface CyclePath {
  /** Starts and ends with the same id. */
  readonly nodes: readonly TypeId[];
}

export interface CycleReport {
  readonly cycles: readonly CyclePath[];
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

interface Successor {
  readonly to: TypeId;
  readonly location: SourceLocation;
}

type Color = "white" | "grey" | "black";

/**
 * Find back-edges among non-external classes, ignoring collection and external edges.
 *
 * Iterative DFS with white/grey/black coloring; nodes and successors are visited in id
 * order so the reported paths are stable. Every back-edge is one cycle.
 */
export function detectCycles(graph: DependencyGraph, logger: Logger = nullLogger): CycleReport {
  const emitter = createGeneratorEmitter("cycles");
  const successors = buildSuccessors(graph);
  const color = new Map<TypeId, Color>();
  const cycles: CyclePath[] = [];

  for (const start of successors.keys()) {
    if ((color.get(start) ?? "white") !== "white") continue;

    const stack: { id: TypeId; next: readonly Successor[]; index: number }[] = [
      { id: start, next: successors.get(start) ?? [], index: 0 },
    ];
    color.set(start, "grey");

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const successor = frame.next[frame.index];
      if (!successor) {
        color.set(frame.id, "black");
        stack.pop();
        continue;
      }
      frame.index++;

      const state = color.get(successor.to) ?? "white";
      if (state === "white") {
        color.set(successor.to, "grey");
        stack.push({ id: successor.to, next: successors.get(successor.to) ?? [], index: 0 });
      } else if (state === "grey") {
        const from = stack.findIndex((f) => f.id === successor.to);
        const nodes = [...stack.slice(from).map((f) => f.id), successor.to];
        cycles.push({ nodes });
        report(graph, nodes, successor.location, emitter);
      }
    }
  }

  if (cycles.length > 0) {
    logger.warn(`[wirekit] Found ${cycles.length} circular ${cycles.length === 1 ? "dependency" : "dependencies"}`);
  }
  return { cycles, diagnostics: emitter.diagnostics };
}

function buildSuccessors(graph: DependencyGraph): Map<TypeId, Successor[]> {
  const successors = new Map<TypeId, Successor[]>();
  const ids = [...graph.nodes.keys()].sort();

  for (const id of ids) {
    const node = graph.nodes.get(id);
    if (!node || node.type.external) continue;
    const byTarget = new Map<TypeId, Successor>();
    for (const edge of node.edges) {
      if (edge.viaCollection || edge.external) continue;
      const target = graph.nodes.get(edge.to);
      if (!target || target.type.external || byTarget.has(edge.to)) continue;
      byTarget.set(edge.to, { to: edge.to, location: edge.dependency.descriptor.location });
    }
    successors.set(
      id,
      [...byTarget.values()].sort((a, b) => (a.to < b.to ? -1 : a.to > b.to ? 1 : 0)),
    );
  }
  return successors;
}

function report(
  graph: DependencyGraph,
  path: readonly TypeId[],
  location: SourceLocation,
  emitter: GeneratorEmitter,
): void {
  const names = path.map((id) => graph.nodes.get(id)?.type.name ?? id);
  debug.cycles("cycle", { path: names });
  emitter.emit("wirekit/cycle/circular-dependency", {
    message: `Circular dependency detected: ${names.join(" → ")}`,
    types: [...new Set(path)],
    location,
    data: { path: names },
  });
}
