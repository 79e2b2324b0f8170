export { buildDependencyGraph, hasServiceIntent } from "./builder.js";
export { ImplementationIndex } from "./candidates.js";
export { walkBaseChain, collectInterfaces, type BaseChain, type InheritanceFrame } from "./inheritance.js";
export { dependencyKey, mergeOwnDependencies } from "./merge.js";
export {
  allDependencies,
  takesConfiguration,
  CONFIGURATION_PARAMETER,
  CONFIGURATION_TOKEN,
  type DependencyGraph,
  type GraphEdge,
  type GraphNode,
  type LifetimeSource,
  type ResolvedDependency,
} from "./types.js";
