/**
 * Debug Channels
 *
 * Targeted trace output for following what the generator decides and why.
 *
 * Enable via environment variable:
 * ```bash
 * WIREKIT_DEBUG=graph npm test           # Just the graph builder
 * WIREKIT_DEBUG=cycles,lifetimes npm test
 * WIREKIT_DEBUG=* npm test               # Everything
 * ```
 *
 * In code the calls stay in place; a disabled channel is a no-op function:
 * ```typescript
 * debug.graph("edge", { from, to, viaCollection });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  output: (message) => console.log(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["WIREKIT_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) return () => {};
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Re-read WIREKIT_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.extract = createChannel("extract");
  debug.graph = createChannel("graph");
  debug.cycles = createChannel("cycles");
  debug.lifetimes = createChannel("lifetimes");
  debug.registration = createChannel("registration");
  debug.emit = createChannel("emit");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Marker extraction (AST → descriptors) */
  extract: createChannel("extract"),
  /** Dependency merging, inheritance frames, edges */
  graph: createChannel("graph"),
  cycles: createChannel("cycles"),
  lifetimes: createChannel("lifetimes"),
  /** Contract selection and conditional grouping */
  registration: createChannel("registration"),
  /** Constructor and registration source */
  emit: createChannel("emit"),
};

export type Debug = typeof debug;
