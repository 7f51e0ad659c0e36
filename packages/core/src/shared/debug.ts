/**
 * Debug Channels
 *
 * Targeted debug logging for following how an edit is resolved, planned and
 * applied.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * FLAKEPATCH_DEBUG=resolve npm test         # Just attribute path resolution
 * FLAKEPATCH_DEBUG=insert,outputs npm test  # Multiple channels
 * FLAKEPATCH_DEBUG=* npm test               # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.resolve("binding.matched", { path, line });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export const DEBUG_ENV_VAR = "FLAKEPATCH_DEBUG";

/** Debug lines go to stderr; stdout carries command results. */
function write(message: string): void {
  console.error(message);
}

/** Parse a channel list such as `resolve,insert` or `*`. */
export function parseDebugChannels(value: string | undefined): Set<string> {
  const env = value ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugChannels(process.env[DEBUG_ENV_VAR]);

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return label;
  }
  return `${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
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
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    write(formatMessage(name, point, data));
  };
}

/**
 * Re-read the enabled channel list, from the environment or an explicit value.
 */
export function refreshDebugChannels(value: string | undefined = process.env[DEBUG_ENV_VAR]): void {
  enabledChannels = parseDebugChannels(value);
  debug.resolve = createChannel("resolve");
  debug.upsert = createChannel("upsert");
  debug.insert = createChannel("insert");
  debug.outputs = createChannel("outputs");
  debug.cli = createChannel("cli");
}

export const debug = {
  /** Attribute path resolution */
  resolve: createChannel("resolve"),

  /** Value replacement of an existing input */
  upsert: createChannel("upsert"),

  /** Insertion planning for a new input */
  insert: createChannel("insert"),

  /** `outputs` parameter list patching */
  outputs: createChannel("outputs"),

  /** Command line front end */
  cli: createChannel("cli"),
};
