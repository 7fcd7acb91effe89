// Debug tracing for weft internals.
//
// Output is gated by the DEBUG environment variable, using the same pattern
// syntax as npm's debug package.

/** Structured trace sink for one namespace. */
export type Tracer = (event: string, fields?: Record<string, unknown>) => void;

/** Read the DEBUG setting. Empty when unset. */
function debugSetting(): string {
  if (typeof process === "undefined") return "";
  return process.env.DEBUG ?? "";
}

/**
 * Check if a namespace is enabled based on the DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string): boolean {
  const debug = debugSetting();
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  // Convert glob pattern to regex
  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a tracer that logs structured objects for a namespace.
 *
 * The DEBUG check happens on every call, so enabling tracing at runtime takes
 * effect immediately:
 * ```sh
 * DEBUG='weft:*' node server.js       # all weft tracing
 * DEBUG='*,-weft:streams' node app.js # everything except stream tracing
 * ```
 */
export function createTracer(namespace: string): Tracer {
  return (event, fields = {}) => {
    if (!isEnabled(namespace)) return;
    console.log(`${namespace} ${event}`, { type: event, ...fields });
  };
}
