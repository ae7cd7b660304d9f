// Diagnostics sink for connection and socket errors.
//
// Debug output is gated by the DEBUG environment variable using the same
// namespace patterns as npm's debug package. Errors are always written.

/** Where the core reports connection and socket problems. */
export interface Diagnostics {
  debug(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export interface DiagnosticsOptions {
  /**
   * Namespace for debug matching. Defaults to "packetline:socket".
   * Supports patterns like "packetline:*" or "*".
   */
  namespace?: string;

  /**
   * Pattern list to match against. When omitted, process.env.DEBUG is read
   * on every debug call, so it can be changed at runtime.
   */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
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
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\?]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a console-backed diagnostics sink.
 *
 * ```bash
 * DEBUG=packetline:* node app.js        # all packetline debug output
 * DEBUG=*,-packetline:frame node app.js # everything except frame decoding
 * ```
 *
 * Lines are prefixed with the namespace and followed by a structured object
 * for easy inspection.
 */
export function createDiagnostics(options: DiagnosticsOptions = {}): Diagnostics {
  const namespace = options.namespace ?? "packetline:socket";
  const patterns = (): string | undefined => options.debug ?? process.env.DEBUG;

  return {
    debug(message: string, details: Record<string, unknown> = {}): void {
      if (!isEnabled(namespace, patterns())) return;
      console.log(`${namespace} ${message}`, details);
    },

    error(message: string, details: Record<string, unknown> = {}): void {
      console.error(`${namespace} ✗ ${message}`, details);
    },
  };
}

/** Structured view of an error for log details. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const described: Record<string, unknown> = { name: error.name, message: error.message };
    if ("kind" in error) described.kind = error.kind;
    if ("code" in error && error.code !== undefined) described.code = error.code;
    return described;
  }
  return { error };
}
