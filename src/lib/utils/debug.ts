/**
 * Debug logging utility for the query optimizer
 *
 * Provides a centralized way to manage debug logging across the library.
 * Output is grouped by namespace and enabled through the DEBUG environment
 * variable (`DEBUG=runner,judge` or `DEBUG=*`) or `parseDebugString`.
 */

/**
 * Namespaces used by the library. Callers may add their own.
 */
export const DEBUG_NAMESPACES = [
  'llm',
  'embedding',
  'similarity',
  'synthesizer',
  'generator',
  'judge',
  'runner',
  'dataset',
  'persistence',
  'config',
  'retry',
  'cli',
] as const;

export type DebugNamespace = (typeof DEBUG_NAMESPACES)[number];

// Configuration object for debug settings
export interface DebugConfig {
  enabled: boolean;
  all: boolean;
  namespaces: Record<string, boolean>;
}

// Global debug configuration
const debugConfig: DebugConfig = {
  enabled: false,
  all: false,
  namespaces: Object.fromEntries(DEBUG_NAMESPACES.map(ns => [ns, false])),
};

/**
 * Log a debug message if debugging is enabled for the given namespace
 *
 * @param namespace - The debug namespace (e.g., 'runner', 'judge')
 * @param message - The message to log, may contain printf-style placeholders
 * @param args - Additional arguments to log
 */
export function debug(namespace: DebugNamespace | (string & {}), message: string, ...args: unknown[]): void {
  if (isDebugEnabled(namespace)) {
    console.log(`[${namespace}] ${message}`, ...args);
  }
}

/**
 * Print a warning regardless of debug settings.
 * Used for conditions the user should see, such as skipped queries.
 */
export function warn(namespace: DebugNamespace | (string & {}), message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}] warning: ${message}`, ...args);
}

/**
 * Whether messages for a namespace are currently printed
 */
export function isDebugEnabled(namespace: string): boolean {
  return debugConfig.enabled && (debugConfig.all || debugConfig.namespaces[namespace] === true);
}

/**
 * Enable or disable debugging globally
 */
export function enableDebug(enabled: boolean): void {
  debugConfig.enabled = enabled;
}

/**
 * Enable or disable debugging for a specific namespace
 */
export function enableNamespace(namespace: string, enabled: boolean): void {
  debugConfig.namespaces[namespace] = enabled;
}

/**
 * Enable debugging for all namespaces
 */
function enableAllNamespaces(): void {
  debugConfig.all = true;
}

/**
 * Turn everything off again. Mostly for tests.
 */
export function resetDebug(): void {
  debugConfig.enabled = false;
  debugConfig.all = false;
  for (const ns of Object.keys(debugConfig.namespaces)) {
    debugConfig.namespaces[ns] = false;
  }
}

/**
 * Parse a debug string (e.g., 'runner,judge') and enable those namespaces
 *
 * @param debugString - Comma-separated list of namespaces to enable
 */
export function parseDebugString(debugString: string): void {
  if (!debugString) return;

  enableDebug(true);

  const namespaces = debugString.split(',').map(ns => ns.trim()).filter(Boolean);

  // Special case for '*' or 'all'
  if (namespaces.includes('*') || namespaces.includes('all')) {
    enableAllNamespaces();
    return;
  }

  namespaces.forEach(ns => {
    enableNamespace(ns, true);
  });
}

// Check for DEBUG environment variable
if (typeof process !== 'undefined' && process.env && process.env.DEBUG) {
  parseDebugString(process.env.DEBUG);
}
