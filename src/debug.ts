/**
 * Shared debug logging utility.
 * Enable with --debug (granular internals) or --verbose (progress and timing).
 */

let debugEnabled = false;
let verboseEnabled = false;

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function setVerboseEnabled(enabled: boolean): void {
  verboseEnabled = enabled;
}

/**
 * Check if debug mode is enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Check if verbose mode is enabled. Debug implies verbose.
 */
export function isVerboseEnabled(): boolean {
  return verboseEnabled || debugEnabled;
}

/**
 * Create a debug logger with an optional module prefix.
 * @param prefix Optional prefix to identify the module (e.g., "rank")
 */
export function createDebugLogger(prefix?: string) {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  return (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.error(tag, ...args);
    }
  };
}

/**
 * Progress message shown with --verbose.
 */
export function verbose(...args: unknown[]): void {
  if (isVerboseEnabled()) {
    console.error(...args);
  }
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Format duration in milliseconds to a readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Time a synchronous function and log the result in verbose mode.
 * @param label Label for the timing output
 * @param fn Function to time
 * @param prefix Optional prefix for the log (module name)
 */
export function timeSync<T>(label: string, fn: () => T, prefix?: string): T {
  if (!isVerboseEnabled()) {
    return fn();
  }

  const tag = prefix ? `[${prefix}]` : "[timing]";
  const start = performance.now();
  const startTime = new Date();

  try {
    const result = fn();
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: ${formatDuration(elapsed)}`);
    return result;
  } catch (err) {
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: FAILED after ${formatDuration(elapsed)}`);
    throw err;
  }
}

/**
 * Create a scoped timer for measuring multiple stages.
 * @param prefix Optional module prefix for all logs
 */
export function createTimer(prefix?: string) {
  const tag = prefix ? `[${prefix}]` : "[timing]";
  const overallStart = performance.now();

  return {
    time<T>(label: string, fn: () => T): T {
      return timeSync(label, fn, prefix);
    },

    /**
     * Log total elapsed time.
     */
    done(label = "Total"): void {
      if (isVerboseEnabled()) {
        const elapsed = performance.now() - overallStart;
        console.error(`${tag} ${formatTimestamp(new Date())} ${label}: ${formatDuration(elapsed)}`);
      }
    },
  };
}
