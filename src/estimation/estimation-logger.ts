/**
 * Tracking log: a bounded in-memory buffer plus console output.
 *
 * A tracker logs per frame and, when verbose, per pair, so both the buffer
 * and the set of once-only messages keep at most `maxLogEntries` items and
 * drop the oldest first.
 */

export type LogVerbosity = 'normal' | 'verbose';

export const DEFAULT_MAX_LOG_ENTRIES = 1000;

/** Most recent messages, oldest first */
export const estimationLogs: string[] = [];

let maxLogEntries = DEFAULT_MAX_LOG_ENTRIES;
const onceMessages = new Set<string>();
let lastMessage: string | null = null;
let verbosity: LogVerbosity = 'normal';
let listener: ((message: string) => void) | null = null;

// Quiet under Jest unless BEARING_VERBOSE_TESTS=true
const consoleEnabled = process.env.NODE_ENV !== 'test' || process.env.BEARING_VERBOSE_TESTS === 'true';

export function setLogCallback(callback: ((message: string) => void) | null): void {
  listener = callback;
}

export function setVerbosity(level: LogVerbosity): void {
  verbosity = level;
}

export function getVerbosity(): LogVerbosity {
  return verbosity;
}

export function setMaxLogEntries(count: number): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Log capacity must be a positive integer, got ${count}`);
  }
  maxLogEntries = count;
  trim();
}

function trim(): void {
  if (estimationLogs.length > maxLogEntries) {
    estimationLogs.splice(0, estimationLogs.length - maxLogEntries);
  }
  for (const message of onceMessages) {
    if (onceMessages.size <= maxLogEntries) break;
    onceMessages.delete(message);
  }
}

/**
 * Record a message. A message identical to the previous one is dropped.
 */
export function log(message: string): void {
  if (message === lastMessage) {
    return;
  }
  lastMessage = message;

  if (consoleEnabled) {
    console.log(message);
  }
  estimationLogs.push(message);
  trim();
  listener?.(message);
}

/** Per-pair and per-frame detail, recorded only when verbose */
export function logDebug(message: string): void {
  if (verbosity === 'verbose') {
    log(message);
  }
}

/**
 * Record a message only the first time it is seen since the last clear,
 * e.g. a warning that would otherwise repeat every frame.
 */
export function logOnce(message: string): void {
  if (onceMessages.has(message)) {
    return;
  }
  onceMessages.add(message);
  log(message);
}

export function clearEstimationLogs(): void {
  estimationLogs.length = 0;
  onceMessages.clear();
  lastMessage = null;
}
