/** Purpose of a scheduled timer */
export type TimerKind =
  | 'timeout'     // Max wait for a condition tree
  | 'duration'    // Min continuous true-time of a condition tree
  | 'sleep'       // wait() / waitUntil() in an action
  | 'schedule'    // Next run of a scheduled rule
  | 'retry';      // Re-arm delay after a failed trigger/timer script

/** Timer - a single-shot delayed callback */
export interface TimerEntry {
  id: string;               // Unique ID, also the cancel handle
  deadline: number;         // Absolute expiry time (Unix ms)
  kind: TimerKind;
  ownerId?: string | undefined;   // Condition tree id or rule name
}

export type TimerCallback = (timer: TimerEntry) => void | Promise<void>;

/** Options for scheduling a timer */
export interface TimerOptions {
  kind?: TimerKind;
  ownerId?: string;
}

/** Relative duration: milliseconds or "15m", "24h", "7d" */
export type Duration = string | number;
