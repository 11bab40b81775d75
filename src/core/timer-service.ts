import { Cron } from 'croner';
import { describeError, TimerError } from '../errors.js';
import type { Duration, TimerCallback, TimerEntry, TimerOptions } from '../types/timer.js';
import { parseDuration } from '../utils/duration-parser.js';
import { generateId } from '../utils/id-generator.js';

/** Longest delay setTimeout accepts; longer delays are chained. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface TimerServiceConfig {
  /** Upper bound on concurrently pending timers (default 100 000) */
  maxTimers?: number;
  /** Source of "now" in Unix ms (default Date.now) */
  clock?: () => number;
}

/**
 * Single-shot delayed callbacks, purely in memory.
 *
 * Every pending timer is a {@link TimerEntry} with an absolute deadline;
 * the entry's id is the cancel handle. A callback runs at most once and
 * never after its timer was cancelled.
 */
export class TimerService {
  private readonly timers = new Map<string, TimerEntry>();
  private readonly callbacks = new Map<string, TimerCallback>();
  private readonly handles = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly maxTimers: number;
  private readonly clock: () => number;

  constructor(config: TimerServiceConfig = {}) {
    this.maxTimers = config.maxTimers ?? 100_000;
    this.clock = config.clock ?? Date.now;
  }

  /** Current time of the service clock. */
  now(): number {
    return this.clock();
  }

  /**
   * Schedules a callback after a relative delay ("30s", "5m" or ms).
   *
   * @throws TimerError for a negative or unparsable delay, or when the
   *         service already holds `maxTimers` timers
   */
  schedule(delay: Duration, callback: TimerCallback, options: TimerOptions = {}): TimerEntry {
    let delayMs: number;
    try {
      delayMs = parseDuration(delay);
    } catch (error) {
      throw new TimerError(describeError(error));
    }
    return this.scheduleAt(this.now() + delayMs, callback, options);
  }

  /**
   * Schedules a callback at an absolute time. A deadline in the past fires
   * on the next turn of the event loop.
   */
  scheduleAt(deadline: number | Date, callback: TimerCallback, options: TimerOptions = {}): TimerEntry {
    const at = deadline instanceof Date ? deadline.getTime() : deadline;
    if (!Number.isFinite(at)) {
      throw new TimerError(`Invalid timer deadline: ${String(deadline)}`);
    }
    if (this.timers.size >= this.maxTimers) {
      throw new TimerError(`Timer capacity exhausted (${this.maxTimers} pending timers)`);
    }

    const entry: TimerEntry = {
      id: generateId('timer'),
      deadline: at,
      kind: options.kind ?? 'sleep',
      ...(options.ownerId !== undefined && { ownerId: options.ownerId })
    };

    this.timers.set(entry.id, entry);
    this.callbacks.set(entry.id, callback);
    this.arm(entry.id, at);

    return entry;
  }

  /**
   * Cancels a pending timer.
   *
   * @returns false when the timer already fired, was cancelled or is unknown
   */
  cancel(timer: TimerEntry | string): boolean {
    const id = typeof timer === 'string' ? timer : timer.id;
    if (!this.timers.has(id)) return false;

    const handle = this.handles.get(id);
    if (handle !== undefined) {
      clearTimeout(handle);
    }
    this.release(id);
    return true;
  }

  /** Cancels every pending timer of one owner. */
  cancelOwned(ownerId: string): number {
    let cancelled = 0;
    for (const entry of [...this.timers.values()]) {
      if (entry.ownerId === ownerId && this.cancel(entry)) {
        cancelled++;
      }
    }
    return cancelled;
  }

  get(id: string): TimerEntry | undefined {
    return this.timers.get(id);
  }

  /**
   * Number of pending timers.
   */
  get size(): number {
    return this.timers.size;
  }

  /**
   * All pending timers, earliest deadline first.
   */
  getAll(): TimerEntry[] {
    return [...this.timers.values()].sort((a, b) => a.deadline - b.deadline);
  }

  /**
   * Cancels all timers.
   */
  stop(): void {
    for (const handle of this.handles.values()) {
      clearTimeout(handle);
    }
    this.handles.clear();
    this.callbacks.clear();
    this.timers.clear();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              FIRING
  // ═══════════════════════════════════════════════════════════════════════════

  private arm(id: string, deadline: number): void {
    const remaining = Math.max(0, deadline - this.now());
    const step = Math.min(remaining, MAX_TIMEOUT_MS);

    const handle = setTimeout(() => {
      if (remaining > MAX_TIMEOUT_MS) {
        this.arm(id, deadline);
      } else {
        void this.fire(id);
      }
    }, step);
    this.handles.set(id, handle);
  }

  private async fire(id: string): Promise<void> {
    const entry = this.timers.get(id);
    const callback = this.callbacks.get(id);
    this.release(id);
    if (!entry || !callback) return;

    try {
      await callback(entry);
    } catch (error) {
      console.error(`[TimerService] Timer "${entry.id}" (${entry.kind}) callback failed:`, error);
    }
  }

  private release(id: string): void {
    this.timers.delete(id);
    this.callbacks.delete(id);
    this.handles.delete(id);
  }
}

/**
 * Next occurrence of a wall-clock time of day ("07:30" or "22:15:30")
 * strictly after `from`, in local time.
 *
 * @throws TimerError for a malformed time
 */
export function nextTimeOfDay(time: string, from: Date = new Date()): Date {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(time.trim());
  const hours = Number(match?.[1]);
  const minutes = Number(match?.[2]);
  const seconds = Number(match?.[3] ?? '0');

  if (!match || hours > 23 || minutes > 59 || seconds > 59) {
    throw new TimerError(`Invalid time of day: "${time}" (expected HH:MM or HH:MM:SS)`);
  }

  const next = new Cron(`${seconds} ${minutes} ${hours} * * *`).nextRun(from);
  if (!next) {
    throw new TimerError(`Time of day "${time}" has no next occurrence`);
  }
  return next;
}
