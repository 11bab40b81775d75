import type { StorageAdapter, PersistedState } from '@hamicek/noex';
import { generateId } from '../utils/id-generator.js';
import {
  AUDIT_EVENT_CATEGORIES,
  type AuditConfig,
  type AuditEntry,
  type AuditEventType,
  type AuditQuery,
  type AuditQueryResult,
  type AuditRecordOptions,
  type AuditSink,
  type AuditSubscriber,
} from './types.js';

const DEFAULT_MAX_MEMORY_ENTRIES = 10_000;
const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_FLUSH_INTERVAL_MS = 5_000;
const DEFAULT_QUERY_LIMIT = 100;

/** Stored shape of one hour of entries */
interface AuditBucketState {
  entries: AuditEntry[];
}

/**
 * Storage key of the UTC hour a timestamp falls in: `audit-log:YYYY-MM-DDTHH`.
 */
export function formatBucketKey(timestamp: number): string {
  return `audit-log:${new Date(timestamp).toISOString().slice(0, 13)}`;
}

/** `'condition_timed_out'` → `'Condition timed out'` */
function summarize(type: AuditEventType): string {
  const text = type.split('_').join(' ');
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function matches(entry: AuditEntry, filter: AuditQuery): boolean {
  return (filter.category === undefined || entry.category === filter.category)
    && (filter.types === undefined || filter.types.includes(entry.type))
    && (filter.ruleName === undefined || entry.ruleName === filter.ruleName)
    && (filter.sceneName === undefined || entry.sceneName === filter.sceneName)
    && (filter.deviceId === undefined || entry.deviceId === filter.deviceId)
    && (filter.source === undefined || entry.source === filter.source)
    && (!filter.failuresOnly || entry.success === false)
    && (filter.from === undefined || entry.timestamp >= filter.from)
    && (filter.to === undefined || entry.timestamp <= filter.to);
}

/**
 * Audit log of rule, condition, device and scene operations.
 *
 * The most recent entries stay in memory for queries; once the buffer is
 * full the oldest recorded entry is dropped. With a StorageAdapter every
 * entry is also written to an hourly bucket by a batched background flush.
 */
export class AuditLogService implements AuditSink {
  private readonly adapter: StorageAdapter | null;
  private readonly maxMemoryEntries: number;
  private readonly batchSize: number;

  private readonly entries: AuditEntry[] = [];
  private readonly subscribers = new Set<AuditSubscriber>();

  private pending: AuditEntry[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> = Promise.resolve();

  private constructor(adapter: StorageAdapter | null, config: AuditConfig) {
    this.adapter = adapter;
    this.maxMemoryEntries = config.maxMemoryEntries ?? DEFAULT_MAX_MEMORY_ENTRIES;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;

    const flushIntervalMs = config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    if (adapter && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flushInBackground();
      }, flushIntervalMs);
      this.flushTimer.unref();
    }
  }

  /**
   * @param adapter - Without one, entries live only in memory.
   */
  static async start(adapter?: StorageAdapter, config: AuditConfig = {}): Promise<AuditLogService> {
    return new AuditLogService(adapter ?? null, config);
  }

  record(
    type: AuditEventType,
    details: Record<string, unknown>,
    options: AuditRecordOptions = {},
  ): AuditEntry {
    const entry: AuditEntry = {
      id: generateId('audit'),
      timestamp: options.timestamp ?? Date.now(),
      category: AUDIT_EVENT_CATEGORIES[type],
      type,
      summary: options.summary ?? summarize(type),
      source: options.source ?? 'rule-engine',
      details,
      ...(options.ruleName !== undefined && { ruleName: options.ruleName }),
      ...(options.sceneName !== undefined && { sceneName: options.sceneName }),
      ...(options.deviceId !== undefined && { deviceId: options.deviceId }),
      ...(options.conditionId !== undefined && { conditionId: options.conditionId }),
      ...(options.success !== undefined && { success: options.success }),
      ...(options.error !== undefined && { error: options.error }),
      ...(options.durationMs !== undefined && { durationMs: options.durationMs }),
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxMemoryEntries) {
      this.entries.splice(0, this.entries.length - this.maxMemoryEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error('[AuditLogService] Subscriber failed:', error);
      }
    }

    if (this.adapter) {
      this.pending.push(entry);
      if (this.pending.length >= this.batchSize) {
        void this.flushInBackground();
      }
    }

    return entry;
  }

  /** Entries held in memory that match every given filter, oldest first. */
  query(filter: AuditQuery = {}): AuditQueryResult {
    const matching = this.entries
      .filter(entry => matches(entry, filter))
      .sort((a, b) => a.timestamp - b.timestamp);

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? DEFAULT_QUERY_LIMIT;

    return {
      entries: matching.slice(offset, offset + limit),
      totalCount: matching.length,
      hasMore: offset + limit < matching.length,
    };
  }

  /**
   * Calls `subscriber` synchronously with every new entry.
   *
   * @returns unsubscribe function
   */
  subscribe(subscriber: AuditSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Writes pending entries into their hourly buckets. Flushes never overlap;
   * no-op without an adapter.
   */
  async flush(): Promise<void> {
    const run = this.flushing.then(() => this.writePending());
    this.flushing = run.catch(() => undefined);
    return run;
  }

  async stop(): Promise<void> {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.subscribers.clear();
    await this.flush();
  }

  private async flushInBackground(): Promise<void> {
    try {
      await this.flush();
    } catch (error) {
      console.error('[AuditLogService] Failed to persist audit entries:', error);
    }
  }

  private async writePending(): Promise<void> {
    const adapter = this.adapter;
    if (!adapter || this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];

    const buckets = new Map<string, AuditEntry[]>();
    for (const entry of batch) {
      const key = formatBucketKey(entry.timestamp);
      buckets.set(key, [...(buckets.get(key) ?? []), entry]);
    }

    for (const [key, entries] of buckets) {
      const existing = await adapter.load<AuditBucketState>(key);
      const state: PersistedState<AuditBucketState> = {
        state: { entries: [...(existing?.state.entries ?? []), ...entries] },
        metadata: { persistedAt: Date.now(), serverId: 'audit-log', schemaVersion: 1 },
      };
      await adapter.save(key, state);
    }
  }
}
