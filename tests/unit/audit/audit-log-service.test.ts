import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryAdapter } from '@hamicek/noex';
import { AuditLogService, formatBucketKey } from '../../../src/audit/audit-log-service';
import type { AuditEntry } from '../../../src/audit/types';

interface StoredBucket {
  entries: AuditEntry[];
}

describe('formatBucketKey', () => {
  it('formats the UTC hour of a timestamp', () => {
    expect(formatBucketKey(Date.UTC(2026, 0, 15, 7, 45, 12))).toBe('audit-log:2026-01-15T07');
    expect(formatBucketKey(Date.UTC(2026, 11, 3, 23, 0, 0))).toBe('audit-log:2026-12-03T23');
  });
});

describe('AuditLogService', () => {
  let service: AuditLogService;

  beforeEach(async () => {
    service = await AuditLogService.start(undefined, { flushIntervalMs: 0 });
  });

  afterEach(async () => {
    await service.stop();
  });

  describe('record()', () => {
    it('fills in category, summary and source', () => {
      const entry = service.record('rule_installed', { kind: 'condition' }, { ruleName: 'porch' });

      expect(entry).toMatchObject({
        type: 'rule_installed',
        category: 'rule_lifecycle',
        summary: 'Rule installed',
        source: 'rule-engine',
        ruleName: 'porch',
        details: { kind: 'condition' },
      });
      expect(entry.id).toMatch(/^audit/);
    });

    it('leaves out options that were not given', () => {
      const entry = service.record('engine_started', {}, { ruleName: undefined });

      expect('ruleName' in entry).toBe(false);
      expect('success' in entry).toBe(false);
      expect('error' in entry).toBe(false);
    });

    it('keeps explicit options', () => {
      const entry = service.record('device_command_failed', {}, {
        timestamp: 1_000,
        summary: 'lamp did not answer',
        source: 'rule-context',
        deviceId: '12',
        success: false,
        error: 'timeout',
        durationMs: 15,
      });

      expect(entry).toMatchObject({
        timestamp: 1_000,
        category: 'device_control',
        summary: 'lamp did not answer',
        source: 'rule-context',
        deviceId: '12',
        success: false,
        error: 'timeout',
        durationMs: 15,
      });
      expect(service.query({ deviceId: '12' }).entries).toEqual([entry]);
    });
  });

  describe('query()', () => {
    beforeEach(() => {
      service.record('rule_triggered', {}, { timestamp: 300, ruleName: 'porch', source: 'rule-coordinator' });
      service.record('action_failed', {}, {
        timestamp: 100,
        ruleName: 'porch',
        source: 'rule-coordinator',
        success: false,
      });
      service.record('scene_enabled', {}, { timestamp: 200, sceneName: 'evening', success: true });
      service.record('condition_fired', {}, { timestamp: 400, ruleName: 'hall', deviceId: '7' });
    });

    it('returns entries in chronological order', () => {
      const result = service.query();

      expect(result.entries.map(entry => entry.timestamp)).toEqual([100, 200, 300, 400]);
      expect(result.totalCount).toBe(4);
      expect(result.hasMore).toBe(false);
    });

    it('filters by rule name and type', () => {
      expect(service.query({ ruleName: 'porch' }).totalCount).toBe(2);
      expect(service.query({ ruleName: 'porch', types: ['rule_triggered'] }).entries.map(e => e.timestamp))
        .toEqual([300]);
      expect(service.query({ types: ['scene_enabled', 'condition_fired'] }).totalCount).toBe(2);
    });

    it('filters by category, scene, device and source', () => {
      expect(service.query({ category: 'rule_execution' }).totalCount).toBe(2);
      expect(service.query({ sceneName: 'evening' }).entries[0]?.type).toBe('scene_enabled');
      expect(service.query({ deviceId: '7' }).entries[0]?.type).toBe('condition_fired');
      expect(service.query({ source: 'rule-coordinator', category: 'rule_execution' }).totalCount).toBe(2);
      expect(service.query({ sceneName: 'unknown' }).entries).toEqual([]);
    });

    it('filters failures and time ranges', () => {
      expect(service.query({ failuresOnly: true }).entries.map(e => e.type)).toEqual(['action_failed']);
      expect(service.query({ from: 200, to: 300 }).entries.map(e => e.timestamp)).toEqual([200, 300]);
    });

    it('paginates', () => {
      const page = service.query({ limit: 2, offset: 1 });

      expect(page.entries.map(entry => entry.timestamp)).toEqual([200, 300]);
      expect(page.totalCount).toBe(4);
      expect(page.hasMore).toBe(true);
    });
  });

  describe('subscribe()', () => {
    it('notifies subscribers until they unsubscribe', () => {
      const received: string[] = [];
      const unsubscribe = service.subscribe(entry => received.push(entry.type));

      service.record('engine_started', {});
      unsubscribe();
      service.record('engine_stopped', {});

      expect(received).toEqual(['engine_started']);
    });

    it('logs a failing subscriber and keeps notifying the others', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const received: string[] = [];
      service.subscribe(() => {
        throw new Error('subscriber broke');
      });
      service.subscribe(entry => received.push(entry.type));

      service.record('engine_started', {});

      expect(received).toEqual(['engine_started']);
      expect(errorSpy).toHaveBeenCalledWith('[AuditLogService] Subscriber failed:', expect.any(Error));
      errorSpy.mockRestore();
    });
  });

  describe('memory limit', () => {
    it('drops the oldest recorded entry once the buffer is full', async () => {
      const small = await AuditLogService.start(undefined, { maxMemoryEntries: 3, flushIntervalMs: 0 });
      small.record('engine_started', {}, { timestamp: 1 });
      for (let i = 2; i <= 4; i++) {
        small.record('rule_triggered', {}, { timestamp: i, ruleName: 'porch' });
      }

      expect(small.size).toBe(3);
      expect(small.query({ category: 'system' }).totalCount).toBe(0);
      expect(small.query().entries.map(entry => entry.timestamp)).toEqual([2, 3, 4]);
      await small.stop();
    });
  });

  describe('persistence', () => {
    let adapter: MemoryAdapter;

    beforeEach(() => {
      adapter = new MemoryAdapter();
    });

    it('writes entries into hourly buckets on flush', async () => {
      const persisted = await AuditLogService.start(adapter, { flushIntervalMs: 0 });
      const morning = Date.UTC(2026, 0, 15, 7, 10);
      const later = Date.UTC(2026, 0, 15, 8, 5);
      persisted.record('rule_triggered', {}, { timestamp: morning, ruleName: 'porch' });
      persisted.record('action_completed', {}, { timestamp: morning + 1_000, ruleName: 'porch' });
      persisted.record('rule_triggered', {}, { timestamp: later, ruleName: 'porch' });

      await persisted.flush();

      const first = await adapter.load<StoredBucket>('audit-log:2026-01-15T07');
      const second = await adapter.load<StoredBucket>('audit-log:2026-01-15T08');
      expect(first?.state.entries.map(entry => entry.type)).toEqual(['rule_triggered', 'action_completed']);
      expect(second?.state.entries).toHaveLength(1);
      await persisted.stop();
    });

    it('appends to an existing bucket', async () => {
      const persisted = await AuditLogService.start(adapter, { flushIntervalMs: 0 });
      const timestamp = Date.UTC(2026, 0, 15, 7, 10);

      persisted.record('rule_installed', {}, { timestamp });
      await persisted.flush();
      persisted.record('rule_uninstalled', {}, { timestamp: timestamp + 60_000 });
      await persisted.flush();

      const bucket = await adapter.load<StoredBucket>('audit-log:2026-01-15T07');
      expect(bucket?.state.entries.map(entry => entry.type)).toEqual(['rule_installed', 'rule_uninstalled']);
      await persisted.stop();
    });

    it('flushes pending entries on stop', async () => {
      const persisted = await AuditLogService.start(adapter, { flushIntervalMs: 0 });
      persisted.record('engine_started', {}, { timestamp: Date.UTC(2026, 0, 15, 7, 0) });

      await persisted.stop();

      expect(await adapter.exists('audit-log:2026-01-15T07')).toBe(true);
    });

    it('does not write before a batch is full or the interval elapses', async () => {
      const persisted = await AuditLogService.start(adapter, { flushIntervalMs: 0, batchSize: 10 });
      persisted.record('engine_started', {}, { timestamp: Date.UTC(2026, 0, 15, 7, 0) });
      await Promise.resolve();

      expect(await adapter.listKeys('audit-log:')).toEqual([]);
      await persisted.stop();
    });

    it('flushes on the configured interval', async () => {
      vi.useFakeTimers();
      const persisted = await AuditLogService.start(adapter, { flushIntervalMs: 1_000 });
      persisted.record('engine_started', {}, { timestamp: Date.UTC(2026, 0, 15, 7, 0) });

      await vi.advanceTimersByTimeAsync(1_000);

      expect(await adapter.exists('audit-log:2026-01-15T07')).toBe(true);
      await persisted.stop();
      vi.useRealTimers();
    });
  });
});
