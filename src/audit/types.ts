/**
 * Audit log types.
 *
 * The audit log is the durable record of what the automation did: which
 * rules were installed, which conditions fired or timed out, which device
 * commands and scenes were sent, and what failed.
 */

/** Categories of auditable operations */
export type AuditCategory =
  | 'rule_lifecycle'
  | 'rule_execution'
  | 'condition'
  | 'device_control'
  | 'scene'
  | 'system';

/** Specific types of audit events */
export type AuditEventType =
  | 'rule_installed'
  | 'rule_uninstalled'
  | 'rule_restored'
  | 'rule_install_failed'
  | 'rule_triggered'
  | 'rule_timed_out'
  | 'action_completed'
  | 'action_failed'
  | 'trigger_failed'
  | 'timer_failed'
  | 'schedule_ended'
  | 'condition_registered'
  | 'condition_fired'
  | 'condition_timed_out'
  | 'condition_removed'
  | 'condition_failed'
  | 'device_command_sent'
  | 'device_command_failed'
  | 'scene_created'
  | 'scene_deleted'
  | 'scene_enabled'
  | 'scene_enable_failed'
  | 'engine_started'
  | 'engine_stopped';

/** Mapping from event type to its category */
export const AUDIT_EVENT_CATEGORIES: Record<AuditEventType, AuditCategory> = {
  rule_installed: 'rule_lifecycle',
  rule_uninstalled: 'rule_lifecycle',
  rule_restored: 'rule_lifecycle',
  rule_install_failed: 'rule_lifecycle',
  rule_triggered: 'rule_execution',
  rule_timed_out: 'rule_execution',
  action_completed: 'rule_execution',
  action_failed: 'rule_execution',
  trigger_failed: 'rule_execution',
  timer_failed: 'rule_execution',
  schedule_ended: 'rule_execution',
  condition_registered: 'condition',
  condition_fired: 'condition',
  condition_timed_out: 'condition',
  condition_removed: 'condition',
  condition_failed: 'condition',
  device_command_sent: 'device_control',
  device_command_failed: 'device_control',
  scene_created: 'scene',
  scene_deleted: 'scene',
  scene_enabled: 'scene',
  scene_enable_failed: 'scene',
  engine_started: 'system',
  engine_stopped: 'system',
};

/** A single audit log entry */
export interface AuditEntry {
  id: string;
  /** Epoch milliseconds */
  timestamp: number;
  category: AuditCategory;
  type: AuditEventType;
  summary: string;
  /** Component that produced the entry, e.g. `rule-coordinator` */
  source: string;
  ruleName?: string;
  sceneName?: string;
  deviceId?: string;
  /** Root id of the condition tree involved */
  conditionId?: string;
  success?: boolean;
  error?: string;
  details: Record<string, unknown>;
  durationMs?: number;
}

/** Audit query; every given field must match */
export interface AuditQuery {
  category?: AuditCategory;
  /** Any of these types */
  types?: AuditEventType[];
  ruleName?: string;
  sceneName?: string;
  deviceId?: string;
  source?: string;
  /** Only entries with `success === false` */
  failuresOnly?: boolean;
  /** Inclusive lower timestamp bound */
  from?: number;
  /** Inclusive upper timestamp bound */
  to?: number;
  /** Default 100 */
  limit?: number;
  offset?: number;
}

export interface AuditQueryResult {
  entries: AuditEntry[];
  /** Matches before pagination */
  totalCount: number;
  hasMore: boolean;
}

/** Configuration for AuditLogService */
export interface AuditConfig {
  /** Entries kept in memory for queries (default: 10000) */
  maxMemoryEntries?: number;

  /** Entries that trigger an early flush (default: 100) */
  batchSize?: number;

  /** Interval between background flushes in ms; 0 disables them (default: 5000) */
  flushIntervalMs?: number;
}

export type AuditSubscriber = (entry: AuditEntry) => void;

/** Options for recording an audit entry */
export interface AuditRecordOptions {
  timestamp?: number;
  summary?: string;
  source?: string;
  ruleName?: string | undefined;
  sceneName?: string | undefined;
  deviceId?: string | undefined;
  conditionId?: string | undefined;
  success?: boolean;
  error?: string;
  durationMs?: number;
}

/**
 * Where components send audit entries. The engine, coordinator and scene
 * manager depend on this interface only.
 */
export interface AuditSink {
  record(type: AuditEventType, details: Record<string, unknown>, options?: AuditRecordOptions): void;
}

/** Sink that discards everything; the default when no audit log is configured. */
export const NOOP_AUDIT: AuditSink = {
  record: () => undefined,
};
