import { NOOP_AUDIT, type AuditEventType, type AuditSink } from '../audit/types.js';
import { ConditionNode } from '../conditions/condition-node.js';
import {
  describeError,
  DuplicateError,
  NotFoundError,
  RuleCancelledError,
  ScriptError,
  type ScriptEntry,
} from '../errors.js';
import type { RulePersistence } from '../persistence/rule-persistence.js';
import type { CompiledScript, ScriptExecutor } from '../scripting/types.js';
import { VmScriptExecutor } from '../scripting/vm-script-executor.js';
import type { ConditionTiming } from '../types/condition.js';
import type { HubClient } from '../types/device.js';
import type { Rule, RuleDefinition, RuleKind } from '../types/rule.js';
import type { SceneProvider } from '../types/scene.js';
import type { Duration, TimerKind } from '../types/timer.js';
import { formatDuration } from '../utils/duration-parser.js';
import type { AttributeCache } from './attribute-cache.js';
import { RuleContext } from './rule-context.js';
import type { RuleEngine } from './rule-engine.js';
import { nextTimeOfDay, type TimerService } from './timer-service.js';

export type RuleErrorHandler = (error: ScriptError, rule: Rule) => void;

export interface RuleCoordinatorConfig {
  engine: RuleEngine;
  timers: TimerService;
  hub: HubClient;
  cache: AttributeCache;
  scenes: SceneProvider;
  /** Default: VmScriptExecutor */
  executor?: ScriptExecutor;
  audit?: AuditSink;
  persistence?: RulePersistence;
  /** Pause before re-arming after a failed trigger or timer script (default: 30 s) */
  retryDelayMs?: number;
  /** Called for every failed trigger, timer or action invocation */
  onError?: RuleErrorHandler;
  /** Name used in log lines (default: 'rule-coordinator') */
  name?: string;
}

export interface RuleFilter {
  kind?: RuleKind;
}

const FAILURE_EVENTS: Record<ScriptEntry, AuditEventType> = {
  trigger: 'trigger_failed',
  timer: 'timer_failed',
  action: 'action_failed',
};

/** What a trigger script resolves to */
interface TriggerSpec extends ConditionTiming {
  condition: ConditionNode;
}

interface RuleTask {
  readonly rule: Rule;
  readonly trigger: CompiledScript;
  readonly action: CompiledScript;
  readonly controller: AbortController;
  readonly context: RuleContext;
  task: Promise<void>;
}

/**
 * Runs installed rules, each as its own cancellable async task.
 *
 * A condition rule loops: trigger script → condition tree → wait until it
 * fires (or times out) → action script → re-arm. A scheduled rule loops:
 * timer script → next run time → sleep → action script → ask again.
 *
 * Failures never end a rule; they are reported and the rule re-arms.
 * Uninstalling aborts the task at its current suspension point.
 */
export class RuleExecutionCoordinator {
  private readonly name: string;
  private readonly engine: RuleEngine;
  private readonly timers: TimerService;
  private readonly hub: HubClient;
  private readonly cache: AttributeCache;
  private readonly scenes: SceneProvider;
  private readonly executor: ScriptExecutor;
  private readonly audit: AuditSink;
  private readonly persistence: RulePersistence | null;
  private readonly retryDelayMs: number;
  private readonly onError: RuleErrorHandler | undefined;

  private readonly tasks = new Map<string, RuleTask>();
  private stopped = false;

  constructor(config: RuleCoordinatorConfig) {
    this.name = config.name ?? 'rule-coordinator';
    this.engine = config.engine;
    this.timers = config.timers;
    this.hub = config.hub;
    this.cache = config.cache;
    this.scenes = config.scenes;
    this.executor = config.executor ?? new VmScriptExecutor();
    this.audit = config.audit ?? NOOP_AUDIT;
    this.persistence = config.persistence ?? null;
    this.retryDelayMs = config.retryDelayMs ?? 30_000;
    this.onError = config.onError;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                           RULE LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Installs a rule and starts its task.
   *
   * Both scripts are compiled before anything else happens.
   *
   * @throws DuplicateError when a rule of that name is active
   * @throws ScriptError when a script does not compile
   */
  async install(definition: RuleDefinition): Promise<Rule> {
    return this.installRule(definition, true);
  }

  /**
   * Uninstalls a rule: aborts its task, waits for it to settle and drops
   * the rule from persistence.
   *
   * @throws NotFoundError when no rule of that name is active
   */
  async uninstall(name: string): Promise<Rule> {
    const entry = this.tasks.get(name);
    if (!entry || entry.rule.status !== 'active') {
      throw new NotFoundError('rule', name);
    }

    entry.controller.abort();
    await entry.task;
    this.timers.cancelOwned(name);

    entry.rule.status = 'removed';
    this.tasks.delete(name);

    await this.persist();

    this.audit.record('rule_uninstalled', {
      cycles: entry.rule.cycles,
      failures: entry.rule.failures,
    }, { source: this.name, ruleName: name });

    return { ...entry.rule };
  }

  get(name: string): Rule | undefined {
    const entry = this.tasks.get(name);
    return entry ? { ...entry.rule } : undefined;
  }

  list(filter: RuleFilter = {}): Rule[] {
    const rules: Rule[] = [];
    for (const entry of this.tasks.values()) {
      if (filter.kind === undefined || entry.rule.kind === filter.kind) {
        rules.push({ ...entry.rule });
      }
    }
    return rules;
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Reinstalls every persisted rule that is not active yet. A rule that no
   * longer compiles is logged and skipped.
   */
  async restore(): Promise<Rule[]> {
    if (!this.persistence) return [];

    const restored: Rule[] = [];
    for (const definition of await this.persistence.load()) {
      if (this.tasks.has(definition.name)) continue;
      try {
        restored.push(await this.installRule(definition, false));
        this.audit.record('rule_restored', { kind: definition.kind }, {
          source: this.name,
          ruleName: definition.name,
        });
      } catch (error) {
        console.error(`[${this.name}] Failed to restore rule "${definition.name}":`, describeError(error));
      }
    }
    return restored;
  }

  /**
   * Aborts every rule task and waits for all of them. Rules stay persisted.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const entries = [...this.tasks.values()];

    for (const entry of entries) {
      entry.controller.abort();
    }
    await Promise.all(entries.map(entry => entry.task));

    for (const entry of entries) {
      this.timers.cancelOwned(entry.rule.name);
      entry.rule.status = 'removed';
    }
    this.tasks.clear();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                             RULE TASKS
  // ═══════════════════════════════════════════════════════════════════════════

  private async installRule(definition: RuleDefinition, persist: boolean): Promise<Rule> {
    if (this.stopped) {
      throw new Error(`RuleExecutionCoordinator "${this.name}" is stopped`);
    }
    if (this.tasks.has(definition.name)) {
      throw new DuplicateError('rule', definition.name);
    }

    const triggerEntry: ScriptEntry = definition.kind === 'condition' ? 'trigger' : 'timer';
    let trigger: CompiledScript;
    let action: CompiledScript;
    try {
      trigger = this.executor.compile(definition.trigger, triggerEntry, { ruleName: definition.name });
      action = this.executor.compile(definition.action, 'action', { ruleName: definition.name });
    } catch (error) {
      const scriptError = ScriptError.from(error, definition.name, triggerEntry);
      this.audit.record('rule_install_failed', { kind: definition.kind }, {
        source: this.name,
        ruleName: definition.name,
        success: false,
        error: scriptError.message,
      });
      throw scriptError;
    }

    const rule: Rule = {
      name: definition.name,
      kind: definition.kind,
      trigger: definition.trigger,
      action: definition.action,
      ...(definition.description !== undefined && { description: definition.description }),
      status: 'installing',
      installedAt: Date.now(),
      cycles: 0,
      failures: 0,
    };

    const controller = new AbortController();
    const entry: RuleTask = {
      rule,
      trigger,
      action,
      controller,
      context: new RuleContext({
        ruleName: rule.name,
        engine: this.engine,
        timers: this.timers,
        hub: this.hub,
        cache: this.cache,
        scenes: this.scenes,
        audit: this.audit,
        signal: controller.signal,
      }),
      task: Promise.resolve(),
    };

    // Reserve the name before the first await
    this.tasks.set(rule.name, entry);

    if (persist) {
      try {
        await this.persist();
      } catch (error) {
        this.tasks.delete(rule.name);
        throw error;
      }
    }

    rule.status = 'active';
    entry.task = this.runTask(entry);

    this.audit.record('rule_installed', {
      kind: rule.kind,
      ...(rule.description !== undefined && { description: rule.description }),
    }, { source: this.name, ruleName: rule.name });

    return { ...rule };
  }

  private async runTask(entry: RuleTask): Promise<void> {
    try {
      if (entry.rule.kind === 'condition') {
        await this.runConditionRule(entry);
      } else {
        await this.runScheduledRule(entry);
      }
    } catch (error) {
      if (!this.isCancellation(entry, error)) {
        console.error(`[${this.name}] Rule "${entry.rule.name}" task crashed:`, error);
      }
    }
  }

  private async runConditionRule(entry: RuleTask): Promise<void> {
    const { rule, context, controller } = entry;

    while (!controller.signal.aborted) {
      let fired: boolean;
      try {
        const spec = toTriggerSpec(
          await this.executor.invoke(entry.trigger, context.capabilities()),
          rule.name
        );
        fired = await context.waitFor(spec.condition, {
          timeout: spec.timeout,
          forDuration: spec.forDuration,
        });
      } catch (error) {
        if (this.isCancellation(entry, error)) return;
        this.reportFailure(entry, 'trigger', error);
        await this.pause(entry, this.timers.now() + this.retryDelayMs, 'retry');
        continue;
      }

      rule.cycles++;
      if (!fired) {
        this.audit.record('rule_timed_out', {}, { source: this.name, ruleName: rule.name });
        continue;
      }

      rule.lastFiredAt = Date.now();
      this.audit.record('rule_triggered', { cycle: rule.cycles }, { source: this.name, ruleName: rule.name });
      await this.runAction(entry);
      // Re-arm on a fresh macrotask so timers and hub events run between cycles.
      await this.pause(entry, this.timers.now(), 'sleep');
    }
  }

  private async runScheduledRule(entry: RuleTask): Promise<void> {
    const { rule, context, controller } = entry;

    while (!controller.signal.aborted) {
      let nextRun: number | null;
      try {
        nextRun = toNextRun(
          await this.executor.invoke(entry.trigger, context.capabilities()),
          rule.name,
          this.timers.now()
        );
      } catch (error) {
        if (this.isCancellation(entry, error)) return;
        this.reportFailure(entry, 'timer', error);
        await this.pause(entry, this.timers.now() + this.retryDelayMs, 'retry');
        continue;
      }

      if (nextRun === null) {
        this.audit.record('schedule_ended', { cycles: rule.cycles }, { source: this.name, ruleName: rule.name });
        return;
      }

      try {
        await context.sleepUntil(nextRun, 'schedule');
      } catch (error) {
        if (this.isCancellation(entry, error)) return;
        this.reportFailure(entry, 'timer', error);
        await this.pause(entry, this.timers.now() + this.retryDelayMs, 'retry');
        continue;
      }

      rule.cycles++;
      rule.lastFiredAt = Date.now();
      this.audit.record('rule_triggered', { cycle: rule.cycles, scheduledFor: nextRun }, {
        source: this.name,
        ruleName: rule.name,
      });
      await this.runAction(entry);
    }
  }

  private async runAction(entry: RuleTask): Promise<void> {
    const started = Date.now();
    try {
      await this.executor.invoke(entry.action, entry.context.capabilities());
      this.audit.record('action_completed', {}, {
        source: this.name,
        ruleName: entry.rule.name,
        success: true,
        durationMs: Date.now() - started,
      });
    } catch (error) {
      if (this.isCancellation(entry, error)) return;
      this.reportFailure(entry, 'action', error, Date.now() - started);
    }
  }

  private async pause(entry: RuleTask, deadline: number, kind: TimerKind): Promise<void> {
    try {
      await entry.context.sleepUntil(deadline, kind);
    } catch (error) {
      if (!this.isCancellation(entry, error)) throw error;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                         INTERNAL METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  private reportFailure(entry: RuleTask, scriptEntry: ScriptEntry, error: unknown, durationMs?: number): void {
    const { rule } = entry;
    const scriptError = ScriptError.from(error, rule.name, scriptEntry);

    rule.failures++;
    rule.lastError = scriptError.message;

    const retry = scriptEntry === 'action' ? '' : ` (retrying in ${formatDuration(this.retryDelayMs)})`;
    console.error(`[${this.name}] ${scriptError.message}${retry}`);

    this.audit.record(FAILURE_EVENTS[scriptEntry], {
      ...(scriptError.cause !== undefined && { cause: describeError(scriptError.cause) }),
    }, {
      source: this.name,
      ruleName: rule.name,
      success: false,
      error: scriptError.message,
      ...(durationMs !== undefined && { durationMs }),
    });

    if (this.onError) {
      try {
        this.onError(scriptError, { ...rule });
      } catch (hookError) {
        console.error(`[${this.name}] onError handler failed:`, hookError);
      }
    }
  }

  private isCancellation(entry: RuleTask, error: unknown): boolean {
    return error instanceof RuleCancelledError || entry.controller.signal.aborted;
  }

  private async persist(): Promise<void> {
    if (!this.persistence) return;
    await this.persistence.save([...this.tasks.values()].map(entry => entry.rule));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//                         SCRIPT RESULT PARSING
// ═══════════════════════════════════════════════════════════════════════════

function toTriggerSpec(value: unknown, ruleName: string): TriggerSpec {
  if (value instanceof ConditionNode) {
    return { condition: value };
  }

  const condition = isRecord(value) ? value['condition'] : undefined;
  if (isRecord(value) && condition instanceof ConditionNode) {
    return {
      condition,
      timeout: toOptionalDuration(value['timeout'], 'timeout', ruleName),
      forDuration: toOptionalDuration(value['forDuration'], 'forDuration', ruleName),
    };
  }

  throw new ScriptError(
    `Rule "${ruleName}" trigger must return a condition or { condition, timeout?, forDuration? }`,
    { ruleName, entry: 'trigger' }
  );
}

function toOptionalDuration(value: unknown, field: string, ruleName: string): Duration | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return value;
  throw new ScriptError(
    `Rule "${ruleName}" trigger returned an invalid ${field}: ${String(value)}`,
    { ruleName, entry: 'trigger' }
  );
}

/**
 * Next run time from a timer script's result: a Date, epoch milliseconds or
 * a time of day ("07:30"). `null`/`undefined` ends the schedule.
 */
function toNextRun(value: unknown, ruleName: string, now: number): number | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.getTime();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return nextTimeOfDay(value, new Date(now)).getTime();
  }

  throw new ScriptError(
    `Rule "${ruleName}" timer must return a Date, epoch milliseconds, a time of day or null`,
    { ruleName, entry: 'timer' }
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
