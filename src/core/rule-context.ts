import type { AuditSink } from '../audit/types.js';
import { AttributeCondition, DeviceComparisonCondition } from '../conditions/attribute-condition.js';
import { AllOfCondition, AnyOfCondition, NotCondition } from '../conditions/boolean-condition.js';
import { ChangeCondition } from '../conditions/change-condition.js';
import type { ConditionNode } from '../conditions/condition-node.js';
import { loadConditionValues } from '../conditions/loader.js';
import { SceneChangeCondition, SceneSetCondition } from '../conditions/scene-condition.js';
import { initializeTree } from '../conditions/tree.js';
import {
  describeError,
  DeviceCommunicationError,
  NotFoundError,
  RuleCancelledError,
  TimerError,
} from '../errors.js';
import type { ComparisonOperator, ConditionTiming } from '../types/condition.js';
import type { AttributeKey, AttributeValue, ExecutionContext, HubClient } from '../types/device.js';
import type { SceneApplyResult, SceneDefinition, SceneProvider } from '../types/scene.js';
import type { Duration, TimerKind } from '../types/timer.js';
import { parseDuration } from '../utils/duration-parser.js';
import type { Operand } from '../utils/operators.js';
import { Signal } from '../utils/signal.js';
import type { AttributeCache } from './attribute-cache.js';
import type { RuleEngine } from './rule-engine.js';
import { nextTimeOfDay, type TimerService } from './timer-service.js';

/**
 * Everything a rule script can reach. Scripts see these as free
 * functions (`device("7")`, `await wait("5m")`).
 */
export interface RuleCapabilities {
  device(id: string | number): DeviceHandle;
  scene(name: string): SceneHandle;
  allOf(...conditions: ConditionNode[]): ConditionNode;
  anyOf(...conditions: ConditionNode[]): ConditionNode;
  isNot(condition: ConditionNode): ConditionNode;
  onChange(target: AttributeRef | SceneHandle): ConditionNode;
  wait(duration: Duration): Promise<void>;
  waitFor(condition: ConditionNode, options?: ConditionTiming): Promise<boolean>;
  waitForChange(target: AttributeRef, timeout?: Duration): Promise<boolean>;
  waitUntil(time: string): Promise<void>;
  check(condition: ConditionNode): boolean;
}

/** Parameter order of compiled scripts */
export const CAPABILITY_NAMES = [
  'device',
  'scene',
  'allOf',
  'anyOf',
  'isNot',
  'onChange',
  'wait',
  'waitFor',
  'waitForChange',
  'waitUntil',
  'check',
] as const satisfies readonly (keyof RuleCapabilities)[];

export interface RuleContextDeps {
  ruleName: string;
  engine: RuleEngine;
  timers: TimerService;
  hub: HubClient;
  cache: AttributeCache;
  scenes: SceneProvider;
  audit: AuditSink;
  /** Aborted when the rule is uninstalled */
  signal: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════════════════
//                          CONDITION BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One attribute of one device. Comparison methods build leaf conditions;
 * comparing against another AttributeRef builds a device comparison.
 */
export class AttributeRef {
  constructor(
    readonly deviceId: string,
    readonly attribute: string
  ) {}

  get key(): AttributeKey {
    return { deviceId: this.deviceId, attribute: this.attribute };
  }

  eq(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('eq', operand);
  }

  neq(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('neq', operand);
  }

  gt(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('gt', operand);
  }

  gte(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('gte', operand);
  }

  lt(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('lt', operand);
  }

  lte(operand: AttributeValue | AttributeRef): ConditionNode {
    return this.compare('lte', operand);
  }

  in(values: AttributeValue[]): ConditionNode {
    return new AttributeCondition(this.deviceId, this.attribute, 'in', values);
  }

  notIn(values: AttributeValue[]): ConditionNode {
    return new AttributeCondition(this.deviceId, this.attribute, 'not_in', values);
  }

  contains(text: string): ConditionNode {
    return new AttributeCondition(this.deviceId, this.attribute, 'contains', text);
  }

  matches(pattern: string): ConditionNode {
    return new AttributeCondition(this.deviceId, this.attribute, 'matches', pattern);
  }

  changes(): ConditionNode {
    return new ChangeCondition(this.deviceId, this.attribute);
  }

  toString(): string {
    return `device(${this.deviceId}).${this.attribute}`;
  }

  private compare(operator: ComparisonOperator, operand: Operand | AttributeRef): ConditionNode {
    if (operand instanceof AttributeRef) {
      return new DeviceComparisonCondition(this.key, operator, operand.key);
    }
    return new AttributeCondition(this.deviceId, this.attribute, operator, operand);
  }
}

/** Device as seen by a rule script */
export class DeviceHandle {
  constructor(
    readonly id: string,
    private readonly context: RuleContext
  ) {}

  attribute(name: string): AttributeRef {
    return new AttributeRef(this.id, name);
  }

  /** Reads the current value from the hub and refreshes the cache. */
  async getAttribute(name: string): Promise<AttributeValue> {
    return this.context.fetchAttribute(this.id, name);
  }

  /** Sends a command and waits for the hub's acknowledgement. */
  async sendCommand(command: string, ...args: AttributeValue[]): Promise<void> {
    await this.context.sendCommand(this.id, command, args);
  }
}

/** Scene as seen by a rule script */
export class SceneHandle {
  constructor(
    readonly definition: SceneDefinition,
    private readonly context: RuleContext
  ) {}

  get name(): string {
    return this.definition.name;
  }

  /** Condition that holds while every device reports the scene's value. */
  isSet(): ConditionNode {
    return new SceneSetCondition(this.definition);
  }

  /** Condition that holds once the scene's set-membership flips. */
  onChange(): ConditionNode {
    return new SceneChangeCondition(this.definition);
  }

  /** Sends every device command of the scene. */
  async enable(): Promise<SceneApplyResult> {
    return this.context.enableScene(this.definition.name);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//                             RULE CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Capabilities of one rule run, bound to the rule's name and abort signal.
 *
 * Every suspension point (`wait*`, device calls) checks the signal. An
 * aborted wait cancels its timer or removes its condition tree and rejects
 * with RuleCancelledError.
 */
export class RuleContext {
  private readonly deps: RuleContextDeps;

  constructor(deps: RuleContextDeps) {
    this.deps = deps;
  }

  get ruleName(): string {
    return this.deps.ruleName;
  }

  get executionContext(): ExecutionContext {
    return { ruleName: this.deps.ruleName };
  }

  /** The capability object handed to scripts. */
  capabilities(): RuleCapabilities {
    return {
      device: id => this.device(id),
      scene: name => this.scene(name),
      allOf: (...conditions) => new AllOfCondition(conditions),
      anyOf: (...conditions) => new AnyOfCondition(conditions),
      isNot: condition => new NotCondition(condition),
      onChange: target => target instanceof SceneHandle ? target.onChange() : target.changes(),
      wait: duration => this.wait(duration),
      waitFor: (condition, options) => this.waitFor(condition, options),
      waitForChange: (target, timeout) => this.waitForChange(target, timeout),
      waitUntil: time => this.waitUntil(time),
      check: condition => this.check(condition),
    };
  }

  device(id: string | number): DeviceHandle {
    return new DeviceHandle(String(id), this);
  }

  /**
   * @throws NotFoundError for an unknown scene
   */
  scene(name: string): SceneHandle {
    const definition = this.deps.scenes.getScene(name);
    if (!definition) {
      throw new NotFoundError('scene', name);
    }
    return new SceneHandle(definition, this);
  }

  // ─────────────────────────────────────────────────────────────────────────
  //  Wait primitives
  // ─────────────────────────────────────────────────────────────────────────

  /** Sleeps for a duration ("30s", "5m" or ms). */
  async wait(duration: Duration): Promise<void> {
    let delayMs: number;
    try {
      delayMs = parseDuration(duration);
    } catch (error) {
      throw new TimerError(describeError(error));
    }
    await this.sleepUntil(this.deps.timers.now() + delayMs, 'sleep');
  }

  /** Sleeps until the next occurrence of a wall-clock time ("07:30"). */
  async waitUntil(time: string): Promise<void> {
    const next = nextTimeOfDay(time, new Date(this.deps.timers.now()));
    await this.sleepUntil(next.getTime(), 'sleep');
  }

  /**
   * Suspends until the condition fires.
   *
   * The values the tree needs are fetched first, then the tree is
   * registered with the engine.
   *
   * @returns true when the condition fired, false when the timeout elapsed first
   */
  async waitFor(condition: ConditionNode, options: ConditionTiming = {}): Promise<boolean> {
    this.throwIfCancelled();
    await loadConditionValues(condition, this.deps.hub, this.deps.cache, this.executionContext);
    this.throwIfCancelled();

    const fired = new Signal();
    const timedOut = new Signal();
    const cancelled = new Signal();

    await this.deps.engine.addCondition(condition, { fired, timeout: timedOut }, {
      timeout: options.timeout,
      forDuration: options.forDuration,
      context: this.executionContext,
    });

    const onAbort = (): void => cancelled.set();
    this.deps.signal.addEventListener('abort', onAbort, { once: true });
    if (this.deps.signal.aborted) cancelled.set();

    try {
      await Promise.race([fired.wait(), timedOut.wait(), cancelled.wait()]);
    } finally {
      this.deps.signal.removeEventListener('abort', onAbort);
    }

    if (fired.isSet) return true;
    if (timedOut.isSet) return false;

    await this.removeIfRegistered(condition);
    throw new RuleCancelledError(this.deps.ruleName);
  }

  /**
   * Suspends until the attribute differs from its current value.
   *
   * @returns false when the timeout elapsed first
   */
  async waitForChange(target: AttributeRef, timeout?: Duration): Promise<boolean> {
    return this.waitFor(target.changes(), { timeout });
  }

  /**
   * Evaluates a condition right now against the last known values.
   * Registered trees report their live state; nothing is fetched or registered.
   */
  check(condition: ConditionNode): boolean {
    if (this.deps.engine.isRegistered(condition)) {
      return this.deps.engine.getConditionState(condition);
    }
    return initializeTree(condition, this.deps.cache);
  }

  // ─────────────────────────────────────────────────────────────────────────
  //  Device and scene calls
  // ─────────────────────────────────────────────────────────────────────────

  async fetchAttribute(deviceId: string, attribute: string): Promise<AttributeValue> {
    this.throwIfCancelled();
    const key = { deviceId, attribute };
    const since = this.deps.cache.sequence(key);

    let value: AttributeValue;
    try {
      value = await this.deps.hub.fetch(deviceId, attribute, { ...this.executionContext, deviceId });
    } catch (error) {
      throw error instanceof DeviceCommunicationError
        ? error
        : new DeviceCommunicationError(deviceId, `fetch ${attribute}`, error);
    }

    this.deps.cache.fill(key, value, since);
    return value;
  }

  async sendCommand(deviceId: string, command: string, args: AttributeValue[]): Promise<void> {
    this.throwIfCancelled();
    const started = Date.now();

    try {
      await this.deps.hub.sendCommand(deviceId, command, args, { ...this.executionContext, deviceId });
    } catch (error) {
      this.deps.audit.record('device_command_failed', { command, arguments: args }, {
        source: 'rule-context',
        ruleName: this.deps.ruleName,
        deviceId,
        success: false,
        error: describeError(error),
        durationMs: Date.now() - started,
      });
      throw error instanceof DeviceCommunicationError
        ? error
        : new DeviceCommunicationError(deviceId, `command ${command}`, error);
    }

    this.deps.audit.record('device_command_sent', { command, arguments: args }, {
      source: 'rule-context',
      ruleName: this.deps.ruleName,
      deviceId,
      success: true,
      durationMs: Date.now() - started,
    });
  }

  async enableScene(name: string): Promise<SceneApplyResult> {
    this.throwIfCancelled();
    return this.deps.scenes.enableScene(name, { ...this.executionContext, sceneName: name });
  }

  /**
   * Sleeps until an absolute time. A deadline in the past resumes on the
   * next turn of the event loop.
   */
  sleepUntil(deadline: number, kind: TimerKind = 'sleep'): Promise<void> {
    this.throwIfCancelled();
    const { signal, timers, ruleName } = this.deps;

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        timers.cancel(timer);
        reject(new RuleCancelledError(ruleName));
      };

      const timer = timers.scheduleAt(deadline, () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, { kind, ownerId: ruleName });

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  //  Internals
  // ─────────────────────────────────────────────────────────────────────────

  private async removeIfRegistered(condition: ConditionNode): Promise<void> {
    if (!this.deps.engine.isRegistered(condition)) return;
    try {
      await this.deps.engine.removeCondition(condition);
    } catch (error) {
      // Settled between the check and the removal
      if (!(error instanceof NotFoundError)) throw error;
    }
  }

  private throwIfCancelled(): void {
    if (this.deps.signal.aborted) {
      throw new RuleCancelledError(this.deps.ruleName);
    }
  }
}
