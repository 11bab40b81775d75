import type { StorageAdapter } from '@hamicek/noex';
import { AuditLogService } from '../audit/audit-log-service.js';
import { NOOP_AUDIT, type AuditConfig, type AuditSink } from '../audit/types.js';
import type { AutomationDocument } from '../config/types.js';
import { describeError } from '../errors.js';
import { RulePersistence, type RulePersistenceOptions } from '../persistence/rule-persistence.js';
import { SceneManager } from '../scenes/scene-manager.js';
import type { ScriptExecutor } from '../scripting/types.js';
import type { DeviceEvent, HubClient } from '../types/device.js';
import type { Rule, RuleDefinition } from '../types/rule.js';
import { AttributeCache } from './attribute-cache.js';
import { RuleExecutionCoordinator, type RuleErrorHandler, type RuleFilter } from './rule-coordinator.js';
import { RuleEngine, type EngineStats } from './rule-engine.js';
import { TimerService } from './timer-service.js';

export interface RulePersistenceConfig extends RulePersistenceOptions {
  adapter: StorageAdapter;
}

export interface AuditPersistenceConfig extends AuditConfig {
  /** Without an adapter entries live only in memory */
  adapter?: StorageAdapter;
}

export interface HomeAutomationConfig {
  hub: HubClient;
  /** Engine settings, scenes and rules loaded from a configuration file */
  document?: AutomationDocument;
  /** Overrides `document.engine.name` (default: 'home-automation') */
  name?: string;
  /** Persist installed rules and restore them on start */
  persistence?: RulePersistenceConfig;
  /** Enables the audit log; `document.audit` settings apply underneath */
  audit?: AuditPersistenceConfig;
  executor?: ScriptExecutor;
  onError?: RuleErrorHandler;
  /** Overrides `document.engine.retryDelayMs` */
  retryDelayMs?: number;
  /** Overrides `document.engine.maxTimers` */
  maxTimers?: number;
}

export interface HomeAutomationStats {
  engine: EngineStats;
  rules: number;
  scenes: number;
  timers: number;
  cachedAttributes: number;
}

/**
 * Entry point: wires the attribute cache, the condition engine, the timer
 * service, the scene manager and the rule coordinator to one hub.
 *
 * @example
 * ```typescript
 * const automation = await HomeAutomation.start({ hub, document });
 *
 * await automation.install({
 *   name: 'hall-light',
 *   kind: 'condition',
 *   trigger: 'device(12).attribute("motion").eq("active")',
 *   action: 'await device(34).sendCommand("on")',
 * });
 *
 * await automation.stop();
 * ```
 */
export class HomeAutomation {
  readonly name: string;
  readonly engine: RuleEngine;
  readonly scenes: SceneManager;
  readonly timers: TimerService;
  readonly cache: AttributeCache;
  readonly audit: AuditLogService | null;

  private readonly coordinator: RuleExecutionCoordinator;
  private unsubscribe: (() => void) | null = null;
  private running = false;

  private constructor(
    name: string,
    engine: RuleEngine,
    scenes: SceneManager,
    timers: TimerService,
    cache: AttributeCache,
    coordinator: RuleExecutionCoordinator,
    audit: AuditLogService | null,
  ) {
    this.name = name;
    this.engine = engine;
    this.scenes = scenes;
    this.timers = timers;
    this.cache = cache;
    this.coordinator = coordinator;
    this.audit = audit;
  }

  /**
   * Creates and starts the whole stack.
   *
   * Persisted rules are restored first. A document rule replaces a
   * restored rule of the same name. If a rule cannot be installed, every
   * part started so far is stopped again before the error is rethrown.
   */
  static async start(config: HomeAutomationConfig): Promise<HomeAutomation> {
    const document = config.document;
    const settings = document?.engine ?? {};
    const name = config.name ?? settings.name ?? 'home-automation';

    let auditLog: AuditLogService | null = null;
    if (config.audit || document?.audit) {
      const options: AuditPersistenceConfig = config.audit ?? {};
      const { adapter, ...auditConfig } = options;
      auditLog = await AuditLogService.start(adapter, { ...document?.audit, ...auditConfig });
    }
    const audit: AuditSink = auditLog ?? NOOP_AUDIT;

    const maxTimers = config.maxTimers ?? settings.maxTimers;
    const timers = new TimerService(maxTimers !== undefined ? { maxTimers } : {});
    const cache = new AttributeCache();

    const engine = await RuleEngine.start({ name, timers, values: cache, audit });
    const scenes = new SceneManager({ hub: config.hub, audit, scenes: document?.scenes ?? [] });

    let persistence: RulePersistence | undefined;
    if (config.persistence) {
      const { adapter, ...options } = config.persistence;
      persistence = new RulePersistence(adapter, options);
    }

    const retryDelayMs = config.retryDelayMs ?? settings.retryDelayMs;
    const coordinator = new RuleExecutionCoordinator({
      name: `${name}-rules`,
      engine,
      timers,
      hub: config.hub,
      cache,
      scenes,
      audit,
      ...(persistence !== undefined && { persistence }),
      ...(config.executor !== undefined && { executor: config.executor }),
      ...(config.onError !== undefined && { onError: config.onError }),
      ...(retryDelayMs !== undefined && { retryDelayMs }),
    });

    const automation = new HomeAutomation(name, engine, scenes, timers, cache, coordinator, auditLog);
    automation.running = true;

    if (config.hub.subscribe) {
      automation.unsubscribe = config.hub.subscribe(event => automation.dispatch(event));
    }

    try {
      await coordinator.restore();
      for (const rule of document?.rules ?? []) {
        if (coordinator.has(rule.name)) {
          await coordinator.uninstall(rule.name);
        }
        await coordinator.install(rule);
      }
    } catch (error) {
      await automation.stop();
      throw error;
    }

    return automation;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              DEVICE EVENTS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Feeds one hub notification into the condition engine, which records it
   * in the cache. Called by the hub subscription; hubs without `subscribe`
   * push here.
   */
  async dispatch(event: DeviceEvent): Promise<void> {
    if (!this.running) return;

    try {
      await this.engine.onDeviceEvent(event);
    } catch (error) {
      console.error(
        `[${this.name}] Failed to process event ${event.deviceId}.${event.attribute}:`,
        describeError(error),
      );
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                                 RULES
  // ═══════════════════════════════════════════════════════════════════════════

  async install(definition: RuleDefinition): Promise<Rule> {
    return this.coordinator.install(definition);
  }

  async uninstall(name: string): Promise<Rule> {
    return this.coordinator.uninstall(name);
  }

  getRule(name: string): Rule | undefined {
    return this.coordinator.get(name);
  }

  listRules(filter: RuleFilter = {}): Rule[] {
    return this.coordinator.list(filter);
  }

  getStats(): HomeAutomationStats {
    return {
      engine: this.engine.getStats(),
      rules: this.coordinator.size,
      scenes: this.scenes.size,
      timers: this.timers.size,
      cachedAttributes: this.cache.size,
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Stops every rule task, the engine and the timers. Installed rules stay
   * persisted and are restored on the next start.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.unsubscribe?.();
    this.unsubscribe = null;

    await this.coordinator.stop();
    await this.engine.stop();
    this.timers.stop();
    await this.audit?.stop();
  }
}
