import type { RuleDefinition } from '../types/rule.js';
import type { SceneDefinition } from '../types/scene.js';

/** Engine and coordinator settings of a configuration document */
export interface EngineSettings {
  /** Name used in log lines and audit entries */
  name?: string;
  /** Pause before re-arming after a failed trigger or timer script, in ms */
  retryDelayMs?: number;
  /** Upper bound on pending timers */
  maxTimers?: number;
}

/** Audit log settings of a configuration document */
export interface AuditSettings {
  maxMemoryEntries?: number;
  batchSize?: number;
  flushIntervalMs?: number;
}

/**
 * Validated configuration document.
 *
 * ```yaml
 * engine:
 *   name: home
 *   retryDelay: 30s
 * scenes:
 *   - name: evening
 *     devices:
 *       - { device: 12, attribute: switch, value: "on", command: "on" }
 * rules:
 *   - name: motion_lights
 *     trigger: device(123).attribute("motion").eq("active")
 *     action: |
 *       await device(456).sendCommand("on");
 *       await wait("5m");
 *       await device(456).sendCommand("off");
 * ```
 */
export interface AutomationDocument {
  engine: EngineSettings;
  audit?: AuditSettings;
  scenes: SceneDefinition[];
  rules: RuleDefinition[];
}
