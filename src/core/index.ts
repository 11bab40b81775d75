export { AttributeCache } from './attribute-cache.js';
export { DeviceEventRouter } from './device-event-router.js';
export { TimerService, nextTimeOfDay, MAX_TIMEOUT_MS, type TimerServiceConfig } from './timer-service.js';
export {
  RuleEngine,
  type RuleEngineConfig,
  type AttributeStore,
  type ConditionSignals,
  type AddConditionOptions,
  type EngineStats,
} from './rule-engine.js';
export {
  RuleContext,
  AttributeRef,
  DeviceHandle,
  SceneHandle,
  CAPABILITY_NAMES,
  type RuleCapabilities,
  type RuleContextDeps,
} from './rule-context.js';
export {
  RuleExecutionCoordinator,
  type RuleCoordinatorConfig,
  type RuleErrorHandler,
  type RuleFilter,
} from './rule-coordinator.js';
export {
  HomeAutomation,
  type HomeAutomationConfig,
  type HomeAutomationStats,
  type RulePersistenceConfig,
  type AuditPersistenceConfig,
} from './home-automation.js';
