export { loadConfigFromYAML, loadConfigFromFile } from './loader.js';
export { validateDocument, validateRule, validateScene } from './schema.js';
export type { AutomationDocument, EngineSettings, AuditSettings } from './types.js';
