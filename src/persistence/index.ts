export { RulePersistence, type RulePersistenceOptions } from './rule-persistence.js';
