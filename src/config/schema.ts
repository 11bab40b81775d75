/**
 * Validation of configuration documents with path-aware error messages
 * (`rules[2].trigger: must be a non-empty string, got number`).
 *
 * @module
 */

import { ConfigValidationError } from '../errors.js';
import type { AttributeValue } from '../types/device.js';
import type { RuleDefinition, RuleKind } from '../types/rule.js';
import type { SceneDefinition, SceneDeviceState } from '../types/scene.js';
import { parseDuration } from '../utils/duration-parser.js';
import type { AuditSettings, AutomationDocument, EngineSettings } from './types.js';

const RULE_KINDS: ReadonlySet<string> = new Set<RuleKind>(['condition', 'scheduled']);

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function has(obj: Record<string, unknown>, key: string): boolean {
  return key in obj && obj[key] !== undefined && obj[key] !== null;
}

function requireField(obj: Record<string, unknown>, field: string, path: string): unknown {
  if (!has(obj, field)) {
    throw new ConfigValidationError(`missing required field "${field}"`, path);
  }
  return obj[field];
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigValidationError(
      `must be a non-empty string, got ${value === '' ? 'empty string' : describeType(value)}`,
      path,
    );
  }
  return value;
}

/** Device ids may be written as numbers; they are kept as strings. */
function requireId(value: unknown, path: string): string {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return String(value);
  }
  return requireString(value, path);
}

function requirePositiveInteger(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`must be a positive integer, got ${describeType(value)}`, path);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(`must be an array, got ${describeType(value)}`, path);
  }
  return value;
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ConfigValidationError(`must be an object, got ${describeType(value)}`, path);
  }
  return value;
}

function requireScalar(value: unknown, path: string): AttributeValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  ) {
    return value;
  }
  throw new ConfigValidationError(`must be a string, number, boolean or null, got ${describeType(value)}`, path);
}

function requireDurationMs(value: unknown, path: string): number {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigValidationError(`must be a duration ("30s", "5m") or milliseconds, got ${describeType(value)}`, path);
  }
  try {
    return parseDuration(value);
  } catch {
    throw new ConfigValidationError(`invalid duration "${value}"`, path);
  }
}

function rejectUnknownKeys(obj: Record<string, unknown>, allowed: readonly string[], path: string): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      throw new ConfigValidationError(`unknown field "${key}" (allowed: ${allowed.join(', ')})`, path);
    }
  }
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function validateEngine(value: unknown, path: string): EngineSettings {
  const obj = requireObject(value, path);
  rejectUnknownKeys(obj, ['name', 'retryDelay', 'maxTimers'], path);

  return {
    ...(has(obj, 'name') && { name: requireString(obj['name'], `${path}.name`) }),
    ...(has(obj, 'retryDelay') && { retryDelayMs: requireDurationMs(obj['retryDelay'], `${path}.retryDelay`) }),
    ...(has(obj, 'maxTimers') && { maxTimers: requirePositiveInteger(obj['maxTimers'], `${path}.maxTimers`) }),
  };
}

function validateAudit(value: unknown, path: string): AuditSettings {
  const obj = requireObject(value, path);
  rejectUnknownKeys(obj, ['maxMemoryEntries', 'batchSize', 'flushInterval'], path);

  return {
    ...(has(obj, 'maxMemoryEntries') && {
      maxMemoryEntries: requirePositiveInteger(obj['maxMemoryEntries'], `${path}.maxMemoryEntries`),
    }),
    ...(has(obj, 'batchSize') && { batchSize: requirePositiveInteger(obj['batchSize'], `${path}.batchSize`) }),
    ...(has(obj, 'flushInterval') && {
      flushIntervalMs: requireDurationMs(obj['flushInterval'], `${path}.flushInterval`),
    }),
  };
}

function validateDeviceState(value: unknown, path: string): SceneDeviceState {
  const obj = requireObject(value, path);
  rejectUnknownKeys(obj, ['device', 'attribute', 'value', 'command', 'arguments'], path);

  if (!('value' in obj)) {
    throw new ConfigValidationError('missing required field "value"', path);
  }

  const args = has(obj, 'arguments') ? requireArray(obj['arguments'], `${path}.arguments`) : [];

  return {
    deviceId: requireId(requireField(obj, 'device', path), `${path}.device`),
    attribute: requireString(requireField(obj, 'attribute', path), `${path}.attribute`),
    value: requireScalar(obj['value'], `${path}.value`),
    command: requireString(requireField(obj, 'command', path), `${path}.command`),
    arguments: args.map((arg, i) => requireScalar(arg, `${path}.arguments[${i}]`)),
  };
}

/**
 * Validates one scene definition.
 *
 * @throws ConfigValidationError
 */
export function validateScene(value: unknown, path: string): SceneDefinition {
  const obj = requireObject(value, path);
  rejectUnknownKeys(obj, ['name', 'description', 'devices'], path);

  const devices = requireArray(requireField(obj, 'devices', path), `${path}.devices`);
  if (devices.length === 0) {
    throw new ConfigValidationError('must contain at least one device state', `${path}.devices`);
  }

  return {
    name: requireString(requireField(obj, 'name', path), `${path}.name`),
    ...(has(obj, 'description') && { description: requireString(obj['description'], `${path}.description`) }),
    deviceStates: devices.map((item, i) => validateDeviceState(item, `${path}.devices[${i}]`)),
  };
}

/**
 * Validates one rule definition. `kind` defaults to `condition`.
 *
 * @throws ConfigValidationError
 */
export function validateRule(value: unknown, path: string): RuleDefinition {
  const obj = requireObject(value, path);
  rejectUnknownKeys(obj, ['name', 'kind', 'description', 'trigger', 'action'], path);

  let kind: RuleKind = 'condition';
  if (has(obj, 'kind')) {
    const raw = requireString(obj['kind'], `${path}.kind`);
    if (!RULE_KINDS.has(raw)) {
      throw new ConfigValidationError(`must be one of: condition, scheduled, got "${raw}"`, `${path}.kind`);
    }
    kind = raw === 'scheduled' ? 'scheduled' : 'condition';
  }

  return {
    name: requireString(requireField(obj, 'name', path), `${path}.name`),
    kind,
    trigger: requireString(requireField(obj, 'trigger', path), `${path}.trigger`),
    action: requireString(requireField(obj, 'action', path), `${path}.action`),
    ...(has(obj, 'description') && { description: requireString(obj['description'], `${path}.description`) }),
  };
}

/**
 * Validates a whole configuration document.
 *
 * @throws ConfigValidationError
 */
export function validateDocument(value: unknown): AutomationDocument {
  const obj = requireObject(value, 'config');
  rejectUnknownKeys(obj, ['engine', 'audit', 'scenes', 'rules'], 'config');

  const scenes = has(obj, 'scenes')
    ? requireArray(obj['scenes'], 'scenes').map((item, i) => validateScene(item, `scenes[${i}]`))
    : [];
  const rules = has(obj, 'rules')
    ? requireArray(obj['rules'], 'rules').map((item, i) => validateRule(item, `rules[${i}]`))
    : [];

  assertUniqueNames(scenes, 'scenes');
  assertUniqueNames(rules, 'rules');

  return {
    engine: has(obj, 'engine') ? validateEngine(obj['engine'], 'engine') : {},
    ...(has(obj, 'audit') && { audit: validateAudit(obj['audit'], 'audit') }),
    scenes,
    rules,
  };
}

function assertUniqueNames(items: readonly { name: string }[], path: string): void {
  const seen = new Set<string>();
  items.forEach((item, i) => {
    if (seen.has(item.name)) {
      throw new ConfigValidationError(`duplicate name "${item.name}"`, `${path}[${i}].name`);
    }
    seen.add(item.name);
  });
}
