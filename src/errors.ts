/**
 * Error hierarchy shared by the engine, the coordinator and collaborators.
 *
 * Every error carries a stable `code`, so callers can branch on it without
 * `instanceof` checks across module boundaries:
 *
 * ```typescript
 * try {
 *   await automation.uninstall('porch-light');
 * } catch (err) {
 *   if (err instanceof HomeRulesError && err.code === 'NOT_FOUND') {
 *     // nothing installed under that name
 *   }
 * }
 * ```
 *
 * @module
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE'
  | 'SCRIPT_ERROR'
  | 'TIMER_ERROR'
  | 'DEVICE_COMMUNICATION_ERROR'
  | 'RULE_CANCELLED'
  | 'CONFIG_VALIDATION_ERROR';

/** Common ancestor of all errors raised by this package. */
export class HomeRulesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HomeRulesError';
    this.code = code;
  }
}

/** Operation on an unknown or already removed condition or rule. */
export class NotFoundError extends HomeRulesError {
  readonly resource: 'condition' | 'rule' | 'scene';
  readonly key: string;

  constructor(resource: 'condition' | 'rule' | 'scene', key: string) {
    super('NOT_FOUND', `${capitalize(resource)} "${key}" is not registered`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.key = key;
  }
}

/** Registration of a condition id or rule name that is already active. */
export class DuplicateError extends HomeRulesError {
  readonly resource: 'condition' | 'rule' | 'scene';
  readonly key: string;

  constructor(resource: 'condition' | 'rule' | 'scene', key: string) {
    super('DUPLICATE', `${capitalize(resource)} "${key}" is already registered`);
    this.name = 'DuplicateError';
    this.resource = resource;
    this.key = key;
  }
}

/** Which part of a rule a script belongs to. */
export type ScriptEntry = 'trigger' | 'timer' | 'action';

/**
 * Compile or runtime failure of a rule-author script.
 *
 * The original failure, if any, is kept in `cause`.
 */
export class ScriptError extends HomeRulesError {
  readonly ruleName: string | undefined;
  readonly entry: ScriptEntry | undefined;

  constructor(
    message: string,
    options: { ruleName?: string | undefined; entry?: ScriptEntry | undefined; cause?: unknown } = {},
  ) {
    super('SCRIPT_ERROR', message, { cause: options.cause });
    this.name = 'ScriptError';
    this.ruleName = options.ruleName;
    this.entry = options.entry;
  }

  /**
   * Wraps an arbitrary failure thrown by a script invocation.
   * A ScriptError passes through with its rule name and entry filled in.
   */
  static from(error: unknown, ruleName: string, entry: ScriptEntry): ScriptError {
    if (error instanceof ScriptError) {
      if (error.ruleName !== undefined && error.entry !== undefined) {
        return error;
      }
      return new ScriptError(error.message, {
        ruleName: error.ruleName ?? ruleName,
        entry: error.entry ?? entry,
        cause: error.cause,
      });
    }
    return new ScriptError(
      `Rule "${ruleName}" ${entry} script failed: ${describeError(error)}`,
      { ruleName, entry, cause: error },
    );
  }
}

/** Timer could not be scheduled. */
export class TimerError extends HomeRulesError {
  constructor(message: string) {
    super('TIMER_ERROR', message);
    this.name = 'TimerError';
  }
}

/** The hub failed while reading an attribute or executing a command. */
export class DeviceCommunicationError extends HomeRulesError {
  readonly deviceId: string;
  readonly operation: string;

  constructor(deviceId: string, operation: string, cause?: unknown) {
    super(
      'DEVICE_COMMUNICATION_ERROR',
      `Device ${deviceId}: ${operation} failed${cause === undefined ? '' : `: ${describeError(cause)}`}`,
      { cause },
    );
    this.name = 'DeviceCommunicationError';
    this.deviceId = deviceId;
    this.operation = operation;
  }
}

/** A wait primitive was interrupted because its rule was uninstalled. */
export class RuleCancelledError extends HomeRulesError {
  readonly ruleName: string;

  constructor(ruleName: string) {
    super('RULE_CANCELLED', `Rule "${ruleName}" was cancelled`);
    this.name = 'RuleCancelledError';
    this.ruleName = ruleName;
  }
}

/** Malformed configuration document. */
export class ConfigValidationError extends HomeRulesError {
  readonly path: string;

  constructor(message: string, path: string) {
    super('CONFIG_VALIDATION_ERROR', `${path}: ${message}`);
    this.name = 'ConfigValidationError';
    this.path = path;
  }
}

/** Human-readable message for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
