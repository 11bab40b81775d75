import { describe, it, expect } from 'vitest';
import { validateDocument, validateRule, validateScene } from '../../../src/config/schema';
import { ConfigValidationError } from '../../../src/errors';

const rule = {
  name: 'porch',
  trigger: 'device(1).attribute("x").eq(1)',
  action: 'await device(2).sendCommand("on")',
};

const scene = {
  name: 'evening',
  devices: [{ device: 1, attribute: 'switch', value: 'on', command: 'on' }],
};

describe('validateRule', () => {
  it('defaults the kind to condition', () => {
    expect(validateRule(rule, 'rules[0]')).toEqual({ ...rule, kind: 'condition' });
  });

  it('keeps a scheduled kind and the description', () => {
    expect(validateRule({ ...rule, kind: 'scheduled', description: 'nightly' }, 'rules[0]')).toEqual({
      ...rule,
      kind: 'scheduled',
      description: 'nightly',
    });
  });

  it('rejects an unknown kind', () => {
    expect(() => validateRule({ ...rule, kind: 'hourly' }, 'rules[0]'))
      .toThrow('rules[0].kind: must be one of: condition, scheduled, got "hourly"');
  });

  it('requires name, trigger and action', () => {
    expect(() => validateRule({ trigger: 'a', action: 'b' }, 'rules[1]'))
      .toThrow('rules[1]: missing required field "name"');
    expect(() => validateRule({ name: 'a', action: 'b' }, 'rules[1]'))
      .toThrow('rules[1]: missing required field "trigger"');
    expect(() => validateRule({ ...rule, action: '' }, 'rules[1]'))
      .toThrow('rules[1].action: must be a non-empty string, got empty string');
  });

  it('rejects unknown fields', () => {
    expect(() => validateRule({ ...rule, priority: 5 }, 'rules[0]'))
      .toThrow('rules[0]: unknown field "priority" (allowed: name, kind, description, trigger, action)');
  });

  it('rejects a non-object', () => {
    expect(() => validateRule(['porch'], 'rules[0]')).toThrow('rules[0]: must be an object, got array');
  });
});

describe('validateScene', () => {
  it('turns numeric device ids into strings and defaults arguments', () => {
    expect(validateScene(scene, 'scenes[0]')).toEqual({
      name: 'evening',
      deviceStates: [{ deviceId: '1', attribute: 'switch', value: 'on', command: 'on', arguments: [] }],
    });
  });

  it('accepts a null target value', () => {
    const result = validateScene({
      name: 'reset',
      devices: [{ device: 'thermostat', attribute: 'mode', value: null, command: 'auto' }],
    }, 'scenes[0]');

    expect(result.deviceStates[0]?.value).toBeNull();
  });

  it('requires at least one device state', () => {
    expect(() => validateScene({ name: 'empty', devices: [] }, 'scenes[0]'))
      .toThrow('scenes[0].devices: must contain at least one device state');
  });

  it('requires a value on each device state', () => {
    expect(() => validateScene({
      name: 'evening',
      devices: [{ device: 1, attribute: 'switch', command: 'on' }],
    }, 'scenes[0]')).toThrow('scenes[0].devices[0]: missing required field "value"');
  });

  it('rejects structured values and arguments', () => {
    expect(() => validateScene({
      name: 'evening',
      devices: [{ device: 1, attribute: 'color', value: { hue: 10 }, command: 'setColor' }],
    }, 'scenes[0]')).toThrow('scenes[0].devices[0].value: must be a string, number, boolean or null, got object');

    expect(() => validateScene({
      name: 'evening',
      devices: [{ device: 1, attribute: 'level', value: 30, command: 'setLevel', arguments: [[30]] }],
    }, 'scenes[0]')).toThrow('scenes[0].devices[0].arguments[0]: must be a string, number, boolean or null, got array');
  });
});

describe('validateDocument', () => {
  it('fills in empty sections', () => {
    expect(validateDocument({})).toEqual({ engine: {}, scenes: [], rules: [] });
  });

  it('parses durations in engine and audit settings', () => {
    const document = validateDocument({
      engine: { retryDelay: '1m', maxTimers: 10 },
      audit: { flushInterval: '2s', batchSize: 50 },
    });

    expect(document.engine).toEqual({ retryDelayMs: 60_000, maxTimers: 10 });
    expect(document.audit).toEqual({ flushIntervalMs: 2_000, batchSize: 50 });
  });

  it('rejects an invalid duration', () => {
    expect(() => validateDocument({ engine: { retryDelay: 'soon' } }))
      .toThrow('engine.retryDelay: invalid duration "soon"');
  });

  it('rejects a non-positive maxTimers', () => {
    expect(() => validateDocument({ engine: { maxTimers: 0 } }))
      .toThrow('engine.maxTimers: must be a positive integer, got number');
  });

  it('rejects duplicate names', () => {
    expect(() => validateDocument({ rules: [rule, rule] }))
      .toThrow('rules[1].name: duplicate name "porch"');
    expect(() => validateDocument({ scenes: [scene, scene] }))
      .toThrow('scenes[1].name: duplicate name "evening"');
  });

  it('rejects unknown top-level sections', () => {
    expect(() => validateDocument({ devices: [] }))
      .toThrow('config: unknown field "devices" (allowed: engine, audit, scenes, rules)');
  });

  it('reports errors as ConfigValidationError with the path', () => {
    try {
      validateDocument({ rules: 'porch' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toMatchObject({ path: 'rules', code: 'CONFIG_VALIDATION_ERROR' });
    }
  });
});
