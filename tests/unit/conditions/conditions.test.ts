import { describe, it, expect, beforeEach } from 'vitest';
import {
  AllOfCondition,
  AnyOfCondition,
  AttributeCondition,
  ChangeCondition,
  DeviceComparisonCondition,
  NotCondition,
  SceneChangeCondition,
  SceneSetCondition,
} from '../../../src/conditions';
import { initializeTree } from '../../../src/conditions/tree';
import { AttributeCache } from '../../../src/core/attribute-cache';
import type { AttributeValue, DeviceEvent } from '../../../src/types/device';
import type { SceneDefinition } from '../../../src/types/scene';

const event = (deviceId: string, attribute: string, value: AttributeValue): DeviceEvent => ({
  deviceId,
  attribute,
  value,
  timestamp: 0,
});

describe('condition nodes', () => {
  let cache: AttributeCache;

  beforeEach(() => {
    cache = new AttributeCache();
  });

  describe('AttributeCondition', () => {
    it('initializes from looked-up values, coerced to the operand type', () => {
      cache.set('12', 'temperature', '21.5');
      const condition = new AttributeCondition('12', 'temperature', 'gt', 20);

      expect(condition.initialize(cache)).toBe(true);
      expect(condition.currentValue).toBe(21.5);
    });

    it('is false while no value is known', () => {
      const condition = new AttributeCondition('12', 'motion', 'neq', 'active');

      expect(condition.initialize(cache)).toBe(false);
      expect(condition.currentValue).toBeUndefined();
    });

    it('recomputes on a matching event only', () => {
      cache.set('12', 'motion', 'inactive');
      const condition = new AttributeCondition('12', 'motion', 'eq', 'active');
      condition.initialize(cache);

      expect(condition.recompute(event('12', 'battery', 80))).toBeUndefined();
      expect(condition.recompute(event('13', 'motion', 'active'))).toBeUndefined();
      expect(condition.currentState()).toBe(false);

      expect(condition.recompute(event('12', 'motion', 'active'))).toBe(true);
      expect(condition.currentState()).toBe(true);
    });

    it('describes itself', () => {
      expect(new AttributeCondition('12', 'motion', 'eq', 'active').label).toBe('device(12).motion == "active"');
      expect(new AttributeCondition('1', 'mode', 'in', ['home', 'night']).label)
        .toBe('device(1).mode in ["home","night"]');
    });

    it('requires a list operand exactly for membership operators', () => {
      expect(() => new AttributeCondition('1', 'mode', 'in', 'home'))
        .toThrow('Operator "in" requires a list operand');
      expect(() => new AttributeCondition('1', 'mode', 'eq', ['home']))
        .toThrow('Operator "eq" does not accept a list operand');
    });

    it('watches exactly one attribute', () => {
      const condition = new AttributeCondition('12', 'motion', 'eq', 'active');

      expect(condition.requirements()).toEqual([{ deviceId: '12', attribute: 'motion' }]);
      expect(condition.deviceIds).toEqual(['12']);
      expect(condition.isLeaf).toBe(true);
    });
  });

  describe('DeviceComparisonCondition', () => {
    const left = { deviceId: '7', attribute: 'temperature' };
    const right = { deviceId: '8', attribute: 'temperature' };

    it('coerces the right side to the type of the left side', () => {
      cache.set('7', 'temperature', 22);
      cache.set('8', 'temperature', '21');
      const condition = new DeviceComparisonCondition(left, 'gt', right);

      expect(condition.initialize(cache)).toBe(true);
      expect(condition.recompute(event('8', 'temperature', 23))).toBe(false);
    });

    it('is false while either side is unknown', () => {
      cache.set('7', 'temperature', 22);
      const condition = new DeviceComparisonCondition(left, 'gt', right);

      expect(condition.initialize(cache)).toBe(false);
      expect(condition.recompute(event('8', 'temperature', 20))).toBe(true);
    });

    it('updates both sides when they watch the same attribute', () => {
      const condition = new DeviceComparisonCondition(left, 'eq', left);
      condition.initialize(cache);

      expect(condition.recompute(event('7', 'temperature', 5))).toBe(true);
    });

    it('rejects membership operators', () => {
      expect(() => new DeviceComparisonCondition(left, 'in', right))
        .toThrow('Operator "in" cannot compare two device attributes');
    });

    it('subscribes to both devices', () => {
      const condition = new DeviceComparisonCondition(left, 'lt', right);

      expect(condition.deviceIds).toEqual(['7', '8']);
      expect(condition.label).toBe('device(7).temperature < device(8).temperature');
    });
  });

  describe('boolean combinators', () => {
    it('combines the cached states of their children', () => {
      cache.set('1', 'a', 1);
      const a = new AttributeCondition('1', 'a', 'eq', 1);
      const b = new AttributeCondition('2', 'b', 'eq', 2);
      const all = new AllOfCondition([a, b]);
      const any = new AnyOfCondition([a, b]);

      initializeTree(all, cache);
      initializeTree(any, cache);
      expect(all.currentState()).toBe(false);
      expect(any.currentState()).toBe(true);

      b.recompute(event('2', 'b', 2));
      expect(all.recompute()).toBe(true);
    });

    it('negates its child', () => {
      const child = new AttributeCondition('1', 'a', 'eq', 1);
      const not = new NotCondition(child);

      expect(initializeTree(not, cache)).toBe(true);
      child.recompute(event('1', 'a', 1));
      expect(not.recompute()).toBe(false);
    });

    it('builds labels from their children', () => {
      const a = new AttributeCondition('1', 'a', 'eq', 1);
      const b = new AttributeCondition('2', 'b', 'eq', 2);

      expect(new AllOfCondition([a, b]).label).toBe('(device(1).a == 1 and device(2).b == 2)');
      expect(new AnyOfCondition([a, b]).label).toBe('(device(1).a == 1 or device(2).b == 2)');
      expect(new NotCondition(a).label).toBe('not device(1).a == 1');
    });

    it('reject an empty child list', () => {
      expect(() => new AllOfCondition([])).toThrow('allOf requires at least one condition');
      expect(() => new AnyOfCondition([])).toThrow('anyOf requires at least one condition');
    });

    it('have no requirements of their own', () => {
      const all = new AllOfCondition([new AttributeCondition('1', 'a', 'eq', 1)]);

      expect(all.requirements()).toEqual([]);
      expect(all.isLeaf).toBe(false);
    });
  });

  describe('ChangeCondition', () => {
    it('is true while the value differs from the snapshot', () => {
      cache.set('5', 'level', 10);
      const condition = new ChangeCondition('5', 'level');

      expect(condition.initialize(cache)).toBe(false);
      expect(condition.snapshotValue).toBe(10);
      expect(condition.recompute(event('5', 'level', '10'))).toBe(false);
      expect(condition.recompute(event('5', 'level', 11))).toBe(true);
      expect(condition.recompute(event('5', 'level', 10))).toBe(false);
    });

    it('treats any first value as a change without a snapshot', () => {
      const condition = new ChangeCondition('5', 'level');

      expect(condition.initialize(cache)).toBe(false);
      expect(condition.recompute(event('5', 'level', null))).toBe(true);
    });

    it('describes itself', () => {
      expect(new ChangeCondition('5', 'level').label).toBe('device(5).level changes');
    });
  });

  describe('scene conditions', () => {
    const evening: SceneDefinition = {
      name: 'evening',
      deviceStates: [
        { deviceId: '1', attribute: 'switch', value: 'on', command: 'on', arguments: [] },
        { deviceId: '2', attribute: 'level', value: 40, command: 'setLevel', arguments: [40] },
      ],
    };

    it('is set when every device reports its declared value', () => {
      cache.set('1', 'switch', 'on');
      cache.set('2', 'level', '40');
      const condition = new SceneSetCondition(evening);

      expect(initializeTree(condition, cache)).toBe(true);
      expect(condition.children).toHaveLength(2);
      expect(condition.label).toBe('scene(evening) is set');
    });

    it('detects a change of set-membership', () => {
      cache.set('1', 'switch', 'on');
      cache.set('2', 'level', 40);
      const condition = new SceneChangeCondition(evening);
      const [sceneSet] = condition.children;
      const [switchLeaf] = sceneSet?.children ?? [];

      expect(initializeTree(condition, cache)).toBe(false);

      switchLeaf?.recompute(event('1', 'switch', 'off'));
      sceneSet?.recompute();
      expect(condition.recompute()).toBe(true);
      expect(condition.label).toBe('scene(evening) changes');
    });

    it('rejects a scene without device states', () => {
      expect(() => new SceneSetCondition({ name: 'empty', deviceStates: [] }))
        .toThrow('Scene "empty" has no device states');
    });
  });

  it('gives every node a unique id', () => {
    const a = new AttributeCondition('1', 'a', 'eq', 1);
    const b = new AttributeCondition('1', 'a', 'eq', 1);

    expect(a.id).not.toBe(b.id);
    expect(a.id.startsWith('cond-')).toBe(true);
  });
});
