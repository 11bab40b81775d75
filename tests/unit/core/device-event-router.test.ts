import { describe, it, expect, beforeEach } from 'vitest';
import { DeviceEventRouter } from '../../../src/core/device-event-router';

describe('DeviceEventRouter', () => {
  let router: DeviceEventRouter;

  beforeEach(() => {
    router = new DeviceEventRouter();
  });

  it('returns the leaves subscribed to a device', () => {
    router.subscribe('12', 'cond-a');
    router.subscribe('12', 'cond-b');
    router.subscribe('34', 'cond-c');

    expect([...router.lookup('12')]).toEqual(['cond-a', 'cond-b']);
    expect([...router.lookup('34')]).toEqual(['cond-c']);
    expect(router.size).toBe(2);
  });

  it('ignores a repeated subscription', () => {
    router.subscribe('12', 'cond-a');
    router.subscribe('12', 'cond-a');

    expect(router.lookup('12').size).toBe(1);
  });

  it('returns an empty set for an unknown device', () => {
    expect(router.lookup('99').size).toBe(0);
  });

  it('drops a device once its last leaf unsubscribes', () => {
    router.subscribe('12', 'cond-a');
    router.subscribe('12', 'cond-b');

    expect(router.unsubscribe('12', 'cond-a')).toBe(true);
    expect(router.size).toBe(1);
    expect(router.unsubscribe('12', 'cond-b')).toBe(true);
    expect(router.size).toBe(0);
    expect(router.unsubscribe('12', 'cond-b')).toBe(false);
  });

  it('clears every subscription', () => {
    router.subscribe('12', 'cond-a');
    router.clear();

    expect(router.size).toBe(0);
    expect(router.lookup('12').size).toBe(0);
  });
});
