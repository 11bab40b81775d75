import type { AttributeLookup } from '../conditions/condition-node.js';
import type { AttributeKey, AttributeValue, DeviceEvent } from '../types/device.js';

interface CachedAttribute {
  value: AttributeValue;
  updatedAt: number;
  sequence: number;
}

/**
 * Last known value of every device attribute the engine has seen.
 *
 * Fed by hub fetches and by device events. Condition trees are initialized
 * from it and `check()` reads it synchronously.
 */
export class AttributeCache implements AttributeLookup {
  private readonly entries = new Map<string, CachedAttribute>();
  private sequenceCounter = 0;

  lookup(deviceId: string, attribute: string): AttributeValue | undefined {
    return this.entries.get(keyOf(deviceId, attribute))?.value;
  }

  has(deviceId: string, attribute: string): boolean {
    return this.entries.has(keyOf(deviceId, attribute));
  }

  /**
   * Records a value unconditionally.
   */
  set(deviceId: string, attribute: string, value: AttributeValue, updatedAt: number = Date.now()): void {
    this.entries.set(keyOf(deviceId, attribute), {
      value,
      updatedAt,
      sequence: ++this.sequenceCounter
    });
  }

  /** Records the value carried by a device event. */
  update(event: DeviceEvent): void {
    this.set(event.deviceId, event.attribute, event.value, event.timestamp);
  }

  /**
   * Write position of an attribute. Pass it to {@link fill} to store a
   * fetched value only if no newer value arrived meanwhile.
   */
  sequence(key: AttributeKey): number {
    return this.entries.get(keyOf(key.deviceId, key.attribute))?.sequence ?? 0;
  }

  /**
   * Stores a fetched value unless the attribute was written after `since`.
   *
   * @returns whether the value was stored
   */
  fill(key: AttributeKey, value: AttributeValue, since: number): boolean {
    if (this.sequence(key) !== since) return false;
    this.set(key.deviceId, key.attribute, value);
    return true;
  }

  /** Snapshot of all known attributes of a device. */
  getDevice(deviceId: string): Record<string, AttributeValue> {
    const prefix = `${deviceId}\u0000`;
    const result: Record<string, AttributeValue> = {};
    for (const [key, entry] of this.entries) {
      if (key.startsWith(prefix)) {
        result[key.slice(prefix.length)] = entry.value;
      }
    }
    return result;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

function keyOf(deviceId: string, attribute: string): string {
  return `${deviceId}\u0000${attribute}`;
}
