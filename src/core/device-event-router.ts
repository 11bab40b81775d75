const EMPTY: ReadonlySet<string> = new Set();

/**
 * Reverse index: device id → ids of the leaf conditions interested in it.
 */
export class DeviceEventRouter {
  private readonly byDevice = new Map<string, Set<string>>();

  /** Adds an interest. Subscribing twice is a no-op. */
  subscribe(deviceId: string, leafId: string): void {
    let set = this.byDevice.get(deviceId);
    if (!set) {
      set = new Set();
      this.byDevice.set(deviceId, set);
    }
    set.add(leafId);
  }

  /** Removes an interest. Drops the device entry once it has no leaves. */
  unsubscribe(deviceId: string, leafId: string): boolean {
    const set = this.byDevice.get(deviceId);
    if (!set?.delete(leafId)) return false;
    if (set.size === 0) {
      this.byDevice.delete(deviceId);
    }
    return true;
  }

  /**
   * Leaves interested in a device. Unknown devices share one empty set;
   * callers must not mutate the result.
   */
  lookup(deviceId: string): ReadonlySet<string> {
    return this.byDevice.get(deviceId) ?? EMPTY;
  }

  /** Number of devices with at least one interested leaf. */
  get size(): number {
    return this.byDevice.size;
  }

  clear(): void {
    this.byDevice.clear();
  }
}
