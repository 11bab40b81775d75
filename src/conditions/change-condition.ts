import type { AttributeKey, AttributeValue, DeviceEvent } from '../types/device.js';
import { LeafCondition, type AttributeLookup } from './condition-node.js';

/**
 * True while a device attribute differs from the value it had when the
 * condition was initialized.
 *
 * Values are compared by their string form, so `"21"` and `21` are the same
 * value. A reading that returns to the snapshot makes the condition false
 * again. Without a snapshot any first value counts as a change.
 */
export class ChangeCondition extends LeafCondition {
  readonly kind = 'change' as const;

  private snapshot: AttributeValue | undefined = undefined;
  private value: AttributeValue | undefined = undefined;
  private readonly keys: readonly AttributeKey[];

  constructor(
    readonly deviceId: string,
    readonly attribute: string
  ) {
    super();
    this.keys = [{ deviceId, attribute }];
  }

  get label(): string {
    return `device(${this.deviceId}).${this.attribute} changes`;
  }

  /** Value captured at initialization. */
  get snapshotValue(): AttributeValue | undefined {
    return this.snapshot;
  }

  requirements(): readonly AttributeKey[] {
    return this.keys;
  }

  protected evaluateInitial(values: AttributeLookup): boolean {
    this.snapshot = values.lookup(this.deviceId, this.attribute);
    this.value = this.snapshot;
    return false;
  }

  protected accept(event: DeviceEvent): void {
    this.value = event.value;
  }

  protected compute(): boolean {
    if (this.value === undefined) return false;
    if (this.snapshot === undefined) return true;
    return !sameValue(this.snapshot, this.value);
  }
}

function sameValue(a: AttributeValue, b: AttributeValue): boolean {
  return a === b || String(a) === String(b);
}
