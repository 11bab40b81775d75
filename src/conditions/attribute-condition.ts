import type { AttributeKey, AttributeValue, DeviceEvent } from '../types/device.js';
import type { ComparisonOperator } from '../types/condition.js';
import { compareValues, coerceToOperand, OPERATOR_SYMBOLS, type Operand } from '../utils/operators.js';
import { LeafCondition, type AttributeLookup } from './condition-node.js';

/**
 * Device attribute compared against a static operand,
 * e.g. `device(123).motion == "active"`.
 *
 * Incoming values are coerced to the operand's type before comparing.
 */
export class AttributeCondition extends LeafCondition {
  readonly kind = 'attribute' as const;

  private value: AttributeValue | undefined = undefined;
  private readonly keys: readonly AttributeKey[];

  constructor(
    readonly deviceId: string,
    readonly attribute: string,
    readonly operator: ComparisonOperator,
    readonly operand: Operand
  ) {
    super();
    if ((operator === 'in' || operator === 'not_in') !== Array.isArray(operand)) {
      throw new Error(`Operator "${operator}" ${Array.isArray(operand) ? 'does not accept' : 'requires'} a list operand`);
    }
    this.keys = [{ deviceId, attribute }];
  }

  get label(): string {
    return `device(${this.deviceId}).${this.attribute} ${OPERATOR_SYMBOLS[this.operator]} ${JSON.stringify(this.operand)}`;
  }

  /** Last value seen, `undefined` until the first value arrives. */
  get currentValue(): AttributeValue | undefined {
    return this.value;
  }

  requirements(): readonly AttributeKey[] {
    return this.keys;
  }

  protected evaluateInitial(values: AttributeLookup): boolean {
    const value = values.lookup(this.deviceId, this.attribute);
    this.value = value === undefined ? undefined : coerceToOperand(value, this.operand);
    return this.compute();
  }

  protected accept(event: DeviceEvent): void {
    this.value = coerceToOperand(event.value, this.operand);
  }

  protected compute(): boolean {
    if (this.value === undefined) return false;
    return compareValues(this.operator, this.value, this.operand);
  }
}

/**
 * Attribute of one device compared against an attribute of another,
 * e.g. `device(7).temperature > device(8).temperature`.
 *
 * False while either side has no value yet.
 */
export class DeviceComparisonCondition extends LeafCondition {
  readonly kind = 'device_comparison' as const;

  private leftValue: AttributeValue | undefined = undefined;
  private rightValue: AttributeValue | undefined = undefined;
  private readonly keys: readonly AttributeKey[];

  constructor(
    readonly left: AttributeKey,
    readonly operator: ComparisonOperator,
    readonly right: AttributeKey
  ) {
    super();
    if (operator === 'in' || operator === 'not_in') {
      throw new Error(`Operator "${operator}" cannot compare two device attributes`);
    }
    this.keys = [{ ...left }, { ...right }];
  }

  get label(): string {
    return `device(${this.left.deviceId}).${this.left.attribute} ${OPERATOR_SYMBOLS[this.operator]} ` +
      `device(${this.right.deviceId}).${this.right.attribute}`;
  }

  requirements(): readonly AttributeKey[] {
    return this.keys;
  }

  protected evaluateInitial(values: AttributeLookup): boolean {
    this.leftValue = values.lookup(this.left.deviceId, this.left.attribute);
    this.rightValue = values.lookup(this.right.deviceId, this.right.attribute);
    return this.compute();
  }

  protected accept(event: DeviceEvent): void {
    // Both sides may watch the same attribute
    if (event.deviceId === this.left.deviceId && event.attribute === this.left.attribute) {
      this.leftValue = event.value;
    }
    if (event.deviceId === this.right.deviceId && event.attribute === this.right.attribute) {
      this.rightValue = event.value;
    }
  }

  protected compute(): boolean {
    if (this.leftValue === undefined || this.rightValue === undefined) return false;
    const right = coerceToOperand(this.rightValue, this.leftValue);
    return compareValues(this.operator, this.leftValue, right);
  }
}
