import type { ConditionKind } from '../types/condition.js';
import type { AttributeKey, AttributeValue, DeviceEvent } from '../types/device.js';
import { generateId } from '../utils/id-generator.js';

/** Read access to already fetched attribute values */
export interface AttributeLookup {
  /** Returns `undefined` when no value has been fetched yet. */
  lookup(deviceId: string, attribute: string): AttributeValue | undefined;
}

const NO_NODES: readonly ConditionNode[] = Object.freeze([]);
const NO_KEYS: readonly AttributeKey[] = Object.freeze([]);

/**
 * Node of a condition tree.
 *
 * Each node caches its boolean state. Leaves derive it from device
 * attribute values, combinators from the cached states of their children.
 * Children are fixed at construction, so a tree can never become a cycle.
 */
export abstract class ConditionNode {
  readonly id: string;
  abstract readonly kind: ConditionKind;

  protected state = false;

  constructor() {
    this.id = generateId('cond');
  }

  /** Human-readable description used in logs and audit entries. */
  abstract get label(): string;

  get children(): readonly ConditionNode[] {
    return NO_NODES;
  }

  /** Device ids the node subscribes to. Empty for combinators. */
  get deviceIds(): readonly string[] {
    return [...new Set(this.requirements().map(key => key.deviceId))];
  }

  /** Attributes whose values a leaf needs before registration. */
  requirements(): readonly AttributeKey[] {
    return NO_KEYS;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  currentState(): boolean {
    return this.state;
  }

  /**
   * Computes the initial state. Combinators expect their children to be
   * initialized already.
   */
  initialize(values: AttributeLookup): boolean {
    this.state = this.evaluateInitial(values);
    return this.state;
  }

  /**
   * Recomputes the state after a device event (leaves) or a child change
   * (combinators).
   *
   * @returns the new state, or `undefined` when the node is not affected
   */
  recompute(event?: DeviceEvent): boolean | undefined {
    const next = this.evaluate(event);
    if (next !== undefined) {
      this.state = next;
    }
    return next;
  }

  toString(): string {
    return this.label;
  }

  protected abstract evaluateInitial(values: AttributeLookup): boolean;

  protected abstract evaluate(event: DeviceEvent | undefined): boolean | undefined;
}

/**
 * Leaf bound to one or more device attributes.
 */
export abstract class LeafCondition extends ConditionNode {
  abstract override requirements(): readonly AttributeKey[];

  /** Whether the event carries one of the attributes this leaf watches. */
  matches(event: DeviceEvent): boolean {
    return this.requirements().some(
      key => key.deviceId === event.deviceId && key.attribute === event.attribute
    );
  }

  protected override evaluate(event: DeviceEvent | undefined): boolean | undefined {
    if (!event || !this.matches(event)) return undefined;
    this.accept(event);
    return this.compute();
  }

  /** Stores the value carried by a matching event. */
  protected abstract accept(event: DeviceEvent): void;

  /** Derives the state from the stored values. */
  protected abstract compute(): boolean;
}

/**
 * Combinator over the cached states of its children.
 */
export abstract class CompositeCondition extends ConditionNode {
  private readonly childNodes: readonly ConditionNode[];

  constructor(children: readonly ConditionNode[]) {
    super();
    this.childNodes = Object.freeze([...children]);
  }

  override get children(): readonly ConditionNode[] {
    return this.childNodes;
  }

  protected override evaluateInitial(_values: AttributeLookup): boolean {
    return this.combine(this.childNodes.map(child => child.currentState()));
  }

  protected override evaluate(_event: DeviceEvent | undefined): boolean {
    return this.combine(this.childNodes.map(child => child.currentState()));
  }

  protected abstract combine(states: boolean[]): boolean;
}
