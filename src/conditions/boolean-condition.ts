import { CompositeCondition, type ConditionNode } from './condition-node.js';

/** True when every child is true. */
export class AllOfCondition extends CompositeCondition {
  readonly kind = 'all_of' as const;

  constructor(children: readonly ConditionNode[]) {
    if (children.length === 0) {
      throw new Error('allOf requires at least one condition');
    }
    super(children);
  }

  get label(): string {
    return `(${this.children.map(child => child.label).join(' and ')})`;
  }

  protected combine(states: boolean[]): boolean {
    return states.every(Boolean);
  }
}

/** True when at least one child is true. */
export class AnyOfCondition extends CompositeCondition {
  readonly kind = 'any_of' as const;

  constructor(children: readonly ConditionNode[]) {
    if (children.length === 0) {
      throw new Error('anyOf requires at least one condition');
    }
    super(children);
  }

  get label(): string {
    return `(${this.children.map(child => child.label).join(' or ')})`;
  }

  protected combine(states: boolean[]): boolean {
    return states.some(Boolean);
  }
}

/** Negation of exactly one child. */
export class NotCondition extends CompositeCondition {
  readonly kind = 'not' as const;

  constructor(child: ConditionNode) {
    super([child]);
  }

  get label(): string {
    return `not ${this.children.map(child => child.label).join('')}`;
  }

  protected combine(states: boolean[]): boolean {
    return states[0] !== true;
  }
}
