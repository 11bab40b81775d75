import type { AttributeKey } from '../types/device.js';
import type { AttributeLookup, ConditionNode } from './condition-node.js';

/**
 * Visits every node of a tree, children before their parent.
 */
export function walk(root: ConditionNode, visit: (node: ConditionNode, depth: number) => void): void {
  const recurse = (node: ConditionNode, depth: number): void => {
    for (const child of node.children) {
      recurse(child, depth + 1);
    }
    visit(node, depth);
  };
  recurse(root, 0);
}

/** All nodes of a tree in post-order. */
export function flatten(root: ConditionNode): ConditionNode[] {
  const nodes: ConditionNode[] = [];
  walk(root, node => nodes.push(node));
  return nodes;
}

/**
 * Initializes every node bottom-up, so each combinator sees the final
 * states of its children.
 *
 * @returns the state of the root
 */
export function initializeTree(root: ConditionNode, values: AttributeLookup): boolean {
  walk(root, node => {
    node.initialize(values);
  });
  return root.currentState();
}

/** Distinct device attributes the leaves of a tree need. */
export function collectRequirements(root: ConditionNode): AttributeKey[] {
  const seen = new Map<string, AttributeKey>();
  walk(root, node => {
    for (const key of node.requirements()) {
      const id = `${key.deviceId}\u0000${key.attribute}`;
      if (!seen.has(id)) {
        seen.set(id, { deviceId: key.deviceId, attribute: key.attribute });
      }
    }
  });
  return [...seen.values()];
}
