export { ConditionNode, LeafCondition, CompositeCondition, type AttributeLookup } from './condition-node.js';
export { AttributeCondition, DeviceComparisonCondition } from './attribute-condition.js';
export { AllOfCondition, AnyOfCondition, NotCondition } from './boolean-condition.js';
export { ChangeCondition } from './change-condition.js';
export { SceneSetCondition, SceneChangeCondition } from './scene-condition.js';
export { walk, flatten, initializeTree, collectRequirements } from './tree.js';
export { loadConditionValues } from './loader.js';
