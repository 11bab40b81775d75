import type { SceneDefinition } from '../types/scene.js';
import { AttributeCondition } from './attribute-condition.js';
import { CompositeCondition, type AttributeLookup } from './condition-node.js';

/**
 * True while every device of a scene reports its declared value.
 */
export class SceneSetCondition extends CompositeCondition {
  readonly kind = 'scene_set' as const;
  readonly sceneName: string;

  constructor(scene: SceneDefinition) {
    if (scene.deviceStates.length === 0) {
      throw new Error(`Scene "${scene.name}" has no device states`);
    }
    super(scene.deviceStates.map(
      state => new AttributeCondition(state.deviceId, state.attribute, 'eq', state.value)
    ));
    this.sceneName = scene.name;
  }

  get label(): string {
    return `scene(${this.sceneName}) is set`;
  }

  protected combine(states: boolean[]): boolean {
    return states.every(Boolean);
  }
}

/**
 * True while the scene's set-membership differs from the membership it had
 * when the condition was initialized.
 */
export class SceneChangeCondition extends CompositeCondition {
  readonly kind = 'scene_change' as const;
  readonly sceneName: string;

  private snapshot = false;

  constructor(scene: SceneDefinition) {
    super([new SceneSetCondition(scene)]);
    this.sceneName = scene.name;
  }

  get label(): string {
    return `scene(${this.sceneName}) changes`;
  }

  protected override evaluateInitial(values: AttributeLookup): boolean {
    this.snapshot = this.children[0]?.currentState() ?? false;
    return super.evaluateInitial(values);
  }

  protected combine(states: boolean[]): boolean {
    return states[0] !== this.snapshot;
  }
}
