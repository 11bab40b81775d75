import type { AttributeValue, CommandResult, ExecutionContext } from './device.js';

/** One device requirement of a scene: the desired state and how to reach it */
export interface SceneDeviceState {
  deviceId: string;
  attribute: string;
  value: AttributeValue;
  command: string;
  arguments: AttributeValue[];
}

/** Named target set of device attribute values */
export interface SceneDefinition {
  name: string;
  description?: string;
  deviceStates: SceneDeviceState[];
}

/** Outcome of applying a scene; only failed commands are listed */
export interface SceneApplyResult {
  success: boolean;
  sceneName: string;
  message: string;
  failedCommands: CommandResult[];
}

/** Scene collaborator */
export interface SceneProvider {
  getScene(name: string): SceneDefinition | undefined;
  isSceneSet(name: string, context?: ExecutionContext): Promise<boolean>;
  enableScene(name: string, context?: ExecutionContext): Promise<SceneApplyResult>;
}
