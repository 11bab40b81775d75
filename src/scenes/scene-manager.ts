import { NOOP_AUDIT, type AuditSink } from '../audit/types.js';
import { describeError, DeviceCommunicationError, DuplicateError, NotFoundError } from '../errors.js';
import type {
  AttributeValue,
  CommandResult,
  DeviceAttributes,
  ExecutionContext,
  HubClient,
} from '../types/device.js';
import type { SceneApplyResult, SceneDefinition, SceneProvider } from '../types/scene.js';
import { coerceToOperand } from '../utils/operators.js';

export interface SceneManagerConfig {
  hub: HubClient;
  audit?: AuditSink;
  /** Scenes to register on construction */
  scenes?: readonly SceneDefinition[];
}

export interface SceneFilter {
  name?: string;
  /** Only scenes that involve this device */
  deviceId?: string;
}

/** Scene definition with its current set-status */
export interface SceneStatus extends SceneDefinition {
  isSet: boolean;
}

/**
 * In-memory scene registry and the scene collaborator of rule scripts.
 *
 * Enabling a scene sends all of its device commands in parallel and
 * reports the ones that failed; failed commands are not retried.
 */
export class SceneManager implements SceneProvider {
  private readonly hub: HubClient;
  private readonly audit: AuditSink;
  private readonly scenes = new Map<string, SceneDefinition>();
  private readonly byDevice = new Map<string, Set<string>>();

  constructor(config: SceneManagerConfig) {
    this.hub = config.hub;
    this.audit = config.audit ?? NOOP_AUDIT;
    for (const scene of config.scenes ?? []) {
      this.createScene(scene);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              REGISTRY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Stores a frozen copy; rule scripts receive the stored definition.
   *
   * @throws DuplicateError when a scene of that name exists
   */
  createScene(scene: SceneDefinition): SceneDefinition {
    if (this.scenes.has(scene.name)) {
      throw new DuplicateError('scene', scene.name);
    }

    const stored = frozenCopy(scene);

    this.scenes.set(stored.name, stored);
    for (const state of stored.deviceStates) {
      this.addToIndex(state.deviceId, stored.name);
    }

    this.audit.record('scene_created', { devices: stored.deviceStates.length }, {
      source: 'scene-manager',
      sceneName: stored.name,
    });

    return stored;
  }

  /**
   * @throws NotFoundError for an unknown scene
   */
  deleteScene(name: string): SceneDefinition {
    const scene = this.scenes.get(name);
    if (!scene) {
      throw new NotFoundError('scene', name);
    }

    this.scenes.delete(name);
    for (const state of scene.deviceStates) {
      this.removeFromIndex(state.deviceId, name);
    }

    this.audit.record('scene_deleted', {}, { source: 'scene-manager', sceneName: name });

    return scene;
  }

  getScene(name: string): SceneDefinition | undefined {
    return this.scenes.get(name);
  }

  /** Scene definitions, optionally limited to those involving one device. */
  listScenes(filter: SceneFilter = {}): SceneDefinition[] {
    if (filter.name !== undefined) {
      const scene = this.scenes.get(filter.name);
      return scene ? [scene] : [];
    }
    if (filter.deviceId !== undefined) {
      const names = this.byDevice.get(filter.deviceId) ?? new Set<string>();
      return [...names].flatMap(name => this.scenes.get(name) ?? []);
    }
    return [...this.scenes.values()];
  }

  /**
   * Scene definitions with their current set-status. Every involved device
   * is read from the hub once.
   */
  async getScenesWithStatus(filter: SceneFilter = {}, context: ExecutionContext = {}): Promise<SceneStatus[]> {
    const scenes = this.listScenes(filter);
    const deviceIds = new Set(scenes.flatMap(scene => scene.deviceStates.map(state => state.deviceId)));
    const states = await this.readDevices(scenes, deviceIds, context);

    return scenes.map(scene => ({ ...scene, isSet: isSetWith(scene, states) }));
  }

  get size(): number {
    return this.scenes.size;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          SCENE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Whether every device of the scene currently reports its declared value.
   *
   * @throws NotFoundError for an unknown scene
   */
  async isSceneSet(name: string, context: ExecutionContext = {}): Promise<boolean> {
    const scene = this.scenes.get(name);
    if (!scene) {
      throw new NotFoundError('scene', name);
    }

    const deviceIds = new Set(scene.deviceStates.map(state => state.deviceId));
    const states = await this.readDevices([scene], deviceIds, { ...context, sceneName: name });
    return isSetWith(scene, states);
  }

  /**
   * Sends every device command of the scene in parallel.
   *
   * @throws NotFoundError for an unknown scene
   */
  async enableScene(name: string, context: ExecutionContext = {}): Promise<SceneApplyResult> {
    const scene = this.scenes.get(name);
    if (!scene) {
      throw new NotFoundError('scene', name);
    }

    const started = Date.now();
    const sceneContext: ExecutionContext = { ...context, sceneName: name };

    const outcomes = await Promise.allSettled(scene.deviceStates.map(state =>
      this.hub.sendCommand(state.deviceId, state.command, state.arguments, {
        ...sceneContext,
        deviceId: state.deviceId,
      })
    ));

    const failedCommands: CommandResult[] = [];
    outcomes.forEach((outcome, index) => {
      const state = scene.deviceStates[index];
      if (outcome.status === 'rejected' && state) {
        failedCommands.push({
          deviceId: state.deviceId,
          command: state.command,
          arguments: [...state.arguments],
          success: false,
          error: describeError(outcome.reason),
        });
      }
    });

    const total = scene.deviceStates.length;
    const success = failedCommands.length === 0;
    const message = success
      ? `Scene "${name}" applied successfully (${total} commands)`
      : `Scene "${name}" applied with ${failedCommands.length} failures out of ${total} commands`;

    this.audit.record(success ? 'scene_enabled' : 'scene_enable_failed', {
      commands: total,
      failedCommands: failedCommands.map(({ deviceId, command, error }) => ({ deviceId, command, error })),
    }, {
      source: 'scene-manager',
      sceneName: name,
      ruleName: context.ruleName,
      success,
      durationMs: Date.now() - started,
      ...(!success && { error: message }),
    });

    return { success, sceneName: name, message, failedCommands };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                         INTERNAL METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  private async readDevices(
    scenes: readonly SceneDefinition[],
    deviceIds: ReadonlySet<string>,
    context: ExecutionContext
  ): Promise<Map<string, DeviceAttributes>> {
    const states = new Map<string, DeviceAttributes>();

    await Promise.all([...deviceIds].map(async deviceId => {
      const deviceContext = { ...context, deviceId };
      try {
        if (this.hub.fetchAll) {
          states.set(deviceId, await this.hub.fetchAll(deviceId, deviceContext));
          return;
        }

        const attributes = new Set(scenes.flatMap(scene =>
          scene.deviceStates.filter(state => state.deviceId === deviceId).map(state => state.attribute)
        ));
        const values: DeviceAttributes = {};
        for (const attribute of attributes) {
          values[attribute] = await this.hub.fetch(deviceId, attribute, deviceContext);
        }
        states.set(deviceId, values);
      } catch (error) {
        throw error instanceof DeviceCommunicationError
          ? error
          : new DeviceCommunicationError(deviceId, 'read scene state', error);
      }
    }));

    return states;
  }

  private addToIndex(deviceId: string, sceneName: string): void {
    let set = this.byDevice.get(deviceId);
    if (!set) {
      set = new Set();
      this.byDevice.set(deviceId, set);
    }
    set.add(sceneName);
  }

  private removeFromIndex(deviceId: string, sceneName: string): void {
    const set = this.byDevice.get(deviceId);
    if (set) {
      set.delete(sceneName);
      if (set.size === 0) {
        this.byDevice.delete(deviceId);
      }
    }
  }
}

function isSetWith(scene: SceneDefinition, states: ReadonlyMap<string, DeviceAttributes>): boolean {
  return scene.deviceStates.every(state => {
    const current: AttributeValue | undefined = states.get(state.deviceId)?.[state.attribute];
    return current !== undefined && coerceToOperand(current, state.value) === state.value;
  });
}

function frozenCopy(scene: SceneDefinition): SceneDefinition {
  const copy: SceneDefinition = {
    name: scene.name,
    ...(scene.description !== undefined && { description: scene.description }),
    deviceStates: scene.deviceStates.map(state => ({ ...state, arguments: [...state.arguments] })),
  };
  for (const state of copy.deviceStates) {
    Object.freeze(state.arguments);
    Object.freeze(state);
  }
  Object.freeze(copy.deviceStates);
  return Object.freeze(copy);
}
