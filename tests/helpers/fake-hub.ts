import type {
  AttributeValue,
  DeviceAttributes,
  DeviceEvent,
  DeviceEventListener,
  ExecutionContext,
  HubClient,
} from '../../src/types/device';

export interface SentCommand {
  deviceId: string;
  command: string;
  args: AttributeValue[];
  context: ExecutionContext | undefined;
}

/**
 * In-memory hub: attribute values live in a map, commands are recorded,
 * and `emit` pushes a notification to the subscribers.
 */
export class FakeHub implements HubClient {
  readonly commands: SentCommand[] = [];
  readonly fetches: string[] = [];

  private readonly values = new Map<string, DeviceAttributes>();
  private readonly listeners = new Set<DeviceEventListener>();
  private readonly failingCommands = new Map<string, string>();
  private readonly failingDevices = new Set<string>();

  setValue(deviceId: string, attribute: string, value: AttributeValue): void {
    const device = this.values.get(deviceId) ?? {};
    device[attribute] = value;
    this.values.set(deviceId, device);
  }

  /** Updates the stored value and notifies the subscribers. */
  async emit(deviceId: string, attribute: string, value: AttributeValue, timestamp = Date.now()): Promise<void> {
    this.setValue(deviceId, attribute, value);
    const event: DeviceEvent = { deviceId, attribute, value, timestamp };
    await Promise.all([...this.listeners].map(listener => listener(event)));
  }

  failCommand(deviceId: string, command: string, message: string): void {
    this.failingCommands.set(`${deviceId}:${command}`, message);
  }

  failFetches(deviceId: string): void {
    this.failingDevices.add(deviceId);
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  async fetch(deviceId: string, attribute: string): Promise<AttributeValue> {
    this.fetches.push(`${deviceId}.${attribute}`);
    if (this.failingDevices.has(deviceId)) {
      throw new Error(`device ${deviceId} unreachable`);
    }
    return this.values.get(deviceId)?.[attribute] ?? null;
  }

  async sendCommand(
    deviceId: string,
    command: string,
    args: AttributeValue[],
    context?: ExecutionContext,
  ): Promise<void> {
    this.commands.push({ deviceId, command, args, context });
    const failure = this.failingCommands.get(`${deviceId}:${command}`);
    if (failure !== undefined) {
      throw new Error(failure);
    }
  }

  subscribe(listener: DeviceEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
