/** Scalar value of a device attribute as reported by the hub */
export type AttributeValue = string | number | boolean | null;

/** Attribute values of one device, keyed by attribute name */
export type DeviceAttributes = Record<string, AttributeValue>;

/** Change notification delivered by the hub */
export interface DeviceEvent {
  deviceId: string;
  attribute: string;
  value: AttributeValue;
  timestamp: number;        // Unix ms, as reported by the hub or on arrival
}

/** Reference to one attribute of one device */
export interface AttributeKey {
  deviceId: string;
  attribute: string;
}

/** Result of a device command */
export interface CommandResult {
  deviceId: string;
  command: string;
  arguments: AttributeValue[];
  success: boolean;
  error?: string;
}

/**
 * Explicit logging/audit context handed to every collaborator call.
 * Replaces any ambient "current rule" state.
 */
export interface ExecutionContext {
  ruleName?: string;
  sceneName?: string;
  deviceId?: string;
  conditionId?: string;
}

export type DeviceEventListener = (event: DeviceEvent) => void | Promise<void>;

/**
 * Hub device collaborator.
 *
 * Implementations translate to the hub's own protocol; the core only sees
 * opaque scalar values. Failures should be raised as DeviceCommunicationError,
 * other errors are normalized by the caller.
 */
export interface HubClient {
  /** Reads the current value of one attribute. */
  fetch(deviceId: string, attribute: string, context?: ExecutionContext): Promise<AttributeValue>;

  /** Reads all current attribute values of a device in one round trip. */
  fetchAll?(deviceId: string, context?: ExecutionContext): Promise<DeviceAttributes>;

  /** Sends a command; resolves on acknowledgement. */
  sendCommand(
    deviceId: string,
    command: string,
    args: AttributeValue[],
    context?: ExecutionContext,
  ): Promise<void>;

  /** Subscribes to the inbound notification stream. Returns an unsubscribe function. */
  subscribe?(listener: DeviceEventListener): () => void;
}
