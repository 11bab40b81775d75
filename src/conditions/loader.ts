import { DeviceCommunicationError } from '../errors.js';
import type { AttributeCache } from '../core/attribute-cache.js';
import type { AttributeKey, AttributeValue, DeviceAttributes, ExecutionContext, HubClient } from '../types/device.js';
import type { ConditionNode } from './condition-node.js';
import { collectRequirements } from './tree.js';

/**
 * Fetches the current value of every attribute the leaves of a tree need
 * and stores it in the cache, where the engine initializes the tree from.
 *
 * Devices are read in parallel, with one `fetchAll` per device when the hub
 * has it. A value that arrives through a device event while its fetch is in
 * flight wins over the fetched one.
 *
 * @throws DeviceCommunicationError when any fetch fails
 */
export async function loadConditionValues(
  root: ConditionNode,
  hub: HubClient,
  cache: AttributeCache,
  context: ExecutionContext = {}
): Promise<void> {
  const byDevice = new Map<string, AttributeKey[]>();
  for (const key of collectRequirements(root)) {
    const keys = byDevice.get(key.deviceId) ?? [];
    keys.push(key);
    byDevice.set(key.deviceId, keys);
  }

  await Promise.all([...byDevice].map(async ([deviceId, keys]) => {
    const deviceContext = { ...context, deviceId };
    const since = keys.map(key => cache.sequence(key));

    let values: AttributeValue[];
    if (hub.fetchAll) {
      let attributes: DeviceAttributes;
      try {
        attributes = await hub.fetchAll(deviceId, deviceContext);
      } catch (error) {
        throw toDeviceError(deviceId, 'read attributes', error);
      }
      values = keys.map(key => attributes[key.attribute] ?? null);
    } else {
      values = await Promise.all(keys.map(async key => {
        try {
          return await hub.fetch(deviceId, key.attribute, deviceContext);
        } catch (error) {
          throw toDeviceError(deviceId, `fetch ${key.attribute}`, error);
        }
      }));
    }

    keys.forEach((key, index) => {
      cache.fill(key, values[index] ?? null, since[index] ?? 0);
    });
  }));
}

function toDeviceError(deviceId: string, operation: string, error: unknown): DeviceCommunicationError {
  return error instanceof DeviceCommunicationError ? error : new DeviceCommunicationError(deviceId, operation, error);
}
