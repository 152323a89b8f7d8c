export {
  instanceId,
  optionalInstanceId,
  nullableInstanceId,
  uuidPattern,
  type InstanceId,
} from './base.js';
export {
  propertyValue,
  instancePayloadSchema,
  createInstancePayload,
  type PropertyValue,
  type InstancePayload,
  type CreateInstancePayload,
} from './instance.js';
export {
  snapshotInstanceSchema,
  forestSnapshotSchema,
  type RawForestSnapshot,
  type SnapshotInstance,
  type ForestSnapshot,
} from './snapshot.js';
