import { z } from 'zod';
import { instanceId, nullableInstanceId, type InstanceId } from './base.js';

/**
 * Plain-data shape of a forest, for external serializers.
 *
 * Payloads are validated separately against a caller-supplied schema, so the
 * structural schema below keeps them as `unknown`.
 */
export const snapshotInstanceSchema = z.object({
  id: instanceId,
  parentId: nullableInstanceId,
  childIds: z.array(instanceId),
  payload: z.unknown(),
});

export const forestSnapshotSchema = z.object({
  rootIds: z.array(instanceId),
  instances: z.array(snapshotInstanceSchema),
});

export type RawForestSnapshot = z.infer<typeof forestSnapshotSchema>;

export interface SnapshotInstance<P> {
  id: InstanceId;
  parentId: InstanceId | null;
  childIds: InstanceId[];
  payload: P;
}

export interface ForestSnapshot<P> {
  rootIds: InstanceId[];
  instances: SnapshotInstance<P>[];
}
