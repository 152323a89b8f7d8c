import { z } from 'zod';

// Instance identifiers are random (v4) UUIDs, compared and hashed as strings
export const uuidPattern = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const instanceId = z.string().regex(uuidPattern, 'Invalid instance ID format').brand<'InstanceId'>();
export const optionalInstanceId = instanceId.optional();
export const nullableInstanceId = instanceId.nullable();

export type InstanceId = z.infer<typeof instanceId>;
