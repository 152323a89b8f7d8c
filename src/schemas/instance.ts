import { z } from 'zod';

/*
 * Sample document payload: what a scene-graph or DOM-like document typically
 * hangs off each instance. The forest itself never looks inside a payload;
 * this schema exists for callers (and snapshot loading) that want one.
 */

export const propertyValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const instancePayloadSchema = z.object({
  name: z.string().min(1, 'Instance name cannot be empty'),
  className: z.string().min(1, 'Class name cannot be empty'),
  properties: z.record(z.string(), propertyValue).default({}),
});

export type PropertyValue = z.infer<typeof propertyValue>;
export type InstancePayload = z.infer<typeof instancePayloadSchema>;
export type CreateInstancePayload = z.input<typeof instancePayloadSchema>;

export function createInstancePayload(data: CreateInstancePayload): InstancePayload {
  return instancePayloadSchema.parse(data);
}
