/**
 * Instance identifier utilities.
 *
 * Identifiers are opaque to the forest: it only copies them, compares them and
 * uses them as map keys. A fresh identifier is unique for the lifetime of the
 * process.
 */

import { randomUUID } from 'node:crypto';
import { instanceId, type InstanceId } from '../schemas/base.js';

export type { InstanceId } from '../schemas/base.js';

/**
 * Generates a fresh, process-unique instance identifier.
 */
export function newInstanceId(): InstanceId {
  return instanceId.parse(randomUUID());
}

/**
 * Parses an identifier received from outside (a snapshot, a test fixture).
 *
 * @throws ZodError when the value is not a UUID string
 */
export function parseInstanceId(value: unknown): InstanceId {
  return instanceId.parse(value);
}

export function isInstanceId(value: unknown): value is InstanceId {
  return instanceId.safeParse(value).success;
}
