import type { z } from 'zod';
import { wrapError } from '../errors/base.js';
import { type ForestOptions, InstanceForest } from './InstanceForest.js';

/**
 * JSON helpers around `InstanceForest.toSnapshot` / `InstanceForest.fromSnapshot`
 */

export function serializeForest<P>(forest: InstanceForest<P>, space?: number): string {
  return JSON.stringify(forest.toSnapshot(), null, space);
}

/**
 * Parses JSON text into a forest.
 *
 * @throws ForestError wrapping the `SyntaxError` when `json` is not valid JSON
 * @throws SnapshotValidationError when the parsed data is not a valid forest
 */
export function parseForestSnapshot<P>(
  json: string,
  payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>,
  options: ForestOptions = {}
): InstanceForest<P> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw wrapError(error, 'forest.snapshot', 'parseForestSnapshot', { length: json.length });
  }

  return InstanceForest.fromSnapshot(data, payloadSchema, options);
}
