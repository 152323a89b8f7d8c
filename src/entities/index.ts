/**
 * @fileoverview Entities module - instance forest, traversal, validation
 *
 * @module entities
 */

export {
  InstanceForest,
  type ForestOptions,
  type TransplantOptions,
} from './InstanceForest.js';
export type { InstanceView, MutableInstanceView } from './RootedInstance.js';
export { Descendants, type DescendantSource, type DescendantsOptions } from './Descendants.js';
export {
  validateForest,
  findDuplicateIds,
  snapshotShape,
  type ForestShape,
  type StructuralView,
  type ValidationResult,
  type ValidationError,
} from './ForestValidation.js';
export { serializeForest, parseForestSnapshot } from './ForestSnapshot.js';
export {
  TRAVERSAL_ORDER,
  DEFAULT_TRAVERSAL_ORDER,
  FOREST_OPERATIONS,
  type TraversalOrder,
} from './ForestConstants.js';
