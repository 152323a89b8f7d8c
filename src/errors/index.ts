/**
 * Error classes and utilities for instance-forest
 */

export { ForestError, wrapError, isForestError, extractErrorDetails } from './base.js';

export {
  ForestContractError,
  InstanceNotFoundError,
  ForestCycleError,
  DuplicateInstanceError,
  ForestInvariantError,
  StaleIterationError,
  SnapshotValidationError,
} from './forest.js';
