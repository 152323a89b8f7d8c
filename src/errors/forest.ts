/**
 * Forest error classes
 *
 * Contract violations (a caller naming a parent that does not exist, a move
 * that would create a cycle) are programming errors and are thrown. Looking
 * up or removing an absent instance is not an error; those operations return
 * `undefined` instead.
 */

import type { ValidationError } from '../entities/ForestValidation.js';
import type { InstanceId } from '../schemas/base.js';
import { ForestError } from './base.js';

/**
 * A caller broke the contract of a forest operation. Nothing was mutated.
 */
export class ForestContractError extends ForestError {
  constructor(message: string, operation: string, context?: Record<string, unknown>) {
    super(message, 'forest', operation, context);
  }
}

/**
 * An operation required an instance that the target forest does not contain
 */
export class InstanceNotFoundError extends ForestContractError {
  constructor(
    public readonly instanceId: InstanceId,
    operation: string,
    role = 'instance',
    location = 'this forest',
    context?: Record<string, unknown>
  ) {
    super(`${operation}: ${role} ${instanceId} is not in ${location}`, operation, {
      ...context,
      instanceId,
      role,
    });
  }
}

/**
 * A move would make an instance its own ancestor
 */
export class ForestCycleError extends ForestContractError {
  constructor(
    public readonly instanceId: InstanceId,
    public readonly newParentId: InstanceId,
    operation: string
  ) {
    super(
      `${operation}: ${newParentId} is ${instanceId} or one of its descendants`,
      operation,
      { instanceId, newParentId }
    );
  }
}

/**
 * Moving a subtree would put a second instance under an identifier that the
 * target forest already holds
 */
export class DuplicateInstanceError extends ForestContractError {
  constructor(
    public readonly duplicateIds: InstanceId[],
    operation: string
  ) {
    super(
      `${operation}: ${duplicateIds.length} instance id(s) already exist in the target forest`,
      operation,
      { duplicateIds }
    );
  }
}

/**
 * Forest internals are inconsistent (a parent that does not list its child,
 * a dangling child id, a cycle). Indicates a defect, never a caller mistake.
 */
export class ForestInvariantError extends ForestError {
  constructor(
    public readonly errors: readonly ValidationError[],
    operation?: string
  ) {
    const summary = errors.map((error) => error.message).join('; ');
    super(`Forest invariants violated: ${summary}`, 'forest', operation, {
      errorCount: errors.length,
    });
  }
}

/**
 * A descendant iterator was advanced after its forest changed shape
 */
export class StaleIterationError extends ForestError {
  constructor(
    public readonly startRevision: number,
    public readonly currentRevision: number
  ) {
    super(
      `Forest was structurally modified while iterating descendants (revision ${startRevision} -> ${currentRevision})`,
      'forest.descendants',
      'next',
      { startRevision, currentRevision }
    );
  }
}

/**
 * A snapshot could not be turned into a forest
 */
export class SnapshotValidationError extends ForestError {
  constructor(
    message: string,
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'forest.snapshot', 'fromSnapshot', { ...context, issues });
  }
}
