import type { InstanceId } from '../schemas/base.js';
import type { RawForestSnapshot } from '../schemas/snapshot.js';

/**
 * ForestValidation - structural integrity checks for a forest
 *
 * Checks parent/child back-references, the root set, duplicate and dangling
 * child ids, and cycles. Works on anything shaped like a forest, so a snapshot
 * can be checked before a forest is built from it.
 */

export interface StructuralView {
  readonly id: InstanceId;
  getParentId(): InstanceId | null;
  getChildIds(): readonly InstanceId[];
}

export interface ForestShape {
  getRootIds(): ReadonlySet<InstanceId>;
  getInstance(id: InstanceId): StructuralView | undefined;
  instances(): Iterable<StructuralView>;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  type:
    | 'dangling_parent'
    | 'missing_back_reference'
    | 'parent_mismatch'
    | 'dangling_child'
    | 'duplicate_child'
    | 'root_mismatch'
    | 'cycle';
  instanceId: InstanceId;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Validates every structural invariant of a forest
 */
export function validateForest(shape: ForestShape): ValidationResult {
  const errors: ValidationError[] = [];

  for (const instance of shape.instances()) {
    errors.push(...validateParentLink(shape, instance));
    errors.push(...validateChildLinks(shape, instance));
  }

  errors.push(...validateRootSet(shape));
  errors.push(...detectCycles(shape));

  return {
    isValid: errors.length === 0,
    errors,
  };
}

function validateParentLink(shape: ForestShape, instance: StructuralView): ValidationError[] {
  const parentId = instance.getParentId();

  if (parentId === null) {
    if (shape.getRootIds().has(instance.id)) return [];
    return [
      {
        type: 'root_mismatch',
        instanceId: instance.id,
        message: `Instance ${instance.id} has no parent but is missing from the root set`,
      },
    ];
  }

  const parent = shape.getInstance(parentId);
  if (!parent) {
    return [
      {
        type: 'dangling_parent',
        instanceId: instance.id,
        message: `Instance ${instance.id} points at missing parent ${parentId}`,
        details: { parentId },
      },
    ];
  }

  if (!parent.getChildIds().includes(instance.id)) {
    return [
      {
        type: 'missing_back_reference',
        instanceId: instance.id,
        message: `Parent ${parentId} does not list instance ${instance.id} as a child`,
        details: { parentId },
      },
    ];
  }

  return [];
}

function validateChildLinks(shape: ForestShape, instance: StructuralView): ValidationError[] {
  const errors: ValidationError[] = [];
  const seen = new Set<InstanceId>();

  for (const childId of instance.getChildIds()) {
    if (seen.has(childId)) {
      errors.push({
        type: 'duplicate_child',
        instanceId: instance.id,
        message: `Instance ${instance.id} lists child ${childId} more than once`,
        details: { childId },
      });
      continue;
    }
    seen.add(childId);

    const child = shape.getInstance(childId);
    if (!child) {
      errors.push({
        type: 'dangling_child',
        instanceId: instance.id,
        message: `Instance ${instance.id} lists missing child ${childId}`,
        details: { childId },
      });
    } else if (child.getParentId() !== instance.id) {
      errors.push({
        type: 'parent_mismatch',
        instanceId: childId,
        message: `Child ${childId} of ${instance.id} names ${child.getParentId() ?? 'no parent'} as its parent`,
        details: { listedBy: instance.id, parentId: child.getParentId() },
      });
    }
  }

  return errors;
}

function validateRootSet(shape: ForestShape): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const rootId of shape.getRootIds()) {
    const root = shape.getInstance(rootId);
    if (!root) {
      errors.push({
        type: 'root_mismatch',
        instanceId: rootId,
        message: `Root ${rootId} is not in the forest`,
      });
    } else if (root.getParentId() !== null) {
      errors.push({
        type: 'root_mismatch',
        instanceId: rootId,
        message: `Root ${rootId} has parent ${root.getParentId()}`,
        details: { parentId: root.getParentId() },
      });
    }
  }

  return errors;
}

/**
 * Finds instances whose parent chain loops back on itself.
 *
 * Every instance reachable from a root through child lists is acyclic. For the
 * rest, the parent chain is followed until it leaves the forest, reaches a
 * known-good instance, or revisits an id, which is a cycle.
 */
function detectCycles(shape: ForestShape): ValidationError[] {
  const errors: ValidationError[] = [];
  const reachable = new Set<InstanceId>();
  const toVisit: InstanceId[] = Array.from(shape.getRootIds());

  let id = toVisit.pop();
  while (id !== undefined) {
    const instance = shape.getInstance(id);
    if (instance && !reachable.has(id)) {
      reachable.add(id);
      toVisit.push(...instance.getChildIds());
    }
    id = toVisit.pop();
  }

  for (const instance of shape.instances()) {
    if (reachable.has(instance.id)) continue;

    const chain = new Set<InstanceId>();
    let current: StructuralView | undefined = instance;
    while (current && !reachable.has(current.id)) {
      if (chain.has(current.id)) {
        errors.push({
          type: 'cycle',
          instanceId: instance.id,
          message: `Parent chain of instance ${instance.id} loops back on itself`,
          details: { cyclePath: Array.from(chain) },
        });
        break;
      }
      chain.add(current.id);

      const parentId = current.getParentId();
      current = parentId === null ? undefined : shape.getInstance(parentId);
    }
  }

  return errors;
}

/**
 * Returns every id that appears more than once in a snapshot's instance list
 */
export function findDuplicateIds(snapshot: RawForestSnapshot): InstanceId[] {
  const seen = new Set<InstanceId>();
  const duplicates = new Set<InstanceId>();

  for (const instance of snapshot.instances) {
    if (seen.has(instance.id)) duplicates.add(instance.id);
    seen.add(instance.id);
  }

  return Array.from(duplicates);
}

/**
 * Adapts a parsed snapshot to `ForestShape` so it can be validated before
 * any forest is built from it
 */
export function snapshotShape(snapshot: RawForestSnapshot): ForestShape {
  const byId = new Map<InstanceId, StructuralView>();
  for (const instance of snapshot.instances) {
    byId.set(instance.id, {
      id: instance.id,
      getParentId: () => instance.parentId,
      getChildIds: () => instance.childIds,
    });
  }
  const rootIds = new Set(snapshot.rootIds);

  return {
    getRootIds: () => rootIds,
    getInstance: (id) => byId.get(id),
    instances: () => byId.values(),
  };
}
