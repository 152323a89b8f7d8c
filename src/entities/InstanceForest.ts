import type { z } from 'zod';
import { cfg } from '../config/index.js';
import {
  DuplicateInstanceError,
  ForestContractError,
  ForestCycleError,
  ForestInvariantError,
  InstanceNotFoundError,
  SnapshotValidationError,
} from '../errors/forest.js';
import type { InstanceId } from '../schemas/base.js';
import { type ForestSnapshot, forestSnapshotSchema } from '../schemas/snapshot.js';
import { extractErrorDetails } from '../errors/base.js';
import { createModuleLogger, logError, startTimer } from '../utils/logger.js';
import { Descendants } from './Descendants.js';
import { FOREST_OPERATIONS, type TraversalOrder } from './ForestConstants.js';
import { findDuplicateIds, snapshotShape, validateForest } from './ForestValidation.js';
import { type InstanceView, type MutableInstanceView, RootedInstance } from './RootedInstance.js';

export const forestLogger = createModuleLogger('InstanceForest');
const logger = forestLogger;

export interface ForestOptions {
  /** Re-validate the whole forest after every structural mutation. Defaults to `FOREST_VERIFY_INVARIANTS`. */
  verifyInvariants?: boolean;
  /** Make descendant iterators fail once the forest changes shape. Defaults to `FOREST_ITERATION_GUARD`. */
  guardIteration?: boolean;
}

export interface TransplantOptions {
  /** Position in the new parent's child list; appended when omitted. Ignored for a new root. */
  index?: number;
}

/**
 * Logs an error on its way out. Broken internals are logged as errors; contract
 * and snapshot violations are thrown to a caller who decides what they mean,
 * so they only show up at debug level.
 */
function fail<E extends Error>(error: E): E {
  if (error instanceof ForestInvariantError) {
    logError(logger, error);
  } else {
    const { message, module, operation, context } = extractErrorDetails(error);
    logger.debug({ error: { name: error.name, message, module, operation, context } }, message);
  }
  return error;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * An identity-indexed forest of instances.
 *
 * The forest is the only owner of its instances: an instance lives exactly as
 * long as it is in `instances`, and its parent and child links are changed by
 * forest operations alone. After every public operation:
 *
 * - a parent link points at an instance of this forest that lists the child
 * - every listed child exists and points back at the parent
 * - `rootIds` holds exactly the instances without a parent
 * - child lists hold no duplicates and the graph has no cycles
 *
 * Moving subtrees between forests preserves the shape of the moved subtree;
 * only the link from its top instance to a parent changes.
 */
export class InstanceForest<P> {
  private readonly _instances = new Map<InstanceId, RootedInstance<P>>();
  private readonly _rootIds = new Set<InstanceId>();
  private _revision = 0;
  private readonly options: Required<ForestOptions>;

  constructor(options: ForestOptions = {}) {
    this.options = {
      verifyInvariants: options.verifyInvariants ?? cfg.FOREST_VERIFY_INVARIANTS,
      guardIteration: options.guardIteration ?? cfg.FOREST_ITERATION_GUARD,
    };
  }

  /**
   * Bumped by every structural mutation. Payload edits leave it alone.
   */
  get revision(): number {
    return this._revision;
  }

  get size(): number {
    return this._instances.size;
  }

  getRootIds(): ReadonlySet<InstanceId> {
    return this._rootIds;
  }

  has(id: InstanceId): boolean {
    return this._instances.has(id);
  }

  getInstance(id: InstanceId): InstanceView<P> | undefined {
    return this._instances.get(id);
  }

  /**
   * Like `getInstance`, but the returned view allows editing the payload
   */
  getInstanceMut(id: InstanceId): MutableInstanceView<P> | undefined {
    return this._instances.get(id);
  }

  /**
   * Every instance in the forest, in no particular structural order
   */
  instances(): IterableIterator<InstanceView<P>> {
    return this._instances.values();
  }

  /**
   * Creates an instance holding `payload` under `parentId` (appended as its
   * last child), or as a new root when `parentId` is null.
   *
   * @throws InstanceNotFoundError when `parentId` is not in this forest
   */
  insertInstance(payload: P, parentId: InstanceId | null = null): InstanceId {
    const parent = parentId === null ? undefined : this._instances.get(parentId);
    if (parentId !== null && !parent) {
      throw fail(new InstanceNotFoundError(parentId, FOREST_OPERATIONS.INSERT, 'parent'));
    }

    const instance = new RootedInstance(payload, parentId);
    if (parent) {
      parent.attachChild(instance.id);
    } else {
      this._rootIds.add(instance.id);
    }
    this._instances.set(instance.id, instance);

    logger.trace({ instanceId: instance.id, parentId }, 'Instance inserted');
    this.touch(FOREST_OPERATIONS.INSERT);

    return instance.id;
  }

  /**
   * Removes an instance together with all of its descendants and returns
   * them as a new forest whose only root is `rootId`.
   *
   * The removed subtree keeps its internal shape; its top instance becomes a
   * root. Returns `undefined` (and changes nothing) when `rootId` is absent.
   */
  removeInstance(rootId: InstanceId): InstanceForest<P> | undefined {
    const root = this._instances.get(rootId);
    if (!root) return undefined;

    const removed = new InstanceForest<P>(this.options);
    for (const instance of this.detachSubtree(root, FOREST_OPERATIONS.REMOVE)) {
      removed._instances.set(instance.id, instance);
    }
    root.setParentId(null);
    removed._rootIds.add(rootId);

    logger.debug({ rootId, instanceCount: removed.size }, 'Subtree removed');
    this.touch(FOREST_OPERATIONS.REMOVE);
    removed.touch(FOREST_OPERATIONS.REMOVE);

    return removed;
  }

  /**
   * Moves `sourceId` and all of its descendants out of `source` and into this
   * forest, under `newParentId` or as a new root when it is null.
   *
   * `source` may be this forest, which moves a subtree within it. Every
   * precondition is checked before anything changes, so a failed transplant
   * leaves both forests untouched.
   *
   * @throws InstanceNotFoundError when `sourceId` is not in `source` or `newParentId` is not in this forest
   * @throws ForestCycleError when moving within one forest under the subtree itself
   * @throws DuplicateInstanceError when this forest already holds one of the moved ids
   * @throws ForestContractError when `options.index` is out of range
   */
  transplant(
    source: InstanceForest<P>,
    sourceId: InstanceId,
    newParentId: InstanceId | null = null,
    options: TransplantOptions = {}
  ): void {
    const operation = FOREST_OPERATIONS.TRANSPLANT;

    const top = source._instances.get(sourceId);
    if (!top) {
      throw fail(new InstanceNotFoundError(sourceId, operation, 'instance', 'the source forest'));
    }

    const newParent = newParentId === null ? undefined : this._instances.get(newParentId);
    if (newParentId !== null && !newParent) {
      throw fail(new InstanceNotFoundError(newParentId, operation, 'new parent'));
    }

    const subtree = source.collectSubtree(top);

    if (source === this) {
      if (newParentId !== null && subtree.some((instance) => instance.id === newParentId)) {
        throw fail(new ForestCycleError(sourceId, newParentId, operation));
      }
    } else {
      const duplicates = subtree
        .filter((instance) => this._instances.has(instance.id))
        .map((instance) => instance.id);
      if (duplicates.length > 0) {
        throw fail(new DuplicateInstanceError(duplicates, operation));
      }
    }

    if (newParent && options.index !== undefined) {
      // Moving within the same parent frees up the moved instance's own slot
      const staysUnderSameParent = source === this && top.getParentId() === newParentId;
      const siblingCount = newParent.getChildIds().length - (staysUnderSameParent ? 1 : 0);
      if (!Number.isInteger(options.index) || options.index < 0 || options.index > siblingCount) {
        throw fail(
          new ForestContractError(
            `${operation}: index ${options.index} is outside 0..${siblingCount}`,
            operation,
            { sourceId, newParentId, index: options.index, siblingCount }
          )
        );
      }
    }

    source.unlink(top, operation);
    if (source !== this) {
      for (const instance of subtree) {
        source._instances.delete(instance.id);
        this._instances.set(instance.id, instance);
      }
    }

    top.setParentId(newParentId);
    if (newParent) {
      newParent.attachChild(top.id, options.index);
    } else {
      this._rootIds.add(top.id);
    }

    logger.debug(
      { sourceId, newParentId, instanceCount: subtree.length, sameForest: source === this },
      'Subtree transplanted'
    );
    source.touch(operation);
    if (source !== this) this.touch(operation);
  }

  /**
   * Lazily walks `id` and everything below it; `id` itself comes first.
   *
   * The default order pops from a stack that children are pushed onto in list
   * order, so at every level the last child is visited before its earlier
   * siblings. Pass `'first-child-first'` for pre-order in child-list order.
   *
   * Do not insert, remove or transplant on this forest while the walk is alive.
   */
  descendants(id: InstanceId, order?: TraversalOrder): Descendants<P> {
    return new Descendants(this, id, { order, guard: this.options.guardIteration });
  }

  toSnapshot(): ForestSnapshot<P> {
    return {
      rootIds: Array.from(this._rootIds),
      instances: Array.from(this._instances.values(), (instance) => ({
        id: instance.id,
        parentId: instance.getParentId(),
        childIds: [...instance.getChildIds()],
        payload: instance.payload,
      })),
    };
  }

  /**
   * Builds a forest from snapshot data, validating its structure, its
   * invariants and every payload against `payloadSchema`.
   *
   * @throws SnapshotValidationError when any check fails
   */
  static fromSnapshot<P>(
    data: unknown,
    payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>,
    options: ForestOptions = {}
  ): InstanceForest<P> {
    const endTimer = startTimer(logger, FOREST_OPERATIONS.FROM_SNAPSHOT);

    const parsed = forestSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw fail(
        new SnapshotValidationError(
          'Snapshot does not have the shape of a forest',
          parsed.error.issues.map(formatIssue)
        )
      );
    }
    const snapshot = parsed.data;

    const duplicates = findDuplicateIds(snapshot);
    if (duplicates.length > 0) {
      throw fail(
        new SnapshotValidationError(
          'Snapshot lists the same instance more than once',
          duplicates.map((id) => `Duplicate instance ${id}`)
        )
      );
    }

    const validation = validateForest(snapshotShape(snapshot));
    if (!validation.isValid) {
      throw fail(
        new SnapshotValidationError(
          'Snapshot violates forest invariants',
          validation.errors.map((error) => error.message)
        )
      );
    }

    const forest = new InstanceForest<P>(options);
    const payloadIssues: string[] = [];
    for (const entry of snapshot.instances) {
      const payload = payloadSchema.safeParse(entry.payload);
      if (!payload.success) {
        payloadIssues.push(...payload.error.issues.map((issue) => `${entry.id}: ${formatIssue(issue)}`));
        continue;
      }
      forest._instances.set(
        entry.id,
        new RootedInstance(payload.data, entry.parentId, entry.id, [...entry.childIds])
      );
    }
    if (payloadIssues.length > 0) {
      throw fail(new SnapshotValidationError('Snapshot payloads failed validation', payloadIssues));
    }

    for (const rootId of snapshot.rootIds) {
      forest._rootIds.add(rootId);
    }

    endTimer({ instanceCount: forest.size });
    return forest;
  }

  /**
   * Collects `root` and everything reachable below it without changing anything.
   *
   * Ids that are absent, already collected, or listed by an instance they do
   * not name as their parent are skipped, so a malformed child list can never
   * pull in an instance from outside the subtree.
   */
  private collectSubtree(root: RootedInstance<P>): RootedInstance<P>[] {
    const collected: RootedInstance<P>[] = [];
    const seen = new Set<InstanceId>();
    const toVisit: Array<[InstanceId, InstanceId | null]> = [[root.id, root.getParentId()]];

    let entry = toVisit.pop();
    while (entry !== undefined) {
      const [id, listedBy] = entry;
      const instance = this._instances.get(id);

      if (instance && !seen.has(id) && instance.getParentId() === listedBy) {
        seen.add(id);
        collected.push(instance);
        for (const childId of instance.getChildIds()) {
          toVisit.push([childId, id]);
        }
      }

      entry = toVisit.pop();
    }

    return collected;
  }

  /**
   * Severs the link between `instance` and its parent (or the root set).
   */
  private unlink(instance: RootedInstance<P>, operation: string): void {
    const parentId = instance.getParentId();
    if (parentId === null) {
      this._rootIds.delete(instance.id);
      return;
    }

    const parent = this._instances.get(parentId);
    if (!parent?.detachChild(instance.id)) {
      throw fail(
        new ForestInvariantError(
          [
            {
              type: 'missing_back_reference',
              instanceId: instance.id,
              message: `Parent ${parentId} does not list instance ${instance.id} as a child`,
              details: { parentId },
            },
          ],
          operation
        )
      );
    }
  }

  /**
   * Takes `root`'s subtree out of this forest and returns its instances
   */
  private detachSubtree(root: RootedInstance<P>, operation: string): RootedInstance<P>[] {
    const subtree = this.collectSubtree(root);

    this.unlink(root, operation);
    for (const instance of subtree) {
      this._instances.delete(instance.id);
    }

    return subtree;
  }

  private touch(operation: string): void {
    this._revision++;

    if (this.options.verifyInvariants) {
      const result = validateForest(this);
      if (!result.isValid) {
        throw fail(new ForestInvariantError(result.errors, operation));
      }
    }
  }
}
