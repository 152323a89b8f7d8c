import type { InstanceId } from '../schemas/base.js';
import { newInstanceId } from '../utils/instanceId.js';

/**
 * Read-only view of an instance held by a forest.
 *
 * Parent and children are invariant-protected: only forest operations change
 * them, so neither view exposes a way to set them.
 */
export interface InstanceView<P> {
  readonly id: InstanceId;
  readonly payload: P;
  getParentId(): InstanceId | null;
  getChildIds(): readonly InstanceId[];
}

/**
 * View returned by mutable lookup: the payload may be replaced or edited in place.
 */
export interface MutableInstanceView<P> extends Omit<InstanceView<P>, 'payload'> {
  payload: P;
}

/**
 * An instance rooted in a forest: a payload plus its structural metadata.
 *
 * Instances are created and owned by `InstanceForest`. The structural mutators
 * below are for the forest alone; callers only ever see the instance through
 * `InstanceView` or `MutableInstanceView`.
 */
export class RootedInstance<P> implements MutableInstanceView<P> {
  public readonly id: InstanceId;
  public payload: P;
  private _parentId: InstanceId | null;
  // Order is relevant and must be preserved
  private readonly _childIds: InstanceId[];

  constructor(
    payload: P,
    parentId: InstanceId | null,
    id: InstanceId = newInstanceId(),
    childIds: InstanceId[] = []
  ) {
    this.id = id;
    this.payload = payload;
    this._parentId = parentId;
    this._childIds = childIds;
  }

  getParentId(): InstanceId | null {
    return this._parentId;
  }

  getChildIds(): readonly InstanceId[] {
    return this._childIds;
  }

  /** @internal */
  setParentId(parentId: InstanceId | null): void {
    this._parentId = parentId;
  }

  /**
   * Appends a child id, or inserts it at `index` when given.
   *
   * @internal
   */
  attachChild(childId: InstanceId, index?: number): void {
    if (index === undefined) {
      this._childIds.push(childId);
    } else {
      this._childIds.splice(index, 0, childId);
    }
  }

  /**
   * @returns whether the id was present
   * @internal
   */
  detachChild(childId: InstanceId): boolean {
    const index = this._childIds.indexOf(childId);
    if (index === -1) return false;

    this._childIds.splice(index, 1);
    return true;
  }
}
