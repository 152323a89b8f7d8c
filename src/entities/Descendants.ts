import { StaleIterationError } from '../errors/forest.js';
import type { InstanceId } from '../schemas/base.js';
import { DEFAULT_TRAVERSAL_ORDER, TRAVERSAL_ORDER, type TraversalOrder } from './ForestConstants.js';
import type { InstanceView } from './RootedInstance.js';

/**
 * What a descendant walk needs from the forest it borrows
 */
export interface DescendantSource<P> {
  readonly revision: number;
  getInstance(id: InstanceId): InstanceView<P> | undefined;
}

export interface DescendantsOptions {
  order?: TraversalOrder;
  /** Throw `StaleIterationError` when the source changes shape mid-walk */
  guard?: boolean;
}

/**
 * Lazy, single-pass walk over an instance and everything below it.
 *
 * The starting instance is always yielded first. The walk keeps an explicit
 * stack seeded with the starting id; each step pops an id, skips it when the
 * forest no longer holds it, otherwise pushes its children and yields it.
 * Nothing beyond the stack is materialized.
 *
 * The source forest must not be structurally mutated while the walk is alive.
 * With the guard on, `next()` throws once the forest's revision has moved,
 * unless the walk has already run dry.
 */
export class Descendants<P> implements IterableIterator<InstanceView<P>> {
  private readonly idsToVisit: InstanceId[];
  private readonly order: TraversalOrder;
  private readonly guard: boolean;
  private readonly startRevision: number;
  private finished = false;

  constructor(
    private readonly source: DescendantSource<P>,
    id: InstanceId,
    options: DescendantsOptions = {}
  ) {
    this.idsToVisit = [id];
    this.order = options.order ?? DEFAULT_TRAVERSAL_ORDER;
    this.guard = options.guard ?? true;
    this.startRevision = source.revision;
  }

  next(): IteratorResult<InstanceView<P>> {
    // Drained walks never read the forest again
    if (this.finished || this.idsToVisit.length === 0) {
      this.finished = true;
      return { done: true, value: undefined };
    }

    if (this.guard && this.source.revision !== this.startRevision) {
      throw new StaleIterationError(this.startRevision, this.source.revision);
    }

    let id = this.idsToVisit.pop();
    while (id !== undefined) {
      const instance = this.source.getInstance(id);
      if (instance) {
        this.pushChildren(instance.getChildIds());
        return { done: false, value: instance };
      }
      id = this.idsToVisit.pop();
    }

    this.finished = true;
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): IterableIterator<InstanceView<P>> {
    return this;
  }

  private pushChildren(childIds: readonly InstanceId[]): void {
    if (this.order === TRAVERSAL_ORDER.FIRST_CHILD_FIRST) {
      for (let i = childIds.length - 1; i >= 0; i--) {
        const childId = childIds[i];
        if (childId !== undefined) this.idsToVisit.push(childId);
      }
      return;
    }

    for (const childId of childIds) {
      this.idsToVisit.push(childId);
    }
  }
}
