/**
 * Configuration constants for forest operations
 */

/**
 * Sibling order used by descendant traversal.
 *
 * Both orders are depth-first and yield the starting instance first.
 */
export const TRAVERSAL_ORDER = {
  /** Children pushed in list order and popped last-in-first-out: the last child is visited before its earlier siblings */
  LAST_CHILD_FIRST: 'last-child-first',

  /** Pre-order in child-list order, the order a document is read in */
  FIRST_CHILD_FIRST: 'first-child-first',
} as const;

export type TraversalOrder = (typeof TRAVERSAL_ORDER)[keyof typeof TRAVERSAL_ORDER];

export const DEFAULT_TRAVERSAL_ORDER: TraversalOrder = TRAVERSAL_ORDER.LAST_CHILD_FIRST;

/**
 * Operation names used in errors and log lines
 */
export const FOREST_OPERATIONS = {
  INSERT: 'insertInstance',
  REMOVE: 'removeInstance',
  TRANSPLANT: 'transplant',
  FROM_SNAPSHOT: 'fromSnapshot',
} as const;
