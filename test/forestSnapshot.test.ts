import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { InstanceForest } from '../src/entities/InstanceForest.js';
import { parseForestSnapshot, serializeForest } from '../src/entities/ForestSnapshot.js';
import { isForestError } from '../src/errors/base.js';
import { SnapshotValidationError } from '../src/errors/forest.js';
import { createInstancePayload, instancePayloadSchema, type InstancePayload } from '../src/schemas/instance.js';
import { buildSampleTree, fixedId, structureOf } from './testUtils.js';

const A = fixedId(1);
const B = fixedId(2);

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('forest snapshots', () => {
  describe('toSnapshot', () => {
    it('exposes roots and every instance with its links and payload', () => {
      const forest = new InstanceForest<InstancePayload>();
      const root = forest.insertInstance(
        createInstancePayload({ name: 'Workspace', className: 'Workspace', properties: { Gravity: 196.2 } })
      );
      const child = forest.insertInstance(createInstancePayload({ name: 'Part', className: 'Part' }), root);

      expect(forest.toSnapshot()).toEqual({
        rootIds: [root],
        instances: [
          {
            id: root,
            parentId: null,
            childIds: [child],
            payload: { name: 'Workspace', className: 'Workspace', properties: { Gravity: 196.2 } },
          },
          {
            id: child,
            parentId: root,
            childIds: [],
            payload: { name: 'Part', className: 'Part', properties: {} },
          },
        ],
      });
    });

    it('copies child lists', () => {
      const forest = new InstanceForest<InstancePayload>();
      const { a } = buildSampleTree(forest);
      const snapshot = forest.toSnapshot();

      snapshot.instances[0]?.childIds.pop();

      expect(forest.getInstance(a)?.getChildIds()).toHaveLength(2);
    });
  });

  describe('fromSnapshot', () => {
    it('rebuilds the same structure and payloads', () => {
      const forest = new InstanceForest<InstancePayload>();
      const { b } = buildSampleTree(forest);

      const copy = InstanceForest.fromSnapshot(forest.toSnapshot(), instancePayloadSchema);

      expect(structureOf(copy)).toEqual(structureOf(forest));
      expect(copy.getInstance(b)?.payload).toEqual(forest.getInstance(b)?.payload);
    });

    it('round-trips through JSON text', () => {
      const forest = new InstanceForest<InstancePayload>();
      const { d } = buildSampleTree(forest);

      const copy = parseForestSnapshot(serializeForest(forest, 2), instancePayloadSchema);

      expect(structureOf(copy)).toEqual(structureOf(forest));
      expect(copy.getInstance(d)?.payload.name).toBe('d');
    });

    it('accepts any payload schema', () => {
      const copy = InstanceForest.fromSnapshot(
        {
          rootIds: [A],
          instances: [{ id: A, parentId: null, childIds: [], payload: 42 }],
        },
        z.number()
      );

      expect(copy.getInstance(A)?.payload).toBe(42);
    });

    it('rejects data without the snapshot shape', () => {
      const error = catchError(() =>
        InstanceForest.fromSnapshot({ rootIds: [A], instances: [{ id: 'not-a-uuid' }] }, z.unknown())
      );

      expect(error).toBeInstanceOf(SnapshotValidationError);
      if (!(error instanceof SnapshotValidationError)) return;
      expect(error.message).toBe('Snapshot does not have the shape of a forest');
      expect(error.issues).toContain('instances.0.id: Invalid instance ID format');
    });

    it('rejects duplicate instance ids', () => {
      const error = catchError(() =>
        InstanceForest.fromSnapshot(
          {
            rootIds: [A],
            instances: [
              { id: A, parentId: null, childIds: [], payload: null },
              { id: A, parentId: null, childIds: [], payload: null },
            ],
          },
          z.null()
        )
      );

      expect(error).toBeInstanceOf(SnapshotValidationError);
      if (!(error instanceof SnapshotValidationError)) return;
      expect(error.message).toBe('Snapshot lists the same instance more than once');
      expect(error.issues).toEqual([`Duplicate instance ${A}`]);
    });

    it('rejects snapshots that break forest invariants', () => {
      const error = catchError(() =>
        InstanceForest.fromSnapshot(
          {
            rootIds: [A],
            instances: [{ id: A, parentId: null, childIds: [B], payload: null }],
          },
          z.null()
        )
      );

      expect(error).toBeInstanceOf(SnapshotValidationError);
      if (!(error instanceof SnapshotValidationError)) return;
      expect(error.message).toBe('Snapshot violates forest invariants');
      expect(error.issues).toEqual([`Instance ${A} lists missing child ${B}`]);
    });

    it('rejects payloads that fail the payload schema', () => {
      const error = catchError(() =>
        InstanceForest.fromSnapshot(
          {
            rootIds: [A],
            instances: [
              { id: A, parentId: null, childIds: [], payload: { name: '', className: 'Part' } },
            ],
          },
          instancePayloadSchema
        )
      );

      expect(error).toBeInstanceOf(SnapshotValidationError);
      if (!(error instanceof SnapshotValidationError)) return;
      expect(error.message).toBe('Snapshot payloads failed validation');
      expect(error.issues).toEqual([`${A}: name: Instance name cannot be empty`]);
    });

    it('applies forest options to the rebuilt forest', () => {
      const copy = InstanceForest.fromSnapshot(
        { rootIds: [A], instances: [{ id: A, parentId: null, childIds: [], payload: null }] },
        z.null(),
        { guardIteration: false }
      );
      const walk = copy.descendants(A);
      copy.insertInstance(null, A);

      expect(walk.next().value?.id).toBe(A);
    });
  });

  describe('parseForestSnapshot', () => {
    it('wraps invalid JSON in a forest error', () => {
      const error = catchError(() => parseForestSnapshot('{not json', z.unknown()));

      expect(isForestError(error)).toBe(true);
      if (!isForestError(error)) return;
      expect(error.module).toBe('forest.snapshot');
      expect(error.operation).toBe('parseForestSnapshot');
      expect(error.context?.cause).toBeInstanceOf(SyntaxError);
    });
  });
});
