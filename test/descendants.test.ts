import { beforeEach, describe, expect, it } from 'vitest';
import { Descendants } from '../src/entities/Descendants.js';
import { TRAVERSAL_ORDER } from '../src/entities/ForestConstants.js';
import { InstanceForest } from '../src/entities/InstanceForest.js';
import { StaleIterationError } from '../src/errors/forest.js';
import type { InstancePayload } from '../src/schemas/instance.js';
import { newInstanceId } from '../src/utils/instanceId.js';
import { buildSampleTree, folder, namesOf, type SampleTree } from './testUtils.js';

describe('descendants', () => {
  let forest: InstanceForest<InstancePayload>;
  let tree: SampleTree;

  beforeEach(() => {
    forest = new InstanceForest<InstancePayload>({ guardIteration: true });
    tree = buildSampleTree(forest);
  });

  describe('order', () => {
    it('yields the starting instance first, then the last child before its earlier siblings', () => {
      expect(namesOf(forest.descendants(tree.a))).toEqual(['a', 'c', 'b', 'e', 'd']);
    });

    it('walks in child-list order when asked for first-child-first', () => {
      expect(namesOf(forest.descendants(tree.a, TRAVERSAL_ORDER.FIRST_CHILD_FIRST))).toEqual([
        'a',
        'b',
        'd',
        'e',
        'c',
      ]);
    });

    it('starts from an inner instance', () => {
      expect(namesOf(forest.descendants(tree.b))).toEqual(['b', 'e', 'd']);
    });

    it('yields only the instance itself for a leaf', () => {
      expect(namesOf(forest.descendants(tree.d))).toEqual(['d']);
    });
  });

  describe('coverage', () => {
    it('yields the instance and every transitive child exactly once', () => {
      const { a, b, c, d, e } = tree;
      const f = forest.insertInstance(folder('f'), e);
      const ids = Array.from(forest.descendants(a), (instance) => instance.id);

      expect(ids).toHaveLength(6);
      expect(new Set(ids)).toEqual(new Set([a, b, c, d, e, f]));
    });

    it('does not reach other roots', () => {
      forest.insertInstance(folder('elsewhere'));

      expect(namesOf(forest.descendants(tree.b))).not.toContain('elsewhere');
      expect(Array.from(forest.descendants(tree.a))).toHaveLength(5);
    });

    it('is empty for an absent id', () => {
      expect(Array.from(forest.descendants(newInstanceId()))).toEqual([]);
    });
  });

  describe('iteration protocol', () => {
    it('is lazy and single-pass', () => {
      const walk = forest.descendants(tree.a);

      expect(walk.next().value?.id).toBe(tree.a);
      expect(Array.from(walk)).toHaveLength(4);
      expect(Array.from(walk)).toHaveLength(0);
      expect(walk.next().done).toBe(true);
    });

    it('skips ids that the source no longer resolves', () => {
      const { a, b, c } = tree;
      const source = {
        revision: 0,
        getInstance: (id: typeof a) => (id === b ? undefined : forest.getInstance(id)),
      };

      expect(namesOf(new Descendants(source, a))).toEqual(['a', 'c']);
      expect(forest.has(c)).toBe(true);
    });
  });

  describe('stale iteration guard', () => {
    it('fails when the forest changes shape mid-walk', () => {
      const walk = forest.descendants(tree.a);
      walk.next();

      forest.insertInstance(folder('late'), tree.a);

      expect(() => walk.next()).toThrow(StaleIterationError);
    });

    it('fails after a removal mid-walk', () => {
      const walk = forest.descendants(tree.a);
      walk.next();

      forest.removeInstance(tree.c);

      expect(() => walk.next()).toThrow('Forest was structurally modified while iterating descendants');
    });

    it('tolerates payload edits mid-walk', () => {
      const walk = forest.descendants(tree.a);
      walk.next();

      const c = forest.getInstanceMut(tree.c);
      if (!c) throw new Error('instance missing');
      c.payload = folder('renamed');

      expect(walk.next().value?.payload.name).toBe('renamed');
    });

    it('stays finished after a drained walk outlives a mutation', () => {
      const walk = forest.descendants(tree.a);
      expect(Array.from(walk)).toHaveLength(5);

      forest.insertInstance(folder('late'), tree.a);

      expect(walk.next()).toEqual({ done: true, value: undefined });
    });

    it('stays finished when the forest changes after the last instance was yielded', () => {
      const walk = forest.descendants(tree.d);
      expect(walk.next().value?.id).toBe(tree.d);

      forest.removeInstance(tree.c);

      expect(walk.next().done).toBe(true);
    });

        it('continues with the ids already stacked when the guard is off', () => {
      const unguarded = new InstanceForest<InstancePayload>({ guardIteration: false });
      const { a, c } = buildSampleTree(unguarded);
      const walk = unguarded.descendants(a);
      walk.next();

      unguarded.insertInstance(folder('late'), a);

      expect(walk.next().value?.id).toBe(c);
    });
  });
});
