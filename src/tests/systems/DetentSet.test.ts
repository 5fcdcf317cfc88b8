/**
 * DetentSet Tests
 */

import { describe, it, expect } from 'vitest';
import { DetentSet, FALLBACK_DETENTS } from '../../systems/DetentSet';
import { Detents, compareDetents, type Detent } from '../../types/detent';

const { small, medium, large } = Detents;

describe('DetentSet', () => {
  describe('construction', () => {
    it('should sort members by extent at the reference container', () => {
      const set = DetentSet.of(large, small, medium);
      expect(set.toArray()).toEqual([small, medium, large]);
    });

    it('should order mixed detent kinds', () => {
      const set = DetentSet.of(Detents.fixed(200), Detents.fraction(0.6), large, small);
      expect(set.toArray()).toEqual([small, Detents.fixed(200), Detents.fraction(0.6), large]);
    });

    it('should fall back to medium and large when empty', () => {
      expect(new DetentSet([]).toArray()).toEqual([medium, large]);
      expect(new DetentSet().toArray()).toEqual([...FALLBACK_DETENTS]);
    });

    it('should keep duplicates', () => {
      const set = DetentSet.of(medium, large, medium);
      expect(set.size).toBe(3);
      expect(set.toArray()).toEqual([medium, medium, large]);
    });

    it('should expose smallest and largest', () => {
      const set = DetentSet.of(medium, small, large);
      expect(set.smallest).toBe(small);
      expect(set.largest).toBe(large);
    });

    it('should not be affected by changes to the source array', () => {
      const source: Detent[] = [small, large];
      const set = new DetentSet(source);
      source.push(medium);
      expect(set.size).toBe(2);
    });
  });

  describe('sortedAscending', () => {
    it('should keep small < medium < large even where a live container would flip them', () => {
      // At 200, small resolves to 120 and medium to 100
      expect(compareDetents(small, medium, 200)).toBeGreaterThan(0);

      const set = DetentSet.of(large, medium, small);
      expect(set.sortedAscending()).toEqual([small, medium, large]);
    });
  });

  describe('nearest', () => {
    const set = DetentSet.of(small, medium, large);

    it('should pick the closest resolved extent', () => {
      expect(set.nearest(300, 800)).toBe(medium);
      expect(set.nearest(650, 800)).toBe(large);
    });

    it('should give ties to the first detent in ascending order', () => {
      // |260 - 120| == |260 - 400|
      expect(set.nearest(260, 800)).toBe(small);
    });

    it('should pick the ends for out-of-range extents', () => {
      expect(set.nearest(-50, 800)).toBe(small);
      expect(set.nearest(10_000, 800)).toBe(large);
    });

    it('should return the first detent for a zero container', () => {
      expect(set.nearest(500, 0)).toBe(small);
    });
  });

  describe('stepping', () => {
    const set = DetentSet.of(small, medium, large);

    it('should step to neighbours', () => {
      expect(set.next(small)).toBe(medium);
      expect(set.next(medium)).toBe(large);
      expect(set.previous(large)).toBe(medium);
      expect(set.previous(medium)).toBe(small);
    });

    it('should stay at the ends', () => {
      expect(set.next(large)).toBe(large);
      expect(set.previous(small)).toBe(small);
    });

    it('should wrap when cycling', () => {
      expect(set.cycleNext(small)).toBe(medium);
      expect(set.cycleNext(large)).toBe(small);
    });

    it('should return the only member of a single-detent set', () => {
      const single = DetentSet.of(large);
      expect(single.next(large)).toBe(large);
      expect(single.previous(large)).toBe(large);
      expect(single.cycleNext(large)).toBe(large);
    });

    it('should step past every copy of a duplicated member', () => {
      const half = Detents.fraction(0.5);
      const withCopies = DetentSet.of(half, large, Detents.fraction(0.5));

      expect(withCopies.next(half)).toBe(large);
      expect(withCopies.cycleNext(half)).toBe(large);
      expect(withCopies.previous(large)).toEqual(half);
      expect(withCopies.previous(half)).toEqual(half);
      expect(withCopies.cycleNext(large)).toEqual(half);
    });

    it('should locate non-members by the nearest member at the reference', () => {
      // fraction(0.6) -> 600, nearest member medium (500)
      expect(set.next(Detents.fraction(0.6))).toBe(large);
      // fixed(130) -> 130, nearest member small (150)
      expect(set.previous(Detents.fixed(130))).toBe(small);
      expect(set.resolveMember(Detents.fraction(0.85))).toBe(large);
    });
  });

  describe('membership', () => {
    const set = DetentSet.of(small, Detents.fraction(0.6), large);

    it('should test membership structurally', () => {
      expect(set.contains(Detents.fraction(0.6))).toBe(true);
      expect(set.contains(medium)).toBe(false);
      expect(set.indexOf(Detents.fraction(0.6))).toBe(1);
      expect(set.indexOf(medium)).toBe(-1);
    });
  });

  describe('resolvedExtent', () => {
    it('should resolve against a container', () => {
      expect(DetentSet.resolvedExtent(medium, 800)).toBe(400);
    });
  });
});
