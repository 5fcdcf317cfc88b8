/**
 * Detent Set
 *
 * Immutable, non-empty collection of detents kept in ascending order of
 * their extent at the reference container. Answers nearest/next/previous
 * queries; none of them can fail.
 */

import {
  Detents,
  DETENT_REFERENCE_EXTENT,
  compareDetents,
  isSameDetent,
  resolveDetentExtent,
  type Detent,
} from '../types/detent';

/**
 * Detents used when a set is built from nothing
 */
export const FALLBACK_DETENTS: readonly Detent[] = [Detents.medium, Detents.large];

export class DetentSet {
  private readonly ordered: readonly Detent[];

  constructor(detents: Iterable<Detent> = FALLBACK_DETENTS) {
    const input = Array.from(detents);
    const members = input.length > 0 ? input : [...FALLBACK_DETENTS];

    // Array.prototype.sort is stable, so equal extents keep insertion order
    this.ordered = Object.freeze(members.sort((a, b) => compareDetents(a, b)));
  }

  /**
   * Convenience factory
   */
  static of(...detents: Detent[]): DetentSet {
    return new DetentSet(detents);
  }

  /**
   * Absolute extent of a detent for a container
   */
  static resolvedExtent(detent: Detent, containerExtent: number): number {
    return resolveDetentExtent(detent, containerExtent);
  }

  get size(): number {
    return this.ordered.length;
  }

  get smallest(): Detent {
    return this.ordered[0];
  }

  get largest(): Detent {
    return this.ordered[this.ordered.length - 1];
  }

  /**
   * Members in ascending order
   */
  toArray(): Detent[] {
    return [...this.ordered];
  }

  /**
   * Members ordered by their extent at the reference container, so
   * small < medium < large whatever the live container size is
   */
  sortedAscending(): Detent[] {
    return this.toArray();
  }

  contains(detent: Detent): boolean {
    return this.ordered.some((member) => isSameDetent(member, detent));
  }

  /**
   * Ascending index of the first equal member, or -1
   */
  indexOf(detent: Detent): number {
    return this.ordered.findIndex((member) => isSameDetent(member, detent));
  }

  /**
   * Member whose extent is closest to `extent`; first wins on ties
   */
  nearest(extent: number, containerExtent: number): Detent {
    let closest = this.ordered[0];
    let minDistance = Number.POSITIVE_INFINITY;

    for (const detent of this.ordered) {
      const distance = Math.abs(extent - resolveDetentExtent(detent, containerExtent));
      if (distance < minDistance) {
        minDistance = distance;
        closest = detent;
      }
    }

    return closest;
  }

  /**
   * Next larger member; the largest stays put. Steps past every copy of a
   * duplicated member.
   */
  next(after: Detent): Detent {
    const index = this.locate(after, 'last');
    return this.ordered[Math.min(index + 1, this.ordered.length - 1)];
  }

  /**
   * Next smaller member; the smallest stays put
   */
  previous(before: Detent): Detent {
    const index = this.locate(before, 'first');
    return this.ordered[Math.max(index - 1, 0)];
  }

  /**
   * Next larger member, wrapping from the largest to the smallest
   */
  cycleNext(after: Detent): Detent {
    const index = this.locate(after, 'last');
    return this.ordered[(index + 1) % this.ordered.length];
  }

  /**
   * Member equal to `detent`, or the member nearest to it at the reference
   */
  resolveMember(detent: Detent): Detent {
    return this.ordered[this.locate(detent, 'first')];
  }

  /**
   * Ascending index of the last equal member, or -1
   */
  lastIndexOf(detent: Detent): number {
    for (let index = this.ordered.length - 1; index >= 0; index--) {
      if (isSameDetent(this.ordered[index], detent)) {
        return index;
      }
    }
    return -1;
  }

  /**
   * Index of `detent` (or its nearest stand-in) at one end of its run of copies
   */
  private locate(detent: Detent, edge: 'first' | 'last'): number {
    const member = this.contains(detent)
      ? detent
      : this.nearest(resolveDetentExtent(detent, DETENT_REFERENCE_EXTENT), DETENT_REFERENCE_EXTENT);
    return edge === 'first' ? this.indexOf(member) : this.lastIndexOf(member);
  }
}
