/**
 * @fileoverview Unit tests for the collection adapter
 */

import {
  ArgumentNullException,
  ISpecification,
  MultipleMatchesException,
  NoMatchException,
  SpecificationQuery,
  Specifications,
  all,
  any,
  count,
  first,
  firstOrDefault,
  query,
  single,
  singleOrDefault,
  where,
} from '../../../src';

const positive = Specifications.where<number>((n) => n > 0);
const even = Specifications.where<number>((n) => n % 2 === 0);
const huge = Specifications.where<number>((n) => n > 1000);
const inRange = Specifications.where<number>((n) => n >= 1 && n <= 100);

const numbers = [-5, 0, 15, 25, 50, 75, 101];

describe('Collection adapter', () => {
  describe('where', () => {
    it('keeps matching elements in source order', () => {
      expect(Array.from(where(numbers, positive.and(inRange)))).toEqual([15, 25, 50, 75]);
    });

    it('is lazy', () => {
      const seen: number[] = [];
      const probe = Specifications.where<number>((n) => {
        seen.push(n);
        return true;
      });

      const filtered = where(numbers, probe);
      expect(seen).toEqual([]);

      const iterator = filtered[Symbol.iterator]();
      iterator.next();
      expect(seen).toEqual([-5]);
    });

    it('can be iterated more than once', () => {
      const filtered = where(numbers, even);
      expect(Array.from(filtered)).toEqual([0, 50]);
      expect(Array.from(filtered)).toEqual([0, 50]);
    });

    it('yields nothing for an empty source', () => {
      expect(Array.from(where<number>([], positive))).toEqual([]);
    });

    it('rejects absent arguments', () => {
      const absentSource = undefined as unknown as number[];
      const absentSpec = undefined as unknown as ISpecification<number>;

      expect(() => where(absentSource, positive)).toThrowErrorType(ArgumentNullException);
      expect(() => where(numbers, absentSpec)).toThrowErrorType(ArgumentNullException);
    });
  });

  describe('count, any, all', () => {
    it('counts matches', () => {
      expect(count(numbers, positive)).toBe(5);
      expect(count(numbers, huge)).toBe(0);
    });

    it('any stops at the first match', () => {
      let calls = 0;
      const probe = Specifications.where<number>((n) => {
        calls++;
        return n > 0;
      });

      expect(any(numbers, probe)).toBe(true);
      expect(calls).toBe(3);
      expect(any(numbers, huge)).toBe(false);
    });

    it('all is vacuously true for an empty source', () => {
      expect(all<number>([], huge)).toBe(true);
      expect(all(numbers, positive)).toBe(false);
      expect(all([2, 4], even)).toBe(true);
    });
  });

  describe('first and single', () => {
    it('first returns the earliest match', () => {
      expect(first(numbers, even)).toBe(0);
    });

    it('first throws when nothing matches', () => {
      expect(() => first(numbers, huge)).toThrowErrorType(NoMatchException);
      expect(() => first(numbers, huge)).toThrow('Sequence contains no matching element');
    });

    it('firstOrDefault falls back', () => {
      expect(firstOrDefault(numbers, huge)).toBeUndefined();
      expect(firstOrDefault(numbers, huge, -1)).toBe(-1);
      expect(firstOrDefault(numbers, positive, -1)).toBe(15);
    });

    it('single returns the only match', () => {
      expect(single(numbers, Specifications.where<number>((n) => n === 25))).toBe(25);
    });

    it('single throws when nothing matches', () => {
      expect(() => single(numbers, huge)).toThrowErrorType(NoMatchException);
    });

    it('single stops scanning at the second match', () => {
      let calls = 0;
      const probe = Specifications.where<number>((n) => {
        calls++;
        return n > 0;
      });

      let caught: unknown;
      try {
        single(numbers, probe);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MultipleMatchesException);
      expect(caught).toMatchObject({ matchCount: 2, name: 'MultipleMatchesException' });
      expect(calls).toBe(4);
    });

    it('singleOrDefault falls back only when nothing matches', () => {
      expect(singleOrDefault(numbers, huge)).toBeUndefined();
      expect(singleOrDefault(numbers, huge, 7)).toBe(7);
      expect(() => singleOrDefault(numbers, even, 7)).toThrowErrorType(MultipleMatchesException);
    });
  });

  describe('SpecificationQuery', () => {
    it('chains where clauses as AND', () => {
      expect(query(numbers).where(positive).where(even).toArray()).toEqual([50]);
    });

    it('returns a new query per where', () => {
      const base = query(numbers);
      const filtered = base.where(positive);

      expect(filtered).not.toBe(base);
      expect(filtered).toBeInstanceOf(SpecificationQuery);
      expect(base.count()).toBe(7);
      expect(filtered.count()).toBe(5);
    });

    it('exposes the terminal operations', () => {
      const q = query(numbers).where(positive);

      expect(q.count(even)).toBe(1);
      expect(q.any(huge)).toBe(false);
      expect(q.all(positive)).toBe(true);
      expect(q.first(inRange.not())).toBe(101);
      expect(q.firstOrDefault(huge, 0)).toBe(0);
      expect(q.single(even)).toBe(50);
      expect(q.singleOrDefault(huge)).toBeUndefined();
    });

    it('is iterable', () => {
      expect([...query(numbers).where(inRange.not())]).toEqual([-5, 0, 101]);
    });
  });
});
