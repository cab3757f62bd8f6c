import { createRandom, randomSeed, shuffle } from '../random';

describe('random', () => {
  describe('createRandom', () => {
    it('should replay the same sequence for the same seed', () => {
      const a = createRandom(42);
      const b = createRandom(42);
      const first = [a(), a(), a(), a()];
      expect([b(), b(), b(), b()]).toEqual(first);
    });

    it('should diverge for different seeds', () => {
      expect(createRandom(1)()).not.toBe(createRandom(2)());
    });

    it('should stay within [0, 1)', () => {
      const random = createRandom(7);
      for (let i = 0; i < 1000; i++) {
        const value = random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('randomSeed', () => {
    it('should return an unsigned 32-bit integer', () => {
      const seed = randomSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    });
  });

  describe('shuffle', () => {
    it('should return a permutation without touching the input', () => {
      const input = ['a', 'b', 'c', 'd', 'e'];
      const result = shuffle(input, createRandom(3));
      expect(input).toEqual(['a', 'b', 'c', 'd', 'e']);
      expect([...result].sort()).toEqual(input);
    });

    it('should swap according to the random source', () => {
      // j = floor(0 * (i + 1)) = 0 at every step
      expect(shuffle([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
      expect(shuffle([1, 2, 3], () => 0.999999)).toEqual([1, 2, 3]);
    });

    it('should be deterministic for a seeded source', () => {
      const items = Array.from({ length: 20 }, (_, i) => i);
      expect(shuffle(items, createRandom(11))).toEqual(shuffle(items, createRandom(11)));
    });
  });
});
