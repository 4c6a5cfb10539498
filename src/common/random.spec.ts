import { createSeededRandom } from './random';

describe('createSeededRandom', () => {
  it('is reproducible for the same seed', () => {
    const a = createSeededRandom(123);
    const b = createSeededRandom(123);

    const first = Array.from({ length: 20 }, () => a());
    const second = Array.from({ length: 20 }, () => b());

    expect(first).toEqual(second);
  });

  it('differs between seeds', () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);

    expect(Array.from({ length: 5 }, () => a())).not.toEqual(Array.from({ length: 5 }, () => b()));
  });

  it('stays within [0, 1)', () => {
    const random = createSeededRandom(99);

    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
