export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

/** [0, 1) 범위의 난수 */
export type RandomSource = () => number;

/**
 * 시드 고정 난수 생성기 (mulberry32)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
