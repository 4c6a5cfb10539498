import { Move } from '../enums/game.enum';

export interface PatternRepeat {
  /** 과거 패턴이 시작된 위치 */
  index: number;
  anchor: Move;
}

/**
 * 최근 패턴(마지막 windowLength+1 수 중 앞 windowLength 수)과 그 뒤에 온 수가
 * 과거에 그대로 나온 적이 있는지 찾는다. 가장 오래된 일치가 우선.
 */
export function findPatternRepeat(
  history: readonly Move[],
  windowLength: number,
): PatternRepeat | undefined {
  if (history.length <= windowLength + 1) {
    return undefined;
  }

  const recent = history.slice(-(windowLength + 1));
  const pattern = recent.slice(0, windowLength);
  const anchor = recent[windowLength];

  for (let i = 0; i <= history.length - windowLength - 2; i++) {
    const matches = pattern.every((move, offset) => history[i + offset] === move);
    if (matches && history[i + windowLength] === anchor) {
      return { index: i, anchor };
    }
  }

  return undefined;
}
