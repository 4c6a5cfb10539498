export class InvalidMoveError extends Error {
  constructor(readonly value: unknown) {
    super(`Invalid move: ${String(value)} (expected 0, 1 or 2)`);
    this.name = 'InvalidMoveError';
  }
}

/**
 * 분류기를 사용할 수 없거나 추론에 실패한 경우
 */
export class PredictionUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PredictionUnavailableError';
  }
}
