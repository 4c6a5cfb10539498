export const TRAINED_CLASSIFIER = Symbol('TRAINED_CLASSIFIER');
export const UNTRAINED_CLASSIFIER = Symbol('UNTRAINED_CLASSIFIER');

export interface ClassifierPrediction {
  classLabel: string;
  probabilities: Record<string, number>;
}

/**
 * 최근 수 시퀀스로 플레이어의 다음 수를 예측하는 분류기.
 * 실패 시 PredictionUnavailableError 를 던진다.
 */
export interface MoveClassifier {
  readonly name: string;
  predict(sequence: readonly number[]): ClassifierPrediction;
}
