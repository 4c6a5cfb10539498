import { MOVES, MoveLabel } from '../enums/game.enum';
import { PredictionUnavailableError } from '../errors/game.errors';
import { ClassifierPrediction, MoveClassifier } from './classifier.interface';
import { ModelArtifactDto } from './dto/model-artifact.dto';
import { moveFromLabel } from '../engine/judge';

export const SEQUENCE_LENGTH = 5;

/**
 * 위치별 one-hot 인코딩 위에서 동작하는 선형 softmax 분류기
 */
export class SoftmaxSequenceClassifier implements MoveClassifier {
  readonly name: string;

  constructor(private readonly model: ModelArtifactDto) {
    this.name = `${model.name}@${model.version}`;
    assertModelShape(model);
  }

  /**
   * 기본 가중치(전부 0)로 만든 미학습 분류기
   */
  static untrained(): SoftmaxSequenceClassifier {
    const labels = MOVES.map((move) => MoveLabel[move]);
    return new SoftmaxSequenceClassifier({
      name: 'rps-predictor',
      version: 'untrained',
      sequenceLength: SEQUENCE_LENGTH,
      labels,
      bias: labels.map(() => 0),
      weights: labels.map(() => new Array<number>(SEQUENCE_LENGTH * MOVES.length).fill(0)),
    });
  }

  predict(sequence: readonly number[]): ClassifierPrediction {
    const { sequenceLength, labels, bias, weights } = this.model;

    if (sequence.length !== sequenceLength) {
      throw new PredictionUnavailableError(
        `${this.name}: expected ${sequenceLength} moves, got ${sequence.length}`,
      );
    }
    if (!sequence.every((value) => Number.isInteger(value) && value >= 0 && value < MOVES.length)) {
      throw new PredictionUnavailableError(`${this.name}: malformed input [${sequence.join(', ')}]`);
    }

    const logits = labels.map((_, c) =>
      sequence.reduce((sum, value, position) => sum + weights[c][position * MOVES.length + value], bias[c]),
    );

    let best = 0;
    logits.forEach((logit, c) => {
      if (logit > logits[best]) {
        best = c;
      }
    });

    const max = logits[best];
    const exps = logits.map((logit) => Math.exp(logit - max));
    const total = exps.reduce((sum, value) => sum + value, 0);

    const probabilities: Record<string, number> = {};
    labels.forEach((label, c) => {
      probabilities[label] = exps[c] / total;
    });

    return { classLabel: labels[best], probabilities };
  }
}

function assertModelShape(model: ModelArtifactDto): void {
  const classes = model.labels.length;
  const features = model.sequenceLength * MOVES.length;

  if (model.sequenceLength !== SEQUENCE_LENGTH) {
    throw new PredictionUnavailableError(
      `${model.name}: sequenceLength must be ${SEQUENCE_LENGTH}, got ${model.sequenceLength}`,
    );
  }
  // 라벨은 세 수가 정확히 한 번씩
  const labelled = new Set(model.labels.map((label) => moveFromLabel(label)));
  if (classes !== MOVES.length || labelled.has(undefined) || labelled.size !== MOVES.length) {
    throw new PredictionUnavailableError(
      `${model.name}: labels must be rock, paper and scissors, got [${model.labels.join(', ')}]`,
    );
  }

  if (model.bias.length !== classes) {
    throw new PredictionUnavailableError(
      `${model.name}: bias has ${model.bias.length} entries for ${classes} labels`,
    );
  }
  if (model.weights.length !== classes) {
    throw new PredictionUnavailableError(
      `${model.name}: weights have ${model.weights.length} rows for ${classes} labels`,
    );
  }
  model.weights.forEach((row, c) => {
    if (row.length !== features || !row.every((w) => Number.isFinite(w))) {
      throw new PredictionUnavailableError(
        `${model.name}: weight row ${c} must hold ${features} finite numbers`,
      );
    }
  });
}
