import { Inject, Injectable, Logger } from '@nestjs/common';
import { RANDOM_SOURCE, RandomSource } from '../../common/random';
import {
  MoveClassifier,
  TRAINED_CLASSIFIER,
  UNTRAINED_CLASSIFIER,
} from '../classifier/classifier.interface';
import { Move, MOVES } from '../enums/game.enum';
import { PredictionUnavailableError } from '../errors/game.errors';
import { counterMove, moveFromLabel } from './judge';
import { findPatternRepeat } from './pattern';

// 처음 6 라운드는 무작위
export const WARMUP_ROUNDS = 6;
export const PATTERN_LENGTH = 5;

export interface Predictor {
  predict(history: readonly Move[], roundIndex: number): Move;
}

@Injectable()
export class MovePredictor implements Predictor {
  private readonly logger = new Logger(MovePredictor.name);

  constructor(
    @Inject(TRAINED_CLASSIFIER) private readonly trained: MoveClassifier,
    @Inject(UNTRAINED_CLASSIFIER) private readonly untrained: MoveClassifier,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  /**
   * 컴퓨터의 다음 수 결정
   */
  predict(history: readonly Move[], roundIndex: number): Move {
    if (roundIndex <= WARMUP_ROUNDS || history.length < PATTERN_LENGTH + 1) {
      return this.randomMove();
    }

    const repeat = findPatternRepeat(history, PATTERN_LENGTH);
    if (repeat) {
      return counterMove(repeat.anchor);
    }

    // 패턴이 없으면 분류기에 최근 패턴(앵커 제외)을 넘긴다
    const pattern = history.slice(-(PATTERN_LENGTH + 1), -1);
    for (const classifier of [this.trained, this.untrained]) {
      const predicted = this.classify(classifier, pattern);
      if (predicted !== undefined) {
        return counterMove(predicted);
      }
    }

    return this.randomMove();
  }

  private classify(classifier: MoveClassifier, pattern: readonly Move[]): Move | undefined {
    try {
      const { classLabel } = classifier.predict(pattern);
      const move = moveFromLabel(classLabel);
      if (move === undefined) {
        throw new PredictionUnavailableError(`unknown class label "${classLabel}"`);
      }
      return move;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Classifier ${classifier.name} prediction error: ${message}`);
      return undefined;
    }
  }

  private randomMove(): Move {
    const index = Math.min(Math.floor(this.random() * MOVES.length), MOVES.length - 1);
    return MOVES[index];
  }
}
