import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { PredictionUnavailableError } from '../errors/game.errors';
import { ClassifierPrediction, MoveClassifier } from './classifier.interface';
import { ModelArtifactDto } from './dto/model-artifact.dto';
import { SoftmaxSequenceClassifier } from './softmax-sequence.classifier';

const logger = new Logger('ModelLoader');

/**
 * 모델을 불러오지 못했을 때 대신 주입되는 분류기 (항상 실패)
 */
export class UnavailableClassifier implements MoveClassifier {
  constructor(
    readonly name: string,
    private readonly reason: string,
  ) {}

  predict(): ClassifierPrediction {
    throw new PredictionUnavailableError(`${this.name} is unavailable: ${this.reason}`);
  }
}

/**
 * 학습된 모델 파일 로드
 */
export function loadTrainedClassifier(modelPath: string): MoveClassifier {
  try {
    const raw: unknown = JSON.parse(readFileSync(modelPath, 'utf8'));
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error('model artifact must be a JSON object');
    }

    const artifact = plainToInstance(ModelArtifactDto, raw);
    const errors = validateSync(artifact);
    if (errors.length > 0) {
      throw new Error(errors.map((error) => error.toString()).join('; '));
    }

    const classifier = new SoftmaxSequenceClassifier(artifact);
    logger.log(`Loaded trained model ${classifier.name} from ${modelPath}`);
    return classifier;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Trained model unavailable (${modelPath}): ${reason}`);
    return new UnavailableClassifier('trained', reason);
  }
}
