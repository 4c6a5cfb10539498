import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createSeededRandom, RANDOM_SOURCE, RandomSource } from '../common/random';
import { DEFAULT_MODEL_PATH } from '../config/env.validation';
import { TRAINED_CLASSIFIER, UNTRAINED_CLASSIFIER } from './classifier/classifier.interface';
import { loadTrainedClassifier } from './classifier/model-loader';
import { SoftmaxSequenceClassifier } from './classifier/softmax-sequence.classifier';
import { MovePredictor } from './engine/move-predictor';
import { GameController } from './game.controller';
import { GameService } from './game.service';

@Module({
  controllers: [GameController],
  providers: [
    GameService,
    MovePredictor,
    {
      provide: TRAINED_CLASSIFIER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadTrainedClassifier(configService.get<string>('RPS_TRAINED_MODEL_PATH') ?? DEFAULT_MODEL_PATH),
    },
    {
      provide: UNTRAINED_CLASSIFIER,
      useFactory: () => SoftmaxSequenceClassifier.untrained(),
    },
    {
      provide: RANDOM_SOURCE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): RandomSource => {
        const seed = configService.get<number>('RPS_RANDOM_SEED');
        return seed === undefined ? Math.random : createSeededRandom(seed);
      },
    },
  ],
})
export class GameModule {}
