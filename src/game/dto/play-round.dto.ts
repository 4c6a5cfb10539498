import { IsIn, IsInt } from 'class-validator';
import { Move, MOVES } from '../enums/game.enum';

export class PlayRoundDto {
  @IsInt()
  @IsIn(MOVES)
  move!: Move; // 0: rock, 1: paper, 2: scissors
}
