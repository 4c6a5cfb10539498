import { Move, RoundOutcome } from '../enums/game.enum';
import { InvalidMoveError } from '../errors/game.errors';
import { SessionState } from '../interfaces/game-result.interface';
import { isMove, judge } from './judge';
import { Predictor } from './move-predictor';

/**
 * 한 세션의 게임 상태(수 기록, 점수, 라운드)를 소유한다
 */
export class RoundEngine {
  private history: Move[] = [];
  private round = 0;
  private playerWins = 0;
  private aiWins = 0;
  private lastComputerMove: Move | null = null;
  private lastOutcome: RoundOutcome | null = null;

  constructor(private readonly predictor: Predictor) {}

  playRound(playerMove: Move): RoundOutcome {
    if (!isMove(playerMove)) {
      throw new InvalidMoveError(playerMove);
    }

    this.round += 1;
    this.history.push(playerMove);

    const computerMove = this.predictor.predict(this.history, this.round);
    const outcome = judge(playerMove, computerMove);

    if (outcome === RoundOutcome.PLAYER_WINS) {
      this.playerWins += 1;
    } else if (outcome === RoundOutcome.AI_WINS) {
      this.aiWins += 1;
    }

    this.lastComputerMove = computerMove;
    this.lastOutcome = outcome;
    return outcome;
  }

  reset(): void {
    this.history = [];
    this.round = 0;
    this.playerWins = 0;
    this.aiWins = 0;
    this.lastComputerMove = null;
    this.lastOutcome = null;
  }

  snapshot(): SessionState {
    return {
      round: this.round,
      history: [...this.history],
      playerWins: this.playerWins,
      aiWins: this.aiWins,
      ties: this.round - this.playerWins - this.aiWins,
      lastComputerMove: this.lastComputerMove,
      lastOutcome: this.lastOutcome,
    };
  }
}
