import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { RoundEngine } from './engine/round-engine';
import { MovePredictor } from './engine/move-predictor';
import { Move, MoveEmoji, MoveLabel, RoundOutcome, RoundOutcomeLabel } from './enums/game.enum';
import { InvalidMoveError } from './errors/game.errors';
import { GameStats, RoundResult, SessionSnapshot } from './interfaces/game-result.interface';

export const DEFAULT_MAX_SESSIONS = 1000;

@Injectable()
export class GameService {
  private readonly logger = new Logger(GameService.name);

  // 진행 중인 세션 (생성 순서 유지)
  private readonly sessions: Map<string, RoundEngine> = new Map();
  private readonly maxSessions: number;

  constructor(
    private readonly movePredictor: MovePredictor,
    configService: ConfigService,
  ) {
    this.maxSessions = configService.get<number>('RPS_MAX_SESSIONS') ?? DEFAULT_MAX_SESSIONS;
  }

  /**
   * 새 게임 세션 생성
   */
  createSession(): SessionSnapshot {
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
      this.logger.log(`Session evicted: ${oldest.value}`);
    }

    const sessionId = randomUUID();
    this.sessions.set(sessionId, new RoundEngine(this.movePredictor));
    this.logger.log(`Session created: ${sessionId}`);

    return this.getSession(sessionId);
  }

  getSession(sessionId: string): SessionSnapshot {
    return { sessionId, ...this.findEngine(sessionId).snapshot() };
  }

  /**
   * 한 라운드 진행
   */
  playRound(sessionId: string, playerMove: Move): RoundResult {
    const engine = this.findEngine(sessionId);

    try {
      const outcome = engine.playRound(playerMove);
      const state = engine.snapshot();
      const computerMove = state.lastComputerMove;
      if (computerMove === null) {
        throw new Error(`Session ${sessionId} has no computer move after round ${state.round}`);
      }

      this.logger.log(
        `RPS Round - Session: ${sessionId}, Round: ${state.round}, ` +
          `Choice: ${MoveLabel[playerMove]} vs ${MoveLabel[computerMove]}, Result: ${outcome}, ` +
          `Score: ${state.playerWins}-${state.aiWins}`,
      );

      return {
        round: state.round,
        playerMove,
        computerMove,
        outcome,
        playerWins: state.playerWins,
        aiWins: state.aiWins,
        ties: state.ties,
        message: formatRoundMessage(playerMove, computerMove, outcome),
      };
    } catch (error) {
      if (error instanceof InvalidMoveError) {
        throw new BadRequestException(error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`RPS round error: ${message}`, error instanceof Error ? error.stack : undefined);
      throw error;
    }
  }

  resetSession(sessionId: string): SessionSnapshot {
    this.findEngine(sessionId).reset();
    this.logger.log(`Session reset: ${sessionId}`);
    return this.getSession(sessionId);
  }

  /**
   * 세션 통계
   */
  getStats(sessionId: string): GameStats {
    const { round, playerWins, aiWins, ties } = this.findEngine(sessionId).snapshot();

    return {
      totalRounds: round,
      playerWins,
      aiWins,
      ties,
      playerWinRate: round === 0 ? 0 : Math.round((playerWins / round) * 100) / 100,
    };
  }

  endSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new NotFoundException(`Session not found: ${sessionId}`);
    }
    this.logger.log(`Session ended: ${sessionId}`);
  }

  private findEngine(sessionId: string): RoundEngine {
    const engine = this.sessions.get(sessionId);
    if (!engine) {
      throw new NotFoundException(`Session not found: ${sessionId}`);
    }
    return engine;
  }
}

export function formatRoundMessage(playerMove: Move, computerMove: Move, outcome: RoundOutcome): string {
  return (
    `${MoveLabel[playerMove]} ${MoveEmoji[playerMove]} vs ` +
    `${MoveLabel[computerMove]} ${MoveEmoji[computerMove]} → ${RoundOutcomeLabel[outcome]}`
  );
}
