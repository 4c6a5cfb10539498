import { Move, RoundOutcome } from '../enums/game.enum';

export interface SessionState {
  round: number;
  history: Move[];
  playerWins: number;
  aiWins: number;
  ties: number;
  lastComputerMove: Move | null;
  lastOutcome: RoundOutcome | null;
}

export interface SessionSnapshot extends SessionState {
  sessionId: string;
}

export interface RoundResult {
  round: number;
  playerMove: Move;
  computerMove: Move;
  outcome: RoundOutcome;
  playerWins: number;
  aiWins: number;
  ties: number;
  message: string;
}

export interface GameStats {
  totalRounds: number;
  playerWins: number;
  aiWins: number;
  ties: number;
  playerWinRate: number;
}
