export enum Move {
  ROCK = 0,
  PAPER = 1,
  SCISSORS = 2,
}

export enum RoundOutcome {
  PLAYER_WINS = 'player_wins',
  AI_WINS = 'ai_wins',
  TIE = 'tie',
}

// 순환 순서: i+1 이 i 를 이긴다
export const MOVES: readonly Move[] = [Move.ROCK, Move.PAPER, Move.SCISSORS];

// 분류기 클래스 라벨 매핑
export const MoveLabel = {
  [Move.ROCK]: 'rock',
  [Move.PAPER]: 'paper',
  [Move.SCISSORS]: 'scissors',
} as const;

export const MoveEmoji = {
  [Move.ROCK]: '✊',
  [Move.PAPER]: '✋',
  [Move.SCISSORS]: '✂️',
} as const;

export const RoundOutcomeLabel = {
  [RoundOutcome.PLAYER_WINS]: 'Player Wins',
  [RoundOutcome.AI_WINS]: 'AI Wins',
  [RoundOutcome.TIE]: 'Tie',
} as const;
