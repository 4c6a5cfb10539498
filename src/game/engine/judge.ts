import { Move, MOVES, MoveLabel, RoundOutcome } from '../enums/game.enum';

export function isMove(value: unknown): value is Move {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < MOVES.length;
}

/**
 * 주어진 수를 이기는 수
 */
export function counterMove(move: Move): Move {
  return MOVES[(move + 1) % MOVES.length];
}

/**
 * 분류기 라벨을 수로 변환 (알 수 없는 라벨이면 undefined)
 */
export function moveFromLabel(label: string): Move | undefined {
  return MOVES.find((move) => MoveLabel[move] === label);
}

/**
 * 라운드 결과 판정
 */
export function judge(playerMove: Move, computerMove: Move): RoundOutcome {
  if (playerMove === computerMove) {
    return RoundOutcome.TIE;
  }

  if (counterMove(playerMove) === computerMove) {
    return RoundOutcome.AI_WINS;
  }

  return RoundOutcome.PLAYER_WINS;
}
