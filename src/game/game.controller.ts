import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import { GameService } from './game.service';
import { PlayRoundDto } from './dto/play-round.dto';
import { GameStats, RoundResult, SessionSnapshot } from './interfaces/game-result.interface';

@Controller('game/sessions')
export class GameController {
  private readonly logger = new Logger(GameController.name);

  constructor(private readonly gameService: GameService) {}

  /**
   * 새 게임 시작
   */
  @Post()
  createSession(): SessionSnapshot {
    return this.gameService.createSession();
  }

  @Get(':id')
  getSession(@Param('id', new ParseUUIDPipe()) id: string): SessionSnapshot {
    return this.gameService.getSession(id);
  }

  /**
   * 가위바위보 한 판
   */
  @Post(':id/rounds')
  @HttpCode(HttpStatus.OK)
  playRound(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() dto: PlayRoundDto,
  ): RoundResult {
    this.logger.log(`RPS round request for session ${id}: move ${dto.move}`);
    return this.gameService.playRound(id, dto.move);
  }

  /**
   * 점수와 기록 초기화
   */
  @Post(':id/reset')
  @HttpCode(HttpStatus.OK)
  resetSession(@Param('id', new ParseUUIDPipe()) id: string): SessionSnapshot {
    return this.gameService.resetSession(id);
  }

  /**
   * 게임 통계 조회
   */
  @Get(':id/stats')
  getStats(@Param('id', new ParseUUIDPipe()) id: string): GameStats {
    return this.gameService.getStats(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  endSession(@Param('id', new ParseUUIDPipe()) id: string): void {
    this.gameService.endSession(id);
  }
}
