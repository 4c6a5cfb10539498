import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  // 상태 확인용 엔드포인트
  @Get('health')
  health() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
