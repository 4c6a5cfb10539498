import { INestApplication, ValidationPipe } from '@nestjs/common';

/**
 * main.ts 와 e2e 테스트가 공유하는 앱 설정
 */
export function configureApp(app: INestApplication): void {
  // CORS 활성화
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // 전역 Validation Pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );
}
