import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { RANDOM_SOURCE } from '../src/common/random';
import { Move, RoundOutcome } from '../src/game/enums/game.enum';

describe('GameController (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(RANDOM_SOURCE)
      .useValue(() => 0)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  const createSession = async (): Promise<string> => {
    const response = await request(app.getHttpServer()).post('/game/sessions').expect(201);
    return response.body.sessionId;
  };

  it('GET /health', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
  });

  it('POST /game/sessions creates an empty session', async () => {
    const response = await request(app.getHttpServer()).post('/game/sessions').expect(201);

    expect(response.body).toEqual({
      sessionId: expect.any(String),
      round: 0,
      history: [],
      playerWins: 0,
      aiWins: 0,
      ties: 0,
      lastComputerMove: null,
      lastOutcome: null,
    });
  });

  it('POST /game/sessions/:id/rounds plays a warm-up round', async () => {
    const sessionId = await createSession();

    const response = await request(app.getHttpServer())
      .post(`/game/sessions/${sessionId}/rounds`)
      .send({ move: Move.PAPER })
      .expect(200);

    expect(response.body).toEqual({
      round: 1,
      playerMove: Move.PAPER,
      computerMove: Move.ROCK,
      outcome: RoundOutcome.PLAYER_WINS,
      playerWins: 1,
      aiWins: 0,
      ties: 0,
      message: 'paper ✋ vs rock ✊ → Player Wins',
    });
  });

  it('counters a repeated pattern after the warm-up', async () => {
    const sessionId = await createSession();
    const moves = [0, 1, 2, 0, 1, 2, 0, 1, 2, 0, 1, 2];

    let last: request.Response | undefined;
    for (const move of moves) {
      last = await request(app.getHttpServer())
        .post(`/game/sessions/${sessionId}/rounds`)
        .send({ move })
        .expect(200);
    }

    expect(last?.body.round).toBe(12);
    expect(last?.body.computerMove).toBe(Move.ROCK);
    expect(last?.body.outcome).toBe(RoundOutcome.AI_WINS);
  });

  it.each([{ move: 3 }, { move: 'rock' }, { move: 1.5 }, {}, { move: 1, extra: true }])(
    'rejects body %p',
    async (body) => {
      const sessionId = await createSession();

      await request(app.getHttpServer()).post(`/game/sessions/${sessionId}/rounds`).send(body).expect(400);
    },
  );

  it('returns 404 for an unknown session and 400 for a malformed id', async () => {
    await request(app.getHttpServer())
      .get('/game/sessions/00000000-0000-4000-8000-000000000000')
      .expect(404);
    await request(app.getHttpServer()).get('/game/sessions/not-a-uuid').expect(400);
  });

  it('resets, reports stats and ends a session', async () => {
    const sessionId = await createSession();
    const server = app.getHttpServer();

    await request(server).post(`/game/sessions/${sessionId}/rounds`).send({ move: Move.ROCK }).expect(200);

    const stats = await request(server).get(`/game/sessions/${sessionId}/stats`).expect(200);
    expect(stats.body).toEqual({ totalRounds: 1, playerWins: 0, aiWins: 0, ties: 1, playerWinRate: 0 });

    const reset = await request(server).post(`/game/sessions/${sessionId}/reset`).expect(200);
    expect(reset.body.round).toBe(0);
    expect(reset.body.history).toEqual([]);

    await request(server).delete(`/game/sessions/${sessionId}`).expect(204);
    await request(server).get(`/game/sessions/${sessionId}`).expect(404);
  });
});
