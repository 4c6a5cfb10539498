import { DEFAULT_MODEL_PATH, validate } from './env.validation';

describe('validate', () => {
  it('applies defaults', () => {
    const config = validate({});

    expect(config.PORT).toBe(3001);
    expect(config.RPS_MAX_SESSIONS).toBe(1000);
    expect(config.RPS_TRAINED_MODEL_PATH).toBe(DEFAULT_MODEL_PATH);
    expect(config.RPS_RANDOM_SEED).toBeUndefined();
  });

  it('converts numeric strings from the environment', () => {
    const config = validate({ PORT: '8080', RPS_RANDOM_SEED: '42', RPS_MAX_SESSIONS: '5' });

    expect(config.PORT).toBe(8080);
    expect(config.RPS_RANDOM_SEED).toBe(42);
    expect(config.RPS_MAX_SESSIONS).toBe(5);
  });

  it('rejects invalid values', () => {
    expect(() => validate({ PORT: 'eighty' })).toThrow(/PORT/);
    expect(() => validate({ RPS_MAX_SESSIONS: '0' })).toThrow(/RPS_MAX_SESSIONS/);
  });

  it('points the default model path at the shipped artifact', () => {
    expect(DEFAULT_MODEL_PATH.endsWith('models/rps-predictor-trained.json')).toBe(true);
  });
});
