import { envValidationSchema } from './env.validation';

describe('envValidationSchema', () => {
  it('applies defaults', () => {
    const { value, error } = envValidationSchema.validate({});

    expect(error).toBeUndefined();
    expect(value).toEqual({
      PORT: 3000,
      LOG_LEVEL: 'info',
      LEDGER_BODY_LIMIT: 65536,
      LEDGER_REDIS_URL: 'redis://localhost:6379',
      LEDGER_REDIS_PREFIX: 'key-ledger',
      LEDGER_PRINCIPALS: '',
    });
  });

  it('accepts identity=token pairs', () => {
    const { error } = envValidationSchema.validate({
      LEDGER_PRINCIPALS: 'backend=token-a,alice=token-b',
    });

    expect(error).toBeUndefined();
  });

  it('rejects malformed principal lists', () => {
    const { error } = envValidationSchema.validate({ LEDGER_PRINCIPALS: 'backend:token-a' });

    expect(error?.message).toBe('LEDGER_PRINCIPALS must be comma-separated identity=token pairs');
  });

  it('accepts an empty redis url to disable the store', () => {
    const { value, error } = envValidationSchema.validate({ LEDGER_REDIS_URL: '' });

    expect(error).toBeUndefined();
    expect(value.LEDGER_REDIS_URL).toBe('');
  });

  it('rejects a redis url that is not a uri', () => {
    const { error } = envValidationSchema.validate({ LEDGER_REDIS_URL: 'not a uri' });

    expect(error).toBeDefined();
  });

  it('rejects body limits below 1024 bytes', () => {
    const { error } = envValidationSchema.validate({ LEDGER_BODY_LIMIT: 10 });

    expect(error).toBeDefined();
  });
});
