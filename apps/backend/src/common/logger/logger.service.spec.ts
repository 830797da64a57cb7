import { ConfigService } from '@nestjs/config';
import { LoggerService } from './logger.service';

const createLogger = (values: Record<string, string>) =>
  new LoggerService({
    get: jest.fn((key: string) => values[key]),
  } as unknown as jest.Mocked<ConfigService>);

describe('LoggerService', () => {
  let write: jest.SpyInstance;

  const entries = () =>
    write.mock.calls.map(([line]: [string]) => JSON.parse(line) as Record<string, unknown>);

  beforeEach(() => {
    write = jest.spyOn(process.stdout, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write one JSON line per entry in production', () => {
    const logger = createLogger({ NODE_ENV: 'production' }).setContext('PromptSeedService');

    logger.log('Seeded 9 prompts', { source: 'prompts.seed.json' });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'info',
        message: 'Seeded 9 prompts',
        context: 'PromptSeedService',
        data: { source: 'prompts.seed.json' },
      }),
    ]);
  });

  it('should take a trailing string as the context', () => {
    const logger = createLogger({ NODE_ENV: 'production' });

    logger.warn('Judge grammar attempt 1/2 failed', 'LlmJudgmentClient');

    expect(entries()[0]).toMatchObject({ level: 'warn', context: 'LlmJudgmentClient' });
  });

  it('should drop entries below LOG_LEVEL', () => {
    const logger = createLogger({ NODE_ENV: 'production', LOG_LEVEL: 'WARN' });

    logger.debug('ignored');
    logger.log('ignored');
    logger.error('kept', new Error('boom'));

    expect(entries()).toHaveLength(1);
    expect(entries()[0]).toMatchObject({
      level: 'error',
      message: 'kept',
      data: expect.objectContaining({ name: 'Error', message: 'boom' }),
    });
  });
});
