import { ConfigService } from '@nestjs/config';
import { ConfigValidationService } from './config-validation.service';

describe('ConfigValidationService', () => {
  const validConfig: Record<string, string | number | boolean> = {
    'database.host': 'localhost',
    'database.port': 5432,
    'database.username': 'postgres',
    'database.password': 'test-password',
    'database.database': 'prediction_league',
    'database.poolSize': 20,
    'redis.host': 'localhost',
    'redis.port': 6379,
    'redis.password': 'test-password',
    'rabbitmq.url': 'amqp://localhost:5672',
    'rabbitmq.eventsQueue': 'betting.events',
    'betting.deadlineOffsetMinutes': 60,
    'betting.points.exactScore': 3,
    'betting.points.correctWinner': 1,
    'betting.points.miss': 0,
    'betting.maxConcurrencyRetries': 3,
    'betting.finalizationWindowHours': 48,
    'audit.historyPageSize': 100,
    'scheduler.enabled': false,
  };

  const createService = (overrides: Record<string, string | number | boolean | undefined> = {}) => {
    const config = { ...validConfig, ...overrides };
    const configService = { get: jest.fn((key: string) => config[key]) };
    return new ConfigValidationService(configService as unknown as ConfigService);
  };

  it('should pass a complete configuration without warnings', () => {
    const service = createService();

    expect(() => service.validate()).not.toThrow();
    expect(service.getWarnings()).toEqual([]);
  });

  it('should fail when the points table is not ordered', () => {
    const service = createService({ 'betting.points.correctWinner': 5 });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should fail on an out-of-range deadline offset', () => {
    expect(() => createService({ 'betting.deadlineOffsetMinutes': 0 }).validate()).toThrow();
    expect(() => createService({ 'betting.deadlineOffsetMinutes': 20000 }).validate()).toThrow();
  });

  it('should fail on a non-AMQP broker url', () => {
    expect(() => createService({ 'rabbitmq.url': 'http://localhost' }).validate()).toThrow();
  });

  it('should warn about optional settings', () => {
    const service = createService({ 'redis.password': undefined, 'betting.maxConcurrencyRetries': 0 });

    service.validate();

    expect(service.getWarnings()).toEqual([
      'REDIS_PASSWORD is not set (authentication disabled)',
      'BETTING_MAX_CONCURRENCY_RETRIES is 0; every version conflict surfaces to callers',
    ]);
  });
});
