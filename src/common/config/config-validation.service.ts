import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Configuration Validation Service
 *
 * Validates environment-derived configuration on startup.
 * Fails fast for critical missing configs, warns for optional ones.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);
  private errors: string[] = [];
  private warnings: string[] = [];

  constructor(private configService: ConfigService) {}

  /**
   * Throws when any critical setting is missing or out of range.
   */
  validate(): void {
    this.errors = [];
    this.warnings = [];
    this.logger.log('Validating configuration...');

    this.validateDatabase();
    this.validateRedis();
    this.validateRabbitMQ();
    this.validateBetting();
    this.validateAudit();

    if (this.errors.length > 0) {
      this.logger.error('Configuration validation failed:');
      this.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error(`Configuration validation failed. Fix the above errors and restart.`);
    }

    if (this.warnings.length > 0) {
      this.logger.warn('Configuration warnings:');
      this.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('Configuration validation passed');
  }

  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private validateDatabase(): void {
    const host = this.configService.get<string>('database.host');
    const port = this.configService.get<number>('database.port');
    const username = this.configService.get<string>('database.username');
    const password = this.configService.get<string>('database.password');
    const database = this.configService.get<string>('database.database');
    const poolSize = this.configService.get<number>('database.poolSize');

    if (!host) {
      this.errors.push('DATABASE_HOST is required but missing');
    }

    if (!port || port < 1 || port > 65535) {
      this.errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    }

    if (!username) {
      this.errors.push('DATABASE_USERNAME is required but missing');
    }

    if (!password) {
      this.warnings.push('DATABASE_PASSWORD is not set');
    }

    if (!database) {
      this.errors.push('DATABASE_NAME is required but missing');
    }

    if (poolSize && (poolSize < 1 || poolSize > 100)) {
      this.errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateRedis(): void {
    const host = this.configService.get<string>('redis.host');
    const port = this.configService.get<number>('redis.port');

    if (!host) {
      this.errors.push('REDIS_HOST is required but missing');
    }

    if (!port || port < 1 || port > 65535) {
      this.errors.push('REDIS_PORT must be a valid port number (1-65535)');
    }

    if (!this.configService.get<string>('redis.password')) {
      this.warnings.push('REDIS_PASSWORD is not set (authentication disabled)');
    }
  }

  private validateRabbitMQ(): void {
    const url = this.configService.get<string>('rabbitmq.url');
    const queue = this.configService.get<string>('rabbitmq.eventsQueue');

    if (!url) {
      this.errors.push('RABBITMQ_URL is required but missing (example: amqp://localhost:5672)');
    } else if (!url.startsWith('amqp://') && !url.startsWith('amqps://')) {
      this.errors.push('RABBITMQ_URL must start with amqp:// or amqps://');
    }

    if (!queue || queue.trim() === '') {
      this.errors.push('RABBITMQ_EVENTS_QUEUE is required but missing');
    }
  }

  private validateBetting(): void {
    const offset = this.configService.get<number>('betting.deadlineOffsetMinutes');
    if (offset === undefined || offset < 1 || offset > 7 * 24 * 60) {
      this.errors.push('BETTING_DEADLINE_OFFSET_MINUTES must be between 1 and 10080');
    }

    const exact = this.configService.get<number>('betting.points.exactScore');
    const winner = this.configService.get<number>('betting.points.correctWinner');
    const miss = this.configService.get<number>('betting.points.miss');

    if (exact === undefined || winner === undefined || miss === undefined) {
      this.errors.push('Scoring points table is incomplete');
    } else if (!(exact >= winner && winner >= miss && miss >= 0)) {
      this.errors.push(
        'Scoring points must satisfy POINTS_EXACT_SCORE >= POINTS_CORRECT_WINNER >= POINTS_MISS >= 0',
      );
    }

    const retries = this.configService.get<number>('betting.maxConcurrencyRetries');
    if (retries === 0) {
      this.warnings.push('BETTING_MAX_CONCURRENCY_RETRIES is 0; every version conflict surfaces to callers');
    }

    const windowHours = this.configService.get<number>('betting.finalizationWindowHours');
    if (windowHours !== undefined && windowHours > 24 * 14) {
      this.warnings.push('BETTING_FINALIZATION_WINDOW_HOURS is longer than two weeks');
    }
  }

  private validateAudit(): void {
    const schedulerEnabled = this.configService.get<boolean>('scheduler.enabled');
    this.logger.log(`Scheduled sweeps: ${schedulerEnabled ? 'ENABLED' : 'DISABLED'}`);

    const pageSize = this.configService.get<number>('audit.historyPageSize');
    if (!pageSize) {
      this.warnings.push('AUDIT_HISTORY_PAGE_SIZE is not set, using 100');
    }
  }
}
