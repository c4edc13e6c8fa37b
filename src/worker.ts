import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { ConfigValidationService } from './common/config/config-validation.service';

/**
 * Scheduler process entry point.
 * Runs the deadline latch and result sweeps; serves no HTTP traffic.
 * Start exactly one instance.
 */
async function bootstrap() {
  const logger = new Logger('Scheduler');

  process.env.SCHEDULER_ENABLED = 'true';

  logger.log('Starting scheduler process...');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });
  app.get(ConfigValidationService).validate();

  logger.log(`Scheduler process started (pid ${process.pid})`);

  const shutdown = async (signal: string) => {
    logger.log(`Received ${signal} signal. Gracefully shutting down...`);
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

bootstrap().catch((error) => {
  new Logger('Scheduler').error('Scheduler failed to start', error);
  process.exit(1);
});
