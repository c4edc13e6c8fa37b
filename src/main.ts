import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { BettingExceptionFilter } from './common/filters/betting-exception.filter';
import { ConfigValidationService } from './common/config/config-validation.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Validate configuration on startup
  app.get(ConfigValidationService).validate();

  app.enableCors({
    origin: true,
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new BettingExceptionFilter());
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Match Prediction League API')
    .setDescription(
      'Deadline-locked match predictions, result lifecycle, settlement and group leaderboards',
    )
    .setVersion('1.0')
    .addTag('Matches', 'Schedule feed, lock state and deadline overrides')
    .addTag('Prediction', 'Placing and reading predictions')
    .addTag('Results', 'Provisional and final results, cancellation, settlement')
    .addTag('Leaderboard', 'Group standings')
    .addTag('Groups', 'Membership mirror')
    .addTag('Audit', 'Administrative audit trail')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      defaultModelsExpandDepth: 1,
    },
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`Application is running on http://localhost:${port}`);
  logger.log(`API docs: http://localhost:${port}/api/docs`);
  logger.log(`Environment: ${process.env.NODE_ENV || 'development'}`);
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error('Application failed to start', error);
  process.exit(1);
});
