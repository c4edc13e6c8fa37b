import { Module } from '@nestjs/common';
import { ActorGuard } from './guards/actor.guard';
import { AdminGuard } from './guards/admin.guard';
import { RateLimitingGuard } from './guards/rate-limiting.guard';
import { MetricsService } from './services/metrics.service';
import { ConfigValidationService } from './config/config-validation.service';
import { CLOCK, SystemClock } from './clock/clock';

@Module({
  providers: [
    ActorGuard,
    AdminGuard,
    RateLimitingGuard,
    MetricsService,
    ConfigValidationService,
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [
    ActorGuard,
    AdminGuard,
    RateLimitingGuard,
    MetricsService,
    ConfigValidationService,
    CLOCK,
  ],
})
export class CommonModule {}
