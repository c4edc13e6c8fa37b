import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { DeadlineService } from './deadline.service';

/**
 * Latches queue heads on a schedule so a match freezes even when nobody reads it.
 * Only runs in the process started with SCHEDULER_ENABLED=true.
 */
@Injectable()
export class DeadlineSweepService {
  private readonly logger = new Logger(DeadlineSweepService.name);
  private running = false;

  constructor(
    private deadlineService: DeadlineService,
    private configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE, { name: 'deadline-latch-sweep' })
  async handleSweep(): Promise<void> {
    if (!this.configService.get<boolean>('scheduler.enabled')) {
      return;
    }
    await this.sweep();
  }

  async sweep(): Promise<number> {
    if (this.running) {
      this.logger.debug('Previous deadline sweep still running, skipping');
      return 0;
    }

    this.running = true;
    try {
      const latched = await this.deadlineService.latchDueMatches();
      if (latched > 0) {
        this.logger.log(`Latched ${latched} match(es) as next to start`);
      }
      return latched;
    } catch (error) {
      this.logger.error('Deadline sweep failed:', error);
      return 0;
    } finally {
      this.running = false;
    }
  }
}
