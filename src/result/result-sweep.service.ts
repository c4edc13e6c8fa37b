import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ResultService } from './result.service';
import { SettlementService } from './settlement.service';
import { MatchResult } from './entities/match-result.entity';
import { DeadlineService } from '../match/deadline.service';
import { MatchStatus } from '../match/types/deadline.types';
import { NotificationService } from '../notification/notification.service';
import { Clock, CLOCK } from '../common/clock/clock';

const MS_PER_HOUR = 3_600_000;

export interface ResultSweepReport {
  resettledMatches: number;
  overdueReported: number;
}

/**
 * Finishes settlement runs that were interrupted after finalization and
 * reports provisional results left unconfirmed past the finalization window.
 */
@Injectable()
export class ResultSweepService {
  private readonly logger = new Logger(ResultSweepService.name);
  // Result versions already reported; a correction gets a fresh key
  private readonly reportedOverdue = new Set<string>();
  private running = false;

  constructor(
    private resultService: ResultService,
    private settlementService: SettlementService,
    private deadlineService: DeadlineService,
    private notificationService: NotificationService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  @Cron(CronExpression.EVERY_5_MINUTES, { name: 'result-sweep' })
  async handleSweep(): Promise<void> {
    if (!this.configService.get<boolean>('scheduler.enabled')) {
      return;
    }
    await this.sweep();
  }

  async sweep(): Promise<ResultSweepReport> {
    const report: ResultSweepReport = { resettledMatches: 0, overdueReported: 0 };
    if (this.running) {
      this.logger.debug('Previous result sweep still running, skipping');
      return report;
    }

    this.running = true;
    try {
      report.resettledMatches = await this.resettle();
      report.overdueReported = await this.reportOverdue();
      return report;
    } finally {
      this.running = false;
    }
  }

  private async resettle(): Promise<number> {
    const matchIds = await this.settlementService.findUnsettledFinalMatches();
    let resettled = 0;

    for (const matchId of matchIds) {
      try {
        const summary = await this.settlementService.settleMatch(matchId);
        this.logger.warn(`Completed interrupted settlement of match ${matchId} (${summary.newlySettled} new)`);
        resettled++;
      } catch (error) {
        this.logger.error(`Re-settlement of match ${matchId} failed:`, error);
      }
    }

    return resettled;
  }

  private async reportOverdue(): Promise<number> {
    const windowHours = this.configService.get<number>('betting.finalizationWindowHours') || 48;
    const cutoff = new Date(this.clock.now().getTime() - windowHours * MS_PER_HOUR);
    const overdue = await this.resultService.findOverdueProvisional(cutoff);
    let reported = 0;

    const stillOverdue = new Set(overdue.map((result) => this.overdueKey(result)));
    for (const key of this.reportedOverdue) {
      if (!stillOverdue.has(key)) this.reportedOverdue.delete(key);
    }

    for (const result of overdue) {
      const key = this.overdueKey(result);
      if (this.reportedOverdue.has(key)) continue;

      const match = await this.deadlineService.getMatch(result.matchId);
      if (match.status === MatchStatus.CANCELLED) continue;

      const published = await this.notificationService.publish({
        type: 'finalization_overdue',
        matchId: result.matchId,
        groupId: match.groupId,
        enteredAt: result.enteredAt.toISOString(),
      });
      if (!published) continue;

      this.reportedOverdue.add(key);
      reported++;
    }

    if (reported > 0) {
      this.logger.warn(`${reported} provisional result(s) awaiting finalization for over ${windowHours}h`);
    }
    return reported;
  }

  private overdueKey(result: MatchResult): string {
    return `${result.id}:v${result.version}`;
  }
}
