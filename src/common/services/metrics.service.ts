import { Injectable } from '@nestjs/common';
import { Counter, Histogram, register } from 'prom-client';

type LabelNames = string[];

/**
 * Prometheus metrics for the prediction league.
 * Tracks predictions, settlement, leaderboard maintenance and event publishing.
 */
@Injectable()
export class MetricsService {
  // Prediction Metrics
  private readonly predictionsPlacedCounter: Counter<string>;
  private readonly predictionsRejectedCounter: Counter<string>;

  // Deadline Metrics
  private readonly deadlineLatchesCounter: Counter<string>;
  private readonly deadlineOverridesCounter: Counter<string>;

  // Result and Settlement Metrics
  private readonly resultTransitionsCounter: Counter<string>;
  private readonly predictionsSettledCounter: Counter<string>;
  private readonly settlementDuration: Histogram<string>;

  // Concurrency Metrics
  private readonly concurrencyConflictsCounter: Counter<string>;

  // Leaderboard Metrics
  private readonly leaderboardRebuildsCounter: Counter<string>;

  // Notification Metrics
  private readonly notificationsFailedCounter: Counter<string>;

  constructor() {
    this.predictionsPlacedCounter = this.counter(
      'predictions_placed_total',
      'Total number of predictions created or overwritten',
      ['outcome'],
    );

    this.predictionsRejectedCounter = this.counter(
      'predictions_rejected_total',
      'Total number of rejected prediction submissions',
      ['reason'],
    );

    this.deadlineLatchesCounter = this.counter(
      'deadline_latches_total',
      'Total number of matches latched as next to start',
    );

    this.deadlineOverridesCounter = this.counter(
      'deadline_overrides_total',
      'Total number of administrative deadline overrides',
    );

    this.resultTransitionsCounter = this.counter(
      'result_transitions_total',
      'Total number of result state transitions',
      ['to'],
    );

    this.predictionsSettledCounter = this.counter(
      'predictions_settled_total',
      'Total number of predictions settled or voided, by score rule',
      ['rule'],
    );

    const existingHistogram = register.getSingleMetric('settlement_duration_seconds');
    this.settlementDuration =
      existingHistogram instanceof Histogram
        ? existingHistogram
        : new Histogram({
            name: 'settlement_duration_seconds',
            help: 'Duration of settling all predictions of one match',
            buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
          });

    this.concurrencyConflictsCounter = this.counter(
      'concurrency_conflicts_total',
      'Total number of optimistic concurrency conflicts',
      ['operation'],
    );

    this.leaderboardRebuildsCounter = this.counter(
      'leaderboard_rebuilds_total',
      'Total number of full leaderboard recomputations',
      ['reason'],
    );

    this.notificationsFailedCounter = this.counter(
      'notifications_failed_total',
      'Total number of league events that could not be published',
      ['type'],
    );
  }

  incrementPredictionsPlaced(outcome: 'created' | 'overwritten'): void {
    this.predictionsPlacedCounter.inc({ outcome });
  }

  incrementPredictionsRejected(reason: string): void {
    this.predictionsRejectedCounter.inc({ reason });
  }

  incrementDeadlineLatches(): void {
    this.deadlineLatchesCounter.inc();
  }

  incrementDeadlineOverrides(): void {
    this.deadlineOverridesCounter.inc();
  }

  incrementResultTransitions(to: string): void {
    this.resultTransitionsCounter.inc({ to });
  }

  incrementPredictionsSettled(rule: string, count: number = 1): void {
    if (count > 0) {
      this.predictionsSettledCounter.inc({ rule }, count);
    }
  }

  recordSettlementDuration(durationSeconds: number): void {
    this.settlementDuration.observe(durationSeconds);
  }

  incrementConcurrencyConflicts(operation: string): void {
    this.concurrencyConflictsCounter.inc({ operation });
  }

  incrementLeaderboardRebuilds(reason: string): void {
    this.leaderboardRebuildsCounter.inc({ reason });
  }

  incrementNotificationsFailed(type: string): void {
    this.notificationsFailedCounter.inc({ type });
  }

  // Several service instances share the global registry in tests and in the worker.
  private counter(name: string, help: string, labelNames: LabelNames = []): Counter<string> {
    const existing = register.getSingleMetric(name);
    if (existing instanceof Counter) {
      return existing;
    }
    return new Counter({ name, help, labelNames });
  }
}
