import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RabbitMQService } from '../rabbitmq/rabbitmq.service';
import { MetricsService } from '../common/services/metrics.service';
import { Clock, CLOCK } from '../common/clock/clock';
import { LeagueEvent, PublishedEvent } from './types/notification.types';

/**
 * Publishes league events for the notification collaborator.
 *
 * Events are emitted after the state change they describe has been committed,
 * so a broker failure is logged and counted but never rolls back or fails the
 * domain operation.
 */
@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);
  private readonly queueName: string;

  constructor(
    private rabbitMQService: RabbitMQService,
    private configService: ConfigService,
    private metricsService: MetricsService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.queueName = this.configService.get<string>('rabbitmq.eventsQueue') || 'betting.events';
  }

  async publish(event: LeagueEvent): Promise<boolean> {
    const message: PublishedEvent = {
      event,
      occurredAt: this.clock.now().toISOString(),
    };

    try {
      const sent = await this.rabbitMQService.publishToQueue(this.queueName, message);
      if (!sent) {
        this.metricsService.incrementNotificationsFailed(event.type);
      }
      return sent;
    } catch (error) {
      this.logger.error(`Failed to publish ${event.type} event`, error);
      this.metricsService.incrementNotificationsFailed(event.type);
      return false;
    }
  }
}
