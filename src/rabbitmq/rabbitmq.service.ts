import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { connect, Channel, Options, Replies } from 'amqplib';

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

@Injectable()
export class RabbitMQService implements OnModuleInit, OnModuleDestroy {
  private connection: AmqpConnection | null = null;
  private channel: Channel | null = null;
  private readonly assertedQueues = new Set<string>();
  private readonly logger = new Logger(RabbitMQService.name);

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    await this.connect();
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  /**
   * Establishes connection to RabbitMQ server and creates a channel
   */
  async connect(): Promise<void> {
    try {
      const rabbitMQUrl = this.configService.get<string>('rabbitmq.url') || 'amqp://localhost:5672';
      this.logger.log(`Connecting to RabbitMQ at ${rabbitMQUrl}...`);

      const connection = await connect(rabbitMQUrl);
      const channel = await connection.createChannel();

      connection.on('error', (err: Error) => {
        this.logger.error('RabbitMQ connection error:', err);
      });

      connection.on('close', () => {
        this.logger.warn('RabbitMQ connection closed');
        this.connection = null;
        this.channel = null;
        this.assertedQueues.clear();
      });

      this.connection = connection;
      this.channel = channel;
      this.logger.log('Successfully connected to RabbitMQ');
    } catch (error) {
      this.logger.error('Failed to connect to RabbitMQ:', error);
      throw error;
    }
  }

  /**
   * Closes the channel and connection gracefully
   */
  async disconnect(): Promise<void> {
    try {
      if (this.channel) {
        await this.channel.close();
      }
      if (this.connection) {
        await this.connection.close();
      }
      this.logger.log('RabbitMQ connection closed');
    } catch (error) {
      this.logger.error('Error closing RabbitMQ connection:', error);
    }
  }

  getChannel(): Channel {
    if (!this.channel) {
      throw new Error('RabbitMQ channel not initialized');
    }
    return this.channel;
  }

  /**
   * Asserts a durable queue together with its dead letter exchange and queue
   */
  async assertQueue(
    queueName: string,
    options?: Options.AssertQueue,
  ): Promise<Replies.AssertQueue> {
    const channel = this.getChannel();
    const dlxName = `${queueName}.dlx`;
    const dlqName = `${queueName}.dlq`;

    await channel.assertExchange(dlxName, 'direct', { durable: true });
    await channel.assertQueue(dlqName, { durable: true });
    await channel.bindQueue(dlqName, dlxName, queueName);

    const reply = await channel.assertQueue(queueName, {
      durable: true,
      deadLetterExchange: dlxName,
      deadLetterRoutingKey: queueName,
      ...options,
    });
    this.assertedQueues.add(queueName);
    return reply;
  }

  /**
   * Publishes a JSON message to a queue. Returns false when the channel's
   * write buffer is full and the message was not accepted.
   */
  async publishToQueue(queueName: string, message: unknown): Promise<boolean> {
    try {
      if (!this.assertedQueues.has(queueName)) {
        await this.assertQueue(queueName);
      }

      const sent = this.getChannel().sendToQueue(queueName, Buffer.from(JSON.stringify(message)), {
        persistent: true,
        contentType: 'application/json',
      });

      if (!sent) {
        this.logger.warn(`Failed to send message to queue ${queueName}`);
      }

      return sent;
    } catch (error) {
      this.logger.error(`Error publishing to queue ${queueName}:`, error);
      throw error;
    }
  }
}
