import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { Kafka, Producer, Consumer, RetryOptions, RecordMetadata } from 'kafkajs';

export interface KafkaConfig {
  clientId?: string;
  brokers?: string[];
  groupId?: string;
  /** When false nothing connects; publish and subscribe reject. */
  enabled?: boolean;
}

export type KafkaHandler<T> = (message: T) => Promise<void>;

@Injectable()
export class KafkaAdapter implements OnModuleInit, OnModuleDestroy {
  private isShuttingDown = false;
  private readonly producer: Producer;
  private readonly consumer: Consumer;
  private readonly kafka: Kafka;
  private isConsumerRunning = false;
  private readonly logger = new Logger(KafkaAdapter.name);
  private readonly handlers = new Map<string, KafkaHandler<unknown>>();
  readonly enabled: boolean;

  private readonly retryOptions: RetryOptions = {
    maxRetryTime: 30000,
    initialRetryTime: 100,
    factor: 0.2,
    multiplier: 2,
    retries: 5
  };

  constructor(config?: KafkaConfig) {
    this.enabled = config?.enabled ?? true;
    this.kafka = new Kafka({
      clientId: config?.clientId || 'rollcall',
      brokers: config?.brokers || ['localhost:29092'],
      retry: this.retryOptions,
    });

    this.producer = this.kafka.producer({
      retry: this.retryOptions,
      allowAutoTopicCreation: true
    });

    this.consumer = this.kafka.consumer({
      groupId: config?.groupId || 'rollcall-group',
      retry: this.retryOptions,
      readUncommitted: false
    });
  }

  async onModuleInit() {
    if (!this.enabled) {
      this.logger.warn('Kafka disabled; not connecting');
      return;
    }
    try {
      await this.producer.connect();
      await this.consumer.connect();
      this.logger.log('Successfully connected to Kafka');
    } catch (error) {
      this.logger.error('Failed to connect to Kafka', error instanceof Error ? error.stack : undefined);
      throw error;
    }
  }

  async onModuleDestroy() {
    this.isShuttingDown = true;
    if (!this.enabled) {
      return;
    }
    try {
      if (this.isConsumerRunning) {
        await this.consumer.stop();
        this.isConsumerRunning = false;
        this.logger.log('Consumer stopped');
      }

      await Promise.all([
        this.producer.disconnect(),
        this.consumer.disconnect()
      ]);

      this.logger.log('Successfully disconnected from Kafka');
    } catch (error) {
      this.logger.error('Error during graceful shutdown', error instanceof Error ? error.stack : undefined);
    }
  }

  /** Publishes one JSON record; `key` pins related records to one partition. */
  async publish<T>(topic: string, message: T, key?: string): Promise<RecordMetadata[]> {
    this.assertUsable();
    try {
      const metadata = await this.producer.send({
        topic,
        messages: [
          {
            key,
            value: JSON.stringify(message),
          },
        ],
      });
      this.logger.debug(`Message published to topic ${topic}`);
      return metadata;
    } catch (error) {
      this.logger.error(`Failed to publish message to topic ${topic}`, error instanceof Error ? error.stack : undefined);
      throw error;
    }
  }

  /**
   * Registers the handler for `topic`; call `run` once every topic is in.
   * Handler errors are logged and the offset still commits, so one bad
   * record cannot stall the topic.
   */
  async subscribe<T>(topic: string, handler: KafkaHandler<T>, parse: (value: unknown) => T): Promise<void> {
    this.assertUsable();
    if (this.isConsumerRunning) {
      throw new Error(`Consumer already running; subscribe to ${topic} before the first run`);
    }

    this.handlers.set(topic, async (raw: unknown) => handler(parse(raw)));
    await this.consumer.subscribe({ topic, fromBeginning: false });
    this.logger.log(`Subscribed to topic ${topic}`);
  }

  async run(): Promise<void> {
    if (this.isConsumerRunning || this.handlers.size === 0) {
      return;
    }
    this.isConsumerRunning = true;

    this.consumer.on(this.consumer.events.CRASH, event => {
      this.logger.error(`Consumer crashed: ${String(event.payload.error)}`);
      this.isConsumerRunning = false;
    });

    await this.consumer.run({
      autoCommit: true,
      autoCommitInterval: 5000,
      eachMessage: async ({ topic, partition, message }) => {
        const handler = this.handlers.get(topic);
        const value = message.value?.toString();
        if (!handler || !value) {
          return;
        }
        try {
          this.logger.debug(`Processing message from topic ${topic}`, {
            key: message.key?.toString(),
            partition,
            offset: message.offset,
          });
          await handler(JSON.parse(value));
        } catch (error) {
          this.logger.error(`Error processing message from topic ${topic}`, error instanceof Error ? error.stack : undefined);
        }
      },
    });
  }

  private assertUsable() {
    if (!this.enabled) {
      throw new Error('Kafka is disabled');
    }
    if (this.isShuttingDown) {
      throw new Error('Service is shutting down');
    }
  }
}
