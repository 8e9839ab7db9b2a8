import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KafkaAdapter } from '../adapters/kafka/kafka.adapter';
import { Transport, TransportResult } from '../ports/transport.port';
import { describeError } from '../common/errors/rollcall.errors';

export interface OutboundSms {
  to: string;
  body: string;
  requestedAt: string;
}

/**
 * Hands each SMS to the gateway worker through Kafka. The record is keyed by
 * address so messages to one phone keep their order.
 */
@Injectable()
export class KafkaTransport implements Transport {
  private readonly topic: string;

  constructor(
    private readonly kafkaAdapter: KafkaAdapter,
    private readonly configService: ConfigService,
  ) {
    this.topic = this.configService.get<string>('SMS_OUTBOUND_TOPIC', 'sms.outbound');
  }

  async send(address: string, text: string): Promise<TransportResult> {
    const record: OutboundSms = { to: address, body: text, requestedAt: new Date().toISOString() };
    try {
      const [metadata] = await this.kafkaAdapter.publish(this.topic, record, address);
      if (!metadata) {
        return { ok: false, error: 'broker returned no record metadata' };
      }
      if (metadata.errorCode !== 0) {
        return { ok: false, error: `broker error code ${metadata.errorCode}` };
      }
      return {
        ok: true,
        providerId: `${metadata.topicName}/${metadata.partition}/${metadata.baseOffset ?? metadata.offset ?? '?'}`,
      };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }
}
