import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DeliveryStatus, MessageKind } from '@rollcall/common';
import { KafkaAdapter } from '../adapters/kafka/kafka.adapter';
import { BroadcastEngineService } from '../broadcast/broadcast-engine.service';
import { validatePayload } from '../common/pipes/validation.pipe';
import { InboundService } from './inbound.service';
import { InboundSmsDto, toAttachments } from './dto/inbound-sms.dto';

/** Feeds gateway records from the inbound topic into InboundService. */
@Injectable()
export class InboundConsumer implements OnApplicationBootstrap {
  private readonly logger = new Logger(InboundConsumer.name);
  private readonly topic: string;

  constructor(
    private readonly kafkaAdapter: KafkaAdapter,
    private readonly inboundService: InboundService,
    private readonly broadcastEngine: BroadcastEngineService,
    private readonly configService: ConfigService,
  ) {
    this.topic = this.configService.get<string>('SMS_INBOUND_TOPIC', 'sms.inbound');
  }

  async onApplicationBootstrap() {
    if (!this.kafkaAdapter.enabled) {
      this.logger.warn(`Kafka disabled; not consuming ${this.topic}`);
      return;
    }
    await this.kafkaAdapter.subscribe<InboundSmsDto>(
      this.topic,
      sms => this.handle(sms),
      value => validatePayload(InboundSmsDto, value),
    );
    await this.kafkaAdapter.run();
  }

  async handle(sms: InboundSmsDto): Promise<void> {
    const reply = await this.inboundService.handleInbound(sms.from, sms.body, toAttachments(sms));
    if (reply === null) {
      return;
    }

    const delivery = await this.broadcastEngine.sendDirect(MessageKind.REPLY, sms.from, reply);
    if (delivery.status !== DeliveryStatus.DELIVERED) {
      this.logger.error(`Reply to ${sms.from} not delivered: ${delivery.error ?? 'unknown error'}`);
    }
  }
}
