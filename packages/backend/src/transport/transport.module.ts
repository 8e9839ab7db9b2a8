import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KafkaModule } from '../adapters/kafka/kafka.module';
import { KafkaAdapter } from '../adapters/kafka/kafka.adapter';
import { TRANSPORT } from '../ports/transport.port';
import { KafkaTransport } from './kafka.transport';
import { LoggingTransport } from './logging.transport';

@Module({
  imports: [KafkaModule],
  providers: [
    {
      provide: TRANSPORT,
      useFactory: (configService: ConfigService, kafkaAdapter: KafkaAdapter) =>
        configService.get('TRANSPORT_MODE', 'kafka') === 'log'
          ? new LoggingTransport()
          : new KafkaTransport(kafkaAdapter, configService),
      inject: [ConfigService, KafkaAdapter],
    },
  ],
  exports: [TRANSPORT, KafkaModule],
})
export class TransportModule {}
