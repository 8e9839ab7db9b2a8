import { Module } from '@nestjs/common';
import { KafkaAdapter } from './kafka.adapter';
import { ConfigModule, ConfigService } from '@nestjs/config';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: KafkaAdapter,
      useFactory: (configService: ConfigService) => {
        const brokers = configService.get<string>('KAFKA_BROKERS', 'localhost:29092');
        return new KafkaAdapter({
          clientId: configService.get('KAFKA_CLIENT_ID', 'rollcall'),
          brokers: brokers.split(',').map(broker => broker.trim()),
          groupId: configService.get('KAFKA_GROUP_ID', 'rollcall-group'),
          enabled: configService.get('KAFKA_ENABLED', 'true') !== 'false',
        });
      },
      inject: [ConfigService],
    },
  ],
  exports: [KafkaAdapter],
})
export class KafkaModule {}
