import { Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MemberModule } from './member/member.module';
import { LedgerModule } from './ledger/ledger.module';
import { InboundModule } from './inbound/inbound.module';
import { DigestModule } from './digest/digest.module';
import { HealthModule } from './health/health.module';
import { Member } from './member/entities/member.entity';
import { Broadcast } from './ledger/entities/broadcast.entity';
import { Reaction } from './ledger/entities/reaction.entity';
import { DeliveryAttempt } from './ledger/entities/delivery-attempt.entity';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get('DB_HOST', 'localhost'),
        port: Number(configService.get('DB_PORT', 5432)),
        username: configService.get('DB_USERNAME'),
        password: configService.get('DB_PASSWORD'),
        database: configService.get('DB_DATABASE'),
        entities: [Member, Broadcast, Reaction, DeliveryAttempt],
        synchronize: configService.get('DB_SYNCHRONIZE', 'true') === 'true',
        logging: ['error', 'warn'],
        ssl: false,
      }),
      inject: [ConfigService],
    }),
    MemberModule,
    LedgerModule,
    DigestModule,
    InboundModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule implements OnApplicationShutdown {
  private readonly logger = new Logger(AppModule.name);

  // Kafka, the scheduler and the database close in their own destroy hooks
  onApplicationShutdown(signal?: string) {
    this.logger.log(`Application shutdown (signal: ${signal ?? 'none'})`);
  }
}
