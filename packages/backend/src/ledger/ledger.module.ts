import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Broadcast } from './entities/broadcast.entity';
import { Reaction } from './entities/reaction.entity';
import { DeliveryAttempt } from './entities/delivery-attempt.entity';
import { LedgerService } from './ledger.service';
import { BroadcastsController } from './broadcasts.controller';
import { MESSAGE_LEDGER } from '../ports/message-ledger.port';

@Module({
  imports: [TypeOrmModule.forFeature([Broadcast, Reaction, DeliveryAttempt])],
  controllers: [BroadcastsController],
  providers: [
    LedgerService,
    { provide: MESSAGE_LEDGER, useExisting: LedgerService },
  ],
  exports: [MESSAGE_LEDGER],
})
export class LedgerModule {}
