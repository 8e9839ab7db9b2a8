import { Module } from '@nestjs/common';
import { MemberModule } from '../member/member.module';
import { LedgerModule } from '../ledger/ledger.module';
import { BroadcastModule } from '../broadcast/broadcast.module';
import { ReactionsModule } from '../reactions/reactions.module';
import { DigestModule } from '../digest/digest.module';
import { TransportModule } from '../transport/transport.module';
import { InboundService } from './inbound.service';
import { InboundController } from './inbound.controller';
import { InboundConsumer } from './inbound.consumer';

@Module({
  imports: [MemberModule, LedgerModule, BroadcastModule, ReactionsModule, DigestModule, TransportModule],
  controllers: [InboundController],
  providers: [InboundService, InboundConsumer],
  exports: [InboundService],
})
export class InboundModule {}
