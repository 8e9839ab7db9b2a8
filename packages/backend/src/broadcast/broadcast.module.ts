import { Module } from '@nestjs/common';
import { MemberModule } from '../member/member.module';
import { LedgerModule } from '../ledger/ledger.module';
import { TransportModule } from '../transport/transport.module';
import { MediaModule } from '../media/media.module';
import { BroadcastEngineService } from './broadcast-engine.service';

@Module({
  imports: [MemberModule, LedgerModule, TransportModule, MediaModule],
  providers: [BroadcastEngineService],
  exports: [BroadcastEngineService],
})
export class BroadcastModule {}
