import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { BroadcastModule } from '../broadcast/broadcast.module';
import { DigestSchedulerService } from './digest-scheduler.service';

@Module({
  imports: [LedgerModule, BroadcastModule],
  providers: [DigestSchedulerService],
  exports: [DigestSchedulerService],
})
export class DigestModule {}
