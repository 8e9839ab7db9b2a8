import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { TargetMessageResolver } from './target-message.resolver';
import { ReactionAggregatorService } from './reaction-aggregator.service';

@Module({
  imports: [LedgerModule],
  providers: [TargetMessageResolver, ReactionAggregatorService],
  exports: [TargetMessageResolver, ReactionAggregatorService],
})
export class ReactionsModule {}
