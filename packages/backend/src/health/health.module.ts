import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { DigestModule } from '../digest/digest.module';
import { HealthController } from './health.controller';
import { SchedulerHealthIndicator } from './scheduler.health';

@Module({
  imports: [TerminusModule, DigestModule],
  controllers: [HealthController],
  providers: [SchedulerHealthIndicator],
})
export class HealthModule {}
