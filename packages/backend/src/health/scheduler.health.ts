import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { DigestSchedulerService } from '../digest/digest-scheduler.service';

@Injectable()
export class SchedulerHealthIndicator extends HealthIndicator {
  constructor(private readonly scheduler: DigestSchedulerService) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const status = this.scheduler.status();
    return this.getStatus(key, true, {
      pauseTimerArmed: status.pauseTimerArmed,
      digestInFlight: status.digestInFlight,
      dailySchedule: status.dailySchedule,
      lastBroadcastAt: status.lastBroadcastAt?.toISOString() ?? null,
      lastDigestAt: status.lastDigestAt?.toISOString() ?? null,
    });
  }
}
