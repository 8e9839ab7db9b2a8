import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  HealthCheckService,
  HealthCheck,
  TypeOrmHealthIndicator,
  MemoryHealthIndicator
} from '@nestjs/terminus';
import { SchedulerHealthIndicator } from './scheduler.health';
import { DigestSchedulerService, SchedulerStatus } from '../digest/digest-scheduler.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private db: TypeOrmHealthIndicator,
    private memory: MemoryHealthIndicator,
    private scheduler: SchedulerHealthIndicator,
    private digestScheduler: DigestSchedulerService
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.db.pingCheck('database'),
      () => this.memory.checkHeap('memory_heap', 150 * 1024 * 1024), // 150MB
      async () => this.scheduler.isHealthy('digest_scheduler'),
    ]);
  }

  @Get('liveness')
  liveness() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString()
    };
  }

  @Get('readiness')
  @HealthCheck()
  readiness() {
    return this.health.check([
      () => this.db.pingCheck('database')
    ]);
  }

  @Get('scheduler')
  schedulerStatus(): SchedulerStatus {
    return this.digestScheduler.status();
  }
}
