import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cron from 'node-cron';
import { BroadcastOutcome, MessageKind } from '@rollcall/common';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';
import { BroadcastEngineService } from '../broadcast/broadcast-engine.service';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { isValidTimeZone, startOfDay } from '../common/utils/time';
import { describeError } from '../common/errors/rollcall.errors';
import { formatDailyDigest, formatPauseDigest, groupReactions, topEntries } from './digest-formatter';

export const DAILY_DIGEST_LIMIT = 5;
const DIGEST_LOCK = 'digest';

export type DigestTrigger = 'pause' | 'daily';

export interface DigestRunResult {
  trigger: DigestTrigger;
  reactionsIncluded: number;
  broadcastsSummarized: number;
  /** `null` when there was nothing to summarize. */
  outcome: BroadcastOutcome | null;
}

/** Owned by the scheduler; changed only while draining the event queue. */
export interface SchedulerState {
  pauseTimer: NodeJS.Timeout | null;
  generation: number;
  lastBroadcastAt: Date | null;
  lastDigestAt: Date | null;
  stopped: boolean;
}

type SchedulerEvent =
  | { type: 'broadcast-accepted'; at: Date }
  | { type: 'pause-elapsed'; generation: number }
  | { type: 'digest-sent'; at: Date }
  | { type: 'shutdown' };

export interface SchedulerStatus {
  pauseTimerArmed: boolean;
  lastBroadcastAt: Date | null;
  lastDigestAt: Date | null;
  dailySchedule: string;
  digestInFlight: boolean;
}

@Injectable()
export class DigestSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DigestSchedulerService.name);
  private readonly state: SchedulerState = {
    pauseTimer: null,
    generation: 0,
    lastBroadcastAt: null,
    lastDigestAt: null,
    stopped: false,
  };
  private readonly queue: SchedulerEvent[] = [];
  private draining = false;
  private readonly digestLock = new KeyedMutex();
  private dailyTask: cron.ScheduledTask | null = null;

  private readonly pauseMs: number;
  private readonly pauseWindowMs: number;
  private readonly dailySchedule: string;
  private readonly timezone: string | undefined;

  constructor(
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
    private readonly broadcastEngine: BroadcastEngineService,
    private readonly configService: ConfigService,
  ) {
    this.pauseMs = Number(this.configService.get('DIGEST_PAUSE_MINUTES', 30)) * 60 * 1000;
    this.pauseWindowMs = Number(this.configService.get('DIGEST_PAUSE_WINDOW_HOURS', 2)) * 60 * 60 * 1000;
    this.dailySchedule = this.configService.get<string>('DIGEST_DAILY_CRON', '0 20 * * *');
    this.timezone = this.configService.get<string>('DIGEST_TIMEZONE');
  }

  onModuleInit() {
    if (!cron.validate(this.dailySchedule)) {
      throw new Error(`Invalid DIGEST_DAILY_CRON expression: ${this.dailySchedule}`);
    }
    if (this.timezone && !isValidTimeZone(this.timezone)) {
      throw new Error(`Invalid DIGEST_TIMEZONE: ${this.timezone}`);
    }

    this.dailyTask = cron.schedule(
      this.dailySchedule,
      () => {
        this.runDailyDigest().catch((error: unknown) =>
          this.logger.error(`Daily digest failed: ${describeError(error)}`, error instanceof Error ? error.stack : undefined),
        );
      },
      this.timezone ? { timezone: this.timezone } : {},
    );
    this.logger.log(`Daily digest scheduled at "${this.dailySchedule}"${this.timezone ? ` (${this.timezone})` : ''}`);
  }

  onModuleDestroy() {
    this.dailyTask?.stop();
    this.dailyTask = null;
    this.dispatch({ type: 'shutdown' });
  }

  /** Restarts the silence timer. Call for every accepted non-reaction broadcast. */
  notifyBroadcastAccepted(at: Date = new Date()): void {
    this.dispatch({ type: 'broadcast-accepted', at });
  }

  status(): SchedulerStatus {
    return {
      pauseTimerArmed: this.state.pauseTimer !== null,
      lastBroadcastAt: this.state.lastBroadcastAt,
      lastDigestAt: this.state.lastDigestAt,
      dailySchedule: this.dailySchedule,
      digestInFlight: this.digestLock.isLocked(DIGEST_LOCK),
    };
  }

  /** Reactions from the pause window, grouped per broadcast. */
  async runPauseDigest(now: Date = new Date()): Promise<DigestRunResult> {
    return this.digestLock.runExclusive(DIGEST_LOCK, async () => {
      const since = new Date(now.getTime() - this.pauseWindowMs);
      const reactions = await this.ledger.unprocessedReactions(since);
      const entries = groupReactions(reactions);
      if (entries.length === 0) {
        this.logger.log('Pause digest skipped: no new reactions');
        return { trigger: 'pause', reactionsIncluded: 0, broadcastsSummarized: 0, outcome: null };
      }

      const outcome = await this.broadcastEngine.sendSynthetic(MessageKind.DIGEST, formatPauseDigest(entries));
      await this.ledger.markProcessed(reactions.map(r => r.id));
      this.dispatch({ type: 'digest-sent', at: now });

      this.logger.log('=== Pause Digest Sent ===', {
        reactions: reactions.length,
        broadcasts: entries.length,
        sent: outcome.sentCount,
        failed: outcome.failedCount,
      });
      return { trigger: 'pause', reactionsIncluded: reactions.length, broadcastsSummarized: entries.length, outcome };
    });
  }

  /**
   * The day's most-reacted broadcasts, the day being the one in DIGEST_TIMEZONE
   * when set. Every unprocessed reaction of the day is marked processed,
   * including those on broadcasts outside the top list.
   */
  async runDailyDigest(now: Date = new Date()): Promise<DigestRunResult> {
    return this.digestLock.runExclusive(DIGEST_LOCK, async () => {
      const reactions = await this.ledger.unprocessedReactions(startOfDay(now, this.timezone));
      const entries = topEntries(groupReactions(reactions), DAILY_DIGEST_LIMIT);
      if (entries.length === 0) {
        this.logger.log('Daily digest skipped: no new reactions today');
        return { trigger: 'daily', reactionsIncluded: 0, broadcastsSummarized: 0, outcome: null };
      }

      const outcome = await this.broadcastEngine.sendSynthetic(MessageKind.DIGEST, formatDailyDigest(entries));
      await this.ledger.markProcessed(reactions.map(r => r.id));
      this.dispatch({ type: 'digest-sent', at: now });

      this.logger.log('=== Daily Digest Sent ===', {
        reactions: reactions.length,
        broadcasts: entries.length,
        sent: outcome.sentCount,
        failed: outcome.failedCount,
      });
      return { trigger: 'daily', reactionsIncluded: reactions.length, broadcastsSummarized: entries.length, outcome };
    });
  }

  private dispatch(event: SchedulerEvent): void {
    this.queue.push(event);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        this.reduce(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private reduce(event: SchedulerEvent): void {
    const state = this.state;
    switch (event.type) {
      case 'broadcast-accepted': {
        if (state.stopped) {
          return;
        }
        if (state.pauseTimer) {
          clearTimeout(state.pauseTimer);
        }
        const generation = ++state.generation;
        state.lastBroadcastAt = event.at;
        state.pauseTimer = setTimeout(() => this.dispatch({ type: 'pause-elapsed', generation }), this.pauseMs);
        state.pauseTimer.unref();
        return;
      }
      case 'pause-elapsed': {
        // A reset since this timer was armed makes it stale
        if (state.stopped || event.generation !== state.generation) {
          return;
        }
        state.pauseTimer = null;
        this.logger.log(`No broadcast for ${this.pauseMs / 60000} minutes; running pause digest`);
        this.runPauseDigest().catch((error: unknown) =>
          this.logger.error(`Pause digest failed: ${describeError(error)}`, error instanceof Error ? error.stack : undefined),
        );
        return;
      }
      case 'digest-sent':
        state.lastDigestAt = event.at;
        return;
      case 'shutdown':
        state.stopped = true;
        if (state.pauseTimer) {
          clearTimeout(state.pauseTimer);
          state.pauseTimer = null;
        }
        return;
    }
  }
}
