import { Inject, Injectable, Logger } from '@nestjs/common';
import { Broadcast, Reaction, ReactionAction } from '@rollcall/common';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { ReactionSummary, summarizeReactions } from './reaction-summary';
import { decideUpdate, UpdateDecision } from './update-timing.policy';

export interface Reactor {
  address: string;
  name: string;
}

export interface ReactionTransition {
  emoji: string;
  previousEmoji: string | null;
  isActive: boolean;
  action: ReactionAction;
}

export interface AggregationResult {
  action: ReactionAction;
  reaction: Reaction;
  /** The target with its recomputed summary applied. */
  broadcast: Broadcast;
  summary: ReactionSummary;
  decision: UpdateDecision;
}

/**
 * Next state of the single (broadcast, reactor) row.
 *
 * Same emoji toggles the row; a different emoji replaces it and always leaves
 * it active. A replacement on a removed row reads as `added` to the reactor.
 */
export function nextReactionState(existing: Reaction | null, emoji: string): ReactionTransition {
  if (!existing) {
    return { emoji, previousEmoji: null, isActive: true, action: 'added' };
  }
  if (existing.emoji === emoji) {
    return existing.isActive
      ? { emoji, previousEmoji: existing.previousEmoji, isActive: false, action: 'removed' }
      : { emoji, previousEmoji: existing.previousEmoji, isActive: true, action: 'added' };
  }
  return {
    emoji,
    previousEmoji: existing.emoji,
    isActive: true,
    action: existing.isActive ? 'changed' : 'added',
  };
}

@Injectable()
export class ReactionAggregatorService {
  private readonly logger = new Logger(ReactionAggregatorService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
  ) {}

  /**
   * Applies a reaction and recomputes the target's summary before returning.
   * Only decides whether an update should go out; sending it is the caller's job.
   */
  async apply(target: Broadcast, reactor: Reactor, emoji: string, now: Date = new Date()): Promise<AggregationResult> {
    const { reaction, action } = await this.locks.runExclusive(`row:${target.id}:${reactor.address}`, async () => {
      const existing = await this.ledger.getReaction(target.id, reactor.address);
      const next = nextReactionState(existing, emoji);
      const saved = await this.ledger.upsertReaction({
        broadcastId: target.id,
        reactorAddress: reactor.address,
        reactorName: reactor.name,
        emoji: next.emoji,
        previousEmoji: next.previousEmoji,
        isActive: next.isActive,
      });
      return { reaction: saved, action: next.action };
    });

    this.logger.log('=== Reaction Applied ===', {
      broadcastId: target.id,
      reactor: reactor.address,
      emoji,
      action,
    });

    // Summary writes are ordered per broadcast so a slower recompute never
    // overwrites a newer one.
    return this.locks.runExclusive(`summary:${target.id}`, async () => {
      const current = (await this.ledger.getBroadcast(target.id)) ?? target;
      const active = await this.ledger.activeReactions(target.id);
      const summary = summarizeReactions(active.map(r => r.emoji));

      const reference = current.lastReactionUpdate ?? current.createdAt;
      const changes = await this.ledger.countReactionChangesSince(target.id, reference);
      const decision = decideUpdate({
        totalActive: summary.total,
        action,
        minutesSinceLastUpdate: (now.getTime() - reference.getTime()) / (60 * 1000),
        changesSinceLastUpdate: changes,
      });

      const lastReactionUpdate = decision.send ? now : current.lastReactionUpdate;
      await this.ledger.updateSummary(target.id, summary.text, decision.send ? now : undefined);

      if (decision.send) {
        this.logger.log(`Summary update due for ${target.id} (${decision.reason}): ${summary.text ?? 'no reactions'}`);
      }

      return {
        action,
        reaction,
        broadcast: { ...current, reactionSummary: summary.text, lastReactionUpdate },
        summary,
        decision,
      };
    });
  }
}
