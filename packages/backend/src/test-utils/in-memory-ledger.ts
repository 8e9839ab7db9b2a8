import {
  Broadcast,
  DeliveryAttempt,
  NewBroadcast,
  NewDeliveryAttempt,
  Reaction,
  ReactionWithBroadcast,
} from '@rollcall/common';
import { MessageLedger, ReactionUpsert } from '../ports/message-ledger.port';
import { LedgerUnavailableError } from '../common/errors/rollcall.errors';

/**
 * MessageLedger kept in maps. Timestamps come from `clock`, so tests can
 * move time forward between calls.
 */
export class InMemoryLedger implements MessageLedger {
  readonly broadcasts = new Map<string, Broadcast>();
  readonly reactions = new Map<string, Reaction>();
  readonly deliveries: DeliveryAttempt[] = [];
  failing = false;
  private sequence = 0;

  constructor(public clock: () => Date = () => new Date()) {}

  async saveBroadcast(input: NewBroadcast): Promise<Broadcast> {
    this.check();
    const broadcast: Broadcast = {
      id: this.nextId('b'),
      ...input,
      createdAt: this.clock(),
      reactionSummary: null,
      lastReactionUpdate: null,
    };
    this.broadcasts.set(broadcast.id, broadcast);
    return { ...broadcast };
  }

  /** Seeds a broadcast with an explicit creation time. */
  addBroadcast(input: NewBroadcast, createdAt: Date): Broadcast {
    const broadcast: Broadcast = {
      id: this.nextId('b'),
      ...input,
      createdAt,
      reactionSummary: null,
      lastReactionUpdate: null,
    };
    this.broadcasts.set(broadcast.id, broadcast);
    return { ...broadcast };
  }

  async getBroadcast(id: string): Promise<Broadcast | null> {
    this.check();
    const broadcast = this.broadcasts.get(id);
    return broadcast ? { ...broadcast } : null;
  }

  async recentBroadcasts(since: Date, excludeSender: string | null, limit: number): Promise<Broadcast[]> {
    this.check();
    return Array.from(this.broadcasts.values())
      .filter(b => b.createdAt >= since && b.senderAddress !== excludeSender)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(b => ({ ...b }));
  }

  async countBroadcastsSince(since: Date): Promise<number> {
    this.check();
    return Array.from(this.broadcasts.values()).filter(b => b.createdAt >= since).length;
  }

  async updateSummary(id: string, summary: string | null, lastReactionUpdate?: Date): Promise<void> {
    this.check();
    const broadcast = this.broadcasts.get(id);
    if (!broadcast) {
      return;
    }
    broadcast.reactionSummary = summary;
    if (lastReactionUpdate) {
      broadcast.lastReactionUpdate = lastReactionUpdate;
    }
  }

  async getReaction(broadcastId: string, reactorAddress: string): Promise<Reaction | null> {
    this.check();
    const reaction = this.findReaction(broadcastId, reactorAddress);
    return reaction ? { ...reaction } : null;
  }

  async upsertReaction(input: ReactionUpsert): Promise<Reaction> {
    this.check();
    const now = this.clock();
    const existing = this.findReaction(input.broadcastId, input.reactorAddress);
    const reaction: Reaction = existing
      ? { ...existing, ...input, updatedAt: now }
      : { id: this.nextId('r'), ...input, processed: false, createdAt: now, updatedAt: now };
    this.reactions.set(reaction.id, reaction);
    return { ...reaction };
  }

  async activeReactions(broadcastId: string): Promise<Reaction[]> {
    this.check();
    return Array.from(this.reactions.values())
      .filter(r => r.broadcastId === broadcastId && r.isActive)
      .map(r => ({ ...r }));
  }

  async countReactionChangesSince(broadcastId: string, since: Date): Promise<number> {
    this.check();
    return Array.from(this.reactions.values()).filter(
      r => r.broadcastId === broadcastId && r.updatedAt > since,
    ).length;
  }

  async unprocessedReactions(since: Date): Promise<ReactionWithBroadcast[]> {
    this.check();
    const result: ReactionWithBroadcast[] = [];
    for (const reaction of this.reactions.values()) {
      const broadcast = this.broadcasts.get(reaction.broadcastId);
      if (broadcast && reaction.isActive && !reaction.processed && reaction.createdAt >= since) {
        result.push({ ...reaction, broadcast: { ...broadcast } });
      }
    }
    return result.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async markProcessed(reactionIds: string[]): Promise<void> {
    this.check();
    for (const id of reactionIds) {
      const reaction = this.reactions.get(id);
      if (reaction) {
        reaction.processed = true;
      }
    }
  }

  async saveDeliveryAttempts(attempts: NewDeliveryAttempt[]): Promise<void> {
    this.check();
    for (const attempt of attempts) {
      this.deliveries.push({ id: this.nextId('d'), ...attempt, createdAt: this.clock() });
    }
  }

  async deliveryAttempts(messageId: string): Promise<DeliveryAttempt[]> {
    this.check();
    return this.deliveries.filter(d => d.messageId === messageId);
  }

  private findReaction(broadcastId: string, reactorAddress: string): Reaction | undefined {
    return Array.from(this.reactions.values()).find(
      r => r.broadcastId === broadcastId && r.reactorAddress === reactorAddress,
    );
  }

  private nextId(prefix: string): string {
    this.sequence++;
    return `${prefix}${this.sequence}`;
  }

  private check() {
    if (this.failing) {
      throw new LedgerUnavailableError('ledger', new Error('connection refused'));
    }
  }
}
