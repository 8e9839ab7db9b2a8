import {
  Broadcast,
  DeliveryAttempt,
  NewBroadcast,
  NewDeliveryAttempt,
  Reaction,
  ReactionWithBroadcast,
} from '@rollcall/common';

export const MESSAGE_LEDGER = Symbol('MESSAGE_LEDGER');

export type ReactionUpsert = Omit<Reaction, 'id' | 'createdAt' | 'updatedAt' | 'processed'>;

export interface MessageLedger {
  saveBroadcast(broadcast: NewBroadcast): Promise<Broadcast>;
  getBroadcast(id: string): Promise<Broadcast | null>;
  /** Newest first. */
  recentBroadcasts(since: Date, excludeSender: string | null, limit: number): Promise<Broadcast[]>;
  countBroadcastsSince(since: Date): Promise<number>;
  updateSummary(id: string, summary: string | null, lastReactionUpdate?: Date): Promise<void>;

  getReaction(broadcastId: string, reactorAddress: string): Promise<Reaction | null>;
  /** Inserts or updates the single row for (broadcastId, reactorAddress). */
  upsertReaction(reaction: ReactionUpsert): Promise<Reaction>;
  activeReactions(broadcastId: string): Promise<Reaction[]>;
  countReactionChangesSince(broadcastId: string, since: Date): Promise<number>;
  /** Active, not yet processed reactions created at or after `since`. */
  unprocessedReactions(since: Date): Promise<ReactionWithBroadcast[]>;
  markProcessed(reactionIds: string[]): Promise<void>;

  saveDeliveryAttempts(attempts: NewDeliveryAttempt[]): Promise<void>;
  deliveryAttempts(messageId: string): Promise<DeliveryAttempt[]>;
}
