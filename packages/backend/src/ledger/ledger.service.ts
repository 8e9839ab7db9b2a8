import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, MoreThan, MoreThanOrEqual, Not, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import {
  Broadcast as BroadcastDto,
  DeliveryAttempt as DeliveryAttemptDto,
  NewBroadcast,
  NewDeliveryAttempt,
  Reaction as ReactionDto,
  ReactionWithBroadcast,
} from '@rollcall/common';
import { Broadcast } from './entities/broadcast.entity';
import { Reaction } from './entities/reaction.entity';
import { DeliveryAttempt } from './entities/delivery-attempt.entity';
import { MessageLedger, ReactionUpsert } from '../ports/message-ledger.port';
import { guardStore } from '../common/errors/rollcall.errors';

@Injectable()
export class LedgerService implements MessageLedger {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    @InjectRepository(Broadcast)
    private readonly broadcastRepository: Repository<Broadcast>,
    @InjectRepository(Reaction)
    private readonly reactionRepository: Repository<Reaction>,
    @InjectRepository(DeliveryAttempt)
    private readonly deliveryRepository: Repository<DeliveryAttempt>,
  ) {}

  async saveBroadcast(input: NewBroadcast): Promise<BroadcastDto> {
    const broadcast = this.broadcastRepository.create({
      id: uuidv4(),
      senderAddress: input.senderAddress,
      senderName: input.senderName,
      text: input.text,
      mediaUrls: input.mediaUrls,
      reactionSummary: null,
      lastReactionUpdate: null,
    });

    const saved = await this.guard('saveBroadcast', () => this.broadcastRepository.save(broadcast));
    this.logger.log('=== Broadcast Saved ===', {
      id: saved.id,
      senderAddress: saved.senderAddress,
      mediaCount: saved.mediaUrls.length,
    });
    return toBroadcastDto(saved);
  }

  async getBroadcast(id: string): Promise<BroadcastDto | null> {
    const broadcast = await this.guard('getBroadcast', () => this.broadcastRepository.findOneBy({ id }));
    return broadcast ? toBroadcastDto(broadcast) : null;
  }

  async recentBroadcasts(since: Date, excludeSender: string | null, limit: number): Promise<BroadcastDto[]> {
    const broadcasts = await this.guard('recentBroadcasts', () =>
      this.broadcastRepository.find({
        where: excludeSender
          ? { createdAt: MoreThanOrEqual(since), senderAddress: Not(excludeSender) }
          : { createdAt: MoreThanOrEqual(since) },
        order: { createdAt: 'DESC' },
        take: limit,
      }),
    );
    return broadcasts.map(toBroadcastDto);
  }

  async countBroadcastsSince(since: Date): Promise<number> {
    return this.guard('countBroadcastsSince', () =>
      this.broadcastRepository.count({ where: { createdAt: MoreThanOrEqual(since) } }),
    );
  }

  async updateSummary(id: string, summary: string | null, lastReactionUpdate?: Date): Promise<void> {
    const changes: Partial<Pick<Broadcast, 'reactionSummary' | 'lastReactionUpdate'>> = {
      reactionSummary: summary,
    };
    if (lastReactionUpdate) {
      changes.lastReactionUpdate = lastReactionUpdate;
    }
    await this.guard('updateSummary', () => this.broadcastRepository.update({ id }, changes));
  }

  async getReaction(broadcastId: string, reactorAddress: string): Promise<ReactionDto | null> {
    const reaction = await this.guard('getReaction', () =>
      this.reactionRepository.findOneBy({ broadcastId, reactorAddress }),
    );
    return reaction ? toReactionDto(reaction) : null;
  }

  async upsertReaction(input: ReactionUpsert): Promise<ReactionDto> {
    const existing = await this.guard('upsertReaction', () =>
      this.reactionRepository.findOneBy({
        broadcastId: input.broadcastId,
        reactorAddress: input.reactorAddress,
      }),
    );

    const reaction = existing ?? this.reactionRepository.create({ id: uuidv4(), processed: false });
    reaction.broadcastId = input.broadcastId;
    reaction.reactorAddress = input.reactorAddress;
    reaction.reactorName = input.reactorName;
    reaction.emoji = input.emoji;
    reaction.previousEmoji = input.previousEmoji;
    reaction.isActive = input.isActive;

    const saved = await this.guard('upsertReaction', () => this.reactionRepository.save(reaction));
    return toReactionDto(saved);
  }

  async activeReactions(broadcastId: string): Promise<ReactionDto[]> {
    const reactions = await this.guard('activeReactions', () =>
      this.reactionRepository.find({
        where: { broadcastId, isActive: true },
        order: { createdAt: 'ASC' },
      }),
    );
    return reactions.map(toReactionDto);
  }

  async countReactionChangesSince(broadcastId: string, since: Date): Promise<number> {
    return this.guard('countReactionChangesSince', () =>
      this.reactionRepository.count({ where: { broadcastId, updatedAt: MoreThan(since) } }),
    );
  }

  async unprocessedReactions(since: Date): Promise<ReactionWithBroadcast[]> {
    const reactions = await this.guard('unprocessedReactions', () =>
      this.reactionRepository.find({
        where: { isActive: true, processed: false, createdAt: MoreThanOrEqual(since) },
        relations: ['broadcast'],
        order: { createdAt: 'ASC' },
      }),
    );

    return reactions.map(reaction => ({
      ...toReactionDto(reaction),
      broadcast: toBroadcastDto(reaction.broadcast),
    }));
  }

  async markProcessed(reactionIds: string[]): Promise<void> {
    if (reactionIds.length === 0) {
      return;
    }
    await this.guard('markProcessed', () =>
      this.reactionRepository.update({ id: In(reactionIds) }, { processed: true }),
    );
    this.logger.log(`Marked ${reactionIds.length} reactions processed`);
  }

  async saveDeliveryAttempts(attempts: NewDeliveryAttempt[]): Promise<void> {
    if (attempts.length === 0) {
      return;
    }
    const rows = attempts.map(attempt =>
      this.deliveryRepository.create({ id: uuidv4(), ...attempt }),
    );
    await this.guard('saveDeliveryAttempts', () => this.deliveryRepository.save(rows));
  }

  async deliveryAttempts(messageId: string): Promise<DeliveryAttemptDto[]> {
    const rows = await this.guard('deliveryAttempts', () =>
      this.deliveryRepository.find({ where: { messageId }, order: { createdAt: 'ASC' } }),
    );
    return rows.map(row => ({
      id: row.id,
      messageId: row.messageId,
      messageKind: row.messageKind,
      recipientAddress: row.recipientAddress,
      status: row.status,
      providerId: row.providerId,
      error: row.error,
      durationMs: row.durationMs,
      retryCount: row.retryCount,
      createdAt: row.createdAt,
    }));
  }

  private guard<T>(operation: string, query: () => Promise<T>): Promise<T> {
    return guardStore(this.logger, `ledger.${operation}`, query);
  }
}

function toBroadcastDto(broadcast: Broadcast): BroadcastDto {
  return {
    id: broadcast.id,
    senderAddress: broadcast.senderAddress,
    senderName: broadcast.senderName,
    text: broadcast.text,
    mediaUrls: broadcast.mediaUrls ?? [],
    createdAt: broadcast.createdAt,
    reactionSummary: broadcast.reactionSummary,
    lastReactionUpdate: broadcast.lastReactionUpdate,
  };
}

function toReactionDto(reaction: Reaction): ReactionDto {
  return {
    id: reaction.id,
    broadcastId: reaction.broadcastId,
    reactorAddress: reaction.reactorAddress,
    reactorName: reaction.reactorName,
    emoji: reaction.emoji,
    previousEmoji: reaction.previousEmoji,
    isActive: reaction.isActive,
    processed: reaction.processed,
    createdAt: reaction.createdAt,
    updatedAt: reaction.updatedAt,
  };
}
