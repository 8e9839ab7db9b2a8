import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { In, MoreThan, MoreThanOrEqual, Not } from 'typeorm';
import { DeliveryStatus, MessageKind } from '@rollcall/common';
import { LedgerService } from '../ledger.service';
import { Broadcast } from '../entities/broadcast.entity';
import { Reaction } from '../entities/reaction.entity';
import { DeliveryAttempt } from '../entities/delivery-attempt.entity';
import { LedgerUnavailableError } from '../../common/errors/rollcall.errors';

const CREATED_AT = new Date('2026-03-10T18:00:00Z');

function mockRepository() {
  return {
    create: jest.fn((input: object) => ({ ...input })),
    save: jest.fn(async (input: object) => ({ createdAt: CREATED_AT, updatedAt: CREATED_AT, ...input })),
    findOneBy: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
    update: jest.fn(),
  };
}

function broadcastRow(overrides: Partial<Broadcast> = {}): Broadcast {
  return Object.assign(new Broadcast(), {
    id: 'b1',
    senderAddress: '+15550000002',
    senderName: 'Bob',
    text: 'Dinner at 7?',
    mediaUrls: [],
    reactionSummary: null,
    lastReactionUpdate: null,
    createdAt: CREATED_AT,
    ...overrides,
  });
}

describe('LedgerService', () => {
  let service: LedgerService;
  let broadcasts: ReturnType<typeof mockRepository>;
  let reactions: ReturnType<typeof mockRepository>;
  let deliveries: ReturnType<typeof mockRepository>;

  beforeEach(async () => {
    broadcasts = mockRepository();
    reactions = mockRepository();
    deliveries = mockRepository();

    const module = await Test.createTestingModule({
      providers: [
        LedgerService,
        { provide: getRepositoryToken(Broadcast), useValue: broadcasts },
        { provide: getRepositoryToken(Reaction), useValue: reactions },
        { provide: getRepositoryToken(DeliveryAttempt), useValue: deliveries },
      ],
    }).compile();

    service = module.get(LedgerService);
  });

  it('saves a new broadcast with no summary yet', async () => {
    const saved = await service.saveBroadcast({
      senderAddress: '+15550000002',
      senderName: 'Bob',
      text: 'Dinner at 7?',
      mediaUrls: ['https://media.test/1'],
    });

    expect(broadcasts.create).toHaveBeenCalledWith(
      expect.objectContaining({ reactionSummary: null, lastReactionUpdate: null, mediaUrls: ['https://media.test/1'] }),
    );
    expect(saved).toMatchObject({ senderName: 'Bob', createdAt: CREATED_AT, reactionSummary: null });
    expect(saved.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('queries recent broadcasts newest first, leaving out one sender', async () => {
    const since = new Date('2026-03-09T18:00:00Z');
    broadcasts.find.mockResolvedValue([broadcastRow()]);

    const result = await service.recentBroadcasts(since, '+15550000003', 10);

    expect(broadcasts.find).toHaveBeenCalledWith({
      where: { createdAt: MoreThanOrEqual(since), senderAddress: Not('+15550000003') },
      order: { createdAt: 'DESC' },
      take: 10,
    });
    expect(result).toEqual([
      {
        id: 'b1',
        senderAddress: '+15550000002',
        senderName: 'Bob',
        text: 'Dinner at 7?',
        mediaUrls: [],
        createdAt: CREATED_AT,
        reactionSummary: null,
        lastReactionUpdate: null,
      },
    ]);
  });

  it('moves lastReactionUpdate only when an update was sent', async () => {
    const sentAt = new Date('2026-03-10T18:05:00Z');

    await service.updateSummary('b1', '2 reactions: x×2');
    await service.updateSummary('b1', '3 reactions: x×3', sentAt);

    expect(broadcasts.update).toHaveBeenNthCalledWith(1, { id: 'b1' }, { reactionSummary: '2 reactions: x×2' });
    expect(broadcasts.update).toHaveBeenNthCalledWith(
      2,
      { id: 'b1' },
      { reactionSummary: '3 reactions: x×3', lastReactionUpdate: sentAt },
    );
  });

  it('updates the existing row on upsert and keeps its processed flag', async () => {
    const existing = Object.assign(new Reaction(), {
      id: 'r1',
      broadcastId: 'b1',
      reactorAddress: '+15550000001',
      reactorName: 'Ann',
      emoji: 'x',
      previousEmoji: null,
      isActive: true,
      processed: true,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
    });
    reactions.findOneBy.mockResolvedValue(existing);

    const saved = await service.upsertReaction({
      broadcastId: 'b1',
      reactorAddress: '+15550000001',
      reactorName: 'Ann',
      emoji: 'y',
      previousEmoji: 'x',
      isActive: true,
    });

    expect(reactions.create).not.toHaveBeenCalled();
    expect(saved).toMatchObject({ id: 'r1', emoji: 'y', previousEmoji: 'x', processed: true });
  });

  it('counts reaction changes strictly after the reference time', async () => {
    reactions.count.mockResolvedValue(2);

    await expect(service.countReactionChangesSince('b1', CREATED_AT)).resolves.toBe(2);
    expect(reactions.count).toHaveBeenCalledWith({ where: { broadcastId: 'b1', updatedAt: MoreThan(CREATED_AT) } });
  });

  it('loads unprocessed reactions with their broadcasts', async () => {
    const since = new Date('2026-03-10T16:00:00Z');
    reactions.find.mockResolvedValue([
      Object.assign(new Reaction(), {
        id: 'r1',
        broadcastId: 'b1',
        reactorAddress: '+15550000001',
        reactorName: 'Ann',
        emoji: 'x',
        previousEmoji: null,
        isActive: true,
        processed: false,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        broadcast: broadcastRow(),
      }),
    ]);

    const result = await service.unprocessedReactions(since);

    expect(reactions.find).toHaveBeenCalledWith({
      where: { isActive: true, processed: false, createdAt: MoreThanOrEqual(since) },
      relations: ['broadcast'],
      order: { createdAt: 'ASC' },
    });
    expect(result[0].broadcast.text).toBe('Dinner at 7?');
  });

  it('marks reactions processed in one update and skips empty lists', async () => {
    await service.markProcessed([]);
    await service.markProcessed(['r1', 'r2']);

    expect(reactions.update).toHaveBeenCalledTimes(1);
    expect(reactions.update).toHaveBeenCalledWith({ id: In(['r1', 'r2']) }, { processed: true });
  });

  it('stores one delivery row per attempt', async () => {
    await service.saveDeliveryAttempts([
      {
        messageId: 'b1',
        messageKind: MessageKind.BROADCAST,
        recipientAddress: '+15550000001',
        status: DeliveryStatus.DELIVERED,
        providerId: 'sms-1',
        error: null,
        durationMs: 12,
        retryCount: 0,
      },
    ]);

    expect(deliveries.save).toHaveBeenCalledWith([
      expect.objectContaining({ messageId: 'b1', status: DeliveryStatus.DELIVERED, providerId: 'sms-1' }),
    ]);
  });

  it('reports driver failures as an unavailable ledger', async () => {
    broadcasts.findOneBy.mockRejectedValue(new Error('ECONNREFUSED'));

    const lookup = service.getBroadcast('b1');

    await expect(lookup).rejects.toBeInstanceOf(LedgerUnavailableError);
    await expect(lookup).rejects.toThrow('Storage unavailable during ledger.getBroadcast');
  });
});
