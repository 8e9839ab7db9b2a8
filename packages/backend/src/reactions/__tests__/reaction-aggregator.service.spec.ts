import { Broadcast, Reaction } from '@rollcall/common';
import { InMemoryLedger } from '../../test-utils/in-memory-ledger';
import { nextReactionState, ReactionAggregatorService } from '../reaction-aggregator.service';
import { UpdateDecision } from '../update-timing.policy';

const HEART = '\u2764\uFE0F';
const THUMBS_UP = '\u{1F44D}';

const T0 = new Date('2026-03-10T18:00:00Z');
const at = (minutes: number) => new Date(T0.getTime() + minutes * 60 * 1000);

const ANN = { address: '+15550000001', name: 'Ann' };

function row(overrides: Partial<Reaction>): Reaction {
  return {
    id: 'r1',
    broadcastId: 'b1',
    reactorAddress: ANN.address,
    reactorName: ANN.name,
    emoji: HEART,
    previousEmoji: null,
    isActive: true,
    processed: false,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

describe('nextReactionState', () => {
  it('adds a first reaction', () => {
    expect(nextReactionState(null, HEART)).toEqual({
      emoji: HEART,
      previousEmoji: null,
      isActive: true,
      action: 'added',
    });
  });

  it('toggles the same emoji off and back on', () => {
    expect(nextReactionState(row({ isActive: true }), HEART)).toMatchObject({ isActive: false, action: 'removed' });
    expect(nextReactionState(row({ isActive: false }), HEART)).toMatchObject({ isActive: true, action: 'added' });
  });

  it('replaces a different emoji and remembers the old one', () => {
    expect(nextReactionState(row({ isActive: true }), THUMBS_UP)).toEqual({
      emoji: THUMBS_UP,
      previousEmoji: HEART,
      isActive: true,
      action: 'changed',
    });
  });

  it('reports a new emoji on a removed reaction as added', () => {
    expect(nextReactionState(row({ isActive: false }), THUMBS_UP)).toMatchObject({
      emoji: THUMBS_UP,
      previousEmoji: HEART,
      isActive: true,
      action: 'added',
    });
  });
});

describe('ReactionAggregatorService', () => {
  let now: Date;
  let ledger: InMemoryLedger;
  let aggregator: ReactionAggregatorService;
  let target: Broadcast;

  beforeEach(() => {
    now = T0;
    ledger = new InMemoryLedger(() => now);
    aggregator = new ReactionAggregatorService(ledger);
    target = ledger.addBroadcast(
      { senderAddress: '+15550000002', senderName: 'Bob', text: 'Dinner at 7?', mediaUrls: [] },
      T0,
    );
  });

  const react = (reactor: { address: string; name: string }, emoji: string, minute: number) => {
    now = at(minute);
    return aggregator.apply(target, reactor, emoji, now);
  };

  const reactor = (n: number) => ({ address: `+1555000010${n}`, name: `Member ${n}` });

  it('toggles one reactor on, off and on again with a single row', async () => {
    const first = await react(ANN, HEART, 1);
    const second = await react(ANN, HEART, 2);
    const third = await react(ANN, HEART, 3);

    expect([first.action, second.action, third.action]).toEqual(['added', 'removed', 'added']);
    expect([first.summary.text, second.summary.text, third.summary.text]).toEqual([
      `1 reaction: ${HEART}`,
      null,
      `1 reaction: ${HEART}`,
    ]);
    expect(ledger.reactions.size).toBe(1);
    expect((await ledger.getBroadcast(target.id))?.reactionSummary).toBe(`1 reaction: ${HEART}`);
  });

  it('keeps one active emoji per reactor when it changes', async () => {
    await react(ANN, HEART, 1);
    const changed = await react(ANN, THUMBS_UP, 2);

    expect(changed.action).toBe('changed');
    expect(changed.reaction).toMatchObject({ emoji: THUMBS_UP, previousEmoji: HEART, isActive: true });
    expect(changed.summary.text).toBe(`1 reaction: ${THUMBS_UP}`);
    expect(await ledger.activeReactions(target.id)).toHaveLength(1);
  });

  it('sends updates after the first and third of four quick reactions', async () => {
    const decisions: UpdateDecision[] = [];
    for (let n = 1; n <= 4; n++) {
      decisions.push((await react(reactor(n), THUMBS_UP, n)).decision);
    }

    expect(decisions.map(d => d.send)).toEqual([true, false, true, false]);
    expect(decisions[2].reason).toBe('milestone');
    expect((await ledger.getBroadcast(target.id))?.lastReactionUpdate).toEqual(at(3));
  });

  it('sends a stale update when a change arrives more than five minutes after the last one', async () => {
    await react(reactor(1), THUMBS_UP, 1);
    const late = await react(reactor(2), THUMBS_UP, 7);

    expect(late.decision).toEqual({ send: true, reason: 'stale' });
    expect(late.broadcast.lastReactionUpdate).toEqual(at(7));
  });

  it('returns the target with the recomputed summary applied', async () => {
    await react(reactor(1), HEART, 1);
    const result = await react(reactor(2), THUMBS_UP, 2);

    expect(result.broadcast).toMatchObject({
      id: target.id,
      reactionSummary: `2 reactions: ${HEART} ${THUMBS_UP}`,
      lastReactionUpdate: at(1),
    });
  });

  it('counts every reactor when reactions arrive together', async () => {
    now = at(1);
    await Promise.all([1, 2, 3, 4, 5].map(n => aggregator.apply(target, reactor(n), THUMBS_UP, now)));

    expect((await ledger.getBroadcast(target.id))?.reactionSummary).toBe(`5 reactions: ${THUMBS_UP}×5`);
    expect(await ledger.activeReactions(target.id)).toHaveLength(5);
  });

  it('applies concurrent toggles from one reactor in order', async () => {
    now = at(1);
    const results = await Promise.all([
      aggregator.apply(target, ANN, HEART, now),
      aggregator.apply(target, ANN, HEART, now),
    ]);

    expect(results.map(r => r.action)).toEqual(['added', 'removed']);
    expect(await ledger.activeReactions(target.id)).toHaveLength(0);
    expect(ledger.reactions.size).toBe(1);
  });
});
