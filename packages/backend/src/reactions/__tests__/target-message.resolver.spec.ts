import { InMemoryLedger } from '../../test-utils/in-memory-ledger';
import { testConfig } from '../../test-utils/fakes';
import { scoreCandidate, TargetMessageResolver } from '../target-message.resolver';

const NOW = new Date('2026-03-10T18:00:00Z');
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60 * 1000);

const ANN = '+15550000001';
const BOB = '+15550000002';
const CAT = '+15550000003';

describe('scoreCandidate', () => {
  it('adds the substring bonus to the shared-word ratio', () => {
    // 3 shared words of max(3, 4), plus 0.5 for the verbatim match
    expect(scoreCandidate('dinner at 7', 'Dinner at 7 tonight?')).toBeCloseTo(1.25);
  });

  it('scores an exact quote at 1.5', () => {
    expect(scoreCandidate('Who is bringing snacks?', 'Who is bringing snacks?')).toBeCloseTo(1.5);
  });

  it('scores unrelated text at zero', () => {
    expect(scoreCandidate('banana', 'Who is bringing snacks?')).toBe(0);
  });
});

describe('TargetMessageResolver', () => {
  let ledger: InMemoryLedger;
  let resolver: TargetMessageResolver;

  beforeEach(() => {
    ledger = new InMemoryLedger(() => NOW);
    resolver = new TargetMessageResolver(ledger, testConfig());
  });

  const post = (sender: string, text: string, createdAt: Date) =>
    ledger.addBroadcast({ senderAddress: sender, senderName: sender.slice(-1), text, mediaUrls: [] }, createdAt);

  it('finds the broadcast a quote came from', async () => {
    const snacks = post(ANN, 'Who is bringing snacks?', minutesAgo(30));
    post(BOB, 'Running late, start without me', minutesAgo(10));

    const resolved = await resolver.resolve('Who is bringing snacks?', CAT, 24, NOW);

    expect(resolved?.broadcast.id).toBe(snacks.id);
    expect(resolved?.score).toBeCloseTo(1.5);
    expect(resolved?.matchedBy).toBe('similarity');
  });

  it('never targets the reactor\'s own broadcasts', async () => {
    post(CAT, 'Who is bringing snacks?', minutesAgo(5));
    const other = post(ANN, 'Game night Friday', minutesAgo(60));

    const resolved = await resolver.resolve('Who is bringing snacks?', CAT, 24, NOW);

    expect(resolved?.broadcast.id).toBe(other.id);
    expect(resolved?.matchedBy).toBe('fallback');
  });

  it('uses the newest candidate for an empty fragment', async () => {
    post(ANN, 'First', minutesAgo(60));
    const newest = post(BOB, 'Second', minutesAgo(1));

    expect(await resolver.resolve('', CAT, 24, NOW)).toEqual({ broadcast: newest, score: 0, matchedBy: 'fallback' });
  });

  it('falls back to the newest candidate when nothing clears the threshold', async () => {
    post(ANN, 'Pizza party at my place', minutesAgo(120));
    const newest = post(BOB, 'Who wants pizza tomorrow at the office', minutesAgo(2));

    const resolved = await resolver.resolve('tacos', CAT, 24, NOW);

    expect(resolved?.broadcast.id).toBe(newest.id);
    expect(resolved?.matchedBy).toBe('fallback');
    expect(resolved?.score).toBe(0);
  });

  it('breaks score ties toward the newer broadcast', async () => {
    post(ANN, 'Game night Friday', minutesAgo(90));
    const newer = post(BOB, 'Game night Friday', minutesAgo(20));

    const resolved = await resolver.resolve('Game night Friday', CAT, 24, NOW);

    expect(resolved?.broadcast.id).toBe(newer.id);
  });

  it('ignores broadcasts outside the lookback window', async () => {
    post(ANN, 'Old news', minutesAgo(25 * 60));

    expect(await resolver.resolve('Old news', CAT, 24, NOW)).toBeNull();
  });

  it('looks at no more than the ten newest candidates', async () => {
    post(ANN, 'The very first message', minutesAgo(100));
    for (let i = 0; i < 10; i++) {
      post(BOB, `Filler ${i}`, minutesAgo(50 - i));
    }

    const resolved = await resolver.resolve('The very first message', CAT, 24, NOW);

    expect(resolved?.broadcast.text).toBe('Filler 9');
    expect(resolved?.matchedBy).toBe('fallback');
  });
});
