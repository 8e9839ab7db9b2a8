import { DeliveryStatus, MessageKind } from '@rollcall/common';
import { BroadcastEngineService } from '../broadcast-engine.service';
import { REPLY_FOOTER } from '../message-formatter';
import { InMemoryLedger } from '../../test-utils/in-memory-ledger';
import { FakeBlobStore, FakeDirectory, FakeTransport, testConfig } from '../../test-utils/fakes';
import {
  LedgerUnavailableError,
  NoRecipientsError,
  UnregisteredSenderError,
} from '../../common/errors/rollcall.errors';

const ANN = '+15550000001';

describe('BroadcastEngineService', () => {
  let directory: FakeDirectory;
  let ledger: InMemoryLedger;
  let transport: FakeTransport;
  let blobStore: FakeBlobStore;

  const createEngine = (config: Record<string, number> = {}) =>
    new BroadcastEngineService(
      directory,
      ledger,
      transport,
      blobStore,
      testConfig({ BROADCAST_RETRY_DELAY_MS: 1, BROADCAST_TIMEOUT_MS: 500, ...config }),
    );

  beforeEach(() => {
    directory = new FakeDirectory();
    ledger = new InMemoryLedger();
    transport = new FakeTransport();
    blobStore = new FakeBlobStore();
    directory.add(ANN, 'Ann');
  });

  const addMembers = (count: number) =>
    Array.from({ length: count }, (_, i) => directory.add(`+1555000010${i}`, `Member ${i}`).address);

  it('delivers to every other member and records one attempt each', async () => {
    const recipients = addMembers(5);
    transport.failing.add(recipients[2]);

    const outcome = await createEngine().broadcast(ANN, 'Hello all');

    expect(outcome.sentCount).toBe(4);
    expect(outcome.failedCount).toBe(1);
    expect(outcome.kind).toBe(MessageKind.BROADCAST);
    expect(transport.textsTo(ANN)).toEqual([]);
    expect(transport.textsTo(recipients[0])).toEqual([`💬 Ann:\nHello all\n\n${REPLY_FOOTER}`]);

    const attempts = await ledger.deliveryAttempts(outcome.messageId);
    expect(attempts).toHaveLength(5);
    expect(attempts.find(a => a.recipientAddress === recipients[2])).toMatchObject({
      status: DeliveryStatus.FAILED,
      retryCount: 2,
      error: `Delivery to ${recipients[2]} failed: carrier rejected`,
      providerId: null,
    });
    expect(attempts.filter(a => a.status === DeliveryStatus.DELIVERED)).toHaveLength(4);
  });

  it('retries a failing recipient up to the attempt limit', async () => {
    const [flaky] = addMembers(1);
    transport.failing.add(flaky);

    await createEngine({ BROADCAST_MAX_ATTEMPTS: 3 }).broadcast(ANN, 'Hi');

    expect(transport.calls.filter(address => address === flaky)).toHaveLength(3);
  });

  it('persists the broadcast under the sender\'s roster name', async () => {
    addMembers(1);

    const outcome = await createEngine().broadcast('(555) 000-0001', 'Hi');

    expect(await ledger.getBroadcast(outcome.messageId)).toMatchObject({
      senderAddress: ANN,
      senderName: 'Ann',
      text: 'Hi',
      mediaUrls: [],
      reactionSummary: null,
    });
  });

  it('gives up on a recipient that never answers without holding up the rest', async () => {
    const [stuck, ...others] = addMembers(3);
    transport.hanging.add(stuck);

    const outcome = await createEngine({ BROADCAST_TIMEOUT_MS: 50 }).broadcast(ANN, 'Hello');

    expect(outcome.sentCount).toBe(2);
    expect(outcome.failedCount).toBe(1);
    expect(outcome.deliveries.find(d => d.recipientAddress === stuck)?.error).toBe('timed out after 50ms');
    expect(others.map(address => transport.textsTo(address).length)).toEqual([1, 1]);
  });

  it('never runs more sends at once than the pool size', async () => {
    transport = new FakeTransport(5);
    addMembers(9);

    const outcome = await createEngine({ BROADCAST_POOL_SIZE: 3 }).broadcast(ANN, 'Hello');

    expect(outcome.sentCount).toBe(9);
    expect(transport.maxInFlight).toBe(3);
  });

  it('sends the text with a note when an attachment cannot be stored', async () => {
    const [bob] = addMembers(1);

    const outcome = await createEngine().broadcast(ANN, 'Look', [
      { data: Buffer.from('png-bytes'), mimeType: 'image/png' },
      { data: Buffer.from('pdf-bytes'), mimeType: 'application/pdf' },
    ]);

    expect(outcome.sentCount).toBe(1);
    expect(transport.textsTo(bob)).toEqual([
      `💬 Ann:\nLook\n📎 https://media.test/1\n⚠️ 1 attachment could not be included\n\n${REPLY_FOOTER}`,
    ]);
    expect((await ledger.getBroadcast(outcome.messageId))?.mediaUrls).toEqual(['https://media.test/1']);
  });

  it('rejects unregistered senders before storing anything', async () => {
    addMembers(2);

    await expect(createEngine().broadcast('+15559999999', 'Hi')).rejects.toBeInstanceOf(UnregisteredSenderError);
    expect(ledger.broadcasts.size).toBe(0);
    expect(transport.calls).toEqual([]);
  });

  it('rejects when there is nobody to send to', async () => {
    await expect(createEngine().broadcast(ANN, 'Anyone?')).rejects.toBeInstanceOf(NoRecipientsError);
    expect(ledger.broadcasts.size).toBe(0);
  });

  it('fails the whole batch when the ledger is down', async () => {
    addMembers(2);
    ledger.failing = true;

    await expect(createEngine().broadcast(ANN, 'Hi')).rejects.toBeInstanceOf(LedgerUnavailableError);
    expect(transport.calls).toEqual([]);
  });

  describe('sendSynthetic', () => {
    it('delivers without persisting a broadcast and files attempts under the kind', async () => {
      const [bob] = addMembers(1);

      const outcome = await createEngine().sendSynthetic(MessageKind.DIGEST, 'Digest text');

      expect(outcome.sentCount).toBe(2);
      expect(transport.textsTo(bob)).toEqual(['Digest text']);
      expect(ledger.broadcasts.size).toBe(0);
      expect((await ledger.deliveryAttempts(outcome.messageId)).map(a => a.messageKind)).toEqual([
        MessageKind.DIGEST,
        MessageKind.DIGEST,
      ]);
    });

    it('can leave one member out', async () => {
      addMembers(2);

      const outcome = await createEngine().sendSynthetic(MessageKind.REACTION_UPDATE, 'Update', ANN);

      expect(outcome.sentCount).toBe(2);
      expect(transport.textsTo(ANN)).toEqual([]);
    });
  });

  describe('sendDirect', () => {
    it('sends to one address, even one off the roster, and records the attempt', async () => {
      const delivery = await createEngine().sendDirect(MessageKind.REPLY, '5550000099', 'Not a member');

      expect(transport.sent).toEqual([{ address: '+15550000099', text: 'Not a member' }]);
      expect(delivery).toMatchObject({ status: DeliveryStatus.DELIVERED, providerId: 'sms-1', retryCount: 0 });
      expect(await ledger.deliveryAttempts(delivery.messageId)).toEqual([
        expect.objectContaining({ messageKind: MessageKind.REPLY, recipientAddress: '+15550000099' }),
      ]);
    });

    it('retries a failing reply and records the failure', async () => {
      transport.failing.add(ANN);

      const delivery = await createEngine().sendDirect(MessageKind.REPLY, ANN, 'Reply');

      expect(transport.calls).toEqual([ANN, ANN, ANN]);
      expect(ledger.deliveries).toEqual([
        expect.objectContaining({
          messageKind: MessageKind.REPLY,
          status: DeliveryStatus.FAILED,
          retryCount: 2,
          error: `Delivery to ${ANN} failed: carrier rejected`,
        }),
      ]);
      expect(delivery.status).toBe(DeliveryStatus.FAILED);
    });
  });
});
