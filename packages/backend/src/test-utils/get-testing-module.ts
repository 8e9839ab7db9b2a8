import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { MemberService } from '../member/member.service';
import { BroadcastEngineService } from '../broadcast/broadcast-engine.service';
import { TargetMessageResolver } from '../reactions/target-message.resolver';
import { ReactionAggregatorService } from '../reactions/reaction-aggregator.service';
import { DigestSchedulerService } from '../digest/digest-scheduler.service';
import { InboundService } from '../inbound/inbound.service';
import { RECIPIENT_DIRECTORY } from '../ports/recipient-directory.port';
import { MESSAGE_LEDGER } from '../ports/message-ledger.port';
import { TRANSPORT } from '../ports/transport.port';
import { BLOB_STORE } from '../ports/blob-store.port';
import { InMemoryLedger } from './in-memory-ledger';
import { FakeBlobStore, FakeDirectory, FakeTransport, testConfig } from './fakes';

export interface TestingHarness {
  module: TestingModule;
  directory: FakeDirectory;
  ledger: InMemoryLedger;
  transport: FakeTransport;
  blobStore: FakeBlobStore;
}

export const FAST_DELIVERY_CONFIG = {
  BROADCAST_RETRY_DELAY_MS: 1,
  BROADCAST_TIMEOUT_MS: 200,
};

/**
 * The message pipeline wired against in-process fakes. Lifecycle hooks are
 * not run, so no cron job or Kafka connection is started.
 */
export async function getTestingModule(config: Record<string, string | number> = {}): Promise<TestingHarness> {
  const directory = new FakeDirectory();
  const ledger = new InMemoryLedger();
  const transport = new FakeTransport();
  const blobStore = new FakeBlobStore();

  const module = await Test.createTestingModule({
    providers: [
      InboundService,
      BroadcastEngineService,
      TargetMessageResolver,
      ReactionAggregatorService,
      DigestSchedulerService,
      { provide: ConfigService, useValue: testConfig({ ...FAST_DELIVERY_CONFIG, ...config }) },
      { provide: MemberService, useValue: directory },
      { provide: RECIPIENT_DIRECTORY, useValue: directory },
      { provide: MESSAGE_LEDGER, useValue: ledger },
      { provide: TRANSPORT, useValue: transport },
      { provide: BLOB_STORE, useValue: blobStore },
    ],
  }).compile();

  return { module, directory, ledger, transport, blobStore };
}
