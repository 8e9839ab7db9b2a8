import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  Attachment,
  BroadcastOutcome,
  DeliveryStatus,
  MessageKind,
  NewDeliveryAttempt,
  Recipient,
} from '@rollcall/common';
import { RECIPIENT_DIRECTORY, RecipientDirectory } from '../ports/recipient-directory.port';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';
import { TRANSPORT, Transport } from '../ports/transport.port';
import { BLOB_STORE, BlobStore } from '../ports/blob-store.port';
import {
  describeError,
  NoRecipientsError,
  TransportFailureError,
  UnregisteredSenderError,
} from '../common/errors/rollcall.errors';
import { runPool, withTimeout } from '../common/utils/worker-pool';
import { sleep } from '../common/utils/text';
import { normalizeAddress } from '../common/utils/address';
import { formatBroadcast } from './message-formatter';

interface DispatchProgress {
  attempts: number;
  abandoned: boolean;
}

@Injectable()
export class BroadcastEngineService {
  private readonly logger = new Logger(BroadcastEngineService.name);
  private readonly poolSize: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(RECIPIENT_DIRECTORY)
    private readonly directory: RecipientDirectory,
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
    @Inject(TRANSPORT)
    private readonly transport: Transport,
    @Inject(BLOB_STORE)
    private readonly blobStore: BlobStore,
    private readonly configService: ConfigService,
  ) {
    this.poolSize = Number(this.configService.get('BROADCAST_POOL_SIZE', 10));
    this.maxAttempts = Number(this.configService.get('BROADCAST_MAX_ATTEMPTS', 3));
    this.retryDelayMs = Number(this.configService.get('BROADCAST_RETRY_DELAY_MS', 1000));
    this.timeoutMs = Number(this.configService.get('BROADCAST_TIMEOUT_MS', 30000));
  }

  /**
   * Persists a member's message and delivers it to every other active member.
   * Per-recipient failures are recorded, never thrown; only an unknown sender,
   * an empty roster or a storage outage reject.
   */
  async broadcast(senderAddress: string, text: string, attachments: Attachment[] = []): Promise<BroadcastOutcome> {
    const address = normalizeAddress(senderAddress);
    const sender = await this.directory.identity(address);
    if (!sender) {
      throw new UnregisteredSenderError(address);
    }

    const recipients = await this.directory.activeRecipients(address);
    if (recipients.length === 0) {
      throw new NoRecipientsError();
    }

    const { urls, failed } = await this.storeAttachments(attachments);
    const broadcast = await this.ledger.saveBroadcast({
      senderAddress: address,
      senderName: sender.name,
      text,
      mediaUrls: urls,
    });

    return this.fanOut(broadcast.id, MessageKind.BROADCAST, recipients, formatBroadcast(broadcast, failed));
  }

  /**
   * Delivers an already formatted message that is not itself a broadcast,
   * such as a digest or a reaction count update. Nothing is persisted besides
   * the delivery attempts, filed under a fresh message id.
   */
  async sendSynthetic(kind: MessageKind, text: string, excludeAddress?: string): Promise<BroadcastOutcome> {
    const recipients = await this.directory.activeRecipients(excludeAddress);
    if (recipients.length === 0) {
      throw new NoRecipientsError();
    }
    return this.fanOut(uuidv4(), kind, recipients, text);
  }

  /** One recorded, retried message to a single address, such as a reply to the sender. */
  async sendDirect(kind: MessageKind, address: string, text: string): Promise<NewDeliveryAttempt> {
    const delivery = await this.dispatch(uuidv4(), kind, normalizeAddress(address), text);
    await this.ledger.saveDeliveryAttempts([delivery]);
    return delivery;
  }

  private async fanOut(
    messageId: string,
    kind: MessageKind,
    recipients: Recipient[],
    text: string,
  ): Promise<BroadcastOutcome> {
    const startedAt = Date.now();
    this.logger.log('=== Fan-out Started ===', {
      messageId,
      kind,
      recipients: recipients.length,
      poolSize: Math.min(this.poolSize, recipients.length),
    });

    const deliveries = await runPool(recipients, this.poolSize, recipient =>
      this.dispatch(messageId, kind, recipient.address, text),
    );
    await this.ledger.saveDeliveryAttempts(deliveries);

    const sentCount = deliveries.filter(d => d.status === DeliveryStatus.DELIVERED).length;
    const outcome: BroadcastOutcome = {
      messageId,
      kind,
      sentCount,
      failedCount: deliveries.length - sentCount,
      elapsedMs: Date.now() - startedAt,
      deliveries,
    };

    this.logger.log('=== Fan-out Finished ===', {
      messageId,
      sent: outcome.sentCount,
      failed: outcome.failedCount,
      elapsedMs: outcome.elapsedMs,
    });
    return outcome;
  }

  private async dispatch(
    messageId: string,
    kind: MessageKind,
    address: string,
    text: string,
  ): Promise<NewDeliveryAttempt> {
    const startedAt = Date.now();
    const progress: DispatchProgress = { attempts: 0, abandoned: false };

    try {
      const providerId = await withTimeout(this.sendWithRetry(address, text, progress), this.timeoutMs);
      return {
        messageId,
        messageKind: kind,
        recipientAddress: address,
        status: DeliveryStatus.DELIVERED,
        providerId,
        error: null,
        durationMs: Date.now() - startedAt,
        retryCount: Math.max(progress.attempts - 1, 0),
      };
    } catch (error) {
      progress.abandoned = true;
      this.logger.error(`Delivery to ${address} failed: ${describeError(error)}`);
      return {
        messageId,
        messageKind: kind,
        recipientAddress: address,
        status: DeliveryStatus.FAILED,
        providerId: null,
        error: describeError(error),
        durationMs: Date.now() - startedAt,
        retryCount: Math.max(progress.attempts - 1, 0),
      };
    }
  }

  private async sendWithRetry(address: string, text: string, progress: DispatchProgress): Promise<string | null> {
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts && !progress.abandoned; attempt++) {
      progress.attempts = attempt;
      try {
        const result = await this.transport.send(address, text);
        if (result.ok) {
          return result.providerId ?? null;
        }
        lastError = result.error ?? 'rejected by transport';
      } catch (error) {
        lastError = describeError(error);
      }

      if (attempt < this.maxAttempts) {
        this.logger.warn(`Attempt ${attempt} to ${address} failed (${lastError}), retrying`);
        await sleep(this.retryDelayMs * attempt);
      }
    }

    throw new TransportFailureError(address, lastError);
  }

  private async storeAttachments(attachments: Attachment[]): Promise<{ urls: string[]; failed: number }> {
    const urls: string[] = [];
    let failed = 0;

    for (const attachment of attachments) {
      try {
        urls.push(await this.blobStore.store(attachment.data, attachment.mimeType));
      } catch (error) {
        failed++;
        this.logger.warn(`Attachment dropped (${attachment.mimeType}): ${describeError(error)}`);
      }
    }

    return { urls, failed };
  }
}
