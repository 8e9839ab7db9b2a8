import { Inject, Injectable, Logger } from '@nestjs/common';
import { Attachment, DetectedReaction, MemberIdentity, MessageKind } from '@rollcall/common';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';
import { MemberService } from '../member/member.service';
import { BroadcastEngineService } from '../broadcast/broadcast-engine.service';
import { formatReactionUpdate } from '../broadcast/message-formatter';
import { detectReaction } from '../reactions/reaction-pattern.detector';
import { TargetMessageResolver } from '../reactions/target-message.resolver';
import { ReactionAggregatorService } from '../reactions/reaction-aggregator.service';
import { DigestSchedulerService } from '../digest/digest-scheduler.service';
import {
  describeError,
  NoRecipientsError,
  UnregisteredSenderError,
} from '../common/errors/rollcall.errors';
import { normalizeAddress } from '../common/utils/address';
import { plural } from '../common/utils/text';
import { helpText, InboundCommand, parseCommand, RECENT_LIMIT, recentText, statsText } from './inbound-commands';

export const NOT_REGISTERED_REPLY = '❌ This number is not part of the group. Ask an admin to add you.';
export const NO_RECIPIENTS_REPLY = '⚠️ There is no one else in the group to send to yet.';
export const TRY_AGAIN_REPLY = '⚠️ Something went wrong. Please try again in a few minutes.';

const STATS_WINDOW_DAYS = 7;

interface Sender extends MemberIdentity {
  address: string;
}

/**
 * Entry point for every text a member sends, whichever way it arrived.
 * Returns the reply owed to the sender, or `null` when none is due.
 */
@Injectable()
export class InboundService {
  private readonly logger = new Logger(InboundService.name);

  constructor(
    private readonly memberService: MemberService,
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
    private readonly broadcastEngine: BroadcastEngineService,
    private readonly resolver: TargetMessageResolver,
    private readonly aggregator: ReactionAggregatorService,
    private readonly scheduler: DigestSchedulerService,
  ) {}

  async handleInbound(senderAddress: string, text: string, attachments: Attachment[] = []): Promise<string | null> {
    const address = normalizeAddress(senderAddress);
    this.logger.log('=== Inbound Message ===', {
      from: address,
      length: text.length,
      attachments: attachments.length,
    });

    let sender: Sender | null = null;
    try {
      const identity = await this.memberService.identity(address);
      if (!identity) {
        throw new UnregisteredSenderError(address);
      }
      sender = { address, ...identity };

      const command = parseCommand(text, sender.isAdmin);
      if (command) {
        return await this.runCommand(command, sender);
      }

      // Attachments always mean a new message
      const detected = attachments.length === 0 ? detectReaction(text) : null;
      if (detected) {
        const reply = await this.handleReaction(sender, detected);
        if (reply !== undefined) {
          return reply;
        }
      }

      return await this.handleBroadcast(sender, text, attachments);
    } catch (error) {
      return this.replyForError(error, sender);
    }
  }

  /** `undefined` means no target was found and the text goes out as a broadcast. */
  private async handleReaction(sender: Sender, detected: DetectedReaction): Promise<string | null | undefined> {
    const target = await this.resolver.resolve(detected.targetFragment, sender.address);
    if (!target) {
      this.logger.log(`Reaction-like text from ${sender.address} has no target; sending as a message`);
      return undefined;
    }

    const result = await this.aggregator.apply(target.broadcast, sender, detected.emoji);
    if (result.decision.send) {
      const update = formatReactionUpdate(result.broadcast, sender.name, detected.emoji, result.action);
      try {
        await this.broadcastEngine.sendSynthetic(MessageKind.REACTION_UPDATE, update, sender.address);
      } catch (error) {
        if (!(error instanceof NoRecipientsError)) {
          throw error;
        }
        this.logger.warn(`Reaction update for ${result.broadcast.id} had no one to go to`);
      }
    }

    return sender.isAdmin ? `✅ Reaction ${result.action}: ${detected.emoji}` : null;
  }

  private async handleBroadcast(sender: Sender, text: string, attachments: Attachment[]): Promise<string | null> {
    const outcome = await this.broadcastEngine.broadcast(sender.address, text, attachments);
    this.scheduler.notifyBroadcastAccepted();

    if (!sender.isAdmin) {
      return null;
    }
    const lines = [`✅ Broadcast sent to ${outcome.sentCount} ${plural(outcome.sentCount, 'member')}`];
    if (outcome.failedCount > 0) {
      lines.push(`⚠️ ${outcome.failedCount} ${outcome.failedCount === 1 ? 'delivery' : 'deliveries'} failed`);
    }
    return lines.join('\n');
  }

  private async runCommand(command: InboundCommand, sender: Sender): Promise<string> {
    this.logger.log(`Command ${command.type} from ${sender.address}`);
    switch (command.type) {
      case 'help':
        return helpText(sender.isAdmin);
      case 'stats': {
        const since = new Date(Date.now() - STATS_WINDOW_DAYS * 24 * 60 * 60 * 1000);
        const [members, broadcasts] = await Promise.all([
          this.memberService.countActive(),
          this.ledger.countBroadcastsSince(since),
        ]);
        return statsText(members, broadcasts);
      }
      case 'recent':
        return recentText(await this.ledger.recentBroadcasts(new Date(0), null, RECENT_LIMIT));
      case 'add': {
        const member = await this.memberService.addMember({ address: command.address, name: command.name });
        return `✅ Added ${member.name} (${member.address})`;
      }
    }
  }

  private replyForError(error: unknown, sender: Sender | null): string | null {
    if (error instanceof UnregisteredSenderError) {
      this.logger.warn(`Rejected message from unregistered ${error.address}`);
      return NOT_REGISTERED_REPLY;
    }
    if (error instanceof NoRecipientsError) {
      this.logger.warn(`Nothing sent for ${sender?.address ?? 'unknown sender'}: no recipients`);
      return sender?.isAdmin ? NO_RECIPIENTS_REPLY : null;
    }
    this.logger.error(
      `Inbound handling failed: ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return TRY_AGAIN_REPLY;
  }
}
