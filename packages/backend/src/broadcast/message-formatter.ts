import { Broadcast, ReactionAction } from '@rollcall/common';
import { plural, truncate } from '../common/utils/text';

export const REPLY_FOOTER = '📱 Reply to join the conversation!';
const SNIPPET_LENGTH = 40;

export type FormattableBroadcast = Pick<Broadcast, 'senderName' | 'text' | 'mediaUrls' | 'reactionSummary'>;

export function snippet(text: string): string {
  return truncate(text.replace(/\s+/g, ' ').trim(), SNIPPET_LENGTH);
}

export function formatBroadcast(broadcast: FormattableBroadcast, failedAttachments = 0): string {
  const lines = [`💬 ${broadcast.senderName}:`];
  if (broadcast.text) {
    lines.push(broadcast.text);
  }
  for (const url of broadcast.mediaUrls) {
    lines.push(`📎 ${url}`);
  }
  if (failedAttachments > 0) {
    lines.push(`⚠️ ${failedAttachments} ${plural(failedAttachments, 'attachment')} could not be included`);
  }
  if (broadcast.reactionSummary) {
    lines.push(`📊 ${broadcast.reactionSummary}`);
  }
  return `${lines.join('\n')}\n\n${REPLY_FOOTER}`;
}

export function formatReactionUpdate(
  target: Pick<Broadcast, 'senderName' | 'text' | 'reactionSummary'>,
  reactorName: string,
  emoji: string,
  action: ReactionAction,
): string {
  const message = `${target.senderName}'s message "${snippet(target.text)}"`;
  const headline = {
    added: `💭 ${reactorName} reacted ${emoji} to ${message}`,
    changed: `💭 ${reactorName} changed their reaction to ${emoji} on ${message}`,
    removed: `💭 ${reactorName} removed ${emoji} from ${message}`,
  }[action];
  return `${headline}\n📊 ${target.reactionSummary ?? 'No reactions'}`;
}
