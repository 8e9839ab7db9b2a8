import { Broadcast, ReactionWithBroadcast } from '@rollcall/common';
import { ReactionSummary, summarizeReactions } from '../reactions/reaction-summary';
import { snippet } from '../broadcast/message-formatter';

export interface DigestEntry {
  broadcast: Broadcast;
  summary: ReactionSummary;
  reactionIds: string[];
}

/** One entry per target broadcast, oldest broadcast first. */
export function groupReactions(reactions: readonly ReactionWithBroadcast[]): DigestEntry[] {
  const byBroadcast = new Map<string, { broadcast: Broadcast; emojis: string[]; reactionIds: string[] }>();
  for (const reaction of reactions) {
    const group = byBroadcast.get(reaction.broadcastId) ?? {
      broadcast: reaction.broadcast,
      emojis: [],
      reactionIds: [],
    };
    group.emojis.push(reaction.emoji);
    group.reactionIds.push(reaction.id);
    byBroadcast.set(reaction.broadcastId, group);
  }

  return Array.from(byBroadcast.values())
    .map(group => ({
      broadcast: group.broadcast,
      summary: summarizeReactions(group.emojis),
      reactionIds: group.reactionIds,
    }))
    .sort((a, b) => a.broadcast.createdAt.getTime() - b.broadcast.createdAt.getTime());
}

/** Most reacted first; equal totals go to the newer broadcast. */
export function topEntries(entries: readonly DigestEntry[], limit: number): DigestEntry[] {
  return entries
    .slice()
    .sort(
      (a, b) =>
        b.summary.total - a.summary.total ||
        b.broadcast.createdAt.getTime() - a.broadcast.createdAt.getTime(),
    )
    .slice(0, limit);
}

function describeEntry(entry: DigestEntry): string {
  return `${entry.broadcast.senderName}: "${snippet(entry.broadcast.text)}" - ${entry.summary.text ?? 'no reactions'}`;
}

export function formatPauseDigest(entries: readonly DigestEntry[]): string {
  return ['📬 Reactions since the last message:', ...entries.map(entry => `• ${describeEntry(entry)}`)].join('\n');
}

export function formatDailyDigest(entries: readonly DigestEntry[]): string {
  return [
    "🌙 Today's most-reacted messages:",
    ...entries.map((entry, index) => `${index + 1}. ${describeEntry(entry)}`),
  ].join('\n');
}
