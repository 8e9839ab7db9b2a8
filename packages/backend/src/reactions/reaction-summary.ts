import { plural } from '../common/utils/text';

export interface EmojiCount {
  emoji: string;
  count: number;
}

export interface ReactionSummary {
  total: number;
  counts: EmojiCount[];
  /** `null` when there are no active reactions. */
  text: string | null;
}

/** Groups emoji by count, highest first, ties ordered by the emoji itself. */
export function countEmoji(emojis: readonly string[]): EmojiCount[] {
  const counts = new Map<string, number>();
  for (const emoji of emojis) {
    counts.set(emoji, (counts.get(emoji) ?? 0) + 1);
  }

  return Array.from(counts, ([emoji, count]) => ({ emoji, count })).sort(
    (a, b) => b.count - a.count || (a.emoji < b.emoji ? -1 : a.emoji > b.emoji ? 1 : 0),
  );
}

export function renderCounts(counts: readonly EmojiCount[]): string {
  return counts.map(({ emoji, count }) => (count === 1 ? emoji : `${emoji}×${count}`)).join(' ');
}

/** `3 reactions: ❤️×2 👍` */
export function summarizeReactions(emojis: readonly string[]): ReactionSummary {
  const counts = countEmoji(emojis);
  const total = emojis.length;
  return {
    total,
    counts,
    text: total === 0 ? null : `${total} ${plural(total, 'reaction')}: ${renderCounts(counts)}`,
  };
}
