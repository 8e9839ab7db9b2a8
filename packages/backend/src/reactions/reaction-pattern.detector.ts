import { DetectedReaction, ReactionPatternKind } from '@rollcall/common';

export const MAX_TARGET_FRAGMENT_LENGTH = 100;

/** Tapback verbs as phones render them, mapped to the emoji they stand for. */
export const TAPBACK_EMOJI: Readonly<Record<string, string>> = {
  'loved': '❤️',
  'liked': '👍',
  'disliked': '👎',
  'laughed at': '😂',
  'emphasized': '‼️',
  'questioned': '❓',
};

// One emoji: a keycap, a flag (letter pair or tag sequence), or a pictograph
// with optional skin tone and ZWJ-joined parts. Pictographs that render as
// text by default (©, ™, ❤) need the U+FE0F selector or a skin tone.
const KEYCAP = String.raw`[0-9#*]\uFE0F?\u20E3`;
const FLAG = String.raw`\p{Regional_Indicator}{2}|\u{1F3F4}[\u{E0020}-\u{E007E}]+\u{E007F}`;
const PICTOGRAPH = String.raw`(?:\p{Emoji_Presentation}\uFE0F?\p{Emoji_Modifier}?|\p{Extended_Pictographic}(?:\uFE0F|\p{Emoji_Modifier}))`;
const JOINED = String.raw`\u200D\p{Extended_Pictographic}\uFE0F?\p{Emoji_Modifier}?`;
const EMOJI_UNIT = `(?:${KEYCAP}|${FLAG}|${PICTOGRAPH}(?:${JOINED})*)`;
const QUOTE = `["'“”‘’]`;

const TAPBACK_PATTERN = new RegExp(
  String.raw`^(loved|liked|disliked|laughed at|emphasized|questioned)\s+${QUOTE}(.+)${QUOTE}$`,
  'isu',
);
const REACTED_TO_PATTERN = new RegExp(String.raw`^reacted\s+(.+?)\s+to\s+${QUOTE}(.+)${QUOTE}$`, 'isu');
const BARE_EMOJI_PATTERN = new RegExp(String.raw`^(?:${EMOJI_UNIT}\s*)+$`, 'u');
const EMOJI_TO_PATTERN = new RegExp(String.raw`^(\S+)\s+to\s+${QUOTE}(.+)${QUOTE}$`, 'isu');
const FIRST_EMOJI = new RegExp(EMOJI_UNIT, 'u');

/**
 * Recognizes reaction phrases. Returns `null` for anything else, which the
 * caller treats as a new broadcast. Forms are tried in order:
 *
 * 1. `Loved "…"` and the other tapback verbs
 * 2. `Reacted 😂 to "…"`
 * 3. a message made only of emoji (empty fragment)
 * 4. `😂 to "…"`
 */
export function detectReaction(text: string): DetectedReaction | null {
  const input = text.trim();
  if (!input) {
    return null;
  }

  const tapback = TAPBACK_PATTERN.exec(input);
  if (tapback) {
    const verb = tapback[1].toLowerCase().replace(/\s+/g, ' ');
    return {
      emoji: TAPBACK_EMOJI[verb],
      targetFragment: toFragment(tapback[2]),
      kind: ReactionPatternKind.TAPBACK,
      rawPattern: tapback[1],
    };
  }

  const reactedTo = REACTED_TO_PATTERN.exec(input);
  if (reactedTo) {
    const emoji = emojiForToken(reactedTo[1]);
    if (emoji) {
      return {
        emoji,
        targetFragment: toFragment(reactedTo[2]),
        kind: ReactionPatternKind.REACTED_TO,
        rawPattern: reactedTo[1],
      };
    }
  }

  if (BARE_EMOJI_PATTERN.test(input)) {
    const emoji = firstEmoji(input);
    if (emoji) {
      return {
        emoji,
        targetFragment: '',
        kind: ReactionPatternKind.BARE_EMOJI,
        rawPattern: input,
      };
    }
  }

  const emojiTo = EMOJI_TO_PATTERN.exec(input);
  if (emojiTo && BARE_EMOJI_PATTERN.test(emojiTo[1])) {
    const emoji = firstEmoji(emojiTo[1]);
    if (emoji) {
      return {
        emoji,
        targetFragment: toFragment(emojiTo[2]),
        kind: ReactionPatternKind.EMOJI_TO,
        rawPattern: emojiTo[1],
      };
    }
  }

  return null;
}

function emojiForToken(token: string): string | null {
  return firstEmoji(token) ?? TAPBACK_EMOJI[token.trim().toLowerCase()] ?? null;
}

function firstEmoji(text: string): string | null {
  const match = FIRST_EMOJI.exec(text);
  return match ? match[0] : null;
}

function toFragment(quoted: string): string {
  return Array.from(quoted.trim()).slice(0, MAX_TARGET_FRAGMENT_LENGTH).join('');
}
