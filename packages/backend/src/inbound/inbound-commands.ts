import { Broadcast } from '@rollcall/common';
import { plural, truncate } from '../common/utils/text';

export type InboundCommand =
  | { type: 'help' }
  | { type: 'stats' }
  | { type: 'recent' }
  | { type: 'add'; address: string; name: string };

export const RECENT_LIMIT = 5;
const RECENT_SNIPPET_LENGTH = 50;

const ADD_PATTERN = /^add\s+(\+?[\d().-]+)\s+(.+)$/is;

/**
 * Matches whole-message commands. Admin-only commands from other members,
 * and anything unrecognized, return `null` and go on as ordinary messages.
 */
export function parseCommand(text: string, isAdmin: boolean): InboundCommand | null {
  const input = text.trim();
  const keyword = input.toUpperCase();

  if (keyword === 'HELP' || keyword === 'H' || keyword === '?') {
    return { type: 'help' };
  }
  if (keyword === 'STATS') {
    return { type: 'stats' };
  }
  if (!isAdmin) {
    return null;
  }
  if (keyword === 'RECENT') {
    return { type: 'recent' };
  }

  const add = ADD_PATTERN.exec(input);
  // "add milk to the list" is a message, not a roster change
  if (add && add[1].replace(/\D/g, '').length >= 10) {
    return { type: 'add', address: add[1], name: add[2].trim() };
  }
  return null;
}

export function helpText(isAdmin: boolean): string {
  const lines = [
    '📱 Group text help',
    'Text anything to send it to everyone.',
    'React with a tapback, an emoji, or 👍 to "part of the message".',
    'STATS - group activity',
    'HELP - this message',
  ];
  if (isAdmin) {
    lines.push('Admin: RECENT - last 5 messages', 'Admin: ADD <phone> <name> - add a member');
  }
  return lines.join('\n');
}

export function statsText(activeMembers: number, broadcastsThisWeek: number): string {
  return [
    '📊 Group stats',
    `👥 ${activeMembers} active ${plural(activeMembers, 'member')}`,
    `💬 ${broadcastsThisWeek} ${plural(broadcastsThisWeek, 'message')} in the last 7 days`,
  ].join('\n');
}

export function recentText(broadcasts: Broadcast[]): string {
  if (broadcasts.length === 0) {
    return '📜 No messages yet';
  }
  const lines = broadcasts.map((b, i) => {
    const at = b.createdAt.toISOString().slice(0, 16).replace('T', ' ');
    return `${i + 1}. ${b.senderName}: ${truncate(b.text, RECENT_SNIPPET_LENGTH)} (${at})`;
  });
  return ['📜 Recent messages', ...lines].join('\n');
}
