import { Broadcast } from './broadcast';

export interface Reaction {
  id: string;
  broadcastId: string;
  reactorAddress: string;
  reactorName: string;
  emoji: string;
  previousEmoji: string | null;
  isActive: boolean;
  processed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type ReactionWithBroadcast = Reaction & { broadcast: Broadcast };

export type ReactionAction = 'added' | 'removed' | 'changed';

export enum ReactionPatternKind {
  TAPBACK = 'tapback',
  REACTED_TO = 'reacted-to',
  BARE_EMOJI = 'bare-emoji',
  EMOJI_TO = 'emoji-to',
}

export interface DetectedReaction {
  emoji: string;
  targetFragment: string;
  kind: ReactionPatternKind;
  rawPattern: string;
}
