import { ReactionAction } from '@rollcall/common';

export const UPDATE_EVERY_N_REACTIONS = 3;
export const STALE_UPDATE_MINUTES = 5;

export interface UpdateTimingInput {
  totalActive: number;
  action: ReactionAction;
  minutesSinceLastUpdate: number;
  /** Reaction rows changed since the last sent update, the current one included. */
  changesSinceLastUpdate: number;
}

export type UpdateReason = 'first-reaction' | 'removed' | 'milestone' | 'stale';

export interface UpdateDecision {
  send: boolean;
  reason: UpdateReason | null;
}

/**
 * Decides whether a changed reaction count is re-broadcast now or only
 * recorded. Most reactions are recorded silently; the digests pick them up.
 */
export function decideUpdate(input: UpdateTimingInput): UpdateDecision {
  if (input.totalActive === 1) {
    return { send: true, reason: 'first-reaction' };
  }
  if (input.action === 'removed') {
    return { send: true, reason: 'removed' };
  }
  if (input.totalActive % UPDATE_EVERY_N_REACTIONS === 0) {
    return { send: true, reason: 'milestone' };
  }
  if (input.minutesSinceLastUpdate > STALE_UPDATE_MINUTES && input.changesSinceLastUpdate >= 1) {
    return { send: true, reason: 'stale' };
  }
  return { send: false, reason: null };
}
