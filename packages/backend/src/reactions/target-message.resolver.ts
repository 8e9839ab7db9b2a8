import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Broadcast } from '@rollcall/common';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';

export const MAX_CANDIDATES = 10;
export const MATCH_THRESHOLD = 0.3;
export const SUBSTRING_BONUS = 0.5;

export interface ResolvedTarget {
  broadcast: Broadcast;
  score: number;
  /** `fallback` means nothing cleared the threshold and the newest candidate was used. */
  matchedBy: 'similarity' | 'fallback';
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Shared-word ratio of `fragment` against `text`, plus a bonus when the
 * fragment appears verbatim (ignoring case) inside the text.
 */
export function scoreCandidate(fragment: string, text: string): number {
  const fragmentWords = words(fragment);
  const messageWords = words(text);
  const denominator = Math.max(fragmentWords.size, messageWords.size);

  let common = 0;
  for (const word of fragmentWords) {
    if (messageWords.has(word)) {
      common++;
    }
  }

  const overlap = denominator === 0 ? 0 : common / denominator;
  const bonus = text.toLowerCase().includes(fragment.toLowerCase()) ? SUBSTRING_BONUS : 0;
  return overlap + bonus;
}

@Injectable()
export class TargetMessageResolver {
  private readonly logger = new Logger(TargetMessageResolver.name);
  private readonly defaultLookbackHours: number;

  constructor(
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
    private readonly configService: ConfigService,
  ) {
    this.defaultLookbackHours = Number(this.configService.get('REACTION_LOOKBACK_HOURS', 24));
  }

  /**
   * Picks the broadcast a reaction most likely points at. Returns `null` only
   * when the window holds no broadcast from anyone but the reactor.
   */
  async resolve(
    fragment: string,
    reactorAddress: string,
    lookbackHours: number = this.defaultLookbackHours,
    now: Date = new Date(),
  ): Promise<ResolvedTarget | null> {
    const since = new Date(now.getTime() - lookbackHours * 60 * 60 * 1000);
    const candidates = (await this.ledger.recentBroadcasts(since, reactorAddress, MAX_CANDIDATES))
      .slice()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    if (candidates.length === 0) {
      this.logger.warn(`No reaction target for ${reactorAddress} in the last ${lookbackHours}h`);
      return null;
    }

    const newest = candidates[0];
    if (!fragment.trim()) {
      return { broadcast: newest, score: 0, matchedBy: 'fallback' };
    }

    let best: ResolvedTarget | null = null;
    for (const candidate of candidates) {
      const score = scoreCandidate(fragment, candidate.text);
      // Candidates are newest first, so a strict comparison keeps the newest on ties
      if (score > MATCH_THRESHOLD && (!best || score > best.score)) {
        best = { broadcast: candidate, score, matchedBy: 'similarity' };
      }
    }

    if (best) {
      this.logger.debug(`Reaction fragment matched ${best.broadcast.id} (score ${best.score.toFixed(2)})`);
      return best;
    }

    this.logger.log(`Low-confidence reaction from ${reactorAddress}; attaching to newest broadcast ${newest.id}`);
    return { broadcast: newest, score: scoreCandidate(fragment, newest.text), matchedBy: 'fallback' };
  }
}
