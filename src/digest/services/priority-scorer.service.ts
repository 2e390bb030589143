import { Injectable } from '@nestjs/common';
import {
  ACTION_TYPE_METRIC,
  BASE_PRIORITY,
  DEADLINE_BONUS,
  DEADLINE_BONUS_DAYS,
  ESCALATED_BILL_ACTIONS,
  ESCALATED_BILL_BASE,
  SCORE_MAX,
  SCORE_MIN,
  STALE_AFTER_DAYS,
  STALE_PENALTY,
  SURGE_BONUS_CAP,
  SURGE_METRIC,
  URGENCY_BONUS,
  WATCHLIST_BONUS,
} from '../config/signal-rules';
import { BUNDLE_PRIORITY_SCORE } from '../config/digest.constants';
import { ScoreBreakdown, Signal } from '../types/signal.types';
import { daysSince, daysUntil } from '../utils/date.util';
import {
  isBundle,
  isWatchlistHit,
  readNumberMetric,
  readTextMetric,
} from '../utils/signal.util';

@Injectable()
export class PriorityScorerService {
  /** Additive score in [0, 10], two decimals. Bundles keep a fixed score. */
  score(signal: Signal, now: Date = new Date()): number {
    if (isBundle(signal)) {
      return BUNDLE_PRIORITY_SCORE;
    }
    return this.breakdown(signal, now).total;
  }

  breakdown(signal: Signal, now: Date = new Date()): ScoreBreakdown {
    const base = this.baseScore(signal);
    const urgencyBonus = signal.urgency ? URGENCY_BONUS[signal.urgency] : 0;
    const surgeBonus = this.surgeBonus(readNumberMetric(signal, SURGE_METRIC));
    const deadlineBonus =
      signal.deadline && daysUntil(signal.deadline, now) <= DEADLINE_BONUS_DAYS
        ? DEADLINE_BONUS
        : 0;
    const watchlistBonus = isWatchlistHit(signal) ? WATCHLIST_BONUS : 0;
    const stalePenalty =
      daysSince(signal.timestamp, now) > STALE_AFTER_DAYS ? STALE_PENALTY : 0;

    const raw =
      base +
      urgencyBonus +
      surgeBonus +
      deadlineBonus +
      watchlistBonus +
      stalePenalty;
    const clamped = Math.max(SCORE_MIN, Math.min(SCORE_MAX, raw));

    return {
      base,
      urgencyBonus,
      surgeBonus,
      deadlineBonus,
      watchlistBonus,
      stalePenalty,
      total: Number(clamped.toFixed(2)),
    };
  }

  surgeBonus(deltaPct: number | null): number {
    if (deltaPct == null || deltaPct <= 0) {
      return 0;
    }
    return Math.min(SURGE_BONUS_CAP, Math.sqrt(deltaPct / 100));
  }

  private baseScore(signal: Signal): number {
    if (!signal.signalType) {
      return BASE_PRIORITY.notice;
    }
    if (signal.signalType === 'bill') {
      const actionType = (
        readTextMetric(signal, ACTION_TYPE_METRIC) ?? ''
      ).toLowerCase();
      if (ESCALATED_BILL_ACTIONS.has(actionType)) {
        return ESCALATED_BILL_BASE;
      }
    }
    return BASE_PRIORITY[signal.signalType];
  }
}
