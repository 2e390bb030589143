import { Injectable } from '@nestjs/common';
import {
  ACTION_TYPE_METRIC,
  COMMENT_COUNT_METRIC,
  COMMITTEE_REFERRAL_ACTION,
  ESCALATED_BILL_ACTIONS,
  SURGE_METRIC,
  URGENCY_WINDOWS,
} from '../config/signal-rules';
import { Signal, SignalType, Urgency } from '../types/signal.types';
import { daysUntil } from '../utils/date.util';
import { readNumberMetric, readTextMetric } from '../utils/signal.util';

const FINAL_RULE_TYPES: ReadonlySet<SignalType> = new Set([
  'final_rule',
  'interim_final_rule',
]);
const EVENT_TYPES: ReadonlySet<SignalType> = new Set(['hearing', 'markup']);

type TierPredicate = (signal: Signal, days: number | null) => boolean;

@Injectable()
export class UrgencyResolverService {
  private readonly tiers: readonly {
    urgency: Exclude<Urgency, 'low'>;
    predicates: readonly TierPredicate[];
  }[] = [
    {
      urgency: 'critical',
      predicates: [
        (signal, days) =>
          this.isType(signal, FINAL_RULE_TYPES) &&
          days != null &&
          days <= URGENCY_WINDOWS.finalRuleCriticalDays,
      ],
    },
    {
      urgency: 'high',
      predicates: [
        (signal, days) =>
          signal.signalType === 'proposed_rule' &&
          days != null &&
          days <= URGENCY_WINDOWS.proposedRuleHighDays,
        (signal, days) =>
          this.isType(signal, EVENT_TYPES) &&
          days != null &&
          days <= URGENCY_WINDOWS.eventHighDays,
        (signal) =>
          signal.signalType === 'bill' &&
          ESCALATED_BILL_ACTIONS.has(this.actionType(signal)),
        (signal, days) =>
          signal.signalType === 'docket' &&
          days != null &&
          days <= URGENCY_WINDOWS.docketHighDays,
        (signal) =>
          signal.signalType === 'docket' &&
          (readNumberMetric(signal, SURGE_METRIC) ?? 0) >=
            URGENCY_WINDOWS.docketSurgeHighPct,
      ],
    },
    {
      urgency: 'medium',
      predicates: [
        (signal, days) =>
          this.isType(signal, EVENT_TYPES) &&
          days != null &&
          days > URGENCY_WINDOWS.eventHighDays &&
          days <= URGENCY_WINDOWS.eventMediumDays,
        (signal) =>
          signal.signalType === 'docket' &&
          (readNumberMetric(signal, COMMENT_COUNT_METRIC) ?? 0) > 0,
        (signal) =>
          signal.signalType === 'bill' &&
          this.actionType(signal) === COMMITTEE_REFERRAL_ACTION,
      ],
    },
  ];

  /**
   * First tier with any matching predicate wins; `low` when none match.
   * Expects `signalType` to be set already.
   */
  resolve(signal: Signal, now: Date = new Date()): Urgency {
    const days = signal.deadline ? daysUntil(signal.deadline, now) : null;

    for (const tier of this.tiers) {
      if (tier.predicates.some((predicate) => predicate(signal, days))) {
        return tier.urgency;
      }
    }
    return 'low';
  }

  private isType(signal: Signal, types: ReadonlySet<SignalType>): boolean {
    return signal.signalType != null && types.has(signal.signalType);
  }

  private actionType(signal: Signal): string {
    return (readTextMetric(signal, ACTION_TYPE_METRIC) ?? '').toLowerCase();
  }
}
