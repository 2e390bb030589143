import { Injectable } from '@nestjs/common';
import { Signal } from '../types/signal.types';

@Injectable()
export class SignalDedupeService {
  /**
   * One signal per stableId: the highest priority wins, the first seen wins
   * a tie, and survivors keep the order their id first appeared in.
   */
  deduplicate(signals: readonly Signal[]): Signal[] {
    const best = new Map<string, Signal>();

    for (const signal of signals) {
      const current = best.get(signal.stableId);
      if (!current || signal.priorityScore > current.priorityScore) {
        best.set(signal.stableId, signal);
      }
    }

    return Array.from(best.values());
  }

  groupByBill(signals: readonly Signal[]): Map<string, Signal[]> {
    return this.groupBy(signals, (signal) => signal.billId);
  }

  groupByDocket(signals: readonly Signal[]): Map<string, Signal[]> {
    return this.groupBy(signals, (signal) => this.docketKeyOf(signal));
  }

  /**
   * Docket id when present, else the source id up to its last "-"
   * ("EPA-HQ-OAR-2026-0001-0042" groups under "EPA-HQ-OAR-2026-0001").
   */
  docketKeyOf(signal: Signal): string | null {
    if (signal.docketId) {
      return signal.docketId;
    }
    if (signal.signalType !== 'docket') {
      return null;
    }
    const cut = signal.sourceId.lastIndexOf('-');
    return cut > 0 ? signal.sourceId.slice(0, cut) : signal.sourceId;
  }

  /** Newest timestamp; ties go to the higher score, then the earlier one. */
  pickLatest(signals: readonly Signal[]): Signal | null {
    let latest: Signal | null = null;
    for (const signal of signals) {
      if (!latest) {
        latest = signal;
        continue;
      }
      const diff = signal.timestamp.getTime() - latest.timestamp.getTime();
      if (
        diff > 0 ||
        (diff === 0 && signal.priorityScore > latest.priorityScore)
      ) {
        latest = signal;
      }
    }
    return latest;
  }

  private groupBy(
    signals: readonly Signal[],
    keyOf: (signal: Signal) => string | null,
  ): Map<string, Signal[]> {
    const groups = new Map<string, Signal[]>();
    for (const signal of signals) {
      const key = keyOf(signal);
      if (!key) {
        continue;
      }
      const group = groups.get(key);
      if (group) {
        group.push(signal);
      } else {
        groups.set(key, [signal]);
      }
    }
    return groups;
  }
}
