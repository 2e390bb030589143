import { Injectable } from '@nestjs/common';
import {
  DEFAULT_DIGEST_BUDGET,
  DEFAULT_DIGEST_THRESHOLDS,
  DEFAULT_HOURS_BACK,
  MINI_DIGEST_HOURS_BACK,
  MINI_DIGEST_MAX_ITEMS,
  OUTLIER_SECTION_TITLE,
  SECTION_ORDER,
  SECTION_TITLES,
} from '../config/digest.constants';
import { DEFAULT_INDUSTRY, SURGE_METRIC } from '../config/signal-rules';
import {
  ComposeOptions,
  DigestBudget,
  DigestReport,
  DigestSection,
  DigestSectionKey,
  DigestThresholds,
  IndustryTag,
  Signal,
} from '../types/signal.types';
import { DAY_MS, daysUntil } from '../utils/date.util';
import {
  isBundle,
  isWatchlistHit,
  readNumberMetric,
} from '../utils/signal.util';
import { DigestFormatService } from './digest-format.service';
import { SignalDedupeService } from './signal-dedupe.service';

interface SectionPlan {
  key: DigestSectionKey;
  candidates: Signal[];
  render: (signal: Signal) => string;
}

const byScoreDesc = (a: Signal, b: Signal): number =>
  b.priorityScore - a.priorityScore;

@Injectable()
export class DigestComposerService {
  constructor(
    private readonly format: DigestFormatService,
    private readonly dedupe: SignalDedupeService,
  ) {}

  compose(signals: readonly Signal[], options: ComposeOptions = {}): string {
    return this.buildReport(signals, options).text;
  }

  /**
   * Fills sections in order within the item budget, each signal at most once,
   * then picks the outlier from whatever was left out.
   */
  buildReport(
    signals: readonly Signal[],
    options: ComposeOptions = {},
  ): DigestReport {
    const now = options.now ?? new Date();
    const hoursBack = options.hoursBack ?? DEFAULT_HOURS_BACK;
    const budget = this.resolveBudget(options);
    const thresholds = this.resolveThresholds(options);
    const includeOutlier = options.includeOutlier ?? true;
    const header = this.format.header(signals, now, hoursBack);

    const plans = this.planSections(signals, thresholds, now);
    const eligible = new Set<Signal>();
    for (const plan of plans) {
      plan.candidates.forEach((signal) => eligible.add(signal));
    }

    const reserved = includeOutlier && budget.totalItems > 0 ? 1 : 0;
    let remaining = budget.totalItems - reserved;
    const emitted = new Set<Signal>();
    const sections: DigestSection[] = [];

    for (const plan of plans) {
      const cap = Math.min(budget.sectionCaps[plan.key], remaining);
      const picked: Signal[] = [];
      for (const signal of plan.candidates) {
        if (picked.length >= cap) {
          break;
        }
        if (!emitted.has(signal)) {
          picked.push(signal);
          emitted.add(signal);
        }
      }
      remaining -= picked.length;
      if (picked.length > 0) {
        sections.push({
          key: plan.key,
          title: SECTION_TITLES[plan.key],
          lines: picked.map(plan.render),
          cap,
          countsOverflow: true,
        });
      }
    }

    const outlier = reserved > 0 ? this.pickOutlier(signals, emitted) : null;
    if (outlier) {
      eligible.add(outlier);
      emitted.add(outlier);
      sections.push({
        key: 'outlier',
        title: OUTLIER_SECTION_TITLE,
        lines: [
          this.format.outlierLine(outlier, thresholds.docketSurgeMinPct),
        ],
        cap: reserved,
        countsOverflow: false,
      });
    }

    if (eligible.size === 0) {
      return {
        text: this.format.emptyDigest(header, now),
        sections: [],
        outlier: null,
        eligibleCount: 0,
        emittedCount: 0,
        overflowCount: 0,
      };
    }

    const overflow = eligible.size - emitted.size;
    const lines = [header];
    for (const section of sections) {
      lines.push(
        this.format.sectionHeader(section.title, section.lines.length),
        ...section.lines,
      );
    }
    lines.push(`\n${this.format.footer(overflow, now)}`);

    return {
      text: lines.join('\n'),
      sections,
      outlier,
      eligibleCount: eligible.size,
      emittedCount: emitted.size,
      overflowCount: overflow,
    };
  }

  /**
   * Short alert for the afternoon run, or null when nothing crosses the
   * volume, watchlist, score or surge thresholds.
   */
  composeMini(
    signals: readonly Signal[],
    options: ComposeOptions = {},
  ): string | null {
    const now = options.now ?? new Date();
    const thresholds = this.resolveThresholds(options);
    const items = signals.filter((signal) => !isBundle(signal));

    const highPriority = items
      .filter((signal) => signal.priorityScore >= thresholds.miniDigestMinScore)
      .sort(byScoreDesc);
    const shouldSend =
      items.length >= thresholds.miniDigestMinSignals ||
      items.some(isWatchlistHit) ||
      highPriority.length > 0 ||
      items.some((signal) => this.isDocketSurge(signal, thresholds));
    if (!shouldSend) {
      return null;
    }

    const lines = [
      this.format.miniHeader(
        now,
        items.length,
        highPriority.length,
        options.hoursBack ?? MINI_DIGEST_HOURS_BACK,
      ),
      ...highPriority
        .slice(0, MINI_DIGEST_MAX_ITEMS)
        .map((signal) => this.format.miniLine(signal)),
    ];
    return lines.join('\n');
  }

  private planSections(
    signals: readonly Signal[],
    thresholds: DigestThresholds,
    now: Date,
  ): SectionPlan[] {
    const items = signals.filter((signal) => !isBundle(signal));

    const candidates: Record<DigestSectionKey, Signal[]> = {
      watchlist: items.filter(isWatchlistHit).sort(byScoreDesc),
      whatChanged: items
        .filter(
          (signal) => signal.priorityScore >= thresholds.whatChangedMinScore,
        )
        .sort(byScoreDesc),
      industry: this.topPerIndustry(items, thresholds.perIndustryLimit),
      deadlines: this.upcomingDeadlines(
        items,
        thresholds.deadlineWindowDays,
        now,
      ),
      docketSurges: items
        .filter((signal) => this.isDocketSurge(signal, thresholds))
        .sort((a, b) => this.surgeOf(b) - this.surgeOf(a)),
      billActions: this.latestBillActions(items),
      bundles: signals.filter(isBundle).sort(byScoreDesc),
    };

    const renderers: Record<DigestSectionKey, (signal: Signal) => string> = {
      watchlist: (signal) => this.format.watchlistLine(signal),
      whatChanged: (signal) => this.format.whatChangedLine(signal),
      industry: (signal) => this.format.industryLine(signal),
      deadlines: (signal) => this.format.deadlineLine(signal, now),
      docketSurges: (signal) => this.format.docketSurgeLine(signal, now),
      billActions: (signal) => this.format.billActionLine(signal),
      bundles: (signal) => this.format.bundleLine(signal),
    };

    return SECTION_ORDER.map((key) => ({
      key,
      candidates: candidates[key],
      render: renderers[key],
    }));
  }

  /** Top `limit` per industry; industries ordered by their best score. */
  private topPerIndustry(items: readonly Signal[], limit: number): Signal[] {
    const groups = new Map<IndustryTag, Signal[]>();
    for (const signal of [...items].sort(byScoreDesc)) {
      const industry = signal.industryTag ?? DEFAULT_INDUSTRY;
      const group = groups.get(industry) ?? [];
      if (group.length < limit) {
        group.push(signal);
      }
      groups.set(industry, group);
    }
    return Array.from(groups.values())
      .filter((group) => group.length > 0)
      .flat();
  }

  private upcomingDeadlines(
    items: readonly Signal[],
    windowDays: number,
    now: Date,
  ): Signal[] {
    const withDays: { signal: Signal; days: number }[] = [];
    for (const signal of items) {
      if (!signal.deadline) {
        continue;
      }
      const remainingMs = signal.deadline.getTime() - now.getTime();
      if (remainingMs >= 0 && remainingMs <= windowDays * DAY_MS) {
        withDays.push({ signal, days: daysUntil(signal.deadline, now) });
      }
    }
    return withDays
      .sort((a, b) => a.days - b.days || byScoreDesc(a.signal, b.signal))
      .map((entry) => entry.signal);
  }

  private latestBillActions(items: readonly Signal[]): Signal[] {
    const latest: Signal[] = [];
    for (const group of this.dedupe.groupByBill(items).values()) {
      const pick = this.dedupe.pickLatest(group);
      if (pick) {
        latest.push(pick);
      }
    }
    return latest.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  private pickOutlier(
    signals: readonly Signal[],
    emitted: ReadonlySet<Signal>,
  ): Signal | null {
    let best: Signal | null = null;
    for (const signal of signals) {
      if (isBundle(signal) || emitted.has(signal)) {
        continue;
      }
      if (!best || signal.priorityScore > best.priorityScore) {
        best = signal;
      }
    }
    return best;
  }

  private isDocketSurge(signal: Signal, thresholds: DigestThresholds): boolean {
    return (
      signal.signalType === 'docket' &&
      this.surgeOf(signal) >= thresholds.docketSurgeMinPct
    );
  }

  private surgeOf(signal: Signal): number {
    return readNumberMetric(signal, SURGE_METRIC) ?? 0;
  }

  private resolveBudget(options: ComposeOptions): DigestBudget {
    const caps = { ...DEFAULT_DIGEST_BUDGET.sectionCaps };
    for (const key of SECTION_ORDER) {
      const override = options.budget?.sectionCaps?.[key];
      if (override != null) {
        caps[key] = this.toCount(override);
      }
    }
    const total = options.budget?.totalItems;
    return {
      totalItems:
        total != null ? this.toCount(total) : DEFAULT_DIGEST_BUDGET.totalItems,
      sectionCaps: caps,
    };
  }

  private resolveThresholds(options: ComposeOptions): DigestThresholds {
    return { ...DEFAULT_DIGEST_THRESHOLDS, ...options.thresholds };
  }

  private toCount(value: number): number {
    return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
  }
}
