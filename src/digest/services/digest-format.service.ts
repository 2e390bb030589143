import { Injectable } from '@nestjs/common';
import {
  DIGEST_TIMEZONE,
  DIGEST_TIMEZONE_LABEL,
  DIGEST_TITLE,
  MINI_DIGEST_TITLE,
  MOBILE_TITLE_LIMIT,
  NO_ACTIVITY_MESSAGE,
  OUTLIER_TITLE_LIMIT,
  SUMMARY_LIMIT,
} from '../config/digest.constants';
import {
  ACTION_TYPE_METRIC,
  BILL_ACTION_LABELS,
  BUNDLE_LINK_LABEL,
  DEFAULT_INDUSTRY,
  LINK_LABELS,
  SIGNAL_TYPE_LABELS,
  SURGE_DELTA_METRIC,
  SURGE_METRIC,
} from '../config/signal-rules';
import { Signal, Urgency } from '../types/signal.types';
import {
  daysUntil,
  formatZonedDate,
  formatZonedTime,
} from '../utils/date.util';
import {
  isBundle,
  isWatchlistHit,
  readNumberMetric,
  readTextMetric,
} from '../utils/signal.util';
import {
  chatLink,
  formatIssueCodes,
  formatTitleForMobile,
  titleCase,
  truncateAtWord,
} from '../utils/text.util';

const URGENCY_LABELS: Readonly<Record<Urgency, string>> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

const MULTI_INDUSTRY_MIN_CODES = 3;

/** Renders digest text. Every method is pure given `now`. */
@Injectable()
export class DigestFormatService {
  header(signals: readonly Signal[], now: Date, hoursBack: number): string {
    let bills = 0;
    let federalRegister = 0;
    let dockets = 0;
    let watchlistHits = 0;

    for (const signal of signals) {
      const weight = isBundle(signal) ? signal.metrics.bundledCount : 1;
      if (signal.source === 'congress') {
        bills += weight;
      } else if (signal.source === 'federal_register') {
        federalRegister += weight;
      } else if (signal.source === 'regulations_gov') {
        dockets += weight;
      }
      if (isWatchlistHit(signal)) {
        watchlistHits += 1;
      }
    }

    const date = formatZonedDate(now, DIGEST_TIMEZONE);
    return (
      `🔍 **${DIGEST_TITLE}** (${date}) · ${hoursBack}h\n` +
      `Mini-stats: Bills ${bills} · FR ${federalRegister} · Dockets ${dockets} · Watchlist hits ${watchlistHits}`
    );
  }

  footer(overflow: number, now: Date): string {
    const updated = `Updated ${this.clock(now)}`;
    return overflow > 0 ? `+${overflow} more in thread · ${updated}` : updated;
  }

  emptyDigest(header: string, now: Date): string {
    return `${header}\n\n${NO_ACTIVITY_MESSAGE}\n\n${this.footer(0, now)}`;
  }

  sectionHeader(title: string, count: number): string {
    return `\n${title} (${count}):`;
  }

  watchlistLine(signal: Signal): string {
    const details: string[] = [];
    if (signal.summary) {
      details.push(truncateAtWord(signal.summary, SUMMARY_LIMIT));
    }
    details.push(`Matches: ${signal.watchlistMatches.join(', ')}`);
    details.push(`Issues: ${formatIssueCodes(signal.issueCodes)}`);
    return (
      `${this.lead(signal)}${this.title(signal)} • ${this.urgency(signal)}` +
      `\n  ${details.join(' • ')}${this.link(signal)}`
    );
  }

  whatChangedLine(signal: Signal): string {
    const prefix = signal.signalType
      ? SIGNAL_TYPE_LABELS[signal.signalType]
      : SIGNAL_TYPE_LABELS.notice;
    return (
      `${this.lead(signal)}${prefix} — ${this.title(signal)} • ${this.urgency(signal)}` +
      this.issuesLine(signal)
    );
  }

  industryLine(signal: Signal): string {
    return (
      `${this.lead(signal)}${this.title(signal)} • ${this.urgency(signal)}` +
      this.issuesLine(signal)
    );
  }

  deadlineLine(signal: Signal, now: Date): string {
    return (
      `${this.lead(signal)}${this.title(signal)} • Deadline: ${this.deadlineLabel(signal, now)}` +
      this.issuesLine(signal)
    );
  }

  docketSurgeLine(signal: Signal, now: Date): string {
    const pct = readNumberMetric(signal, SURGE_METRIC) ?? 0;
    const delta = readNumberMetric(signal, SURGE_DELTA_METRIC) ?? 0;
    const deadline = signal.deadline
      ? `Deadline in ${daysUntil(signal.deadline, now)}d`
      : 'No deadline';
    return (
      `${this.lead(signal)}Docket Surge — ${this.title(signal)} • ${this.urgency(signal)}` +
      `\n  +${Math.round(pct)}% / +${Math.round(delta)} (24h) • ${deadline}` +
      ` • Issues: ${formatIssueCodes(signal.issueCodes)}${this.link(signal)}`
    );
  }

  billActionLine(signal: Signal): string {
    const action = readTextMetric(signal, ACTION_TYPE_METRIC);
    const label = action
      ? BILL_ACTION_LABELS[action.toLowerCase()] ?? titleCase(action)
      : 'Action';
    return (
      `${this.lead(signal)}Bill Action — ${this.title(signal)} • ${this.urgency(signal)}` +
      `\n  Last action: ${label} • Issues: ${formatIssueCodes(signal.issueCodes)}${this.link(signal)}`
    );
  }

  bundleLine(signal: Signal): string {
    return `${this.lead(signal)}${signal.title} — ${signal.summary}${this.link(signal)}`;
  }

  outlierLine(signal: Signal, surgeMinPct: number): string {
    const surge = readNumberMetric(signal, SURGE_METRIC);
    let reason = 'High Impact';
    if (surge != null && surge >= surgeMinPct) {
      reason = `Comment Surge (${Math.round(surge)}%)`;
    } else if (signal.issueCodes.length >= MULTI_INDUSTRY_MIN_CODES) {
      reason = `Multi-Industry Impact (${signal.issueCodes.length} codes)`;
    }
    return `• ${reason} — ${truncateAtWord(signal.title, OUTLIER_TITLE_LIMIT)}${this.link(signal)}`;
  }

  miniHeader(
    now: Date,
    total: number,
    highPriority: number,
    hoursBack: number,
  ): string {
    return (
      `⚡ **${MINI_DIGEST_TITLE}** — ${this.clock(now)}\n` +
      `_${total} signals in last ${hoursBack}h, ${highPriority} high-priority_`
    );
  }

  miniLine(signal: Signal): string {
    return `${this.lead(signal)}${this.title(signal)} • ${this.urgency(signal)}${this.link(signal)}`;
  }

  deadlineLabel(signal: Signal, now: Date): string {
    if (!signal.deadline) {
      return 'Unknown';
    }
    const days = daysUntil(signal.deadline, now);
    if (days === 0) {
      return 'Today';
    }
    return days === 1 ? 'Tomorrow' : `${days}d`;
  }

  private lead(signal: Signal): string {
    return `• [${signal.industryTag ?? DEFAULT_INDUSTRY}] `;
  }

  private title(signal: Signal): string {
    return formatTitleForMobile(signal.title, MOBILE_TITLE_LIMIT);
  }

  private urgency(signal: Signal): string {
    return URGENCY_LABELS[signal.urgency ?? 'low'];
  }

  private issuesLine(signal: Signal): string {
    return `\n  Issues: ${formatIssueCodes(signal.issueCodes)}${this.link(signal)}`;
  }

  private link(signal: Signal): string {
    const label = isBundle(signal)
      ? BUNDLE_LINK_LABEL
      : LINK_LABELS[signal.source];
    const link = chatLink(signal.link, label);
    return link ? ` • ${link}` : '';
  }

  private clock(now: Date): string {
    return `${formatZonedTime(now, DIGEST_TIMEZONE)} ${DIGEST_TIMEZONE_LABEL}`;
  }
}
