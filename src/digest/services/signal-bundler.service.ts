import { Injectable, Logger } from '@nestjs/common';
import {
  BUNDLE_MAX_MEMBER_SCORE,
  BUNDLE_MIN_CLUSTER_SIZE,
  BUNDLE_PRIORITY_SCORE,
} from '../config/digest.constants';
import {
  BUNDLE_RULES,
  BundleRule,
  DEFAULT_INDUSTRY,
  ESCALATION_KEYWORDS,
} from '../config/signal-rules';
import { BundleSignal, Signal } from '../types/signal.types';
import { buildStableId, isWatchlistHit } from '../utils/signal.util';
import { slugify } from '../utils/text.util';

const PATTERN_MIN_CLUSTER_SIZE = 2;
const GENERIC_RULE_KEY = 'generic';
const GENERIC_NOUN = 'notices';
const STEM_WORDS = 4;
const STEM_SEPARATOR_RE = /\s*(?::|;|\s-\s|\s—\s)/;

export interface BundleOptions {
  minClusterSize?: number;
}

interface Cluster {
  ruleKey: string;
  label: string;
  noun: string;
  landingUrl: string | null;
  industry: BundleSignal['industryTag'];
  minSize: number;
  members: Signal[];
}

@Injectable()
export class SignalBundlerService {
  private readonly logger = new Logger(SignalBundlerService.name);

  /**
   * Collapses routine notices into bundle items. A bundle takes the place of
   * its first member; everything not bundled keeps its position.
   */
  bundle(signals: readonly Signal[], options: BundleOptions = {}): Signal[] {
    const minClusterSize = Math.max(
      PATTERN_MIN_CLUSTER_SIZE,
      options.minClusterSize ?? BUNDLE_MIN_CLUSTER_SIZE,
    );
    const clusters = new Map<string, Cluster>();
    const clusterOf = new Map<Signal, string>();

    for (const signal of signals) {
      if (!this.isBundleCandidate(signal)) {
        continue;
      }
      const cluster = this.clusterFor(signal, minClusterSize);
      if (!cluster) {
        continue;
      }
      const key = `${cluster.ruleKey}|${this.clusterScope(signal, cluster)}`;
      const existing = clusters.get(key);
      if (existing) {
        existing.members.push(signal);
      } else {
        clusters.set(key, cluster);
      }
      clusterOf.set(signal, key);
    }

    const output: Signal[] = [];
    const placed = new Set<string>();
    for (const signal of signals) {
      const key = clusterOf.get(signal);
      const cluster = key ? clusters.get(key) : undefined;
      if (!key || !cluster || cluster.members.length < cluster.minSize) {
        output.push(signal);
        continue;
      }
      if (!placed.has(key)) {
        placed.add(key);
        output.push(this.toBundle(cluster));
      }
    }

    if (placed.size > 0) {
      this.logger.log(
        `stage bundle done: bundles=${placed.size} in=${signals.length} out=${output.length}`,
      );
    }
    return output;
  }

  /** Escalated items and watchlist hits are always reported on their own. */
  isBundleCandidate(signal: Signal): boolean {
    if (signal.kind !== 'signal' || isWatchlistHit(signal)) {
      return false;
    }
    const text = `${signal.title} ${signal.summary}`.toLowerCase();
    return !ESCALATION_KEYWORDS.some((keyword) => text.includes(keyword));
  }

  /** Lower-cased leading words of a title, before any ":" or " - " suffix. */
  titleStem(title: string): string {
    return this.stemLabel(title)
      .toLowerCase()
      .replace(/[^a-z\s]+/g, ' ')
      .split(/\s+/)
      .filter(Boolean)
      .slice(0, STEM_WORDS)
      .join(' ');
  }

  private clusterFor(signal: Signal, minClusterSize: number): Cluster | null {
    const rule = this.matchRule(signal);
    if (rule) {
      return {
        ruleKey: rule.key,
        label: rule.label,
        noun: rule.noun,
        landingUrl: rule.landingUrl,
        industry: rule.industry,
        minSize: PATTERN_MIN_CLUSTER_SIZE,
        members: [signal],
      };
    }

    if (
      !signal.agency ||
      signal.priorityScore >= BUNDLE_MAX_MEMBER_SCORE ||
      !this.titleStem(signal.title)
    ) {
      return null;
    }
    return {
      ruleKey: GENERIC_RULE_KEY,
      label: this.stemLabel(signal.title),
      noun: GENERIC_NOUN,
      landingUrl: null,
      industry: signal.industryTag ?? DEFAULT_INDUSTRY,
      minSize: minClusterSize,
      members: [signal],
    };
  }

  private clusterScope(signal: Signal, cluster: Cluster): string {
    const agency = (signal.agency ?? '').toLowerCase();
    return cluster.ruleKey === GENERIC_RULE_KEY
      ? `${agency}|${this.titleStem(signal.title)}`
      : agency;
  }

  private matchRule(signal: Signal): BundleRule | null {
    const agency = signal.agency ?? '';
    return (
      BUNDLE_RULES.find(
        (rule) => rule.agency.test(agency) && rule.title.test(signal.title),
      ) ?? null
    );
  }

  private stemLabel(title: string): string {
    return title.split(STEM_SEPARATOR_RE)[0].trim();
  }

  private toBundle(cluster: Cluster): BundleSignal {
    const [first] = cluster.members;
    const count = cluster.members.length;
    const latest = cluster.members.reduce((acc, member) =>
      member.timestamp.getTime() > acc.timestamp.getTime() ? member : acc,
    );
    const sourceId = `bundle:${cluster.ruleKey}:${slugify(first.agency ?? '')}:${count}`;

    return {
      kind: 'bundle',
      source: first.source,
      sourceId,
      stableId: buildStableId(first.source, sourceId),
      title: cluster.label,
      summary: `${count} ${cluster.noun} today`,
      link: cluster.landingUrl ?? first.link,
      timestamp: new Date(latest.timestamp.getTime()),
      agency: first.agency,
      issueCodes: [],
      billId: null,
      docketId: null,
      deadline: null,
      metrics: {
        bundledCount: count,
        members: cluster.members.map((member) => member.stableId),
      },
      signalType: first.signalType,
      urgency: 'low',
      priorityScore: BUNDLE_PRIORITY_SCORE,
      industryTag: cluster.industry,
      watchlistMatches: [],
    };
  }
}
