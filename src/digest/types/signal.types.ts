export const SIGNAL_SOURCES = [
  'congress',
  'federal_register',
  'regulations_gov',
] as const;

export type KnownSignalSource = (typeof SIGNAL_SOURCES)[number];
export type SignalSource = KnownSignalSource | 'other';

export type SignalType =
  | 'final_rule'
  | 'interim_final_rule'
  | 'proposed_rule'
  | 'hearing'
  | 'markup'
  | 'bill'
  | 'docket'
  | 'notice';

export type Urgency = 'critical' | 'high' | 'medium' | 'low';

export type IndustryTag =
  | 'Health'
  | 'Finance'
  | 'Tech'
  | 'Energy'
  | 'Environment'
  | 'Trade'
  | 'Defense'
  | 'Tax'
  | 'Transportation'
  | 'Education'
  | 'Agriculture'
  | 'Labor'
  | 'Immigration'
  | 'Civil Rights'
  | 'Commerce'
  | 'Cyber/Intel'
  | 'Government';

export type SignalKind = 'signal' | 'bundle';

export type SignalMetrics = Record<string, unknown>;

export interface Signal {
  kind: SignalKind;
  source: SignalSource;
  sourceId: string;
  stableId: string;
  title: string;
  summary: string;
  link: string;
  timestamp: Date;
  agency: string | null;
  issueCodes: string[];
  billId: string | null;
  docketId: string | null;
  deadline: Date | null;
  metrics: SignalMetrics;
  signalType: SignalType | null;
  urgency: Urgency | null;
  priorityScore: number;
  industryTag: IndustryTag | null;
  watchlistMatches: string[];
}

export interface BundleSignal extends Signal {
  kind: 'bundle';
  metrics: SignalMetrics & { bundledCount: number };
}

/**
 * JSON-safe form of a Signal. Instants are ISO-8601 UTC strings.
 */
export interface SignalRecord {
  kind: SignalKind;
  source: SignalSource;
  sourceId: string;
  stableId: string;
  title: string;
  summary: string;
  link: string;
  timestamp: string;
  agency: string | null;
  issueCodes: string[];
  billId: string | null;
  docketId: string | null;
  deadline: string | null;
  metrics: SignalMetrics;
  signalType: SignalType | null;
  urgency: Urgency | null;
  priorityScore: number;
  industryTag: IndustryTag | null;
  watchlistMatches: string[];
  watchlistHit: boolean;
}

export interface ScoreBreakdown {
  base: number;
  urgencyBonus: number;
  surgeBonus: number;
  deadlineBonus: number;
  watchlistBonus: number;
  stalePenalty: number;
  total: number;
}

export type DigestSectionKey =
  | 'watchlist'
  | 'whatChanged'
  | 'industry'
  | 'deadlines'
  | 'docketSurges'
  | 'billActions'
  | 'bundles';

export interface DigestSection {
  key: DigestSectionKey | 'outlier';
  title: string;
  lines: string[];
  cap: number;
  countsOverflow: boolean;
}

export interface DigestBudget {
  totalItems: number;
  sectionCaps: Record<DigestSectionKey, number>;
}

export interface DigestThresholds {
  whatChangedMinScore: number;
  docketSurgeMinPct: number;
  deadlineWindowDays: number;
  perIndustryLimit: number;
  miniDigestMinScore: number;
  miniDigestMinSignals: number;
}

export interface ComposeOptions {
  now?: Date;
  hoursBack?: number;
  budget?: Partial<Omit<DigestBudget, 'sectionCaps'>> & {
    sectionCaps?: Partial<Record<DigestSectionKey, number>>;
  };
  thresholds?: Partial<DigestThresholds>;
  includeOutlier?: boolean;
}

export interface DigestReport {
  text: string;
  sections: DigestSection[];
  outlier: Signal | null;
  eligibleCount: number;
  emittedCount: number;
  overflowCount: number;
}

export interface DigestRunStats {
  received: number;
  rejected: number;
  processed: number;
  failed: number;
  deduplicated: number;
  bundled: number;
  eligible: number;
  emitted: number;
  overflow: number;
}

export interface DigestRunResult {
  text: string;
  stats: DigestRunStats;
}

export interface DigestRunOptions {
  now?: Date;
  hoursBack?: number;
  watchlist?: readonly string[];
}
