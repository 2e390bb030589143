import {
  DigestBudget,
  DigestSectionKey,
  DigestThresholds,
} from '../types/signal.types';

function readCount(name: string, fallback: number): number {
  const raw = Number(process.env[name] ?? fallback);
  return Number.isFinite(raw) ? Math.max(0, Math.floor(raw)) : fallback;
}

function readScore(name: string, fallback: number): number {
  const raw = Number(process.env[name] ?? fallback);
  return Number.isFinite(raw) ? Math.max(0, Math.min(10, raw)) : fallback;
}

export const SERVICE_NAME = 'gov-signals-digest';
export const DIGEST_TITLE = 'Gov Signals — Daily Digest';
export const MINI_DIGEST_TITLE = 'Mini Signals Alert';
export const NO_ACTIVITY_MESSAGE = '*No fresh government activity detected.*';

export const DEFAULT_HOURS_BACK = readCount('DIGEST_HOURS_BACK', 24) || 24;
export const DIGEST_TIMEZONE =
  process.env.DIGEST_TIMEZONE ?? 'America/Los_Angeles';
export const DIGEST_TIMEZONE_LABEL = process.env.DIGEST_TIMEZONE_LABEL ?? 'PT';

export const DEFAULT_WATCHLIST: readonly string[] = Object.freeze(
  (process.env.DIGEST_WATCHLIST ?? '')
    .split(',')
    .map((term) => term.trim())
    .filter(Boolean),
);

export const SECTION_TITLES: Readonly<Record<DigestSectionKey, string>> = {
  watchlist: '🔎 **Watchlist Alerts**',
  whatChanged: '📈 **What Changed**',
  industry: '🏭 **Industry Snapshot**',
  deadlines: '⏰ **Deadlines** (next 7d)',
  docketSurges: '📊 **Docket Surges**',
  billActions: '📜 **New Bills & Actions**',
  bundles: '🧺 **Bundled Notices**',
};
export const OUTLIER_SECTION_TITLE = '🧪 **Outlier**';

// Section order is the order the composer fills them in.
export const SECTION_ORDER: readonly DigestSectionKey[] = [
  'watchlist',
  'whatChanged',
  'industry',
  'deadlines',
  'docketSurges',
  'billActions',
  'bundles',
];

export const DEFAULT_DIGEST_BUDGET: DigestBudget = {
  totalItems: readCount('DIGEST_TOTAL_BUDGET', 20),
  sectionCaps: {
    watchlist: readCount('DIGEST_CAP_WATCHLIST', 5),
    whatChanged: readCount('DIGEST_CAP_WHAT_CHANGED', 7),
    industry: readCount('DIGEST_CAP_INDUSTRY', 6),
    deadlines: readCount('DIGEST_CAP_DEADLINES', 5),
    docketSurges: readCount('DIGEST_CAP_DOCKET_SURGES', 3),
    billActions: readCount('DIGEST_CAP_BILL_ACTIONS', 5),
    bundles: readCount('DIGEST_CAP_BUNDLES', 3),
  },
};

export const DEFAULT_DIGEST_THRESHOLDS: DigestThresholds = {
  whatChangedMinScore: readScore('WHAT_CHANGED_MIN_SCORE', 3.0),
  docketSurgeMinPct: readCount('DOCKET_SURGE_MIN_PCT', 200),
  deadlineWindowDays: readCount('DEADLINE_WINDOW_DAYS', 7),
  perIndustryLimit: readCount('INDUSTRY_TOP_K', 2),
  miniDigestMinScore: readScore('MINI_DIGEST_MIN_SCORE', 5.0),
  miniDigestMinSignals: readCount('MINI_DIGEST_MIN_SIGNALS', 10),
};

export const MINI_DIGEST_MAX_ITEMS = 3;
export const MINI_DIGEST_HOURS_BACK = 4;

export const MOBILE_TITLE_LIMIT = readCount('MOBILE_TITLE_LIMIT', 60) || 60;
export const SUMMARY_LIMIT = readCount('SUMMARY_LIMIT', 160) || 160;
export const OUTLIER_TITLE_LIMIT = 80;

export const BUNDLE_MIN_CLUSTER_SIZE = Math.max(
  2,
  readCount('BUNDLE_MIN_CLUSTER_SIZE', 3),
);
export const BUNDLE_PRIORITY_SCORE = readScore('BUNDLE_PRIORITY_SCORE', 2.0);
export const BUNDLE_MAX_MEMBER_SCORE = readScore(
  'BUNDLE_MAX_MEMBER_SCORE',
  3.0,
);
