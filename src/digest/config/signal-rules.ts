import {
  IndustryTag,
  SignalSource,
  SignalType,
  Urgency,
} from '../types/signal.types';

export const BASE_PRIORITY: Readonly<Record<SignalType, number>> =
  Object.freeze({
    final_rule: 5.0,
    interim_final_rule: 5.0,
    proposed_rule: 3.5,
    hearing: 3.0,
    markup: 3.0,
    docket: 2.0,
    bill: 1.5,
    notice: 1.0,
  });

export const ESCALATED_BILL_ACTIONS: ReadonlySet<string> = new Set([
  'floor_vote',
  'conference_action',
]);
export const ESCALATED_BILL_BASE = 4.0;
export const COMMITTEE_REFERRAL_ACTION = 'committee_referral';

export const URGENCY_BONUS: Readonly<Record<Urgency, number>> = Object.freeze({
  critical: 2.0,
  high: 1.0,
  medium: 0,
  low: 0,
});

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;
export const SURGE_BONUS_CAP = 2.0;
export const DEADLINE_BONUS = 0.8;
export const DEADLINE_BONUS_DAYS = 3;
export const WATCHLIST_BONUS = 1.5;
export const STALE_PENALTY = -1.0;
export const STALE_AFTER_DAYS = 30;

export const URGENCY_WINDOWS = Object.freeze({
  finalRuleCriticalDays: 30,
  proposedRuleHighDays: 14,
  eventHighDays: 7,
  eventMediumDays: 21,
  docketHighDays: 7,
  docketSurgeHighPct: 200,
});

export const SURGE_METRIC = 'comments_24h_delta_pct';
export const SURGE_DELTA_METRIC = 'comments_24h_delta';
export const COMMENT_COUNT_METRIC = 'comment_count';
export const ACTION_TYPE_METRIC = 'action_type';

// Every metric read as a number anywhere downstream.
export const NUMERIC_METRICS: readonly string[] = [
  SURGE_METRIC,
  SURGE_DELTA_METRIC,
  COMMENT_COUNT_METRIC,
];

export interface ClassificationRule {
  type: SignalType;
  terms: readonly string[];
}

// Order is load-bearing: "interim final rule" contains "final rule".
export const CLASSIFICATION_RULES: Readonly<
  Record<SignalSource, readonly ClassificationRule[]>
> = {
  federal_register: [
    { type: 'interim_final_rule', terms: ['interim final rule'] },
    { type: 'final_rule', terms: ['final rule'] },
    { type: 'proposed_rule', terms: ['proposed rule', 'nprm'] },
  ],
  congress: [
    { type: 'markup', terms: ['markup'] },
    { type: 'hearing', terms: ['hearing'] },
  ],
  regulations_gov: [],
  other: [],
};

export const DEFAULT_SIGNAL_TYPE: Readonly<Record<SignalSource, SignalType>> = {
  federal_register: 'notice',
  congress: 'bill',
  regulations_gov: 'docket',
  other: 'notice',
};

export const CONGRESS_ACTION_TYPES: Readonly<Record<string, SignalType>> = {
  markup_scheduled: 'markup',
  hearing_scheduled: 'hearing',
};

export const ISSUE_CODE_INDUSTRY: Readonly<Record<string, IndustryTag>> = {
  HCR: 'Health',
  FIN: 'Finance',
  TEC: 'Tech',
  ENE: 'Energy',
  FUE: 'Energy',
  ENV: 'Environment',
  TRD: 'Trade',
  DEF: 'Defense',
  TAX: 'Tax',
  TRA: 'Transportation',
  AVI: 'Transportation',
  EDU: 'Education',
  AGR: 'Agriculture',
  LAB: 'Labor',
  IMM: 'Immigration',
  CIV: 'Civil Rights',
  COM: 'Commerce',
  GOV: 'Government',
  INT: 'Cyber/Intel',
};

export type KeywordIndustryTable = readonly (readonly [string, IndustryTag])[];

// Checked against the agency name only, in this order.
export const AGENCY_INDUSTRY: KeywordIndustryTable = [
  ['federal aviation administration', 'Transportation'],
  ['environmental protection agency', 'Environment'],
  ['securities and exchange commission', 'Finance'],
  ['federal communications commission', 'Tech'],
  ['federal trade commission', 'Tech'],
  ['food and drug administration', 'Health'],
  ['health and human services', 'Health'],
  ['medicare & medicaid', 'Health'],
  ['cybersecurity and infrastructure security agency', 'Cyber/Intel'],
  ['federal energy regulatory commission', 'Energy'],
  ['hhs', 'Health'],
  ['fda', 'Health'],
  ['cms', 'Health'],
  ['epa', 'Environment'],
  ['doe', 'Energy'],
  ['fcc', 'Tech'],
  ['ftc', 'Tech'],
  ['sec', 'Finance'],
  ['treasury', 'Finance'],
  ['dhs', 'Defense'],
  ['dod', 'Defense'],
  ['dot', 'Transportation'],
  ['faa', 'Transportation'],
  ['ed', 'Education'],
  ['usda', 'Agriculture'],
  ['dol', 'Labor'],
];

// Checked against title, summary and agency together.
export const KEYWORD_INDUSTRY: KeywordIndustryTable = [
  ['health', 'Health'],
  ['medical', 'Health'],
  ['drug', 'Health'],
  ['privacy', 'Tech'],
  ['cybersecurity', 'Tech'],
  ['ai', 'Tech'],
  ['artificial intelligence', 'Tech'],
  ['climate', 'Environment'],
  ['emissions', 'Environment'],
  ['energy', 'Energy'],
  ['banking', 'Finance'],
  ['tariff', 'Trade'],
  ['tax', 'Tax'],
  ['transportation', 'Transportation'],
  ['aviation', 'Transportation'],
  ['education', 'Education'],
  ['agriculture', 'Agriculture'],
  ['labor', 'Labor'],
  ['immigration', 'Immigration'],
];

export const DEFAULT_INDUSTRY: IndustryTag = 'Government';

export const LINK_LABELS: Readonly<Record<SignalSource, string>> = {
  federal_register: 'FR',
  regulations_gov: 'Docket',
  congress: 'Congress',
  other: 'View',
};
export const BUNDLE_LINK_LABEL = 'View all';

export const SIGNAL_TYPE_LABELS: Readonly<Record<SignalType, string>> = {
  final_rule: 'Final Rule',
  interim_final_rule: 'Interim Final Rule',
  proposed_rule: 'Proposed Rule',
  hearing: 'Hearing',
  markup: 'Markup',
  bill: 'Bill Action',
  docket: 'Docket',
  notice: 'Notice',
};

export const BILL_ACTION_LABELS: Readonly<Record<string, string>> = {
  introduced: 'Introduced',
  hearing_scheduled: 'Hearing scheduled',
  markup_scheduled: 'Markup scheduled',
  floor_vote: 'Floor vote',
  conference_action: 'Conference action',
  committee_referral: 'Referred to committee',
};

export const ESCALATION_KEYWORDS: readonly string[] = [
  'emergency',
  'immediate adoption',
  'immediately effective',
];

export interface BundleRule {
  key: string;
  label: string;
  noun: string;
  agency: RegExp;
  title: RegExp;
  industry: IndustryTag;
  landingUrl: string | null;
}

export const BUNDLE_RULES: readonly BundleRule[] = [
  {
    key: 'faa-ad',
    label: 'FAA Airworthiness Directives',
    noun: 'directives',
    agency: /federal aviation administration|\bfaa\b/i,
    title: /^airworthiness directives?\b/i,
    industry: 'Transportation',
    landingUrl:
      'https://www.federalregister.gov/agencies/federal-aviation-administration',
  },
  {
    key: 'sec-sro',
    label: 'SEC Self-Regulatory Organization filings',
    noun: 'filings',
    agency: /securities and exchange commission|\bsec\b/i,
    title: /^self-regulatory organizations?\b/i,
    industry: 'Finance',
    landingUrl:
      'https://www.federalregister.gov/agencies/securities-and-exchange-commission',
  },
];
