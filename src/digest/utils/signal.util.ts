import {
  BundleSignal,
  IndustryTag,
  SIGNAL_SOURCES,
  Signal,
  SignalRecord,
  SignalSource,
  SignalType,
  Urgency,
} from '../types/signal.types';
import { parseUtcDate } from './date.util';

export class InvalidSignalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSignalError';
  }
}

export class InvalidMetricError extends Error {
  constructor(
    readonly stableId: string,
    readonly metric: string,
    readonly value: unknown,
  ) {
    super(`metric ${metric} on ${stableId} is not numeric: ${describe(value)}`);
    this.name = 'InvalidMetricError';
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value === null) {
    return 'null';
  }
  return typeof value === 'object' ? 'object' : JSON.stringify(value);
}

const SIGNAL_TYPES: ReadonlySet<string> = new Set<SignalType>([
  'final_rule',
  'interim_final_rule',
  'proposed_rule',
  'hearing',
  'markup',
  'bill',
  'docket',
  'notice',
]);
const URGENCIES: ReadonlySet<string> = new Set<Urgency>([
  'critical',
  'high',
  'medium',
  'low',
]);
const INDUSTRY_TAGS: ReadonlySet<string> = new Set<IndustryTag>([
  'Health',
  'Finance',
  'Tech',
  'Energy',
  'Environment',
  'Trade',
  'Defense',
  'Tax',
  'Transportation',
  'Education',
  'Agriculture',
  'Labor',
  'Immigration',
  'Civil Rights',
  'Commerce',
  'Cyber/Intel',
  'Government',
]);

export function isSignalType(value: unknown): value is SignalType {
  return typeof value === 'string' && SIGNAL_TYPES.has(value);
}

export function isUrgency(value: unknown): value is Urgency {
  return typeof value === 'string' && URGENCIES.has(value);
}

export function isIndustryTag(value: unknown): value is IndustryTag {
  return typeof value === 'string' && INDUSTRY_TAGS.has(value);
}

export function toSignalSource(value: unknown): SignalSource {
  const normalized =
    typeof value === 'string' ? value.trim().toLowerCase() : '';
  const known = SIGNAL_SOURCES.find((source) => source === normalized);
  return known ?? 'other';
}

export function buildStableId(source: string, sourceId: string): string {
  return `${source}:${sourceId}`;
}

export function isWatchlistHit(signal: Signal): boolean {
  return signal.watchlistMatches.length > 0;
}

export function isBundle(signal: Signal): signal is BundleSignal {
  return (
    signal.kind === 'bundle' && typeof signal.metrics.bundledCount === 'number'
  );
}

/**
 * Reads a numeric metric. Absent keys give null; numeric strings are
 * accepted; any other shape throws InvalidMetricError.
 */
export function readNumberMetric(signal: Signal, key: string): number | null {
  const value = signal.metrics[key];
  if (value == null || value === '') {
    return null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw new InvalidMetricError(signal.stableId, key, value);
}

/** Throws InvalidMetricError for the first listed metric that is not numeric. */
export function assertNumericMetrics(
  signal: Signal,
  keys: readonly string[],
): void {
  for (const key of keys) {
    readNumberMetric(signal, key);
  }
}

export function readTextMetric(signal: Signal, key: string): string | null {
  const value = signal.metrics[key];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function toSignalRecord(signal: Signal): SignalRecord {
  return {
    kind: signal.kind,
    source: signal.source,
    sourceId: signal.sourceId,
    stableId: signal.stableId,
    title: signal.title,
    summary: signal.summary,
    link: signal.link,
    timestamp: signal.timestamp.toISOString(),
    agency: signal.agency,
    issueCodes: [...signal.issueCodes],
    billId: signal.billId,
    docketId: signal.docketId,
    deadline: signal.deadline ? signal.deadline.toISOString() : null,
    metrics: { ...signal.metrics },
    signalType: signal.signalType,
    urgency: signal.urgency,
    priorityScore: signal.priorityScore,
    industryTag: signal.industryTag,
    watchlistMatches: [...signal.watchlistMatches],
    watchlistHit: isWatchlistHit(signal),
  };
}

export function fromSignalRecord(record: SignalRecord): Signal {
  const timestamp = parseUtcDate(record.timestamp);
  if (!timestamp) {
    throw new InvalidSignalError(
      `record ${record.stableId} has an unreadable timestamp`,
    );
  }

  return {
    kind: record.kind === 'bundle' ? 'bundle' : 'signal',
    source: toSignalSource(record.source),
    sourceId: record.sourceId,
    stableId: record.stableId || buildStableId(record.source, record.sourceId),
    title: record.title ?? '',
    summary: record.summary ?? '',
    link: record.link ?? '',
    timestamp,
    agency: record.agency ?? null,
    issueCodes: [...(record.issueCodes ?? [])],
    billId: record.billId ?? null,
    docketId: record.docketId ?? null,
    deadline: parseUtcDate(record.deadline),
    metrics: { ...(record.metrics ?? {}) },
    signalType: isSignalType(record.signalType) ? record.signalType : null,
    urgency: isUrgency(record.urgency) ? record.urgency : null,
    priorityScore: Number.isFinite(record.priorityScore)
      ? record.priorityScore
      : 0,
    industryTag: isIndustryTag(record.industryTag) ? record.industryTag : null,
    watchlistMatches: [...(record.watchlistMatches ?? [])],
  };
}
