import { SignalRecord } from '../types/signal.types';
import { NOW, daysFromNow, makeSignal } from '../testing/signal.factory';
import {
  InvalidMetricError,
  fromSignalRecord,
  readNumberMetric,
  toSignalRecord,
  toSignalSource,
} from './signal.util';

describe('signal util', () => {
  it('reads numeric metrics and rejects other shapes', () => {
    const signal = makeSignal({
      metrics: { pct: 250, text: '120', blank: '', bad: 'n/a', nested: {} },
    });

    expect(readNumberMetric(signal, 'pct')).toBe(250);
    expect(readNumberMetric(signal, 'text')).toBe(120);
    expect(readNumberMetric(signal, 'blank')).toBeNull();
    expect(readNumberMetric(signal, 'missing')).toBeNull();
    expect(() => readNumberMetric(signal, 'bad')).toThrow(InvalidMetricError);
    expect(() => readNumberMetric(signal, 'nested')).toThrow(
      'metric nested on federal_register:FR-0001 is not numeric: object',
    );
  });

  it('maps source names onto known sources', () => {
    expect(toSignalSource(' Congress ')).toBe('congress');
    expect(toSignalSource('lda')).toBe('other');
    expect(toSignalSource(undefined)).toBe('other');
  });

  it('survives a JSON round trip', () => {
    const signal = makeSignal({
      title: 'Consumer Privacy Standards',
      deadline: daysFromNow(5),
      metrics: { comment_count: 12 },
      signalType: 'final_rule',
      urgency: 'critical',
      priorityScore: 8.5,
      industryTag: 'Tech',
      watchlistMatches: ['privacy'],
    });

    const record = toSignalRecord(signal);
    const parsed: SignalRecord = JSON.parse(JSON.stringify(record));

    expect(record.watchlistHit).toBe(true);
    expect(record.timestamp).toBe('2026-10-19T12:00:00.000Z');
    expect(fromSignalRecord(parsed)).toEqual(signal);
  });

  it('coerces naive record instants to UTC', () => {
    const record = toSignalRecord(makeSignal());
    const restored = fromSignalRecord({
      ...record,
      timestamp: '2026-10-19T08:00:00',
      deadline: '2026-10-20T12:00:00',
      signalType: null,
    });

    expect(restored.timestamp.toISOString()).toBe('2026-10-19T08:00:00.000Z');
    expect(restored.deadline?.toISOString()).toBe('2026-10-20T12:00:00.000Z');
    expect(restored.timestamp.getTime()).toBeLessThan(NOW.getTime());
  });
});
