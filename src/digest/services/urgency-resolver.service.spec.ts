import { Signal } from '../types/signal.types';
import { NOW, daysFromNow, makeSignal } from '../testing/signal.factory';
import { InvalidMetricError } from '../utils/signal.util';
import { UrgencyResolverService } from './urgency-resolver.service';

describe('UrgencyResolverService', () => {
  const service = new UrgencyResolverService();
  const resolve = (overrides: Partial<Signal>) =>
    service.resolve(makeSignal(overrides), NOW);

  it('marks final rules critical up to 30 days out', () => {
    expect(
      resolve({ signalType: 'final_rule', deadline: daysFromNow(30) }),
    ).toBe('critical');
    expect(
      resolve({ signalType: 'final_rule', deadline: daysFromNow(31) }),
    ).toBe('low');
    expect(
      resolve({ signalType: 'interim_final_rule', deadline: daysFromNow(10) }),
    ).toBe('critical');
    expect(resolve({ signalType: 'final_rule' })).toBe('low');
  });

  it('marks proposed rules high within 14 days', () => {
    expect(
      resolve({ signalType: 'proposed_rule', deadline: daysFromNow(14) }),
    ).toBe('high');
    expect(
      resolve({ signalType: 'proposed_rule', deadline: daysFromNow(15) }),
    ).toBe('low');
  });

  it('grades hearings and markups by how soon they are', () => {
    expect(resolve({ signalType: 'hearing', deadline: daysFromNow(7) })).toBe(
      'high',
    );
    expect(resolve({ signalType: 'markup', deadline: daysFromNow(8) })).toBe(
      'medium',
    );
    expect(resolve({ signalType: 'hearing', deadline: daysFromNow(22) })).toBe(
      'low',
    );
  });

  it('grades bills by action type', () => {
    expect(
      resolve({ signalType: 'bill', metrics: { action_type: 'floor_vote' } }),
    ).toBe('high');
    expect(
      resolve({
        signalType: 'bill',
        metrics: { action_type: 'committee_referral' },
      }),
    ).toBe('medium');
    expect(
      resolve({ signalType: 'bill', metrics: { action_type: 'introduced' } }),
    ).toBe('low');
  });

  it('grades dockets by deadline, surge and activity', () => {
    expect(resolve({ signalType: 'docket', deadline: daysFromNow(3) })).toBe(
      'high',
    );
    expect(
      resolve({
        signalType: 'docket',
        metrics: { comments_24h_delta_pct: 250 },
      }),
    ).toBe('high');
    expect(
      resolve({ signalType: 'docket', metrics: { comment_count: 5 } }),
    ).toBe('medium');
    expect(resolve({ signalType: 'docket' })).toBe('low');
  });

  it('throws on a non-numeric surge metric', () => {
    expect(() =>
      resolve({
        signalType: 'docket',
        metrics: { comments_24h_delta_pct: 'lots' },
      }),
    ).toThrow(InvalidMetricError);
  });
});
