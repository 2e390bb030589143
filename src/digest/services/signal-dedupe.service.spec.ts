import { NOW, makeSignal } from '../testing/signal.factory';
import { SignalDedupeService } from './signal-dedupe.service';

describe('SignalDedupeService', () => {
  const service = new SignalDedupeService();

  it('keeps the highest priority per stable id in first-seen order', () => {
    const a = makeSignal({ sourceId: 'one', priorityScore: 2 });
    const b = makeSignal({ sourceId: 'two', priorityScore: 3 });
    const c = makeSignal({ sourceId: 'one', priorityScore: 5, title: 'c' });
    const d = makeSignal({ sourceId: 'one', priorityScore: 5, title: 'd' });

    const result = service.deduplicate([a, b, c, d]);

    expect(result).toEqual([c, b]);
    expect(result[0]).toBe(c);
    expect(service.deduplicate(result)).toEqual(result);
  });

  it('groups by bill and by docket', () => {
    const first = makeSignal({ sourceId: 'a', billId: 'hr-1' });
    const second = makeSignal({ sourceId: 'b', billId: 'hr-1' });
    const other = makeSignal({ sourceId: 'c', billId: 'hr-2' });
    const loose = makeSignal({ sourceId: 'd' });

    const bills = service.groupByBill([first, second, other, loose]);

    expect(Array.from(bills.keys())).toEqual(['hr-1', 'hr-2']);
    expect(bills.get('hr-1')).toEqual([first, second]);

    const comment = makeSignal({
      source: 'regulations_gov',
      sourceId: 'EPA-HQ-OAR-2026-0001-0042',
      signalType: 'docket',
    });
    expect(Array.from(service.groupByDocket([comment, loose]).keys())).toEqual(
      ['EPA-HQ-OAR-2026-0001'],
    );
  });

  it('derives docket keys from the docket id or the source id', () => {
    expect(
      service.docketKeyOf(
        makeSignal({ docketId: 'FDA-2026-N-0101', signalType: 'notice' }),
      ),
    ).toBe('FDA-2026-N-0101');
    expect(
      service.docketKeyOf(
        makeSignal({ sourceId: 'CMS-2026-0007-0001', signalType: 'docket' }),
      ),
    ).toBe('CMS-2026-0007');
    expect(service.docketKeyOf(makeSignal({ signalType: 'notice' }))).toBe(
      null,
    );
  });

  it('picks the newest signal, breaking ties by score then order', () => {
    const older = makeSignal({ sourceId: 'a', timestamp: new Date(0) });
    const newer = makeSignal({ sourceId: 'b', timestamp: NOW });
    const tied = makeSignal({ sourceId: 'c', timestamp: NOW });
    const stronger = makeSignal({
      sourceId: 'd',
      timestamp: NOW,
      priorityScore: 4,
    });

    expect(service.pickLatest([older, newer, tied])).toBe(newer);
    expect(service.pickLatest([newer, stronger, older])).toBe(stronger);
    expect(service.pickLatest([])).toBeNull();
  });
});
