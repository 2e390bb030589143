import { NOW, daysFromNow, makeSignal } from '../testing/signal.factory';
import { DigestFormatService } from './digest-format.service';

describe('DigestFormatService', () => {
  const service = new DigestFormatService();
  const rule = makeSignal({
    title: 'Consumer Privacy Standards',
    link: 'https://fr.test/1',
    issueCodes: ['TEC'],
    signalType: 'final_rule',
    urgency: 'critical',
    industryTag: 'Tech',
  });

  it('renders the header mini-stats, counting bundled items', () => {
    const header = service.header(
      [
        makeSignal({ source: 'congress', sourceId: 'hr-1' }),
        makeSignal({ watchlistMatches: ['privacy'] }),
        makeSignal({ source: 'regulations_gov', sourceId: 'EPA-1' }),
        makeSignal({
          kind: 'bundle',
          sourceId: 'bundle:faa-ad:faa:4',
          metrics: { bundledCount: 4 },
        }),
      ],
      NOW,
      24,
    );

    expect(header).toBe(
      '🔍 **Gov Signals — Daily Digest** (2026-10-19) · 24h\n' +
        'Mini-stats: Bills 1 · FR 5 · Dockets 1 · Watchlist hits 1',
    );
  });

  it('mentions overflow in the footer only when there is some', () => {
    expect(service.footer(3, NOW)).toBe('+3 more in thread · Updated 09:00 PT');
    expect(service.footer(0, NOW)).toBe('Updated 09:00 PT');
  });

  it('renders a what-changed line with its source link', () => {
    expect(service.whatChangedLine(rule)).toBe(
      '• [Tech] Final Rule — Consumer Privacy Standards • Critical\n' +
        '  Issues: TEC • <https://fr.test/1|FR>',
    );
    expect(service.whatChangedLine({ ...rule, link: '' })).toBe(
      '• [Tech] Final Rule — Consumer Privacy Standards • Critical\n' +
        '  Issues: TEC',
    );
  });

  it('renders watchlist lines with summary and matches', () => {
    const hit = makeSignal({
      title: 'Privacy rule',
      summary: 'Short summary',
      link: 'https://fr.test/2',
      urgency: 'medium',
      industryTag: 'Tech',
      watchlistMatches: ['privacy', 'acme'],
    });

    expect(service.watchlistLine(hit)).toBe(
      '• [Tech] Privacy rule • Medium\n' +
        '  Short summary • Matches: privacy, acme • Issues: None • <https://fr.test/2|FR>',
    );
  });

  it('labels deadlines relative to now', () => {
    expect(
      service.deadlineLabel(
        makeSignal({ deadline: daysFromNow(0, 2 * 60 * 60 * 1000) }),
        NOW,
      ),
    ).toBe('Today');
    expect(
      service.deadlineLabel(
        makeSignal({ deadline: daysFromNow(1, 60 * 60 * 1000) }),
        NOW,
      ),
    ).toBe('Tomorrow');
    expect(
      service.deadlineLine(
        makeSignal({ title: 'Comment window', deadline: daysFromNow(5) }),
        NOW,
      ),
    ).toBe('• [Government] Comment window • Deadline: 5d\n  Issues: None');
  });

  it('renders docket surge figures', () => {
    const docket = makeSignal({
      source: 'regulations_gov',
      sourceId: 'EPA-HQ-2026-0001',
      title: 'Methane Emissions Standards',
      link: 'https://regs.test/d',
      issueCodes: ['ENV'],
      deadline: daysFromNow(6),
      metrics: { comments_24h_delta_pct: 250, comments_24h_delta: 120 },
      signalType: 'docket',
      urgency: 'high',
      industryTag: 'Environment',
    });

    expect(service.docketSurgeLine(docket, NOW)).toBe(
      '• [Environment] Docket Surge — Methane Emissions Standards • High\n' +
        '  +250% / +120 (24h) • Deadline in 6d • Issues: ENV • <https://regs.test/d|Docket>',
    );
  });

  it('names the last bill action', () => {
    const bill = makeSignal({
      source: 'congress',
      sourceId: 'hr-1234',
      title: 'H.R. 1234 - Secure Networks Act',
      link: 'https://congress.test/hr1234',
      metrics: { action_type: 'floor_vote' },
      signalType: 'bill',
      urgency: 'high',
    });

    expect(service.billActionLine(bill)).toBe(
      '• [Government] Bill Action — H.R. 1234 - Secure Networks Act • High\n' +
        '  Last action: Floor vote • Issues: None • <https://congress.test/hr1234|Congress>',
    );
    expect(
      service.billActionLine({
        ...bill,
        metrics: { action_type: 'quorum_call' },
      }),
    ).toContain('Last action: Quorum Call •');
  });

  it('renders bundles with a view-all link', () => {
    const bundle = makeSignal({
      kind: 'bundle',
      title: 'FAA Airworthiness Directives',
      summary: '5 directives today',
      link: 'https://fr.test/faa',
      metrics: { bundledCount: 5 },
      industryTag: 'Transportation',
    });

    expect(service.bundleLine(bundle)).toBe(
      '• [Transportation] FAA Airworthiness Directives — 5 directives today • <https://fr.test/faa|View all>',
    );
  });

  it('explains why the outlier stands out', () => {
    const surging = makeSignal({
      source: 'regulations_gov',
      title: 'Water Rule',
      link: 'https://regs.test/w',
      metrics: { comments_24h_delta_pct: 450 },
    });
    const broad = makeSignal({
      title: 'Omnibus Notice',
      issueCodes: ['TAX', 'HCR', 'TRD'],
    });

    expect(service.outlierLine(surging, 200)).toBe(
      '• Comment Surge (450%) — Water Rule • <https://regs.test/w|Docket>',
    );
    expect(service.outlierLine(broad, 200)).toBe(
      '• Multi-Industry Impact (3 codes) — Omnibus Notice',
    );
    expect(service.outlierLine(rule, 200)).toBe(
      '• High Impact — Consumer Privacy Standards • <https://fr.test/1|FR>',
    );
  });
});
