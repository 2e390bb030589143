import { makeSignal } from '../testing/signal.factory';
import { IndustryTaggerService } from './industry-tagger.service';

describe('IndustryTaggerService', () => {
  const service = new IndustryTaggerService();

  it('prefers the first mapped issue code', () => {
    expect(
      service.tag(
        makeSignal({
          issueCodes: ['XYZ', 'TAX', 'HCR'],
          agency: 'Federal Aviation Administration',
        }),
      ),
    ).toBe('Tax');
  });

  it('falls back to the agency table', () => {
    expect(
      service.tag(makeSignal({ agency: 'Federal Aviation Administration' })),
    ).toBe('Transportation');
    expect(service.tag(makeSignal({ agency: 'SEC' }))).toBe('Finance');
  });

  it('then scans title, summary and agency for keywords', () => {
    expect(
      service.tag(
        makeSignal({
          title: 'Grant program update',
          agency: 'Department of Education',
        }),
      ),
    ).toBe('Education');
    expect(service.tag(makeSignal({ title: 'AI safety framework' }))).toBe(
      'Tech',
    );
  });

  it('does not match keywords inside longer words', () => {
    expect(
      service.tag(
        makeSignal({
          title: 'Maintain records',
          agency: 'Office of Management and Budget',
        }),
      ),
    ).toBe('Government');
  });
});
