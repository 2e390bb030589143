import { Injectable, Logger } from '@nestjs/common';
import { Signal, SignalMetrics } from '../types/signal.types';
import { parseUtcDate } from '../utils/date.util';
import {
  InvalidSignalError,
  buildStableId,
  toSignalSource,
} from '../utils/signal.util';
import { cleanText } from '../utils/text.util';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class SignalNormalizerService {
  private readonly logger = new Logger(SignalNormalizerService.name);

  /**
   * Turns one collector record into a fresh Signal. Partial records are
   * filled with empty defaults; only a non-object or a record without a
   * source id is rejected.
   */
  normalize(raw: unknown, now: Date = new Date()): Signal {
    if (!isRecord(raw)) {
      throw new InvalidSignalError('signal record must be an object');
    }

    const sourceRaw = this.readText(raw.source).toLowerCase();
    const sourceId = this.readId(raw.sourceId ?? raw.source_id);
    if (!sourceId) {
      throw new InvalidSignalError(
        `signal record from ${sourceRaw || 'unknown source'} has no sourceId`,
      );
    }
    const source = toSignalSource(sourceRaw);
    const stableId = buildStableId(sourceRaw || source, sourceId);

    let timestamp = parseUtcDate(raw.timestamp);
    if (!timestamp) {
      this.logger.debug(
        `timestamp fallback: stableId=${stableId} value=${String(raw.timestamp)}`,
      );
      timestamp = new Date(now.getTime());
    }

    const agency = cleanText(this.readText(raw.agency));

    return {
      kind: 'signal',
      source,
      sourceId,
      stableId,
      title: cleanText(this.readText(raw.title)),
      summary: cleanText(this.readText(raw.summary)),
      link: this.readText(raw.link ?? raw.url).trim(),
      timestamp,
      agency: agency || null,
      issueCodes: this.readIssueCodes(raw.issueCodes ?? raw.issue_codes),
      billId: this.readId(raw.billId ?? raw.bill_id),
      docketId: this.readId(raw.docketId ?? raw.docket_id),
      deadline: parseUtcDate(raw.deadline),
      metrics: this.readMetrics(raw.metrics),
      signalType: null,
      urgency: null,
      priorityScore: 0,
      industryTag: null,
      watchlistMatches: [],
    };
  }

  private readText(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return '';
  }

  private readId(value: unknown): string | null {
    const text = this.readText(value).trim();
    return text || null;
  }

  private readIssueCodes(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    const codes: string[] = [];
    for (const entry of value) {
      const code = this.readText(entry).trim().toUpperCase();
      if (code && !codes.includes(code)) {
        codes.push(code);
      }
    }
    return codes;
  }

  private readMetrics(value: unknown): SignalMetrics {
    return isRecord(value) ? { ...value } : {};
  }
}
