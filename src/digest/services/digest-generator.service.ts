import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_HOURS_BACK,
  DEFAULT_WATCHLIST,
} from '../config/digest.constants';
import {
  DigestRunOptions,
  DigestRunResult,
  DigestRunStats,
  Signal,
} from '../types/signal.types';
import { InvalidSignalError } from '../utils/signal.util';
import { DigestComposerService } from './digest-composer.service';
import { SignalBundlerService } from './signal-bundler.service';
import { SignalDedupeService } from './signal-dedupe.service';
import { SignalNormalizerService } from './signal-normalizer.service';
import { SignalRulesService } from './signal-rules.service';

interface PreparedRun {
  signals: Signal[];
  stats: Pick<
    DigestRunStats,
    'received' | 'rejected' | 'processed' | 'failed' | 'deduplicated'
  >;
}

@Injectable()
export class DigestGeneratorService {
  private readonly logger = new Logger(DigestGeneratorService.name);

  constructor(
    private readonly normalizer: SignalNormalizerService,
    private readonly rules: SignalRulesService,
    private readonly dedupe: SignalDedupeService,
    private readonly bundler: SignalBundlerService,
    private readonly composer: DigestComposerService,
  ) {}

  generateDigest(
    records: readonly unknown[],
    options: DigestRunOptions = {},
  ): DigestRunResult {
    const startedAt = Date.now();
    const now = options.now ?? new Date();
    const hoursBack = options.hoursBack ?? DEFAULT_HOURS_BACK;
    const watchlist = options.watchlist ?? DEFAULT_WATCHLIST;
    this.logger.log(
      `generate start: records=${records.length} watchlist=${watchlist.length} hoursBack=${hoursBack}`,
    );

    const prepared = this.prepare(records, now, watchlist);
    const bundled = this.bundler.bundle(prepared.signals);
    const report = this.composer.buildReport(bundled, { now, hoursBack });

    const stats: DigestRunStats = {
      ...prepared.stats,
      bundled: prepared.signals.length - bundled.length,
      eligible: report.eligibleCount,
      emitted: report.emittedCount,
      overflow: report.overflowCount,
    };
    this.logger.log(
      `generate done: emitted=${stats.emitted} overflow=${stats.overflow} rejected=${stats.rejected} failed=${stats.failed} elapsedMs=${Date.now() - startedAt}`,
    );
    return { text: report.text, stats };
  }

  generateMiniDigest(
    records: readonly unknown[],
    options: DigestRunOptions = {},
  ): string | null {
    const now = options.now ?? new Date();
    const watchlist = options.watchlist ?? DEFAULT_WATCHLIST;
    const { signals } = this.prepare(records, now, watchlist);

    const text = this.composer.composeMini(signals, {
      now,
      hoursBack: options.hoursBack,
    });
    this.logger.log(
      `mini digest ${text ? 'ready' : 'skipped'}: signals=${signals.length}`,
    );
    return text;
  }

  private prepare(
    records: readonly unknown[],
    now: Date,
    watchlist: readonly string[],
  ): PreparedRun {
    const normalized: Signal[] = [];
    let rejected = 0;
    for (const record of records) {
      try {
        normalized.push(this.normalizer.normalize(record, now));
      } catch (error) {
        if (!(error instanceof InvalidSignalError)) {
          throw error;
        }
        rejected += 1;
        this.logger.warn(`record rejected: reason=${error.message}`);
      }
    }
    this.logger.log(
      `stage normalize done: in=${records.length} out=${normalized.length} rejected=${rejected}`,
    );

    const { signals: processed, failed } = this.rules.processAll(normalized, {
      now,
      watchlist,
    });
    this.logger.log(
      `stage rules done: processed=${processed.length} failed=${failed}`,
    );

    const signals = this.dedupe.deduplicate(processed);
    this.logger.log(
      `stage dedupe done: in=${processed.length} out=${signals.length}`,
    );

    return {
      signals,
      stats: {
        received: records.length,
        rejected,
        processed: processed.length,
        failed,
        deduplicated: processed.length - signals.length,
      },
    };
  }
}
