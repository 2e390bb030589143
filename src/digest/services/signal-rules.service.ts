import { Injectable, Logger } from '@nestjs/common';
import { NUMERIC_METRICS } from '../config/signal-rules';
import { Signal } from '../types/signal.types';
import {
  InvalidMetricError,
  InvalidSignalError,
  assertNumericMetrics,
} from '../utils/signal.util';
import { IndustryTaggerService } from './industry-tagger.service';
import { PriorityScorerService } from './priority-scorer.service';
import { SignalClassifierService } from './signal-classifier.service';
import { UrgencyResolverService } from './urgency-resolver.service';
import { WatchlistMatcherService } from './watchlist-matcher.service';

export interface ProcessOptions {
  now?: Date;
  watchlist?: readonly string[];
}

export interface ProcessResult {
  signals: Signal[];
  failed: number;
}

/**
 * Derives type, urgency, watchlist matches, priority and industry for each
 * signal. Scoring reads the watchlist matches, so matching runs first.
 */
@Injectable()
export class SignalRulesService {
  private readonly logger = new Logger(SignalRulesService.name);

  constructor(
    private readonly classifier: SignalClassifierService,
    private readonly urgencyResolver: UrgencyResolverService,
    private readonly watchlistMatcher: WatchlistMatcherService,
    private readonly scorer: PriorityScorerService,
    private readonly industryTagger: IndustryTaggerService,
  ) {}

  process(signal: Signal, options: ProcessOptions = {}): Signal {
    const now = options.now ?? new Date();
    const next: Signal = {
      ...signal,
      issueCodes: [...signal.issueCodes],
      metrics: { ...signal.metrics },
    };
    assertNumericMetrics(next, NUMERIC_METRICS);

    next.signalType = this.classifier.classify(next);
    next.urgency = this.urgencyResolver.resolve(next, now);
    next.watchlistMatches = this.watchlistMatcher.match(
      next,
      options.watchlist ?? [],
    );
    next.priorityScore = this.scorer.score(next, now);
    next.industryTag = this.industryTagger.tag(next);
    return next;
  }

  /** Bad records are logged and left out; anything else propagates. */
  processAll(
    signals: readonly Signal[],
    options: ProcessOptions = {},
  ): ProcessResult {
    const processed: Signal[] = [];
    let failed = 0;

    for (const signal of signals) {
      try {
        processed.push(this.process(signal, options));
      } catch (error) {
        if (
          error instanceof InvalidMetricError ||
          error instanceof InvalidSignalError
        ) {
          failed += 1;
          this.logger.warn(
            `signal skipped: stableId=${signal.stableId} reason=${error.message}`,
          );
          continue;
        }
        throw error;
      }
    }

    return { signals: processed, failed };
  }
}
