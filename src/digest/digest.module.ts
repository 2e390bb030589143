import { Module } from '@nestjs/common';
import { DigestController } from './digest.controller';
import { DigestComposerService } from './services/digest-composer.service';
import { DigestFormatService } from './services/digest-format.service';
import { DigestGeneratorService } from './services/digest-generator.service';
import { IndustryTaggerService } from './services/industry-tagger.service';
import { PriorityScorerService } from './services/priority-scorer.service';
import { SignalBundlerService } from './services/signal-bundler.service';
import { SignalClassifierService } from './services/signal-classifier.service';
import { SignalDedupeService } from './services/signal-dedupe.service';
import { SignalNormalizerService } from './services/signal-normalizer.service';
import { SignalRulesService } from './services/signal-rules.service';
import { UrgencyResolverService } from './services/urgency-resolver.service';
import { WatchlistMatcherService } from './services/watchlist-matcher.service';

@Module({
  controllers: [DigestController],
  providers: [
    DigestGeneratorService,
    SignalNormalizerService,
    SignalClassifierService,
    UrgencyResolverService,
    WatchlistMatcherService,
    PriorityScorerService,
    IndustryTaggerService,
    SignalRulesService,
    SignalDedupeService,
    SignalBundlerService,
    DigestFormatService,
    DigestComposerService,
  ],
  exports: [DigestGeneratorService, SignalRulesService],
})
export class DigestModule {}
