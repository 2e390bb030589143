import { Injectable } from '@nestjs/common';
import {
  AGENCY_INDUSTRY,
  DEFAULT_INDUSTRY,
  ISSUE_CODE_INDUSTRY,
  KEYWORD_INDUSTRY,
  KeywordIndustryTable,
} from '../config/signal-rules';
import { IndustryTag, Signal } from '../types/signal.types';
import { containsWord } from '../utils/text.util';

@Injectable()
export class IndustryTaggerService {
  tag(signal: Signal): IndustryTag {
    for (const code of signal.issueCodes) {
      const industry = ISSUE_CODE_INDUSTRY[code.toUpperCase()];
      if (industry) {
        return industry;
      }
    }

    if (signal.agency) {
      const byAgency = this.firstMatch(signal.agency, AGENCY_INDUSTRY);
      if (byAgency) {
        return byAgency;
      }
    }

    const content = [signal.title, signal.summary, signal.agency ?? '']
      .join(' ')
      .toLowerCase();
    return this.firstMatch(content, KEYWORD_INDUSTRY) ?? DEFAULT_INDUSTRY;
  }

  private firstMatch(
    text: string,
    table: KeywordIndustryTable,
  ): IndustryTag | null {
    for (const [keyword, industry] of table) {
      if (containsWord(text, keyword)) {
        return industry;
      }
    }
    return null;
  }
}
