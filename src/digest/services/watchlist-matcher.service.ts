import { Injectable } from '@nestjs/common';
import { Signal } from '../types/signal.types';

@Injectable()
export class WatchlistMatcherService {
  /**
   * Watch terms found in title, summary or agency, case-insensitively, in
   * watchlist order and each at most once.
   */
  match(signal: Signal, watchlist: readonly string[]): string[] {
    if (watchlist.length === 0) {
      return [];
    }

    const haystack = [signal.title, signal.summary, signal.agency ?? '']
      .join(' ')
      .toLowerCase();
    const seen = new Set<string>();
    const matches: string[] = [];

    for (const term of watchlist) {
      const needle = term.trim().toLowerCase();
      if (!needle || seen.has(needle)) {
        continue;
      }
      seen.add(needle);
      if (haystack.includes(needle)) {
        matches.push(term.trim());
      }
    }
    return matches;
  }
}
