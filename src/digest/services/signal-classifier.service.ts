import { Injectable } from '@nestjs/common';
import {
  ACTION_TYPE_METRIC,
  CLASSIFICATION_RULES,
  CONGRESS_ACTION_TYPES,
  DEFAULT_SIGNAL_TYPE,
} from '../config/signal-rules';
import { Signal, SignalType } from '../types/signal.types';
import { readTextMetric } from '../utils/signal.util';

@Injectable()
export class SignalClassifierService {
  classify(signal: Signal): SignalType {
    const text = `${signal.title} ${signal.summary}`.toLowerCase();

    for (const rule of CLASSIFICATION_RULES[signal.source]) {
      if (rule.terms.some((term) => text.includes(term))) {
        return rule.type;
      }
    }

    if (signal.source === 'congress') {
      const actionType = readTextMetric(signal, ACTION_TYPE_METRIC);
      const byAction = actionType
        ? CONGRESS_ACTION_TYPES[actionType.toLowerCase()]
        : undefined;
      if (byAction) {
        return byAction;
      }
    }

    return DEFAULT_SIGNAL_TYPE[signal.source];
  }
}
