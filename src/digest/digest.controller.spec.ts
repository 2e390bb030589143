import { BadRequestException } from '@nestjs/common';
import { DigestController } from './digest.controller';
import { DigestRunResult } from './types/signal.types';

function makeResult(): DigestRunResult {
  return {
    text: 'digest',
    stats: {
      received: 1,
      rejected: 0,
      processed: 1,
      failed: 0,
      deduplicated: 0,
      bundled: 0,
      eligible: 1,
      emitted: 1,
      overflow: 0,
    },
  };
}

describe('DigestController', () => {
  const result = makeResult();
  const generator = {
    generateDigest: jest.fn().mockReturnValue(result),
    generateMiniDigest: jest.fn().mockReturnValue(null),
  };
  const controller = new DigestController(generator as never);
  const signals = [{ source: 'congress', sourceId: 'hr-1' }];

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reports health', () => {
    expect(controller.getHealth()).toEqual({
      status: 'ok',
      service: 'gov-signals-digest',
    });
  });

  it('passes parsed options to the generator', () => {
    expect(controller.generateDigest(signals, ['acme'], '12.9')).toBe(result);

    expect(generator.generateDigest).toHaveBeenCalledWith(signals, {
      watchlist: ['acme'],
      hoursBack: 12,
    });
  });

  it('leaves omitted options undefined', () => {
    controller.generateDigest(signals);

    expect(generator.generateDigest).toHaveBeenCalledWith(signals, {
      watchlist: undefined,
      hoursBack: undefined,
    });
  });

  it('wraps the mini digest text', () => {
    expect(controller.generateMiniDigest(signals)).toEqual({ text: null });
    expect(generator.generateMiniDigest).toHaveBeenCalledTimes(1);
  });

  it('rejects malformed bodies', () => {
    expect(() => controller.generateDigest('nope')).toThrow(
      BadRequestException,
    );
    expect(() => controller.generateDigest(signals, [1])).toThrow(
      'watchlist must be an array of strings',
    );
    expect(() => controller.generateDigest(signals, undefined, 'abc')).toThrow(
      'hoursBack must be a positive number',
    );
    expect(generator.generateDigest).not.toHaveBeenCalled();
  });
});
