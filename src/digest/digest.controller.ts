import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
} from '@nestjs/common';
import { SERVICE_NAME } from './config/digest.constants';
import { DigestGeneratorService } from './services/digest-generator.service';
import { DigestRunOptions, DigestRunResult } from './types/signal.types';

@Controller()
export class DigestController {
  constructor(
    private readonly digestGeneratorService: DigestGeneratorService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Post('digest')
  generateDigest(
    @Body('signals') signals?: unknown,
    @Body('watchlist') watchlist?: unknown,
    @Body('hoursBack') hoursBack?: unknown,
  ): DigestRunResult {
    return this.digestGeneratorService.generateDigest(
      this.parseSignals(signals),
      this.parseOptions(watchlist, hoursBack),
    );
  }

  @Post('digest/mini')
  generateMiniDigest(
    @Body('signals') signals?: unknown,
    @Body('watchlist') watchlist?: unknown,
    @Body('hoursBack') hoursBack?: unknown,
  ): { text: string | null } {
    return {
      text: this.digestGeneratorService.generateMiniDigest(
        this.parseSignals(signals),
        this.parseOptions(watchlist, hoursBack),
      ),
    };
  }

  private parseSignals(value: unknown): unknown[] {
    if (!Array.isArray(value)) {
      throw new BadRequestException('signals must be an array');
    }
    return value;
  }

  private parseOptions(
    watchlist: unknown,
    hoursBack: unknown,
  ): DigestRunOptions {
    return {
      watchlist: this.parseWatchlist(watchlist),
      hoursBack: this.parseHoursBack(hoursBack),
    };
  }

  private parseWatchlist(value: unknown): string[] | undefined {
    if (value == null) {
      return undefined;
    }
    if (
      !Array.isArray(value) ||
      !value.every((term): term is string => typeof term === 'string')
    ) {
      throw new BadRequestException('watchlist must be an array of strings');
    }
    return value;
  }

  private parseHoursBack(value: unknown): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new BadRequestException('hoursBack must be a positive number');
    }
    return Math.floor(parsed);
  }
}
