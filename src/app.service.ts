import { Injectable } from '@nestjs/common';
import { SERVICE_NAME } from './digest/config/digest.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string } {
    return {
      service: SERVICE_NAME,
      version: '1.0.0',
    };
  }
}
