import { Injectable } from '@nestjs/common';
import { toIsoDate } from '../utils/date-utils';

export const CLOCK = 'CLOCK';

export interface Clock {
  /** Current calendar date as YYYY-MM-DD. */
  today(): string;
}

@Injectable()
export class SystemClock implements Clock {
  today(): string {
    return toIsoDate(new Date());
  }
}
