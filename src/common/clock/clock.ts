import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

/**
 * Wall-clock source. Every expiry decision reads time through this so that
 * tests can move time forward deterministically.
 */
export abstract class Clock {
  abstract now(): Date;
}

export abstract class IdGenerator {
  abstract generate(): string;
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}

@Injectable()
export class RandomIdGenerator extends IdGenerator {
  generate(): string {
    return randomUUID();
  }
}
