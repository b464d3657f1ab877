import { Injectable } from '@nestjs/common';
import { ClockPort } from '../../domain/ports/clock.port';

/** Reloj real del proceso */
@Injectable()
export class SystemClock implements ClockPort {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((r) => setTimeout(r, ms));
  }

  random(): number {
    return Math.random();
  }
}
