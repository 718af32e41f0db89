import { Injectable } from "@nestjs/common";

/** Wall clock in epoch milliseconds. Tests substitute a manual one. */
@Injectable()
export class Clock {
  now(): number {
    return Date.now();
  }

  isoNow(): string {
    return new Date(this.now()).toISOString();
  }
}
