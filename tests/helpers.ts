import { Clock } from "../src/infra/clock";
import { IdGenerator } from "../src/infra/ids";
import { Logger } from "../src/infra/logger";
import { Slot, Section, slotId } from "../src/dtos/slot.dto";
import { SizeClass } from "../src/dtos/vehicle.dto";

export class ManualClock implements Clock {
  private current: number;

  constructor(start = '2024-03-01T08:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceMinutes(minutes: number): void {
    this.current += minutes * 60_000;
  }

  advanceDays(days: number): void {
    this.current += days * 24 * 60 * 60_000;
  }
}

export function sequentialIds(): IdGenerator {
  let tickets = 0;
  let passes = 0;
  return {
    ticketId: () => `T${++tickets}`,
    passId: () => `P${++passes}`
  };
}

export function quietLogger(): Logger & { info: jest.Mock; warn: jest.Mock; error: jest.Mock } {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export function slot(level: number, index: number, size: SizeClass, section: Section = 'Regular'): Slot {
  return { id: slotId(level, index), level, index, size, section, status: 'Free', ticketId: null };
}

/** Lets setImmediate callbacks queued so far run. */
export function flushEvents(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
