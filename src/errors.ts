export type ParkingErrorKind =
  | 'NoSlotAvailable'
  | 'DuplicateVehicle'
  | 'InvalidTicket'
  | 'SlotConflict'
  | 'InvalidRequest'
  | 'InvalidConfig';

/**
 * Base class for every failure the engine reports to its caller.
 * `kind` is stable and safe to switch on; `retryable` tells the caller
 * whether the same request may succeed later without changes.
 */
export abstract class ParkingError extends Error {
  abstract readonly kind: ParkingErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoSlotAvailableError extends ParkingError {
  readonly kind = 'NoSlotAvailable';
  readonly retryable = true;

  constructor(size: string) {
    super(`No suitable ${size} slot available`);
  }
}

export class DuplicateVehicleError extends ParkingError {
  readonly kind = 'DuplicateVehicle';
  readonly retryable = false;

  constructor(readonly plate: string, readonly activeTicketId: string, readonly customerKey?: string) {
    super(customerKey === undefined
      ? `Vehicle ${plate} already holds active ticket ${activeTicketId}`
      : `Customer ${customerKey} already holds active ticket ${activeTicketId}; ${plate} needs a VIP pass to park alongside`);
  }
}

export class InvalidTicketError extends ParkingError {
  readonly kind = 'InvalidTicket';
  readonly retryable = false;

  constructor(readonly ticketId: string, reason: 'unknown' | 'released') {
    super(reason === 'unknown' ? `Unknown ticket ${ticketId}` : `Ticket ${ticketId} is already released`);
  }
}

export class SlotConflictError extends ParkingError {
  readonly kind = 'SlotConflict';
  readonly retryable = true;

  constructor(readonly slotId: string, detail: string) {
    super(`Slot ${slotId} changed concurrently: ${detail}`);
  }
}

export class InvalidRequestError extends ParkingError {
  readonly kind = 'InvalidRequest';
  readonly retryable = false;

  constructor(readonly field: string, detail: string) {
    super(`Invalid ${field}: ${detail}`);
  }
}

export class ConfigError extends ParkingError {
  readonly kind = 'InvalidConfig';
  readonly retryable = false;

  constructor(readonly path: string, detail: string) {
    super(`Invalid parking config at ${path}: ${detail}`);
  }
}

export function isParkingError(err: unknown): err is ParkingError {
  return err instanceof ParkingError;
}
