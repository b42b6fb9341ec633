import { Slot, SlotStatus } from "../dtos/slot.dto";
import { ReleaseOutcome, Ticket } from "../dtos/ticket.dto";
import { VipPass } from "../dtos/pass.dto";
import { CustomerType, SizeClass } from "../dtos/vehicle.dto";

export interface ISlotInventory {
  listSlots(): Promise<Slot[]>;
  findById(slotId: string): Promise<Slot | undefined>;
  /**
   * Compare-and-set on a slot's status. Throws SlotConflictError when the slot
   * is unknown or its status is not `expected`.
   */
  trySet(slotId: string, expected: SlotStatus, next: SlotStatus, ticketId: string | null): Promise<Slot>;
}

export interface NewTicket {
  plate: string;
  customerKey: string;
  size: SizeClass;
  customerType: CustomerType;
  isEV: boolean;
  slotId: string;
  level: number;
  entryTime: Date;
  // lets several plates under one customerKey hold active tickets; never the same plate twice
  multiVehicleAllowed: boolean;
}

export interface ITicketRegistry {
  create(input: NewTicket): Promise<Ticket>;
  lookup(ticketId: string): Promise<Ticket>;
  release(ticketId: string, outcome: ReleaseOutcome): Promise<Ticket>;
  findActiveByPlate(plate: string): Promise<Ticket | undefined>;
  findActiveByCustomer(customerKey: string): Promise<Ticket | undefined>;
  listActive(): Promise<Ticket[]>;
  discard(ticketId: string): Promise<void>;
}

export interface IVipPassRegistry {
  purchase(customerKey: string, size: SizeClass, now: Date, price: number): Promise<VipPass>;
  activePass(customerKey: string, size: SizeClass, now: Date): Promise<VipPass | undefined>;
}
