import { Slot, SlotStatus } from "../dtos/slot.dto";
import { ReleaseOutcome, Ticket } from "../dtos/ticket.dto";
import { VipPass, isPassActive } from "../dtos/pass.dto";
import { SizeClass } from "../dtos/vehicle.dto";
import { ISlotInventory, ITicketRegistry, IVipPassRegistry, NewTicket } from "../interfaces/repositories";
import { DuplicateVehicleError, InvalidTicketError, SlotConflictError } from "../errors";
import { IdGenerator, uuidIds } from "./ids";
import { addDays } from "./clock";

function cloneSlot(slot: Slot): Slot {
  return { ...slot };
}

function cloneTicket(ticket: Ticket): Ticket {
  return { ...ticket };
}

export class InMemorySlotInventory implements ISlotInventory {
  private slots = new Map<string, Slot>();

  constructor(initial: Slot[] = []) {
    const ordered = initial.slice().sort((a, b) => a.level - b.level || a.index - b.index);
    for (const slot of ordered) {
      if (this.slots.has(slot.id)) throw new Error(`Duplicate slot id ${slot.id}`);
      this.slots.set(slot.id, cloneSlot(slot));
    }
  }

  async listSlots(): Promise<Slot[]> {
    return [...this.slots.values()].map(cloneSlot);
  }

  async findById(slotId: string): Promise<Slot | undefined> {
    const slot = this.slots.get(slotId);
    return slot ? cloneSlot(slot) : undefined;
  }

  /**
   * Occupied → Free also checks the back-reference when `ticketId` is given,
   * so a stale release cannot free a slot re-assigned to another ticket.
   */
  async trySet(slotId: string, expected: SlotStatus, next: SlotStatus, ticketId: string | null): Promise<Slot> {
    const slot = this.slots.get(slotId);
    if (!slot) throw new SlotConflictError(slotId, 'unknown slot');
    if (slot.status !== expected) {
      throw new SlotConflictError(slotId, `expected ${expected} but found ${slot.status}`);
    }
    if (next === 'Occupied') {
      if (ticketId === null) throw new SlotConflictError(slotId, 'occupying requires a ticket');
      slot.ticketId = ticketId;
    } else {
      if (expected === 'Occupied' && ticketId !== null && slot.ticketId !== ticketId) {
        throw new SlotConflictError(slotId, `held by ticket ${slot.ticketId}, not ${ticketId}`);
      }
      slot.ticketId = null;
    }
    slot.status = next;
    return cloneSlot(slot);
  }
}

export class InMemoryTicketRegistry implements ITicketRegistry {
  private tickets = new Map<string, Ticket>();
  // plate -> its one active ticket
  private activeByPlate = new Map<string, string>();
  // customerKey -> ids of its active tickets
  private activeByCustomer = new Map<string, Set<string>>();

  constructor(private ids: IdGenerator = uuidIds) {}

  async create(input: NewTicket): Promise<Ticket> {
    const samePlate = this.activeByPlate.get(input.plate);
    if (samePlate !== undefined) throw new DuplicateVehicleError(input.plate, samePlate);
    if (!input.multiVehicleAllowed) {
      const sameCustomer = await this.findActiveByCustomer(input.customerKey);
      if (sameCustomer) throw new DuplicateVehicleError(input.plate, sameCustomer.id, input.customerKey);
    }

    let id = this.ids.ticketId();
    while (this.tickets.has(id)) id = this.ids.ticketId();

    const ticket: Ticket = {
      id,
      plate: input.plate,
      customerKey: input.customerKey,
      size: input.size,
      customerType: input.customerType,
      isEV: input.isEV,
      slotId: input.slotId,
      level: input.level,
      entryTime: input.entryTime,
      state: 'Active',
      exitTime: null,
      fee: null,
      durationHours: null
    };
    this.tickets.set(id, ticket);
    this.activeByPlate.set(input.plate, id);
    const forCustomer = this.activeByCustomer.get(input.customerKey) ?? new Set<string>();
    forCustomer.add(id);
    this.activeByCustomer.set(input.customerKey, forCustomer);
    return cloneTicket(ticket);
  }

  async lookup(ticketId: string): Promise<Ticket> {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) throw new InvalidTicketError(ticketId, 'unknown');
    return cloneTicket(ticket);
  }

  async release(ticketId: string, outcome: ReleaseOutcome): Promise<Ticket> {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) throw new InvalidTicketError(ticketId, 'unknown');
    if (ticket.state === 'Released') throw new InvalidTicketError(ticketId, 'released');

    ticket.state = 'Released';
    ticket.exitTime = outcome.exitTime;
    ticket.fee = outcome.fee;
    ticket.durationHours = outcome.durationHours;
    ticket.overstay = outcome.overstay;
    this.forgetActive(ticket);
    return cloneTicket(ticket);
  }

  async findActiveByPlate(plate: string): Promise<Ticket | undefined> {
    const id = this.activeByPlate.get(plate);
    const ticket = id === undefined ? undefined : this.tickets.get(id);
    return ticket ? cloneTicket(ticket) : undefined;
  }

  async findActiveByCustomer(customerKey: string): Promise<Ticket | undefined> {
    for (const id of this.activeByCustomer.get(customerKey) ?? []) {
      const ticket = this.tickets.get(id);
      if (ticket) return cloneTicket(ticket);
    }
    return undefined;
  }

  async listActive(): Promise<Ticket[]> {
    return [...this.tickets.values()].filter(t => t.state === 'Active').map(cloneTicket);
  }

  async discard(ticketId: string): Promise<void> {
    const ticket = this.tickets.get(ticketId);
    if (!ticket || ticket.state !== 'Active') return;
    this.forgetActive(ticket);
    this.tickets.delete(ticketId);
  }

  private forgetActive(ticket: Ticket): void {
    if (this.activeByPlate.get(ticket.plate) === ticket.id) this.activeByPlate.delete(ticket.plate);
    const ids = this.activeByCustomer.get(ticket.customerKey);
    if (!ids) return;
    ids.delete(ticket.id);
    if (ids.size === 0) this.activeByCustomer.delete(ticket.customerKey);
  }
}

export class InMemoryVipPassRegistry implements IVipPassRegistry {
  private passes = new Map<string, VipPass>();

  constructor(private ids: IdGenerator = uuidIds, private passDays = 30) {}

  async purchase(customerKey: string, size: SizeClass, now: Date, price: number): Promise<VipPass> {
    const key = this.key(customerKey, size);
    const current = this.passes.get(key);

    let pass: VipPass;
    if (current && isPassActive(current, size, now)) {
      // extend from the later of now and the current expiry
      pass = {
        ...current,
        expiresAt: addDays(current.expiresAt, this.passDays),
        amountPaid: current.amountPaid + price
      };
    } else {
      pass = {
        id: this.ids.passId(),
        customerKey,
        size,
        issuedAt: now,
        expiresAt: addDays(now, this.passDays),
        amountPaid: price
      };
    }
    this.passes.set(key, pass);
    return { ...pass };
  }

  async activePass(customerKey: string, size: SizeClass, now: Date): Promise<VipPass | undefined> {
    const pass = this.passes.get(this.key(customerKey, size));
    return pass && isPassActive(pass, size, now) ? { ...pass } : undefined;
  }

  private key(customerKey: string, size: SizeClass): string {
    return `${customerKey}::${size}`;
  }
}
