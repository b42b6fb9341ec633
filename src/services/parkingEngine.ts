import { AllocationRequest, SizeClass, isCustomerType, isSizeClass } from "../dtos/vehicle.dto";
import { SlotView } from "../dtos/slot.dto";
import { Ticket } from "../dtos/ticket.dto";
import { EngineEventListener } from "../dtos/events.dto";
import {
  AllocationResult,
  LevelStatus,
  LotStatus,
  OccupiedSlot,
  PassPurchaseResult,
  ReleaseResult
} from "../dtos/results.dto";
import { IAllocationPolicy, SelectionRequest } from "../interfaces/allocator";
import { IFeeCalculator } from "../interfaces/feeCalculator";
import { IEventPublisher } from "../interfaces/eventPublisher";
import { ISlotInventory, ITicketRegistry, IVipPassRegistry } from "../interfaces/repositories";
import {
  DuplicateVehicleError,
  InvalidRequestError,
  InvalidTicketError,
  SlotConflictError,
  isParkingError
} from "../errors";
import { ParkingConfigOverrides, resolveParkingConfig } from "../config/parkingConfig";
import { buildSlots } from "../config/topology";
import { InMemorySlotInventory, InMemoryTicketRegistry, InMemoryVipPassRegistry } from "../infra/inMemoryRepos";
import { InMemoryEventBus } from "../infra/eventBus";
import { SerialExecutor } from "../infra/serialExecutor";
import { Clock, HOUR_MS, hoursBetween, systemClock } from "../infra/clock";
import { IdGenerator, uuidIds } from "../infra/ids";
import { Logger, consoleLogger } from "../infra/logger";
import { SectionPriorityAllocator } from "./sectionPriorityAllocator";
import { HourlyFeeCalculator } from "./hourlyFeeCalculator";
import { PricingTable } from "./pricingTable";

export interface ParkingEngineDeps {
  inventory: ISlotInventory;
  tickets: ITicketRegistry;
  passes: IVipPassRegistry;
  pricing: PricingTable;
  policy?: IAllocationPolicy;
  feeCalculator?: IFeeCalculator;
  events?: IEventPublisher;
  clock?: Clock;
  logger?: Logger;
}

// what readers see between commits
interface PublishedState {
  slots: readonly SlotView[];
  activeTickets: readonly Readonly<Ticket>[];
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Single entry point for every mutation of slots, tickets and passes.
 * Mutations run one at a time through a SerialExecutor; reads return the
 * frozen state published by the last committed mutation and never wait.
 */
export class ParkingEngine {
  private readonly inventory: ISlotInventory;
  private readonly tickets: ITicketRegistry;
  private readonly passes: IVipPassRegistry;
  private readonly pricing: PricingTable;
  private readonly policy: IAllocationPolicy;
  private readonly feeCalculator: IFeeCalculator;
  private readonly events: IEventPublisher;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly serial = new SerialExecutor();
  private published: PublishedState = Object.freeze({ slots: [], activeTickets: [] });

  private constructor(deps: ParkingEngineDeps) {
    this.inventory = deps.inventory;
    this.tickets = deps.tickets;
    this.passes = deps.passes;
    this.pricing = deps.pricing;
    this.logger = deps.logger ?? consoleLogger;
    this.policy = deps.policy ?? new SectionPriorityAllocator();
    this.feeCalculator = deps.feeCalculator ?? new HourlyFeeCalculator(deps.pricing);
    this.events = deps.events ?? new InMemoryEventBus(this.logger);
    this.clock = deps.clock ?? systemClock;
  }

  static async create(deps: ParkingEngineDeps): Promise<ParkingEngine> {
    const engine = new ParkingEngine(deps);
    await engine.publish();
    return engine;
  }

  async allocate(request: AllocationRequest): Promise<AllocationResult> {
    this.validateRequest(request);
    return this.serial.run(async () => {
      try {
        return await this.allocateLocked(request);
      } catch (err) {
        if (isParkingError(err)) this.logger.warn(`Allocation refused for ${request.plate}: ${err.message}`);
        throw err;
      }
    });
  }

  async release(ticketId: string): Promise<ReleaseResult> {
    if (typeof ticketId !== 'string' || ticketId.trim() === '') {
      throw new InvalidRequestError('ticket', 'a ticket id is required');
    }
    const id = ticketId.trim();
    return this.serial.run(async () => {
      try {
        return await this.releaseLocked(id);
      } catch (err) {
        if (isParkingError(err)) this.logger.warn(`Release refused for ticket ${id}: ${err.message}`);
        throw err;
      }
    });
  }

  async purchasePass(customerKey: string, size: SizeClass): Promise<PassPurchaseResult> {
    if (typeof customerKey !== 'string' || customerKey.trim() === '') {
      throw new InvalidRequestError('customer_key', 'a customer key is required');
    }
    if (!isSizeClass(size)) throw new InvalidRequestError('size', `unknown size class "${String(size)}"`);
    const key = customerKey.trim();

    return this.serial.run(async () => {
      const price = this.pricing.monthlyPassPrice(size);
      const pass = await this.passes.purchase(key, size, this.clock.now(), price);
      this.logger.info(`VIP pass ${pass.id} for ${key} (${size}) valid until ${pass.expiresAt.toISOString()}`);
      return { passId: pass.id, expiry: pass.expiresAt, amountCharged: price, amountPaid: pass.amountPaid };
    });
  }

  snapshot(): readonly SlotView[] {
    return this.published.slots;
  }

  occupiedSlots(): OccupiedSlot[] {
    const bySlot = new Map(this.published.activeTickets.map((t): [string, Readonly<Ticket>] => [t.slotId, t]));
    const result: OccupiedSlot[] = [];
    for (const slot of this.published.slots) {
      const ticket = bySlot.get(slot.id);
      if (slot.status === 'Occupied' && ticket) {
        result.push({ slotId: slot.id, level: slot.level, section: slot.section, ticket: { ...ticket } });
      }
    }
    return result;
  }

  status(): LotStatus {
    const now = this.clock.now();
    const { slots, activeTickets } = this.published;
    const levels = new Map<number, LevelStatus>();

    for (const slot of slots) {
      let level = levels.get(slot.level);
      if (!level) {
        level = { level: slot.level, bySize: this.emptyBuckets() };
        levels.set(slot.level, level);
      }
      const bucket = level.bySize[slot.size][slot.section];
      if (slot.status === 'Occupied') bucket.occupied++;
      else bucket.free++;
    }

    const occupied = slots.filter(s => s.status === 'Occupied').length;
    return {
      counters: {
        total: slots.length,
        occupied,
        available: slots.length - occupied,
        overstayed: activeTickets.filter(t => this.isOverstay(t, now)).length
      },
      levels: [...levels.values()],
      timestamp: now.toISOString()
    };
  }

  /** Any ticket ever issued, Released ones included. */
  async getTicket(ticketId: string): Promise<Ticket> {
    return this.tickets.lookup(ticketId);
  }

  subscribe(listener: EngineEventListener): () => void {
    return this.events.subscribe(listener);
  }

  private async allocateLocked(request: AllocationRequest): Promise<AllocationResult> {
    const now = this.clock.now();
    const customerKey = request.customerKey ?? request.plate;
    const pass = await this.passes.activePass(customerKey, request.size, now);
    const vipEntitled = request.customerType === 'VIP' && pass !== undefined;

    // one vehicle never holds two slots; only a pass holder may park several vehicles
    const existing = await this.tickets.findActiveByPlate(request.plate);
    if (existing) throw new DuplicateVehicleError(request.plate, existing.id);
    if (!vipEntitled) {
      const sameCustomer = await this.tickets.findActiveByCustomer(customerKey);
      if (sameCustomer) throw new DuplicateVehicleError(request.plate, sameCustomer.id, customerKey);
    }

    const limit = this.pricing.timeLimitHours(request.customerType);
    const expiresAt = pass ? pass.expiresAt : limit === null ? null : new Date(now.getTime() + limit * HOUR_MS);

    const selection: SelectionRequest = { size: request.size, isEV: request.isEV, vipEntitled };
    let lastConflict: SlotConflictError | undefined;

    // one retry against refreshed inventory after a lost compare-and-set
    for (let attempt = 0; attempt < 2; attempt++) {
      const slot = this.policy.selectSlot(selection, await this.inventory.listSlots());
      const ticket = await this.tickets.create({
        plate: request.plate,
        customerKey,
        size: request.size,
        customerType: request.customerType,
        isEV: request.isEV,
        slotId: slot.id,
        level: slot.level,
        entryTime: now,
        multiVehicleAllowed: vipEntitled
      });

      try {
        await this.inventory.trySet(slot.id, 'Free', 'Occupied', ticket.id);
      } catch (err) {
        await this.tickets.discard(ticket.id);
        if (!(err instanceof SlotConflictError)) throw err;
        lastConflict = err;
        this.logger.warn(`Lost slot ${slot.id} while allocating ${request.plate}, attempt ${attempt + 1}`);
        continue;
      }

      await this.publish();
      this.logger.info(`Allocated ${slot.id} (level ${slot.level}, ${slot.section}) to ${request.plate}, ticket ${ticket.id}`);
      this.events.publish({ type: 'SlotOccupied', slotId: slot.id, ticketId: ticket.id, ts: now.toISOString() });
      return { ticketId: ticket.id, slotId: slot.id, level: slot.level, section: slot.section, entryTime: now, expiresAt };
    }

    throw lastConflict ?? new SlotConflictError('unknown', 'allocation did not settle');
  }

  private async releaseLocked(ticketId: string): Promise<ReleaseResult> {
    const ticket = await this.tickets.lookup(ticketId);
    if (ticket.state === 'Released') throw new InvalidTicketError(ticketId, 'released');

    const exitTime = this.clock.now();
    // the pass is bought per customer, whatever type the ticket was issued under
    const pass = await this.passes.activePass(ticket.customerKey, ticket.size, exitTime);
    const fee = this.feeCalculator.calculate(ticket, exitTime, pass !== undefined);
    const durationHours = round2(hoursBetween(ticket.entryTime, exitTime));
    const overstay = pass === undefined && this.isOverstay(ticket, exitTime);

    await this.inventory.trySet(ticket.slotId, 'Occupied', 'Free', ticket.id);
    try {
      await this.tickets.release(ticketId, { exitTime, fee, durationHours, overstay });
    } catch (err) {
      await this.inventory.trySet(ticket.slotId, 'Free', 'Occupied', ticket.id);
      throw err;
    }

    await this.publish();
    this.logger.info(`Released ${ticket.slotId} from ticket ${ticketId}, fee ${fee}, ${durationHours}h${overstay ? ' (overstay)' : ''}`);
    this.events.publish({ type: 'SlotFreed', slotId: ticket.slotId, ticketId, fee, ts: exitTime.toISOString() });
    return { ticketId, slotId: ticket.slotId, fee, durationHours, overstay };
  }

  private isOverstay(ticket: Readonly<Ticket>, at: Date): boolean {
    const limit = this.pricing.timeLimitHours(ticket.customerType);
    return limit !== null && hoursBetween(ticket.entryTime, at) > limit;
  }

  private validateRequest(request: AllocationRequest): void {
    if (typeof request.plate !== 'string' || request.plate.trim() === '') {
      throw new InvalidRequestError('license_plate', 'a license plate is required');
    }
    if (!isSizeClass(request.size)) {
      throw new InvalidRequestError('vehicle_type', `unknown size class "${String(request.size)}"`);
    }
    if (!isCustomerType(request.customerType)) {
      throw new InvalidRequestError('customer_type', `unknown customer type "${String(request.customerType)}"`);
    }
    if (typeof request.isEV !== 'boolean') throw new InvalidRequestError('is_ev', 'expected a boolean');
    if (request.customerKey !== undefined && request.customerKey.trim() === '') {
      throw new InvalidRequestError('customer_key', 'expected a non-empty string');
    }
  }

  private emptyBuckets(): LevelStatus['bySize'] {
    const bySection = () => ({
      Regular: { free: 0, occupied: 0 },
      VIP: { free: 0, occupied: 0 },
      EV: { free: 0, occupied: 0 }
    });
    return { Small: bySection(), Medium: bySection(), Large: bySection() };
  }

  private async publish(): Promise<void> {
    const [slots, activeTickets] = await Promise.all([this.inventory.listSlots(), this.tickets.listActive()]);
    this.published = Object.freeze({
      slots: Object.freeze(slots.map(s => Object.freeze(s))),
      activeTickets: Object.freeze(activeTickets.map(t => Object.freeze(t)))
    });
  }
}

export interface EngineOptions {
  config?: ParkingConfigOverrides;
  clock?: Clock;
  logger?: Logger;
  ids?: IdGenerator;
  policy?: IAllocationPolicy;
  events?: IEventPublisher;
  inventory?: ISlotInventory;
}

/** Wires the in-memory registries and the default policy from config. */
export async function createParkingEngine(options: EngineOptions = {}): Promise<ParkingEngine> {
  const config = resolveParkingConfig(options.config);
  const ids = options.ids ?? uuidIds;
  return ParkingEngine.create({
    inventory: options.inventory ?? new InMemorySlotInventory(buildSlots(config.topology)),
    tickets: new InMemoryTicketRegistry(ids),
    passes: new InMemoryVipPassRegistry(ids, config.passDays),
    pricing: new PricingTable(config),
    policy: options.policy,
    events: options.events,
    clock: options.clock,
    logger: options.logger
  });
}
