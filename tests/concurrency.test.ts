import { createParkingEngine, ParkingEngine } from "../src/services/parkingEngine";
import { InMemorySlotInventory, InMemoryTicketRegistry, InMemoryVipPassRegistry } from "../src/infra/inMemoryRepos";
import { SerialExecutor } from "../src/infra/serialExecutor";
import { PricingTable } from "../src/services/pricingTable";
import { resolveParkingConfig } from "../src/config/parkingConfig";
import { Slot, SlotStatus } from "../src/dtos/slot.dto";
import { Ticket } from "../src/dtos/ticket.dto";
import { NoSlotAvailableError, SlotConflictError } from "../src/errors";
import { ManualClock, quietLogger, sequentialIds, slot } from "./helpers";

/** Loses the first `losses` occupy attempts to a rival writer. */
class RacingInventory extends InMemorySlotInventory {
  constructor(slots: Slot[], private losses: number) {
    super(slots);
  }

  async trySet(slotId: string, expected: SlotStatus, next: SlotStatus, ticketId: string | null): Promise<Slot> {
    if (next === 'Occupied' && this.losses > 0) {
      this.losses--;
      await super.trySet(slotId, 'Free', 'Occupied', `rival-${this.losses}`);
    }
    return super.trySet(slotId, expected, next, ticketId);
  }
}

/** A ticket store that goes away between freeing the slot and recording the release. */
class OfflineOnReleaseRegistry extends InMemoryTicketRegistry {
  async release(): Promise<Ticket> {
    throw new Error('ticket store offline');
  }
}

function engineWith(inventory: InMemorySlotInventory) {
  return createParkingEngine({ inventory, clock: new ManualClock(), logger: quietLogger(), ids: sequentialIds() });
}

test('N concurrent allocations against K slots give exactly min(N, K) successes', async () => {
  const inventory = new InMemorySlotInventory([
    slot(1, 1, 'Small'),
    slot(1, 2, 'Small'),
    slot(1, 3, 'Medium'),
    slot(2, 1, 'Large', 'EV'),
    slot(2, 2, 'Medium', 'VIP')
  ]);
  const engine = await engineWith(inventory);

  const results = await Promise.allSettled(
    Array.from({ length: 12 }, (_, i) => engine.allocate({ plate: `RUSH-${i}`, size: 'Small', customerType: 'Regular', isEV: false }))
  );

  const won = results.flatMap(r => (r.status === 'fulfilled' ? [r.value.slotId] : []));
  const lost = results.flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
  expect(won).toHaveLength(5);
  expect(new Set(won).size).toBe(5);
  expect(lost).toHaveLength(7);
  expect(lost.every(e => e instanceof NoSlotAvailableError)).toBe(true);
  expect(engine.status().counters.available).toBe(0);
});

test('allocations are served in arrival order', async () => {
  const engine = await engineWith(new InMemorySlotInventory([slot(1, 1, 'Small'), slot(1, 2, 'Small')]));
  const [a, b] = await Promise.all([
    engine.allocate({ plate: 'A', size: 'Small', customerType: 'Regular', isEV: false }),
    engine.allocate({ plate: 'B', size: 'Small', customerType: 'Regular', isEV: false })
  ]);
  expect([a.slotId, b.slotId]).toEqual(['L1-001', 'L1-002']);
});

test('concurrent releases of one ticket succeed once', async () => {
  const engine = await engineWith(new InMemorySlotInventory([slot(1, 1, 'Small')]));
  const { ticketId } = await engine.allocate({ plate: 'R-1', size: 'Small', customerType: 'Regular', isEV: false });

  const results = await Promise.allSettled([engine.release(ticketId), engine.release(ticketId), engine.release(ticketId)]);
  expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'rejected']);
});

test('reads during a pending allocation see the last committed state', async () => {
  const engine = await engineWith(new InMemorySlotInventory([slot(1, 1, 'Small')]));
  const pending = engine.allocate({ plate: 'P-1', size: 'Small', customerType: 'Regular', isEV: false });

  expect(engine.snapshot()[0].status).toBe('Free');
  await pending;
  expect(engine.snapshot()[0].status).toBe('Occupied');
});

test('a lost compare-and-set is retried once against fresh inventory', async () => {
  const engine = await engineWith(new RacingInventory([slot(1, 1, 'Small'), slot(1, 2, 'Small')], 1));

  const result = await engine.allocate({ plate: 'RACE-1', size: 'Small', customerType: 'Regular', isEV: false });

  expect(result).toMatchObject({ ticketId: 'T2', slotId: 'L1-002' });
  await expect(engine.getTicket('T1')).rejects.toThrow('Unknown ticket T1');
});

test('a second lost compare-and-set surfaces SlotConflict and leaves no ticket', async () => {
  const engine = await engineWith(new RacingInventory([slot(1, 1, 'Small'), slot(1, 2, 'Small'), slot(1, 3, 'Small')], 2));

  await expect(engine.allocate({ plate: 'RACE-2', size: 'Small', customerType: 'Regular', isEV: false }))
    .rejects.toThrow(SlotConflictError);
  expect(engine.occupiedSlots()).toHaveLength(0);

  // the plate is not left holding a phantom ticket
  await expect(engine.allocate({ plate: 'RACE-2', size: 'Small', customerType: 'Regular', isEV: false }))
    .resolves.toMatchObject({ slotId: 'L1-003' });
});

test('a failed ticket release puts the slot back under its ticket', async () => {
  const inventory = new InMemorySlotInventory([slot(1, 1, 'Small')]);
  const engine = await ParkingEngine.create({
    inventory,
    tickets: new OfflineOnReleaseRegistry(sequentialIds()),
    passes: new InMemoryVipPassRegistry(sequentialIds()),
    pricing: new PricingTable(resolveParkingConfig()),
    clock: new ManualClock(),
    logger: quietLogger()
  });
  const { ticketId } = await engine.allocate({ plate: 'OFF-1', size: 'Small', customerType: 'Regular', isEV: false });

  await expect(engine.release(ticketId)).rejects.toThrow('ticket store offline');

  expect(await inventory.findById('L1-001')).toMatchObject({ status: 'Occupied', ticketId: 'T1' });
  expect((await engine.getTicket(ticketId)).state).toBe('Active');
  expect(engine.snapshot()[0]).toMatchObject({ status: 'Occupied', ticketId: 'T1' });
});

test('SerialExecutor runs tasks one at a time and survives failures', async () => {
  const serial = new SerialExecutor();
  const trace: string[] = [];
  const task = (name: string, fail = false) => async () => {
    trace.push(`start ${name}`);
    await new Promise(resolve => setImmediate(resolve));
    trace.push(`end ${name}`);
    if (fail) throw new Error(name);
    return name;
  };

  const results = await Promise.allSettled([serial.run(task('a')), serial.run(task('b', true)), serial.run(task('c'))]);

  expect(trace).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  expect(serial.size).toBe(0);
});
