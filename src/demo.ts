import { createParkingEngine } from "./services/parkingEngine";
import { parseAllocationRequest } from "./dtos/vehicle.dto";
import { consoleLogger } from "./infra/logger";

async function demo() {
  const engine = await createParkingEngine({
    config: { topology: { levels: 1, perLevel: {
      Small: { Regular: 2, VIP: 1, EV: 1 },
      Medium: { Regular: 2, VIP: 1, EV: 1 },
      Large: { Regular: 1, VIP: 0, EV: 0 }
    } } }
  });
  engine.subscribe(event => consoleLogger.info(`event ${JSON.stringify(event)}`));

  await engine.purchasePass('ACME-FLEET', 'Medium');

  const regular = await engine.allocate(parseAllocationRequest({ vehicle_type: 'medium', customer_type: 'regular', license_plate: 'ABC123' }));
  const vip = await engine.allocate(parseAllocationRequest({
    vehicle_type: 'medium', customer_type: 'vip', license_plate: 'VIP-1', customer_key: 'ACME-FLEET'
  }));
  console.log('Checked in:', regular, vip);

  // simulate wait
  await new Promise(r => setTimeout(r, 100));

  console.log('Checked out:', await engine.release(regular.ticketId), await engine.release(vip.ticketId));
  console.log('Status:', JSON.stringify(engine.status().counters));
}

demo().catch(err => console.error(err));
