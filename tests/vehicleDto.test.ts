import { parseAllocationRequest } from "../src/dtos/vehicle.dto";
import { InvalidRequestError } from "../src/errors";

test('normalizes a transport payload', () => {
  expect(parseAllocationRequest({ vehicle_type: 'small', customer_type: 'vip', is_ev: true, license_plate: '  KA-01  ' }))
    .toEqual({ plate: 'KA-01', size: 'Small', customerType: 'VIP', isEV: true });
});

test('accepts camelCase keys and a customer key', () => {
  expect(parseAllocationRequest({ size: 'LARGE', customerType: 'Regular', plate: 'BUS-9', customerKey: 'depot' }))
    .toEqual({ plate: 'BUS-9', size: 'Large', customerType: 'Regular', isEV: false, customerKey: 'depot' });
});

test('names the field that failed', () => {
  expect(() => parseAllocationRequest({ vehicle_type: 'truck', customer_type: 'regular', license_plate: 'X' }))
    .toThrow('Invalid vehicle_type: unknown size class "truck"');
  expect(() => parseAllocationRequest({ vehicle_type: 'small', customer_type: 'gold', license_plate: 'X' }))
    .toThrow('Invalid customer_type: unknown customer type "gold"');
  expect(() => parseAllocationRequest({ vehicle_type: 'small', customer_type: 'regular', license_plate: ' ' }))
    .toThrow('Invalid license_plate: a license plate is required');
  expect(() => parseAllocationRequest({ vehicle_type: 'small', customer_type: 'regular', license_plate: 'X', is_ev: 'yes' }))
    .toThrow('Invalid is_ev: expected a boolean');
  expect(() => parseAllocationRequest(null)).toThrow(InvalidRequestError);
});
