import { InvalidRequestError } from "../errors";

export type SizeClass = 'Small' | 'Medium' | 'Large';
export type CustomerType = 'Regular' | 'VIP';

export const SIZE_CLASSES: readonly SizeClass[] = ['Small', 'Medium', 'Large'];
export const CUSTOMER_TYPES: readonly CustomerType[] = ['Regular', 'VIP'];

export interface AllocationRequest {
  plate: string;
  size: SizeClass;
  customerType: CustomerType;
  isEV: boolean;
  // pass-holder identity; the plate when omitted
  customerKey?: string;
}

export function isSizeClass(value: unknown): value is SizeClass {
  return SIZE_CLASSES.some(size => size === value);
}

export function isCustomerType(value: unknown): value is CustomerType {
  return CUSTOMER_TYPES.some(type => type === value);
}

export function parseSizeClass(value: unknown, field = 'size'): SizeClass {
  if (typeof value !== 'string') throw new InvalidRequestError(field, 'expected small, medium or large');
  const lower = value.trim().toLowerCase();
  const normalized = lower.charAt(0).toUpperCase() + lower.slice(1);
  if (!isSizeClass(normalized)) throw new InvalidRequestError(field, `unknown size class "${value}"`);
  return normalized;
}

export function parseCustomerType(value: unknown, field = 'customer_type'): CustomerType {
  if (typeof value !== 'string') throw new InvalidRequestError(field, 'expected regular or vip');
  switch (value.trim().toLowerCase()) {
    case 'regular': return 'Regular';
    case 'vip': return 'VIP';
    default: throw new InvalidRequestError(field, `unknown customer type "${value}"`);
  }
}

function readField(raw: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined) return raw[key];
  }
  return undefined;
}

/**
 * Turns a loosely-typed payload (as a transport layer would receive it) into an
 * AllocationRequest. Accepts both snake_case and camelCase keys and is
 * case-insensitive for size and customer type.
 */
export function parseAllocationRequest(raw: unknown): AllocationRequest {
  if (typeof raw !== 'object' || raw === null) {
    throw new InvalidRequestError('request', 'expected an object');
  }
  const body: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const size = parseSizeClass(readField(body, 'vehicle_type', 'size'), 'vehicle_type');
  const customerType = parseCustomerType(readField(body, 'customer_type', 'customerType'));

  const plateValue = readField(body, 'license_plate', 'plate');
  if (typeof plateValue !== 'string' || plateValue.trim() === '') {
    throw new InvalidRequestError('license_plate', 'a license plate is required');
  }

  const isEVValue = readField(body, 'is_ev', 'isEV') ?? false;
  if (typeof isEVValue !== 'boolean') throw new InvalidRequestError('is_ev', 'expected a boolean');

  const keyValue = readField(body, 'customer_key', 'customerKey');
  if (keyValue !== undefined && (typeof keyValue !== 'string' || keyValue.trim() === '')) {
    throw new InvalidRequestError('customer_key', 'expected a non-empty string');
  }

  return {
    plate: plateValue.trim(),
    size,
    customerType,
    isEV: isEVValue,
    ...(typeof keyValue === 'string' ? { customerKey: keyValue.trim() } : {})
  };
}
