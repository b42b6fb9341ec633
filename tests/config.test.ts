import { DEFAULT_PARKING_CONFIG, resolveParkingConfig } from "../src/config/parkingConfig";
import { buildSlots } from "../src/config/topology";
import { PricingTable } from "../src/services/pricingTable";
import { ConfigError } from "../src/errors";

test('defaults carry the monthly pass prices', () => {
  const pricing = new PricingTable(resolveParkingConfig());
  expect(pricing.monthlyPassPrice('Small')).toBe(1050);
  expect(pricing.monthlyPassPrice('Medium')).toBe(2100);
  expect(pricing.monthlyPassPrice('Large')).toBe(3150);
  expect(pricing.minimumCharge()).toBe(20);
  expect(pricing.timeLimitHours('Regular')).toBe(24);
  expect(pricing.timeLimitHours('VIP')).toBeNull();
});

test('overrides merge onto the defaults', () => {
  const config = resolveParkingConfig({ hourlyRates: { Small: 25, Medium: 40, Large: 60 }, minimumCharge: 30 });
  expect(config.hourlyRates.Small).toBe(25);
  expect(config.minimumCharge).toBe(30);
  expect(config.monthlyPassPrices).toEqual(DEFAULT_PARKING_CONFIG.monthlyPassPrices);
  expect(config.topology.levels).toBe(2);
});

test('rejects invalid values with the offending path', () => {
  expect(() => resolveParkingConfig({ minimumCharge: -1 })).toThrow(ConfigError);
  expect(() => resolveParkingConfig({ topology: { levels: 0 } })).toThrow('Invalid parking config at topology.levels: expected an integer >= 1, got 0');
  expect(() => resolveParkingConfig({ hourlyRates: { Small: Number.NaN, Medium: 40, Large: 60 } })).toThrow('hourlyRates.Small');
  expect(() => resolveParkingConfig({ timeLimitHours: { Regular: 0, VIP: null } })).toThrow('timeLimitHours.Regular');
});

test('builds slots level by level with per-level indexes', () => {
  const slots = buildSlots({
    levels: 2,
    perLevel: {
      Small: { Regular: 1, VIP: 0, EV: 1 },
      Medium: { Regular: 0, VIP: 1, EV: 0 },
      Large: { Regular: 0, VIP: 0, EV: 0 }
    }
  });
  expect(slots.map(s => `${s.id}:${s.size}:${s.section}`)).toEqual([
    'L1-001:Small:Regular',
    'L1-002:Small:EV',
    'L1-003:Medium:VIP',
    'L2-001:Small:Regular',
    'L2-002:Small:EV',
    'L2-003:Medium:VIP'
  ]);
  expect(slots.every(s => s.status === 'Free' && s.ticketId === null)).toBe(true);
});

test('the default topology has 46 slots', () => {
  expect(buildSlots(DEFAULT_PARKING_CONFIG.topology)).toHaveLength(46);
});
