import { CustomerType, SizeClass, SIZE_CLASSES } from "../dtos/vehicle.dto";
import { Section, SECTIONS } from "../dtos/slot.dto";
import { ConfigError } from "../errors";

export type SectionCounts = Record<Section, number>;

/** Slots per size class and section, repeated on every level. */
export interface TopologyLayout {
  levels: number;
  perLevel: Record<SizeClass, SectionCounts>;
}

export interface ParkingConfigValues {
  hourlyRates: Record<SizeClass, number>;
  minimumCharge: number;
  monthlyPassPrices: Record<SizeClass, number>;
  passDays: number;
  // null means no limit
  timeLimitHours: Record<CustomerType, number | null>;
  topology: TopologyLayout;
}

export type ParkingConfigOverrides = Partial<Omit<ParkingConfigValues, 'topology'>> & {
  topology?: Partial<TopologyLayout>;
};

export const DEFAULT_PARKING_CONFIG: Readonly<ParkingConfigValues> = {
  hourlyRates: { Small: 20, Medium: 40, Large: 60 },
  minimumCharge: 20,
  monthlyPassPrices: { Small: 1050, Medium: 2100, Large: 3150 },
  passDays: 30,
  timeLimitHours: { Regular: 24, VIP: null },
  topology: {
    levels: 2,
    perLevel: {
      Small: { Regular: 4, VIP: 2, EV: 2 },
      Medium: { Regular: 6, VIP: 2, EV: 2 },
      Large: { Regular: 3, VIP: 1, EV: 1 }
    }
  }
};

function requireAmount(path: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) throw new ConfigError(path, `expected a non-negative number, got ${value}`);
}

function requireCount(path: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) throw new ConfigError(path, `expected an integer >= ${min}, got ${value}`);
}

export function validateParkingConfig(config: ParkingConfigValues): ParkingConfigValues {
  for (const size of SIZE_CLASSES) {
    requireAmount(`hourlyRates.${size}`, config.hourlyRates[size]);
    requireAmount(`monthlyPassPrices.${size}`, config.monthlyPassPrices[size]);
    for (const section of SECTIONS) {
      requireCount(`topology.perLevel.${size}.${section}`, config.topology.perLevel[size][section], 0);
    }
  }
  requireAmount('minimumCharge', config.minimumCharge);
  requireCount('passDays', config.passDays, 1);
  requireCount('topology.levels', config.topology.levels, 1);
  for (const [type, limit] of Object.entries(config.timeLimitHours)) {
    if (limit !== null && (!Number.isFinite(limit) || limit <= 0)) {
      throw new ConfigError(`timeLimitHours.${type}`, `expected a positive number or null, got ${limit}`);
    }
  }
  return config;
}

export function resolveParkingConfig(overrides: ParkingConfigOverrides = {}): ParkingConfigValues {
  const base = DEFAULT_PARKING_CONFIG;
  return validateParkingConfig({
    hourlyRates: { ...base.hourlyRates, ...overrides.hourlyRates },
    minimumCharge: overrides.minimumCharge ?? base.minimumCharge,
    monthlyPassPrices: { ...base.monthlyPassPrices, ...overrides.monthlyPassPrices },
    passDays: overrides.passDays ?? base.passDays,
    timeLimitHours: { ...base.timeLimitHours, ...overrides.timeLimitHours },
    topology: {
      levels: overrides.topology?.levels ?? base.topology.levels,
      perLevel: overrides.topology?.perLevel ?? base.topology.perLevel
    }
  });
}
