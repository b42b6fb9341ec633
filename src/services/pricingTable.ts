import { CustomerType, SizeClass } from "../dtos/vehicle.dto";
import { ParkingConfigValues } from "../config/parkingConfig";

/** Read-only rate lookups; built once from resolved config. */
export class PricingTable {
  private readonly hourly: Readonly<Record<SizeClass, number>>;
  private readonly passes: Readonly<Record<SizeClass, number>>;
  private readonly limits: Readonly<Record<CustomerType, number | null>>;
  private readonly minimum: number;

  constructor(config: ParkingConfigValues) {
    this.hourly = Object.freeze({ ...config.hourlyRates });
    this.passes = Object.freeze({ ...config.monthlyPassPrices });
    this.limits = Object.freeze({ ...config.timeLimitHours });
    this.minimum = config.minimumCharge;
  }

  hourlyRate(size: SizeClass): number {
    return this.hourly[size];
  }

  minimumCharge(): number {
    return this.minimum;
  }

  monthlyPassPrice(size: SizeClass): number {
    return this.passes[size];
  }

  timeLimitHours(customerType: CustomerType): number | null {
    return this.limits[customerType];
  }
}
