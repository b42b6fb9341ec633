import { IFeeCalculator } from "../interfaces/feeCalculator";
import { Ticket } from "../dtos/ticket.dto";
import { hoursBetween } from "../infra/clock";
import { PricingTable } from "./pricingTable";

export class HourlyFeeCalculator implements IFeeCalculator {
  constructor(private pricing: PricingTable) {}

  /** Started hours at the size's rate, never below the minimum; zero under an active pass. */
  calculate(ticket: Ticket, exitTime: Date, passActive: boolean): number {
    if (passActive) return 0;
    const hours = Math.ceil(hoursBetween(ticket.entryTime, exitTime));
    return Math.max(this.pricing.minimumCharge(), hours * this.pricing.hourlyRate(ticket.size));
  }
}
