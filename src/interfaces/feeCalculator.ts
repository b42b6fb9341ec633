import { Ticket } from "../dtos/ticket.dto";

export interface IFeeCalculator {
  calculate(ticket: Ticket, exitTime: Date, passActive: boolean): number;
}
