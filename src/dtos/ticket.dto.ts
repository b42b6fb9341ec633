import { CustomerType, SizeClass } from "./vehicle.dto";

export type TicketState = 'Active' | 'Released';

export interface Ticket {
  id: string;
  plate: string;
  customerKey: string;
  size: SizeClass;
  customerType: CustomerType;
  isEV: boolean;
  slotId: string;
  level: number;
  entryTime: Date;
  state: TicketState;
  exitTime?: Date | null;
  fee?: number | null;
  durationHours?: number | null;
  overstay?: boolean;
}

export interface ReleaseOutcome {
  exitTime: Date;
  fee: number;
  durationHours: number;
  overstay: boolean;
}
