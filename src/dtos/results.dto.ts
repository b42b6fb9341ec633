import { Section } from "./slot.dto";
import { SizeClass } from "./vehicle.dto";
import { Ticket } from "./ticket.dto";

export interface AllocationResult {
  ticketId: string;
  slotId: string;
  level: number;
  section: Section;
  entryTime: Date;
  // end of the allowed stay: pass expiry for a pass holder, null when unlimited
  expiresAt: Date | null;
}

export interface ReleaseResult {
  ticketId: string;
  slotId: string;
  fee: number;
  durationHours: number;
  overstay: boolean;
}

export interface PassPurchaseResult {
  passId: string;
  expiry: Date;
  amountCharged: number;
  // cumulative across extensions
  amountPaid: number;
}

export interface OccupiedSlot {
  slotId: string;
  level: number;
  section: Section;
  ticket: Ticket;
}

export interface StatusBucket {
  free: number;
  occupied: number;
}

export interface LevelStatus {
  level: number;
  bySize: Record<SizeClass, Record<Section, StatusBucket>>;
}

export interface LotStatus {
  counters: {
    total: number;
    occupied: number;
    available: number;
    overstayed: number;
  };
  levels: LevelStatus[];
  timestamp: string;
}
