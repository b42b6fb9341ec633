import { SizeClass, SIZE_CLASSES } from "./vehicle.dto";

export type Section = 'Regular' | 'VIP' | 'EV';
export type SlotStatus = 'Free' | 'Occupied';

export const SECTIONS: readonly Section[] = ['Regular', 'VIP', 'EV'];

export interface Slot {
  id: string;
  level: number;
  index: number;
  size: SizeClass;
  section: Section;
  status: SlotStatus;
  // back-reference only; the ticket owns the occupancy
  ticketId: string | null;
}

export type SlotView = Readonly<Slot>;

export function slotId(level: number, index: number): string {
  return `L${level}-${String(index).padStart(3, '0')}`;
}

/** Position of a size class in Small < Medium < Large. */
export function sizeRank(size: SizeClass): number {
  return SIZE_CLASSES.indexOf(size);
}

/** A vehicle fits its own size class or any larger one, never a smaller one. */
export function canFit(requested: SizeClass, slotSize: SizeClass): boolean {
  return sizeRank(slotSize) >= sizeRank(requested);
}
