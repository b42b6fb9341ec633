import { Slot, SECTIONS, slotId } from "../dtos/slot.dto";
import { SIZE_CLASSES } from "../dtos/vehicle.dto";
import { TopologyLayout } from "./parkingConfig";

/**
 * Expands a layout into concrete Free slots. Indexes restart at 1 on every
 * level and run Small → Large, and within a size Regular → VIP → EV.
 */
export function buildSlots(layout: TopologyLayout): Slot[] {
  const slots: Slot[] = [];
  for (let level = 1; level <= layout.levels; level++) {
    let index = 0;
    for (const size of SIZE_CLASSES) {
      for (const section of SECTIONS) {
        for (let n = 0; n < layout.perLevel[size][section]; n++) {
          index++;
          slots.push({
            id: slotId(level, index),
            level,
            index,
            size,
            section,
            status: 'Free',
            ticketId: null
          });
        }
      }
    }
  }
  return slots;
}
