import { Slot } from "../dtos/slot.dto";
import { SizeClass } from "../dtos/vehicle.dto";

export interface SelectionRequest {
  size: SizeClass;
  isEV: boolean;
  // VIP customer holding an active pass for `size`
  vipEntitled: boolean;
}

export interface IAllocationPolicy {
  /** Returns the top-ranked Free slot, or throws NoSlotAvailableError. */
  selectSlot(request: SelectionRequest, slots: readonly Slot[]): Slot;
}
