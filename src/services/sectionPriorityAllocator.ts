import { IAllocationPolicy, SelectionRequest } from "../interfaces/allocator";
import { Section, Slot, canFit, sizeRank } from "../dtos/slot.dto";
import { NoSlotAvailableError } from "../errors";

/** Sections tried after the preferred one, in this order. */
export const SECTION_FALLBACK_ORDER: readonly Section[] = ['EV', 'VIP', 'Regular'];

export function preferredSection(request: SelectionRequest): Section {
  if (request.isEV) return 'EV';
  if (request.vipEntitled) return 'VIP';
  return 'Regular';
}

export function sectionOrder(request: SelectionRequest): Section[] {
  const preferred = preferredSection(request);
  return [preferred, ...SECTION_FALLBACK_ORDER.filter(s => s !== preferred)];
}

/**
 * Ranks Free, size-compatible slots by section order, then by how closely the
 * slot size matches, then level, then index. Pure: the same slots and request
 * always give the same slot.
 */
export class SectionPriorityAllocator implements IAllocationPolicy {
  selectSlot(request: SelectionRequest, slots: readonly Slot[]): Slot {
    const order = sectionOrder(request);
    const requested = sizeRank(request.size);

    const candidates = slots.filter(s => s.status === 'Free' && canFit(request.size, s.size));
    if (candidates.length === 0) throw new NoSlotAvailableError(request.size);

    const ranked = candidates.slice().sort((a, b) =>
      order.indexOf(a.section) - order.indexOf(b.section) ||
      (sizeRank(a.size) - requested) - (sizeRank(b.size) - requested) ||
      a.level - b.level ||
      a.index - b.index
    );
    return ranked[0];
  }
}
