export * from "./errors";
export * from "./dtos/vehicle.dto";
export * from "./dtos/slot.dto";
export * from "./dtos/ticket.dto";
export * from "./dtos/pass.dto";
export * from "./dtos/events.dto";
export * from "./dtos/results.dto";
export * from "./interfaces/allocator";
export * from "./interfaces/feeCalculator";
export * from "./interfaces/eventPublisher";
export * from "./interfaces/repositories";
export * from "./config/parkingConfig";
export { buildSlots } from "./config/topology";
export { InMemorySlotInventory, InMemoryTicketRegistry, InMemoryVipPassRegistry } from "./infra/inMemoryRepos";
export { InMemoryEventBus } from "./infra/eventBus";
export { SerialExecutor } from "./infra/serialExecutor";
export { Clock, systemClock } from "./infra/clock";
export { IdGenerator, uuidIds } from "./infra/ids";
export { Logger, consoleLogger } from "./infra/logger";
export { SectionPriorityAllocator, SECTION_FALLBACK_ORDER, sectionOrder } from "./services/sectionPriorityAllocator";
export { HourlyFeeCalculator } from "./services/hourlyFeeCalculator";
export { PricingTable } from "./services/pricingTable";
export { ParkingEngine, ParkingEngineDeps, EngineOptions, createParkingEngine } from "./services/parkingEngine";
