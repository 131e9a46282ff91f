export type {
  BusEvent,
  BusEventType,
  DomainEvent,
  EventOf,
  Handler,
  UserIntentEvent,
} from "./types.js";
export { EventBus } from "./bus.js";
