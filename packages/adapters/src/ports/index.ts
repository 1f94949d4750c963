/**
 * Port interfaces for adapters
 */

export type {
  BookDroppedEvent,
  ConnectionEvent,
  OrderGateway,
  StateEvent,
  SummaryEvent,
  SupervisorState,
  VenueEvent,
  VenuePort,
  VenueSessionState,
} from "./venue-port";
