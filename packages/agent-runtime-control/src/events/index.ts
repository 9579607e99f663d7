/**
 * Events Module
 */

export {
  Broker,
  type BrokerOptions,
  type BrokerStats,
  createBroker,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MAX_QUEUE_DEPTH,
} from "./broker";
export { EventSubscription, type EventSubscriptionOptions } from "./subscription";
export {
  type BrokerEvent,
  CREATED_EVENT,
  DELETED_EVENT,
  type EventKind,
  UPDATED_EVENT,
} from "./types";
