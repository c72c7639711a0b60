/**
 * @orderflow/bus
 *
 * Resilient broker client and its transports.
 */

export {
  ResilientBrokerClient,
  BROKER_CLIENT_DEFAULTS,
  type BrokerClientSettings,
  type BrokerClientOptions,
} from "./client.js";
export { PendingEventBuffer } from "./buffer.js";
export type {
  BrokerMessage,
  BrokerTransport,
  MessageHandler,
  PendingEvent,
  PublishResult,
  EventHandler,
} from "./types.js";
export {
  InMemoryBroker,
  InMemoryBrokerTransport,
  type FailedDelivery,
} from "./transports/in-memory.js";
export {
  SqsBrokerTransport,
  encodeSqsMessage,
  decodeSqsMessage,
  EVENT_TYPE_ATTRIBUTE,
  type SqsTransportOptions,
} from "./transports/sqs.js";
export { parseBrokerUrl, type BrokerEndpoint } from "./transports/url.js";
