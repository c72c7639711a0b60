export { HealthAggregator, httpStatusFor, type HealthAggregatorOptions } from "./aggregator.js";
export type {
  BrokerStatus,
  BrokerStatusChange,
  BrokerStatusListener,
  BrokerStatusSource,
  CircuitStatusSource,
  HealthStatus,
  CircuitHealth,
  BrokerHealth,
  HealthReport,
} from "./types.js";
