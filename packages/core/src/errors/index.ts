export { FulfillmentError } from "./FulfillmentError.js";
export { ConfigurationError } from "./configuration.js";
export {
  TimeoutError,
  TransientError,
  CircuitOpenError,
  ExhaustedRetriesError,
  OperationCancelledError,
  TRANSIENT_ERROR_CODES,
  isTransientError,
  describeError,
} from "./resilience.js";
