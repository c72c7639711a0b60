import { FulfillmentError } from "./FulfillmentError.js";

/**
 * Invalid or unsupported configuration. The only error that is fatal at
 * startup.
 */
export class ConfigurationError extends FulfillmentError<"CONFIG_INVALID"> {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n  - ${issues.join("\n  - ")}`, {
      issues: [...issues],
    });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
