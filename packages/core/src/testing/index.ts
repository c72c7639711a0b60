/**
 * Test doubles and builders for code that depends on the fulfillment core.
 *
 * @module @orderflow/core/testing
 */

export {
  ScriptedInventoryClient,
  StaticVendorCatalog,
  accept,
  acceptAfter,
  reject,
  hang,
  failTransiently,
  type HoldBehaviour,
  type ReleaseBehaviour,
  type ConfirmBehaviour,
} from "./fakes.js";
export { vendorCandidate, fulfillmentOrder } from "./builders.js";
