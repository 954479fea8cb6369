/**
 * Bridge Module - Public API
 */

export type { Bridge, BridgeConfig, BridgeState, Publication } from "./schema.js";
export { INITIAL_BRIDGE_STATE } from "./schema.js";

export { createBridge } from "./service.js";
export type { BridgeDeps } from "./service.js";

export {
  buildAggregatePayload,
  nextAvailability,
  rememberPublication,
  selectPublications,
} from "./transform.js";
