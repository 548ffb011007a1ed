/**
 * Tanks Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  DiscoverOptions,
  PropaneTank,
  TankDevice,
  TankIndex,
} from "./schema.js";

export { PROPANE_TANK_TYPE } from "./schema.js";

// Service functions (side effects)
export { discoverTanks } from "./service.js";

// Pure transformations
export {
  flattenProperties,
  indexTanksById,
  parseFuelLevel,
  parseTanks,
  selectTanks,
} from "./transform.js";
