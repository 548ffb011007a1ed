/**
 * Tanks Module - Schemas and Types
 *
 * The normalized propane tank record handed to consumers. Absent values
 * are null; nothing here is optional.
 */
import { z } from "zod";

/**
 * Apparatus type code of a propane tank monitor. Every other type is ignored.
 */
export const PROPANE_TANK_TYPE = 2;

/**
 * Property names read from an apparatus property list.
 */
export const PROPERTY_NAMES = {
  device: "Device",
  fuelLevel: "FuelLevel",
  lastReading: "LastReading",
  capacity: "Capacity",
} as const;

// =============================================================================
// Device
// =============================================================================

/**
 * Fields of the `Device` property. Each one degrades to null on its own.
 */
export const DeviceWireSchema = z.object({
  deviceId: z.union([z.string(), z.number()]).nullish().catch(null),
  deviceType: z.union([z.string(), z.number()]).nullish().catch(null),
  batteryLevel: z.union([z.string(), z.number()]).nullish().catch(null),
  status: z.union([z.string(), z.number()]).nullish().catch(null),
});

export type TankDevice = Readonly<{
  deviceId: string | null;
  deviceType: string | null;
  /** As reported: vendor sends either a number or a label */
  batteryLevel: number | string | null;
  status: string | null;
}>;

export const EMPTY_DEVICE: TankDevice = {
  deviceId: null,
  deviceType: null,
  batteryLevel: null,
  status: null,
};

// =============================================================================
// Propane Tank
// =============================================================================

export type PropaneTank = Readonly<{
  /** Stable identity; the join key for consumers */
  apparatusId: number;
  name: string;
  fuelLevelPercent: number | null;
  /** Vendor-formatted timestamp, passed through */
  lastReading: string | null;
  /** Textual form of the capacity, numeric coercion left to consumers */
  capacityGallons: string | null;
  isConnected: boolean | null;
  device: TankDevice;
}>;

export type TankIndex = ReadonlyMap<number, PropaneTank>;

export type DiscoverOptions = Readonly<{
  /** Apparatus ids to keep; empty keeps every tank */
  selectedIds?: ReadonlyArray<number>;
}>;
