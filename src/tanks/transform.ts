/**
 * Tanks Module - Pure Transformations
 *
 * Turns raw apparatus records into PropaneTank values. Malformed fields
 * degrade to null; a record is only dropped when it is not a propane tank
 * or has no usable id.
 */
import type { PropertyValue, RawApparatus, RawProperty } from "../session/index.js";
import {
  DeviceWireSchema,
  EMPTY_DEVICE,
  PROPANE_TANK_TYPE,
  PROPERTY_NAMES,
  type PropaneTank,
  type TankDevice,
  type TankIndex,
} from "./schema.js";

// =============================================================================
// Properties
// =============================================================================

/**
 * Property list to lookup. Duplicate names: the last occurrence wins.
 */
export function flattenProperties(
  properties: ReadonlyArray<RawProperty>,
): ReadonlyMap<string, PropertyValue> {
  const lookup = new Map<string, PropertyValue>();
  for (const property of properties) {
    lookup.set(property.name, property.value);
  }
  return lookup;
}

/**
 * Best-effort percentage. Numeric strings parse; anything else is null.
 *
 * @example
 * parseFuelLevel("42.5") // 42.5
 * parseFuelLevel("not-a-number") // null
 */
export function parseFuelLevel(value: PropertyValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }

  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Integer apparatus id from a number or an integer string.
 */
export function parseApparatusId(value: RawApparatus["apparatusId"]): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}

/**
 * Fields of the `Device` property. A missing or wrong-shaped value gives
 * an all-null device.
 */
export function parseDevice(value: PropertyValue | undefined): TankDevice {
  const parsed = DeviceWireSchema.safeParse(value);
  if (!parsed.success) {
    return EMPTY_DEVICE;
  }

  const { deviceId, deviceType, batteryLevel, status } = parsed.data;
  return {
    deviceId: toText(deviceId),
    deviceType: toText(deviceType),
    batteryLevel: batteryLevel ?? null,
    status: toText(status),
  };
}

function parseCapacity(value: PropertyValue | undefined): string | null {
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  return null;
}

// =============================================================================
// Tanks
// =============================================================================

/**
 * Normalize one propane apparatus, or null when it has no usable id.
 */
export function toPropaneTank(apparatus: RawApparatus): PropaneTank | null {
  const apparatusId = parseApparatusId(apparatus.apparatusId);
  if (apparatusId === null) {
    return null;
  }

  const props = flattenProperties(apparatus.properties);
  const name = apparatus.name?.trim();
  const lastReading = props.get(PROPERTY_NAMES.lastReading);

  return {
    apparatusId,
    name: name ? name : `Tank ${apparatusId}`,
    fuelLevelPercent: parseFuelLevel(props.get(PROPERTY_NAMES.fuelLevel)),
    lastReading: typeof lastReading === "string" ? lastReading : null,
    capacityGallons: parseCapacity(props.get(PROPERTY_NAMES.capacity)),
    isConnected: apparatus.isConnected,
    device: parseDevice(props.get(PROPERTY_NAMES.device)),
  };
}

/**
 * Keep propane tanks and normalize them, in input order. Never throws.
 *
 * @example
 * parseTanks([{ apparatusId: 7, type: 2, name: null, isConnected: null,
 *   properties: [{ name: "FuelLevel", value: "42.5" }] }])
 * // [{ apparatusId: 7, name: "Tank 7", fuelLevelPercent: 42.5, ... }]
 */
export function parseTanks(
  rawList: ReadonlyArray<RawApparatus>,
): PropaneTank[] {
  const tanks: PropaneTank[] = [];
  for (const apparatus of rawList) {
    if (apparatus.type !== PROPANE_TANK_TYPE) {
      continue;
    }
    const tank = toPropaneTank(apparatus);
    if (tank !== null) {
      tanks.push(tank);
    }
  }
  return tanks;
}

/**
 * Keep the selected ids. An empty selection keeps everything.
 */
export function selectTanks(
  tanks: ReadonlyArray<PropaneTank>,
  selectedIds: ReadonlyArray<number>,
): PropaneTank[] {
  if (selectedIds.length === 0) {
    return [...tanks];
  }
  const selected = new Set(selectedIds);
  return tanks.filter((tank) => selected.has(tank.apparatusId));
}

/**
 * Key tanks by apparatus id. Duplicate ids keep the last record.
 */
export function indexTanksById(tanks: ReadonlyArray<PropaneTank>): TankIndex {
  return new Map(tanks.map((tank) => [tank.apparatusId, tank] as const));
}
