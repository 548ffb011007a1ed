/**
 * Tanks Transform Tests
 *
 * Pure normalization of raw apparatus records.
 */
import { describe, expect, it } from "vitest";

import type { RawApparatus } from "../../session/index.js";
import {
  flattenProperties,
  indexTanksById,
  parseApparatusId,
  parseDevice,
  parseFuelLevel,
  parseTanks,
  selectTanks,
} from "../transform.js";

function apparatus(overrides: Partial<RawApparatus> = {}): RawApparatus {
  return {
    apparatusId: 7,
    type: 2,
    name: null,
    isConnected: null,
    properties: [],
    ...overrides,
  };
}

describe("Tanks Transform", () => {
  // ===========================================================================
  // Properties
  // ===========================================================================

  describe("flattenProperties", () => {
    it("lets the last duplicate win", () => {
      const lookup = flattenProperties([
        { name: "FuelLevel", value: 10 },
        { name: "Capacity", value: 500 },
        { name: "FuelLevel", value: 20 },
      ]);

      expect(lookup.get("FuelLevel")).toBe(20);
      expect(lookup.get("Capacity")).toBe(500);
      expect(lookup.size).toBe(2);
    });
  });

  describe("parseFuelLevel", () => {
    it.each([
      [42, 42],
      ["42.5", 42.5],
      [" 80 ", 80],
    ])("parses %j", (input, expected) => {
      expect(parseFuelLevel(input)).toBe(expected);
    });

    it.each([["not-a-number"], [""], [null], [undefined], [true]])(
      "returns null for %j",
      (input) => {
        expect(parseFuelLevel(input)).toBeNull();
      },
    );

    it("returns null for an object", () => {
      expect(parseFuelLevel({ value: 10 })).toBeNull();
    });
  });

  describe("parseApparatusId", () => {
    it("accepts integers and integer strings", () => {
      expect(parseApparatusId(12)).toBe(12);
      expect(parseApparatusId("12")).toBe(12);
    });

    it("rejects everything else", () => {
      expect(parseApparatusId(1.5)).toBeNull();
      expect(parseApparatusId("abc")).toBeNull();
      expect(parseApparatusId(null)).toBeNull();
    });
  });

  describe("parseDevice", () => {
    it("reads the device fields", () => {
      expect(
        parseDevice({
          deviceId: "dev-1",
          deviceType: "TankUtility",
          batteryLevel: 85,
          status: "Online",
        }),
      ).toEqual({
        deviceId: "dev-1",
        deviceType: "TankUtility",
        batteryLevel: 85,
        status: "Online",
      });
    });

    it("degrades wrong-typed fields one by one", () => {
      expect(
        parseDevice({ deviceId: 99, deviceType: { x: 1 }, batteryLevel: "Good" }),
      ).toEqual({
        deviceId: "99",
        deviceType: null,
        batteryLevel: "Good",
        status: null,
      });
    });

    it.each([[undefined], [null], ["Device"], [5]])(
      "gives an empty device for %j",
      (input) => {
        expect(parseDevice(input)).toEqual({
          deviceId: null,
          deviceType: null,
          batteryLevel: null,
          status: null,
        });
      },
    );
  });

  // ===========================================================================
  // parseTanks
  // ===========================================================================

  describe("parseTanks", () => {
    it("normalizes a propane record with defaults", () => {
      const tanks = parseTanks([
        apparatus({ properties: [{ name: "FuelLevel", value: "42.5" }] }),
      ]);

      expect(tanks).toEqual([
        {
          apparatusId: 7,
          name: "Tank 7",
          fuelLevelPercent: 42.5,
          lastReading: null,
          capacityGallons: null,
          isConnected: null,
          device: {
            deviceId: null,
            deviceType: null,
            batteryLevel: null,
            status: null,
          },
        },
      ]);
    });

    it("excludes other apparatus types", () => {
      const tanks = parseTanks([
        apparatus({ apparatusId: 1, type: 1 }),
        apparatus({ apparatusId: 2, type: null }),
        apparatus({ apparatusId: 3 }),
      ]);

      expect(tanks.map((tank) => tank.apparatusId)).toEqual([3]);
    });

    it("keeps the record when the fuel level is not numeric", () => {
      const [tank] = parseTanks([
        apparatus({ properties: [{ name: "FuelLevel", value: "not-a-number" }] }),
      ]);

      expect(tank?.fuelLevelPercent).toBeNull();
      expect(tank?.apparatusId).toBe(7);
    });

    it("reads every known property", () => {
      const [tank] = parseTanks([
        apparatus({
          apparatusId: "15",
          name: "Cabin",
          isConnected: false,
          properties: [
            { name: "FuelLevel", value: 63 },
            { name: "LastReading", value: "2024-01-05T10:00:00Z" },
            { name: "Capacity", value: 500 },
            { name: "Device", value: { deviceId: "dev-15", status: "Offline" } },
          ],
        }),
      ]);

      expect(tank).toEqual({
        apparatusId: 15,
        name: "Cabin",
        fuelLevelPercent: 63,
        lastReading: "2024-01-05T10:00:00Z",
        capacityGallons: "500",
        isConnected: false,
        device: {
          deviceId: "dev-15",
          deviceType: null,
          batteryLevel: null,
          status: "Offline",
        },
      });
    });

    it("keeps a textual capacity as given", () => {
      const [tank] = parseTanks([
        apparatus({ properties: [{ name: "Capacity", value: "250 gal" }] }),
      ]);

      expect(tank?.capacityGallons).toBe("250 gal");
    });

    it("ignores a non-string last reading", () => {
      const [tank] = parseTanks([
        apparatus({ properties: [{ name: "LastReading", value: 1704448800 }] }),
      ]);

      expect(tank?.lastReading).toBeNull();
    });

    it("defaults a blank name", () => {
      const [tank] = parseTanks([apparatus({ name: "  " })]);

      expect(tank?.name).toBe("Tank 7");
    });

    it("skips records without a usable id", () => {
      const tanks = parseTanks([
        apparatus({ apparatusId: null }),
        apparatus({ apparatusId: "tank-a" }),
        apparatus({ apparatusId: 8 }),
      ]);

      expect(tanks.map((tank) => tank.apparatusId)).toEqual([8]);
    });

    it("gives equal results on repeated calls", () => {
      const raw = [
        apparatus({ properties: [{ name: "FuelLevel", value: "42.5" }] }),
        apparatus({ apparatusId: 9, type: 1 }),
      ];

      expect(parseTanks(raw)).toEqual(parseTanks(raw));
    });

    it("returns an empty list for empty input", () => {
      expect(parseTanks([])).toEqual([]);
    });
  });

  // ===========================================================================
  // Selection and Indexing
  // ===========================================================================

  describe("selectTanks", () => {
    const tanks = parseTanks([
      apparatus({ apparatusId: 1 }),
      apparatus({ apparatusId: 2 }),
      apparatus({ apparatusId: 3 }),
    ]);

    it("keeps everything for an empty selection", () => {
      expect(selectTanks(tanks, [])).toHaveLength(3);
    });

    it("keeps only the selected ids", () => {
      expect(selectTanks(tanks, [3, 1, 99]).map((t) => t.apparatusId)).toEqual([
        1, 3,
      ]);
    });
  });

  describe("indexTanksById", () => {
    it("keys tanks by id and keeps the last duplicate", () => {
      const tanks = parseTanks([
        apparatus({ apparatusId: 4, name: "First" }),
        apparatus({ apparatusId: 5 }),
        apparatus({ apparatusId: 4, name: "Second" }),
      ]);

      const index = indexTanksById(tanks);

      expect(index.size).toBe(2);
      expect(index.get(4)?.name).toBe("Second");
      expect(index.get(5)?.name).toBe("Tank 5");
    });
  });
});
