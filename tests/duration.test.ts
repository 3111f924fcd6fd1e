import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
    distanceKm,
    flightDuration,
    formatDuration,
    loadAirportCoordinates,
    parseAirportCoordinates,
} from "../lib/duration";

// longitude that puts a point exactly 800 km east of (0, 0) along the equator
const LON_800_KM = ((800 / 6371) * 180) / Math.PI;

describe("formatDuration", () => {
    it("prints hours and zero-padded minutes, carrying a rounded 60", () => {
        expect(formatDuration(98)).toBe("(1h:38m)");
        expect(formatDuration(38)).toBe("(0h:38m)");
        expect(formatDuration(119.7)).toBe("(2h:00m)");
    });
});

describe("flightDuration", () => {
    const airports = new Map([
        ["CGN", { lat: 0, lon: 0 }],
        ["BGY", { lat: 0, lon: LON_800_KM }],
    ]);

    it("measures great-circle distance", () => {
        expect(distanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: LON_800_KM })).toBeCloseTo(800, 6);
        expect(distanceKm({ lat: 50, lon: 7 }, { lat: 50, lon: 7 })).toBe(0);
    });

    it("adds ground time to an hour of cruise per 800 km", () => {
        expect(flightDuration(airports, "CGN", "BGY")).toBe("(1h:38m)");
        expect(flightDuration(airports, "BGY", "CGN")).toBe("(1h:38m)");
    });

    it("knows nothing about airports missing from the table", () => {
        expect(flightDuration(airports, "CGN", "PMI")).toBeUndefined();
    });
});

describe("airport coordinates", () => {
    it("loads a code → coordinates file with upper-cased codes", () => {
        const airports = loadAirportCoordinates(fileURLToPath(new URL("./fixtures/airports.json", import.meta.url)));
        expect([...airports.keys()]).toEqual(["AAA", "BBB"]);
        expect(flightDuration(airports, "AAA", "BBB")).toBe("(2h:01m)");
    });

    it("rejects out-of-range coordinates", () => {
        expect(() => parseAirportCoordinates({ XXX: { lat: 91, lon: 0 } })).toThrow();
        expect(() => parseAirportCoordinates({ XXX: { lat: "50", lon: 7 } })).toThrow();
    });
});
