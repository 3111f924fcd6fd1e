// lib/duration.ts — rough block time for a leg from great-circle distance
import fs from "node:fs";
import { z } from "zod";

const EARTH_RADIUS_KM = 6371;
const CRUISE_KMH = 800;
// taxi, climb and descent on top of cruise
const GROUND_MINUTES = 38;

export type Coordinates = { lat: number; lon: number };
export type AirportCoordinates = ReadonlyMap<string, Coordinates>;

const CoordinatesFile = z.record(
    z.string(),
    z.object({ lat: z.number().min(-90).max(90), lon: z.number().min(-180).max(180) }),
);

/** `{ "CGN": { "lat": 50.87, "lon": 7.14 }, … }`, codes upper-cased. */
export function parseAirportCoordinates(json: unknown): AirportCoordinates {
    const parsed = CoordinatesFile.parse(json);
    return new Map(Object.entries(parsed).map(([code, c]) => [code.trim().toUpperCase(), c]));
}

export function loadAirportCoordinates(file: string): AirportCoordinates {
    const json: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    return parseAirportCoordinates(json);
}

const rad = (deg: number) => (deg * Math.PI) / 180;

export function distanceKm(a: Coordinates, b: Coordinates): number {
    const dLat = rad(b.lat - a.lat);
    const dLon = rad(b.lon - a.lon);
    const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(a.lat)) * Math.cos(rad(b.lat)) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export const estimatedMinutes = (km: number) => (km / CRUISE_KMH) * 60 + GROUND_MINUTES;

/** `98` → `"(1h:38m)"` */
export function formatDuration(minutes: number): string {
    let h = Math.floor(minutes / 60);
    let m = Math.round(minutes % 60);
    if (m === 60) {
        h += 1;
        m = 0;
    }
    return `(${h}h:${String(m).padStart(2, "0")}m)`;
}

/** `undefined` when either airport is missing from the table. */
export function flightDuration(airports: AirportCoordinates, from: string, to: string): string | undefined {
    const a = airports.get(from);
    const b = airports.get(to);
    return a && b ? formatDuration(estimatedMinutes(distanceKm(a, b))) : undefined;
}
