// pipeline/search.ts — round trips from each origin whose outbound leg lands in an
// admitted weekday/hour slot, ranked cheapest first.
import { addDays, getDay, getHours, startOfDay } from "date-fns";
import type { Airport, Leg, TripCandidate } from "../lib/types";
import type { FlightProvider, TimeWindow } from "../providers/types";
import { isoDate, nightsBetween } from "../lib/dates";

/** Weekday (0 = Sunday) → earliest allowed outbound hour. Days not listed are never admitted. */
export type AdmissionRule = ReadonlyMap<number, number>;

/** Thursday from 17:00, Friday from 23:00. */
export const REFERENCE_RULE: AdmissionRule = new Map([
    [4, 17],
    [5, 23],
]);

export type NightRange = { min: number; max: number };

export type SearchOptions = {
    origins: Airport[];
    horizonDays: number;
    rule: AdmissionRule;
    nights: NightRange;
    startDate?: Date;
    maxTotalPrice?: number;
    verbose?: boolean;
};

export function isAdmitted(departure: Date, rule: AdmissionRule): boolean {
    const minHour = rule.get(getDay(departure));
    return minHour !== undefined && getHours(departure) >= minHour;
}

export const outboundWindow = (minHour: number): TimeWindow => ({
    from: `${String(minHour).padStart(2, "0")}:00`,
    to: "23:59",
});

export function makeCandidate(outbound: Leg, inbound: Leg): TripCandidate {
    return Object.freeze({
        outbound: Object.freeze({ ...outbound }),
        inbound: Object.freeze({ ...inbound }),
        outboundPrice: outbound.price,
        totalPrice: outbound.price + inbound.price,
    });
}

/** Total price, then outbound date, then destination code. */
export function compareCandidates(a: TripCandidate, b: TripCandidate): number {
    if (a.totalPrice !== b.totalPrice) return a.totalPrice - b.totalPrice;
    const da = isoDate(a.outbound.departureTime);
    const db = isoDate(b.outbound.departureTime);
    if (da !== db) return da < db ? -1 : 1;
    const ca = a.outbound.destinationCode;
    const cb = b.outbound.destinationCode;
    return ca === cb ? 0 : ca < cb ? -1 : 1;
}

export const rankCandidates = (candidates: readonly TripCandidate[]) => [...candidates].sort(compareCandidates);

/**
 * One provider query per (origin, admitted day). Provider failures are not caught:
 * a failed query aborts the whole search.
 */
export async function searchTrips(provider: FlightProvider, opts: SearchOptions): Promise<TripCandidate[]> {
    const { origins, horizonDays, rule, nights } = opts;
    const start = startOfDay(opts.startDate ?? new Date());
    const found: TripCandidate[] = [];
    let queries = 0;
    let discarded = 0;

    for (const origin of origins) {
        for (let offset = 0; offset < horizonDays; offset++) {
            const date = addDays(start, offset);
            const minHour = rule.get(getDay(date));
            if (minHour === undefined) continue;

            const pairs = await provider.searchRoundTrips(origin.code, date, outboundWindow(minHour), {
                from: addDays(date, nights.min),
                to: addDays(date, nights.max),
            });
            queries++;
            if (opts.verbose) console.error(`[search] ${origin.name} (${origin.code}) ${isoDate(date)}: ${pairs.length} trips`);

            for (const [outbound, inbound] of pairs) {
                const n = nightsBetween(outbound.departureTime, inbound.departureTime);
                if (!isAdmitted(outbound.departureTime, rule) || n < nights.min || n > nights.max) {
                    discarded++;
                    continue;
                }
                const candidate = makeCandidate(
                    { ...outbound, searchOrigin: origin },
                    { ...inbound, searchOrigin: origin },
                );
                if (opts.maxTotalPrice !== undefined && candidate.totalPrice > opts.maxTotalPrice) continue;
                found.push(candidate);
            }
        }
    }

    if (discarded) console.warn(`[search] ${discarded} trips outside the requested slot were dropped`);
    console.error(`[search] ${queries} queries over ${origins.length} airports → ${found.length} round trips`);
    return rankCandidates(found);
}
