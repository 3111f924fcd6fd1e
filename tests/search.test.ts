import { describe, expect, it, vi } from "vitest";
import type { Leg } from "../lib/types";
import { nightsBetween } from "../lib/dates";
import {
    REFERENCE_RULE,
    compareCandidates,
    isAdmitted,
    makeCandidate,
    outboundWindow,
    rankCandidates,
    searchTrips,
} from "../pipeline/search";
import { FakeFlights, leg } from "./fakes";

// Monday; the following Thursday is Oct 22 and Friday Oct 23
const MONDAY = new Date(2026, 9, 19);
const at = (day: number, hour: number, minute = 0) => new Date(2026, 9, day, hour, minute);

const pair = (dest: string, out: Date, back: Date, outPrice: number, backPrice: number): [Leg, Leg] => [
    leg({ destinationCode: dest, destinationName: `${dest} Airport, Somewhere`, departureTime: out, price: outPrice }),
    leg({
        originCode: dest,
        originName: `${dest} Airport, Somewhere`,
        destinationCode: "CGN",
        destinationName: "Cologne, Germany",
        departureTime: back,
        price: backPrice,
    }),
];

const base = {
    origins: [{ code: "CGN", name: "Köln" }],
    horizonDays: 7,
    rule: REFERENCE_RULE,
    nights: { min: 2, max: 4 },
    startDate: MONDAY,
};

describe("isAdmitted", () => {
    it("applies the weekday's minimum hour", () => {
        expect(isAdmitted(at(22, 17), REFERENCE_RULE)).toBe(true);
        expect(isAdmitted(at(22, 16, 59), REFERENCE_RULE)).toBe(false);
        expect(isAdmitted(at(23, 23, 15), REFERENCE_RULE)).toBe(true);
        expect(isAdmitted(at(23, 22), REFERENCE_RULE)).toBe(false);
        expect(isAdmitted(at(24, 23), REFERENCE_RULE)).toBe(false);
    });
});

describe("outboundWindow", () => {
    it("pads the hour and runs to the end of the day", () => {
        expect(outboundWindow(7)).toEqual({ from: "07:00", to: "23:59" });
        expect(outboundWindow(23)).toEqual({ from: "23:00", to: "23:59" });
    });
});

describe("searchTrips", () => {
    it("queries once per origin and admitted day with the rule's windows", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const flights = new FakeFlights(() => []);
        await searchTrips(flights, base);

        expect(flights.calls.map((c) => [c.outboundDate.getDate(), c.window.from])).toEqual([
            [22, "17:00"],
            [23, "23:00"],
        ]);
        const thursday = flights.calls[0];
        expect(thursday.originCode).toBe("CGN");
        expect(thursday.range.from).toEqual(new Date(2026, 9, 24));
        expect(thursday.range.to).toEqual(new Date(2026, 9, 26));
    });

    it("keeps stdout free when not verbose", async () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const error = vi.spyOn(console, "error").mockImplementation(() => {});
        await searchTrips(new FakeFlights(() => []), base);

        expect(log).not.toHaveBeenCalled();
        expect(error.mock.calls).toEqual([["[search] 2 queries over 1 airports → 0 round trips"]]);
    });

    it("ranks by total price, then outbound date, then destination code", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        const flights = new FakeFlights(({ outboundDate }) =>
            outboundDate.getDate() === 22
                ? [
                      pair("PMI", at(22, 18), at(25, 10), 15, 25),
                      pair("BGY", at(22, 19), at(25, 10), 20, 20),
                      pair("OPO", at(22, 16), at(25, 10), 1, 1), // too early on a Thursday
                      pair("DUB", at(22, 20), at(23, 10), 2, 2), // one night only
                  ]
                : [pair("ALC", at(23, 23, 30), at(26, 9), 30, 10), pair("STN", at(23, 23, 30), at(25, 9), 10, 10)],
        );

        const trips = await searchTrips(flights, base);
        expect(trips.map((t) => [t.outbound.destinationCode, t.totalPrice])).toEqual([
            ["STN", 20],
            ["BGY", 40],
            ["PMI", 40],
            ["ALC", 40],
        ]);
        for (const t of trips) {
            const n = nightsBetween(t.outbound.departureTime, t.inbound.departureTime);
            expect(n).toBeGreaterThanOrEqual(2);
            expect(n).toBeLessThanOrEqual(4);
            expect(isAdmitted(t.outbound.departureTime, REFERENCE_RULE)).toBe(true);
            expect(t.outboundPrice).toBe(t.outbound.price);
        }
    });

    it("tags both legs with the searched origin", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const flights = new FakeFlights(({ originCode, outboundDate }) =>
            outboundDate.getDate() === 22 ? [pair(originCode === "CGN" ? "BGY" : "PMI", at(22, 19), at(25, 9), 10, 10)] : [],
        );
        const trips = await searchTrips(flights, {
            ...base,
            origins: [
                { code: "CGN", name: "Köln" },
                { code: "NRN", name: "Düsseldorf Weeze" },
            ],
        });
        expect(trips.map((t) => [t.outbound.destinationCode, t.outbound.searchOrigin, t.inbound.searchOrigin])).toEqual([
            ["BGY", { code: "CGN", name: "Köln" }, { code: "CGN", name: "Köln" }],
            ["PMI", { code: "NRN", name: "Düsseldorf Weeze" }, { code: "NRN", name: "Düsseldorf Weeze" }],
        ]);
        expect(flights.calls).toHaveLength(4);
    });

    it("keeps repeat destinations on different days", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const flights = new FakeFlights(({ outboundDate }) =>
            outboundDate.getDate() === 22
                ? [pair("BGY", at(22, 19), at(25, 9), 10, 10)]
                : [pair("BGY", at(23, 23, 5), at(26, 9), 10, 10)],
        );
        const trips = await searchTrips(flights, base);
        expect(trips.map((t) => t.outbound.departureTime.getDate())).toEqual([22, 23]);
    });

    it("drops trips over the price ceiling", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const flights = new FakeFlights(() => [pair("BGY", at(22, 19), at(25, 9), 20, 20), pair("STN", at(22, 19), at(25, 9), 5, 5)]);
        const trips = await searchTrips(flights, { ...base, horizonDays: 4, maxTotalPrice: 30 });
        expect(trips.map((t) => t.outbound.destinationCode)).toEqual(["STN"]);
    });

    it("returns nothing for an empty horizon or origin list", async () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const flights = new FakeFlights(() => [pair("BGY", at(22, 19), at(25, 9), 10, 10)]);
        expect(await searchTrips(flights, { ...base, horizonDays: 0 })).toEqual([]);
        expect(await searchTrips(flights, { ...base, origins: [] })).toEqual([]);
        expect(flights.calls).toHaveLength(0);
    });

    it("lets a provider failure abort the search", async () => {
        const flights = new FakeFlights(() => {
            throw new Error("fare finder down");
        });
        await expect(searchTrips(flights, base)).rejects.toThrow("fare finder down");
    });
});

describe("compareCandidates", () => {
    const c = (dest: string, day: number, price: number) =>
        makeCandidate(...pair(dest, at(day, 19), at(day + 3, 9), price, 0));

    it("is a total order over price, date and destination", () => {
        expect(compareCandidates(c("BGY", 22, 10), c("AAA", 22, 20))).toBeLessThan(0);
        expect(compareCandidates(c("ZZZ", 22, 10), c("AAA", 29, 10))).toBeLessThan(0);
        expect(compareCandidates(c("AAA", 22, 10), c("BGY", 22, 10))).toBeLessThan(0);
        expect(compareCandidates(c("BGY", 22, 10), c("BGY", 22, 10))).toBe(0);
    });

    it("does not reorder the input array", () => {
        const input = [c("BGY", 22, 30), c("AAA", 22, 10)];
        const ranked = rankCandidates(input);
        expect(ranked.map((t) => t.outbound.destinationCode)).toEqual(["AAA", "BGY"]);
        expect(input.map((t) => t.outbound.destinationCode)).toEqual(["BGY", "AAA"]);
    });

    it("freezes candidates", () => {
        expect(Object.isFrozen(c("BGY", 22, 10))).toBe(true);
        expect(Object.isFrozen(c("BGY", 22, 10).outbound)).toBe(true);
    });
});
