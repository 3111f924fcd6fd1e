// providers/ryanair.ts — round-trip fares from the public fare-finder API
import Bottleneck from "bottleneck";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import type { Leg } from "../lib/types";
import { isoDate } from "../lib/dates";
import type { DateRange, FlightProvider, TimeWindow } from "./types";

export const FARE_FINDER_URL = "https://services-api.ryanair.com/farfnd/v4/roundTripFares";
const BOOKING_URL = "https://www.ryanair.com/de/de/trip/flights/select";

const AirportDTO = z.object({
    iataCode: z.string(),
    name: z.string(),
    countryName: z.string().optional(),
});

const FlightDTO = z.object({
    departureAirport: AirportDTO,
    arrivalAirport: AirportDTO,
    departureDate: z.string(),
    price: z.object({
        value: z.number().nonnegative(),
        currencyCode: z.string(),
    }),
});

export const RoundTripFaresDTO = z.object({
    fares: z
        .array(z.object({ outbound: FlightDTO, inbound: FlightDTO }))
        .nullish()
        .transform((v) => v ?? []),
});

type FlightDTO = z.infer<typeof FlightDTO>;

const fullName = (a: z.infer<typeof AirportDTO>) => (a.countryName ? `${a.name}, ${a.countryName}` : a.name);

/** Departure times arrive as local wall-clock time without an offset. */
export function toLeg(f: FlightDTO): Leg | undefined {
    const departureTime = parseISO(f.departureDate);
    if (!isValid(departureTime)) return undefined;
    return {
        originCode: f.departureAirport.iataCode,
        originName: fullName(f.departureAirport),
        destinationCode: f.arrivalAirport.iataCode,
        destinationName: fullName(f.arrivalAirport),
        departureTime,
        price: f.price.value,
        currency: f.price.currencyCode,
    };
}

export type RyanairOptions = {
    currency?: string;
    /** Minimum spacing between two requests. */
    minTimeMs?: number;
    timeoutMs?: number;
    baseUrl?: string;
};

export class RyanairFlightProvider implements FlightProvider {
    readonly name = "ryanair";
    private readonly limiter: Bottleneck;

    constructor(private readonly opts: RyanairOptions = {}) {
        this.limiter = new Bottleneck({ minTime: opts.minTimeMs ?? 250, maxConcurrent: 1 });
    }

    async searchRoundTrips(
        originCode: string,
        outboundDate: Date,
        outboundTimeWindow: TimeWindow,
        returnDateRange: DateRange,
    ): Promise<[Leg, Leg][]> {
        const day = isoDate(outboundDate);
        const params = new URLSearchParams({
            departureAirportIataCode: originCode,
            outboundDepartureDateFrom: day,
            outboundDepartureDateTo: day,
            inboundDepartureDateFrom: isoDate(returnDateRange.from),
            inboundDepartureDateTo: isoDate(returnDateRange.to),
            outboundDepartureTimeFrom: outboundTimeWindow.from,
            outboundDepartureTimeTo: outboundTimeWindow.to,
            currency: this.opts.currency ?? "EUR",
        });
        const url = `${this.opts.baseUrl ?? FARE_FINDER_URL}?${params.toString()}`;

        const res = await this.limiter.schedule(() =>
            fetch(url, {
                headers: { accept: "application/json" },
                signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000),
            }),
        );
        if (!res.ok) throw new Error(`fare finder returned ${res.status} for ${originCode} on ${day}`);

        const body: unknown = await res.json();
        const parsed = RoundTripFaresDTO.safeParse(body);
        if (!parsed.success) {
            throw new Error(`unexpected fare finder payload for ${originCode} on ${day}: ${parsed.error.issues[0]?.message}`);
        }

        const pairs: [Leg, Leg][] = [];
        for (const fare of parsed.data.fares) {
            const outbound = toLeg(fare.outbound);
            const inbound = toLeg(fare.inbound);
            if (outbound && inbound) pairs.push([outbound, inbound]);
        }
        return pairs;
    }
}

/** Deep link to the round-trip selection page. */
export function bookingUrl(originCode: string, destinationCode: string, dateOut: string, dateIn: string, adults = 2): string {
    const params = new URLSearchParams({
        adults: String(adults),
        teens: "0",
        children: "0",
        infants: "0",
        dateOut,
        dateIn,
        isConnectedFlight: "false",
        discount: "0",
        isReturn: "true",
        originIata: originCode,
        destinationIata: destinationCode,
    });
    return `${BOOKING_URL}?${params.toString()}`;
}
