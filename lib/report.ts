// lib/report.ts — plain-text and JSON views of an enrichment run
import { format } from "date-fns";
import type { EnrichedTrip, JsonValue, Leg, LodgingOffer } from "./types";
import { isRecord } from "./normalize";
import { longDeparture, nightsBetween } from "./dates";
import { bookingUrl } from "../providers/ryanair";
import { flightDuration, type AirportCoordinates } from "./duration";

const NONE = "none found";
const WEATHER_LINES = 7;
const ATTRACTION_LINES = 10;

const money = (v: number, currency: string) => `${v.toFixed(2)} ${currency}`;

const scalar = (v: JsonValue | undefined): string | undefined =>
    v === undefined || v === null || isRecord(v) || Array.isArray(v) ? undefined : String(v);

/** One line for a daily sample or a month summary; `undefined` for provider error entries. */
export function formatWeather(item: JsonValue): string | undefined {
    if (!isRecord(item)) return String(item);
    if (item.error) return undefined;

    const summary = item.weather_summary;
    if (isRecord(summary)) {
        const parts: string[] = [];
        const city = scalar(item.city);
        const month = scalar(item.month);
        if (city) parts.push(city);
        if (month) parts.push(month);
        const temp = scalar(summary.avg_temperature_mean ?? summary.avg_temp);
        if (temp !== undefined) parts.push(`avg ${temp}°C`);
        const rain = scalar(summary.avg_rain_mm ?? summary.rain_mm);
        if (rain !== undefined) parts.push(`rain ${rain} mm`);
        const desc = scalar(summary.description);
        if (desc) parts.push(desc);
        if (parts.length) return parts.join(" · ");
    }

    const parts: string[] = [];
    const date = scalar(item.date);
    if (date) parts.push(date);
    const temp = scalar(item.temperature ?? item.temp);
    if (temp !== undefined) parts.push(`${temp}°C`);
    const cond = scalar(item.condition ?? item.description);
    if (cond) parts.push(cond);
    return parts.length ? parts.join(" · ") : JSON.stringify(item);
}

export function formatAttraction(item: JsonValue): string {
    if (!isRecord(item)) return String(item);
    return scalar(item.name) ?? scalar(item.title) ?? scalar(item.attraction) ?? "—";
}

function formatOffer(o: LodgingOffer, i: number): string[] {
    const price = [o.pricePerNight && `${o.pricePerNight}/night`, o.pricePerStay && `${o.pricePerStay} stay`]
        .filter(Boolean)
        .join(", ");
    const lines = [`      ${i + 1}. ${o.name}${price ? ` — ${price}` : ""}${o.rating ? `, rating ${o.rating}` : ""}`];
    if (o.url) lines.push(`         ${o.url}`);
    return lines;
}

export type TextReportOptions = {
    adults?: number;
    /** Adds an estimated flight time to each leg when both airports are known. */
    airports?: AirportCoordinates;
};

function legLine(label: string, leg: Leg, airports?: AirportCoordinates): string {
    const duration = airports && flightDuration(airports, leg.originCode, leg.destinationCode);
    const when = `${longDeparture(leg.departureTime)}${duration ? ` ${duration}` : ""}`;
    return `    ${label} ${when}  ${money(leg.price, leg.currency)}  ${leg.originCode}→${leg.destinationCode}`;
}

export function formatTextReport(trips: readonly EnrichedTrip[], opts: TextReportOptions = {}): string {
    if (!trips.length) return "(No round trips found.)";
    const out: string[] = [];
    trips.forEach((t, i) => {
        const { outbound, inbound, totalPrice } = t.candidate;
        const nights = nightsBetween(outbound.departureTime, inbound.departureTime);
        out.push(
            `${String(i + 1).padStart(2)}. ${t.destinationCity} (${outbound.destinationCode})  ${money(totalPrice, outbound.currency)}  ${nights} nights`,
        );
        out.push(legLine("out ", outbound, opts.airports));
        out.push(legLine("back", inbound, opts.airports));
        out.push(`    book ${bookingUrl(outbound.originCode, outbound.destinationCode, t.stay.arrival, t.stay.departure, opts.adults)}`);

        out.push(`    Hotels (${t.stay.arrival} → ${t.stay.departure}):${t.lodging.length ? "" : ` ${NONE}`}`);
        t.lodging.forEach((o, j) => out.push(...formatOffer(o, j)));

        const weather = (t.weather ?? []).slice(0, WEATHER_LINES).map(formatWeather).filter((s): s is string => !!s);
        out.push(`    Weather:${weather.length ? "" : ` ${NONE}`}`);
        weather.forEach((w) => out.push(`      ${w}`));

        const attractions = (t.attractions ?? []).slice(0, ATTRACTION_LINES).map(formatAttraction);
        out.push(`    Attractions:${attractions.length ? "" : ` ${NONE}`}`);
        attractions.forEach((a) => out.push(`      • ${a}`));

        for (const issue of t.issues) out.push(`    ! ${issue.stage}: ${issue.message}`);
        out.push("");
    });
    return out.join("\n");
}

const localIso = (d: Date) => format(d, "yyyy-MM-dd'T'HH:mm:ss");

const legJson = (leg: Leg) => ({
    departure: localIso(leg.departureTime),
    origin: leg.originCode,
    origin_full: leg.originName,
    destination: leg.destinationCode,
    destination_full: leg.destinationName,
    price: leg.price,
    currency: leg.currency,
});

export function toJsonReport(trips: readonly EnrichedTrip[]) {
    return {
        trips: trips.map((t) => ({
            outbound: legJson(t.candidate.outbound),
            return: legJson(t.candidate.inbound),
            total_price: t.candidate.totalPrice,
            destination_city: t.destinationCity,
            hotel_arrival: t.stay.arrival,
            hotel_departure: t.stay.departure,
            hotels: t.lodging,
            weather: t.weather,
            attractions: t.attractions,
            issues: t.issues,
        })),
    };
}
