// pipeline/lodging.ts — accommodation search for one stay, cheapest nights first
import { z } from "zod";
import type { LocationKey, LodgingOffer, StayWindow } from "../lib/types";
import { pickList } from "../lib/normalize";
import { comparePrices, parsePrice } from "../lib/price";
import { err, ok, type NormalizationFailure, type ProviderError, type Result } from "../lib/result";
import type { ToolInvoker } from "../providers/types";
import { callTool } from "./call-tool";

// Providers send either display-style ("Price Per Night") or snake_case keys.
const Field = z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .nullish()
    .catch(undefined);

export const LodgingRecord = z.object({
    "Accommodation Name": Field,
    accommodation_name: Field,
    "Accommodation URL": Field,
    accommodation_url: Field,
    "Price Per Night": Field,
    price_per_night: Field,
    "Price Per Stay": Field,
    price_per_stay: Field,
    "Review Rating": Field,
    review_rating: Field,
});

const pick = (...vals: (string | null | undefined)[]) => vals.find((v): v is string => !!v) ?? null;

export function toLodgingOffer(raw: unknown): LodgingOffer | undefined {
    const parsed = LodgingRecord.safeParse(raw);
    if (!parsed.success) return undefined;
    const r = parsed.data;
    return {
        name: pick(r["Accommodation Name"], r.accommodation_name) ?? "—",
        url: pick(r["Accommodation URL"], r.accommodation_url),
        pricePerNight: pick(r["Price Per Night"], r.price_per_night),
        pricePerStay: pick(r["Price Per Stay"], r.price_per_stay),
        rating: pick(r["Review Rating"], r.review_rating),
    };
}

/** Stable ascending sort on the parsed nightly price; unreadable prices go last. */
export function rankOffers(offers: readonly LodgingOffer[], limit: number): LodgingOffer[] {
    return offers
        .map((offer) => ({ offer, price: parsePrice(offer.pricePerNight) }))
        .sort((a, b) => comparePrices(a.price, b.price))
        .slice(0, limit)
        .map((x) => x.offer);
}

export type Occupancy = { adults: number; rooms: number };

export async function searchLodging(
    invoker: ToolInvoker,
    tool: string,
    key: LocationKey,
    stay: StayWindow,
    occupancy: Occupancy,
    limit: number,
): Promise<Result<LodgingOffer[], ProviderError | NormalizationFailure>> {
    const res = await callTool(invoker, tool, {
        id: key.id,
        ns: key.ns,
        arrival: stay.arrival,
        departure: stay.departure,
        adults: occupancy.adults,
        rooms: occupancy.rooms,
    });
    if (!res.ok) return res;
    if (res.value.kind === "null" || res.value.kind === "raw") return err({ kind: "normalization", tool });

    const records = pickList(res.value, ["output"]) ?? [];
    const offers = records.map(toLodgingOffer).filter((o): o is LodgingOffer => o !== undefined);
    return ok(rankOffers(offers, limit));
}
