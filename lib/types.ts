// lib/types.ts — shared domain types for search + enrichment

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export type JsonObject = { [key: string]: JsonValue };
export type JsonArray = JsonValue[];

export type Airport = { code: string; name: string };

export type Leg = {
    originCode: string;
    originName: string;
    destinationCode: string;
    destinationName: string;
    departureTime: Date;
    price: number;
    currency: string;
    // set by the search for the airport the leg was found from
    searchOrigin?: Airport;
};

export type TripCandidate = {
    outbound: Leg;
    inbound: Leg;
    outboundPrice: number;
    totalPrice: number;
};

export type LocationKey = { id: number; ns: number };

export type LodgingOffer = {
    name: string;
    url: string | null;
    pricePerNight: string | null;
    pricePerStay: string | null;
    rating: string | null;
};

export type WeatherSample = JsonValue;
export type AttractionEntry = JsonValue;

export type StayWindow = { arrival: string; departure: string };

export type EnrichmentIssue = {
    stage: "location" | "lodging" | "weather" | "attractions" | "travel";
    message: string;
};

export type EnrichedTrip = {
    candidate: TripCandidate;
    destinationCity: string;
    stay: StayWindow;
    lodging: LodgingOffer[];
    // null means the travel-data phase produced nothing for this run
    weather: WeatherSample[] | null;
    attractions: AttractionEntry[] | null;
    issues: EnrichmentIssue[];
};
