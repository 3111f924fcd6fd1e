// pipeline/enrich.ts — lodging, weather and attractions for the cheapest trips.
// One remote call per dedup key per run; output keeps the input order.
import Bottleneck from "bottleneck";
import type {
    AttractionEntry,
    EnrichedTrip,
    EnrichmentIssue,
    Leg,
    LocationKey,
    LodgingOffer,
    StayWindow,
    TripCandidate,
    WeatherSample,
} from "../lib/types";
import { isoDate } from "../lib/dates";
import { OnceCache, cacheKey } from "../lib/once-cache";
import {
    describeError,
    type NormalizationFailure,
    type ProviderError,
    type ResolutionFailure,
    type Result,
} from "../lib/result";
import type { ToolInvoker, ToolNames } from "../providers/types";
import { resolveLocation } from "./location";
import { searchLodging, type Occupancy } from "./lodging";
import { fetchAttractions, fetchWeather, type WeatherMode } from "./travel-data";

type Fetched<T> = Result<T[], ProviderError | NormalizationFailure>;

export type RunCaches = {
    locations: OnceCache<Result<LocationKey, ResolutionFailure | ProviderError>>;
    lodging: OnceCache<Fetched<LodgingOffer>>;
    weather: OnceCache<Fetched<WeatherSample>>;
    attractions: OnceCache<Fetched<AttractionEntry>>;
};

/** Fresh caches for one run; nothing carries over between runs. */
export const createRunCaches = (): RunCaches => ({
    locations: new OnceCache(),
    lodging: new OnceCache(),
    weather: new OnceCache(),
    attractions: new OnceCache(),
});

export type EnrichOptions = {
    lodgingPerTrip: number;
    occupancy: Occupancy;
    attractionLimit: number;
    weatherMode: WeatherMode;
    maxConcurrent: number;
    dedupeLodging?: boolean;
    verbose?: boolean;
};

export type EnrichDeps = {
    /** `null` skips lodging entirely. */
    lodging: ToolInvoker | null;
    /** `null` means no travel data for this run. */
    travel: ToolInvoker | null;
    tools: ToolNames;
    caches?: RunCaches;
};

/** `"Milan Bergamo, Italy"` → `"Milan Bergamo"` */
export function destinationCityOf(leg: Leg): string {
    const city = leg.destinationName.split(",")[0].trim();
    return city || leg.destinationCode;
}

export const stayWindowOf = (c: TripCandidate): StayWindow => ({
    arrival: isoDate(c.outbound.departureTime),
    departure: isoDate(c.inbound.departureTime),
});

type Plan = { candidate: TripCandidate; destinationCity: string; stay: StayWindow };
type LodgingOutcome = { offers: LodgingOffer[]; issues: EnrichmentIssue[] };
type TravelOutcome = {
    weather: WeatherSample[] | null;
    attractions: AttractionEntry[] | null;
    issues: EnrichmentIssue[];
};

export async function enrichTrips(
    candidates: readonly TripCandidate[],
    options: EnrichOptions,
    deps: EnrichDeps,
): Promise<EnrichedTrip[]> {
    const caches = deps.caches ?? createRunCaches();
    const { tools } = deps;
    const limiter = new Bottleneck({ maxConcurrent: Math.max(1, options.maxConcurrent) });
    const plans: Plan[] = candidates.map((candidate) => ({
        candidate,
        destinationCity: destinationCityOf(candidate.outbound),
        stay: stayWindowOf(candidate),
    }));

    const lodgingFor = async (plan: Plan, invoker: ToolInvoker): Promise<LodgingOutcome> => {
        const { destinationCity: city, stay } = plan;
        const location = await caches.locations.get(cacheKey(city), () =>
            resolveLocation(invoker, city, tools.suggestions),
        );
        if (!location.ok) {
            console.warn(`[lodging] ${city}: ${describeError(location.error)}`);
            return { offers: [], issues: [{ stage: "location", message: describeError(location.error) }] };
        }
        const search = () =>
            searchLodging(invoker, tools.accommodations, location.value, stay, options.occupancy, options.lodgingPerTrip);
        const res = options.dedupeLodging
            ? await caches.lodging.get(cacheKey(city, stay.arrival, stay.departure), search)
            : await search();
        if (!res.ok) {
            console.warn(`[lodging] ${city} ${stay.arrival}→${stay.departure}: ${describeError(res.error)}`);
            return { offers: [], issues: [{ stage: "lodging", message: describeError(res.error) }] };
        }
        if (options.verbose) console.error(`[lodging] ${city} ${stay.arrival}→${stay.departure}: ${res.value.length} offers`);
        return { offers: res.value, issues: [] };
    };

    const lodgingInvoker = deps.lodging;
    const lodging: LodgingOutcome[] = lodgingInvoker
        ? await Promise.all(plans.map((p) => limiter.schedule(() => lodgingFor(p, lodgingInvoker))))
        : plans.map(() => ({ offers: [], issues: [] }));

    const travel = deps.travel
        ? await travelPhase(plans, deps.travel, options, tools, caches, limiter)
        : plans.map((): TravelOutcome => ({ weather: null, attractions: null, issues: [] }));

    return plans.map((plan, i) =>
        Object.freeze({
            candidate: plan.candidate,
            destinationCity: plan.destinationCity,
            stay: plan.stay,
            lodging: lodging[i].offers,
            weather: travel[i].weather,
            attractions: travel[i].attractions,
            issues: [...lodging[i].issues, ...travel[i].issues],
        }),
    );
}

/**
 * Weather + attractions for every plan. A transport failure anywhere in this
 * phase drops travel data for the whole run; lodging is unaffected.
 */
async function travelPhase(
    plans: Plan[],
    invoker: ToolInvoker,
    options: EnrichOptions,
    tools: ToolNames,
    caches: RunCaches,
    limiter: Bottleneck,
): Promise<TravelOutcome[]> {
    // first transport failure seen in this phase
    const state: { failure?: ProviderError } = {};

    const fetchFor = async (plan: Plan) => {
        const { destinationCity: city, stay } = plan;
        if (state.failure) return undefined;
        const weather = await caches.weather.get(cacheKey(city, stay.arrival, stay.departure), () =>
            fetchWeather(invoker, tools.weather, city, stay, options.weatherMode),
        );
        if (!weather.ok && weather.error.kind === "provider") {
            state.failure ??= weather.error;
            return undefined;
        }
        if (state.failure) return undefined;
        const attractions = await caches.attractions.get(cacheKey(city), () =>
            fetchAttractions(invoker, tools.attractions, city, options.attractionLimit),
        );
        if (!attractions.ok && attractions.error.kind === "provider") {
            state.failure ??= attractions.error;
            return undefined;
        }
        return { weather, attractions };
    };

    const fetched = await Promise.all(plans.map((p) => limiter.schedule(() => fetchFor(p))));

    if (state.failure) {
        const message = `travel data unavailable: ${describeError(state.failure)}`;
        console.warn(`[travel] ${message}`);
        return plans.map((): TravelOutcome => ({ weather: null, attractions: null, issues: [{ stage: "travel", message }] }));
    }

    return fetched.map((f, i): TravelOutcome => {
        const issues: EnrichmentIssue[] = [];
        if (!f) return { weather: null, attractions: null, issues };
        if (!f.weather.ok) issues.push({ stage: "weather", message: describeError(f.weather.error) });
        if (!f.attractions.ok) issues.push({ stage: "attractions", message: describeError(f.attractions.error) });
        if (options.verbose) console.error(`[travel] ${plans[i].destinationCity}: weather/attractions fetched`);
        return {
            weather: f.weather.ok ? f.weather.value : [],
            attractions: f.attractions.ok ? f.attractions.value : [],
            issues,
        };
    });
}
