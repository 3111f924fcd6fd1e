// pipeline/travel-data.ts — weather for a stay and attractions for a city
import type { AttractionEntry, StayWindow, WeatherSample } from "../lib/types";
import { isRecord, pickList, type Normalized } from "../lib/normalize";
import { err, ok, type NormalizationFailure, type ProviderError, type Result } from "../lib/result";
import type { ToolArgs, ToolInvoker } from "../providers/types";
import { callTool } from "./call-tool";

export type WeatherMode = "month" | "range";

/** `"Milan - Bergamo"` → `"Milan"`; the weather/attractions server only knows plain city names. */
export const travelCity = (destinationCity: string) => destinationCity.split(" - ")[0].trim();

export function weatherArgs(city: string, stay: StayWindow, mode: WeatherMode): ToolArgs {
    const month = Number(stay.arrival.slice(5, 7));
    if (mode === "month" && month >= 1 && month <= 12) return { city_name: city, month };
    return { city_name: city, start_date: stay.arrival, end_date: stay.departure };
}

// daily list, { days: [...] }, { weather: [...] } or a single month summary
export function weatherFrom(n: Normalized): WeatherSample[] | undefined {
    const list = pickList(n, ["days", "weather"]);
    if (list) return list;
    if (n.kind === "object") return n.value.error ? [] : [n.value];
    return undefined;
}

export function attractionsFrom(n: Normalized): AttractionEntry[] | undefined {
    const list = pickList(n, ["attractions", "items"]);
    if (list) return list;
    return n.kind === "object" ? [] : undefined;
}

type TravelResult<T> = Result<T[], ProviderError | NormalizationFailure>;

export async function fetchWeather(
    invoker: ToolInvoker,
    tool: string,
    destinationCity: string,
    stay: StayWindow,
    mode: WeatherMode,
): Promise<TravelResult<WeatherSample>> {
    const res = await callTool(invoker, tool, weatherArgs(travelCity(destinationCity), stay, mode));
    if (!res.ok) return res;
    const samples = weatherFrom(res.value);
    return samples ? ok(samples.filter((s) => !(isRecord(s) && s.error))) : err({ kind: "normalization", tool });
}

export async function fetchAttractions(
    invoker: ToolInvoker,
    tool: string,
    destinationCity: string,
    limit: number,
): Promise<TravelResult<AttractionEntry>> {
    const res = await callTool(invoker, tool, { city_name: travelCity(destinationCity), limit });
    if (!res.ok) return res;
    const entries = attractionsFrom(res.value);
    return entries ? ok(entries) : err({ kind: "normalization", tool });
}
