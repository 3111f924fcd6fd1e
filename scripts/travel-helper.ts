// scripts/travel-helper.ts — cheapest Thu-evening / Fri-night round trips, then hotels,
// weather and attractions for the top ones.
//   tsx scripts/travel-helper.ts [--json] [--no-hotels] [--days 60] [--top 10] [--hotels 3] [--adults 2] [--rooms 1] [--verbose]
import { loadConfig, loadEnvFiles } from "../lib/config";
import { loadAirportCoordinates } from "../lib/duration";
import { formatTextReport, toJsonReport } from "../lib/report";
import { errorMessage } from "../lib/result";
import { enrichTrips } from "../pipeline/enrich";
import { searchTrips } from "../pipeline/search";
import { McpToolInvoker } from "../providers/mcp";
import { RyanairFlightProvider } from "../providers/ryanair";

const FLAGS = new Set(["json", "no-hotels", "verbose"]);

const args = new Map<string, string>();
for (let i = 2; i < process.argv.length; i++) {
    const k = process.argv[i];
    if (!k.startsWith("--")) continue;
    const name = k.slice(2);
    if (FLAGS.has(name)) args.set(name, "true");
    else args.set(name, process.argv[++i] ?? "");
}

const intArg = (name: string, fallback: number) => {
    const v = args.get(name);
    if (v === undefined) return fallback;
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) throw new Error(`--${name} expects a non-negative integer, got "${v}"`);
    return n;
};

const seconds = (ms: number) => `${(ms / 1000).toFixed(1)}s`;

async function connectOrNull(label: string, url: string): Promise<McpToolInvoker | null> {
    try {
        return await McpToolInvoker.connect(url);
    } catch (e) {
        console.warn(`[${label}] cannot reach ${url}: ${errorMessage(e)}`);
        return null;
    }
}

async function main() {
    loadEnvFiles();
    const cfg = loadConfig();
    const asJson = args.has("json");
    const verbose = args.has("verbose");
    const withHotels = !args.has("no-hotels");
    const adults = intArg("adults", cfg.ADULTS);

    const t0 = Date.now();
    const provider = new RyanairFlightProvider({ currency: cfg.CURRENCY, minTimeMs: cfg.FLIGHT_MIN_TIME_MS });
    const ranked = await searchTrips(provider, {
        origins: cfg.ORIGINS,
        horizonDays: intArg("days", cfg.DAYS_AHEAD),
        rule: cfg.ADMISSION_RULE,
        nights: { min: cfg.NIGHTS_MIN, max: cfg.NIGHTS_MAX },
        maxTotalPrice: cfg.MAX_TOTAL_PRICE,
        verbose,
    });
    const cheapest = ranked.slice(0, intArg("top", cfg.TOP_TRIPS));
    const tFlights = Date.now() - t0;

    const t1 = Date.now();
    const lodging = withHotels && cheapest.length ? await connectOrNull("lodging", cfg.LODGING_MCP_URL) : null;
    const travel = cheapest.length ? await connectOrNull("travel", cfg.TRAVEL_MCP_URL) : null;
    try {
        const trips = await enrichTrips(
            cheapest,
            {
                lodgingPerTrip: intArg("hotels", cfg.HOTELS_PER_TRIP),
                occupancy: { adults, rooms: intArg("rooms", cfg.ROOMS) },
                attractionLimit: cfg.ATTRACTION_LIMIT,
                weatherMode: cfg.WEATHER_MODE,
                maxConcurrent: cfg.MAX_CONCURRENT,
                dedupeLodging: cfg.DEDUPE_LODGING,
                verbose,
            },
            {
                lodging,
                travel,
                tools: {
                    suggestions: cfg.TOOL_SUGGESTIONS,
                    accommodations: cfg.TOOL_ACCOMMODATIONS,
                    weather: cfg.TOOL_WEATHER,
                    attractions: cfg.TOOL_ATTRACTIONS,
                },
            },
        );
        const tEnrich = Date.now() - t1;

        if (asJson) {
            console.log(JSON.stringify(toJsonReport(trips), null, 2));
        } else {
            const airports = cfg.AIRPORTS_FILE ? loadAirportCoordinates(cfg.AIRPORTS_FILE) : undefined;
            console.log(formatTextReport(trips, { adults, airports }));
        }
        console.error(
            `Total ${seconds(Date.now() - t0)}. Flights: ${seconds(tFlights)}, hotels/weather/attractions: ${seconds(tEnrich)}.`,
        );
    } finally {
        await Promise.all([lodging?.close(), travel?.close()]);
    }
}

main().catch((e) => {
    console.error("🔥 Fatal error:", e);
    process.exit(1);
});
