// lib/config.ts — environment → validated run configuration
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { Airport } from "./types";
import { WEEKDAYS, weekdayIndex } from "./dates";

/** `.env.local` first, then `.env`; values already in the environment win. */
export function loadEnvFiles(cwd = process.cwd()) {
    loadDotenv({ path: path.resolve(cwd, ".env.local") });
    loadDotenv({ path: path.resolve(cwd, ".env") });
}

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const int = (def: number, min = 0) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(def));

const flag = (def: boolean) =>
    z.preprocess(
        blankToUndefined,
        z.enum(["true", "false", "1", "0", "yes", "no"]).default(def ? "true" : "false"),
    ).transform((v) => v === "true" || v === "1" || v === "yes");

const text = (def: string) => z.preprocess(blankToUndefined, z.string().default(def));
const url = (def: string) => z.preprocess(blankToUndefined, z.string().url().default(def));

/** `CGN:Köln,NRN:Düsseldorf Weeze` */
export function parseOrigins(raw: string): Airport[] | string {
    const out: Airport[] = [];
    for (const part of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
        const at = part.indexOf(":");
        const code = (at === -1 ? part : part.slice(0, at)).trim().toUpperCase();
        const name = (at === -1 ? "" : part.slice(at + 1)).trim() || code;
        if (!/^[A-Z]{3}$/.test(code)) return `bad airport code "${code}" in ORIGINS`;
        out.push({ code, name });
    }
    return out;
}

/** `thu>=17,fri>=23` → weekday index (0 = Sunday) → earliest departure hour. */
export function parseAdmissionRule(raw: string): Map<number, number> | string {
    const rule = new Map<number, number>();
    for (const part of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
        const m = part.match(/^([a-z]+)\s*>=\s*(\d{1,2})$/i);
        if (!m) return `cannot read "${part}" (expected e.g. thu>=17)`;
        const day = weekdayIndex(m[1]);
        if (day === undefined) return `unknown weekday "${m[1]}", use one of ${WEEKDAYS.join("/")}`;
        const hour = Number(m[2]);
        if (hour > 23) return `hour ${hour} out of range in "${part}"`;
        rule.set(day, hour);
    }
    return rule;
}

export const ConfigSchema = z
    .object({
        ORIGINS: text("CGN:Köln,NRN:Düsseldorf Weeze").transform((v, ctx) => {
            const parsed = parseOrigins(v);
            if (typeof parsed === "string") {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed });
                return z.NEVER;
            }
            return parsed;
        }),
        ADMISSION_RULE: text("thu>=17,fri>=23").transform((v, ctx) => {
            const parsed = parseAdmissionRule(v);
            if (typeof parsed === "string") {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed });
                return z.NEVER;
            }
            return parsed;
        }),
        DAYS_AHEAD: int(120),
        NIGHTS_MIN: int(2),
        NIGHTS_MAX: int(4),
        MAX_TOTAL_PRICE: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),
        CURRENCY: text("EUR").pipe(z.string().length(3)),
        FLIGHT_MIN_TIME_MS: int(250),

        TOP_TRIPS: int(10),
        HOTELS_PER_TRIP: int(3),
        ADULTS: int(2, 1),
        ROOMS: int(1, 1),
        ATTRACTION_LIMIT: int(10, 1),
        WEATHER_MODE: z.preprocess(blankToUndefined, z.enum(["month", "range"]).default("month")),
        MAX_CONCURRENT: int(1, 1),
        DEDUPE_LODGING: flag(false),

        AIRPORTS_FILE: z.preprocess(blankToUndefined, z.string().optional()),

        LODGING_MCP_URL: url("https://mcp.trivago.com/mcp"),
        TRAVEL_MCP_URL: url("https://mcp-travel-data.onrender.com/sse"),
        TOOL_SUGGESTIONS: text("trivago-search-suggestions"),
        TOOL_ACCOMMODATIONS: text("trivago-accommodation-search"),
        TOOL_WEATHER: text("get_weather"),
        TOOL_ATTRACTIONS: text("get_attractions"),
    })
    .refine((c) => c.NIGHTS_MIN <= c.NIGHTS_MAX, {
        message: "NIGHTS_MIN must not exceed NIGHTS_MAX",
        path: ["NIGHTS_MIN"],
    });

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const lines = parsed.error.issues.map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`);
        throw new Error(`Invalid configuration:\n${lines.join("\n")}`);
    }
    return parsed.data;
}
