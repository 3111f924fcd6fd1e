// pipeline/location.ts — destination display name → lodging provider location key
import type { LocationKey } from "../lib/types";
import { isRecord, type Normalized } from "../lib/normalize";
import { err, ok, type ProviderError, type ResolutionFailure, type Result } from "../lib/result";
import type { ToolInvoker } from "../providers/types";
import { callTool } from "./call-tool";

const PAIR_KEYS = ["ID", "NS"] as const;

/** `"Nador (NDR)"` → `"Nador"` */
export function stripAirportCode(destination: string): string {
    const s = destination.trim();
    const at = s.lastIndexOf(" (");
    return at !== -1 && s.endsWith(")") ? s.slice(0, at).trim() : s;
}

/** Primary query first, then the part before `" - "` when there is one. */
export function locationQueries(destination: string): string[] {
    const primary = stripAirportCode(destination);
    const queries = [primary];
    if (primary.includes(" - ")) {
        const head = primary.split(" - ")[0].trim();
        if (head && head !== primary) queries.push(head);
    }
    return queries;
}

const toInt = (v: unknown): number | undefined => {
    const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
    return Number.isInteger(n) ? n : undefined;
};

function fieldCI(record: Record<string, unknown>, name: string): unknown {
    const want = name.toLowerCase();
    for (const [k, v] of Object.entries(record)) if (k.toLowerCase() === want) return v;
    return undefined;
}

export function keyFromRecord(record: unknown): LocationKey | undefined {
    if (!isRecord(record)) return undefined;
    const id = toInt(fieldCI(record, "id"));
    const ns = toInt(fieldCI(record, "ns"));
    return id !== undefined && ns !== undefined ? { id, ns } : undefined;
}

/** First record exposing both an id and a namespace. */
export function keyFromSuggestions(n: Normalized): LocationKey | undefined {
    if (n.kind === "pair") return { id: n.values[0], ns: n.values[1] };
    let list: unknown[] = [];
    if (n.kind === "array") list = n.value;
    else if (n.kind === "object") {
        const wrapped = fieldCI(n.value, "output");
        if (Array.isArray(wrapped)) list = wrapped;
    }
    for (const s of list) {
        const key = keyFromRecord(s);
        if (key) return key;
    }
    return undefined;
}

/**
 * Tries each query in order and stops at the first one that yields a key;
 * results from different queries are never merged.
 */
export async function resolveLocation(
    invoker: ToolInvoker,
    destination: string,
    suggestionTool: string,
): Promise<Result<LocationKey, ResolutionFailure | ProviderError>> {
    const queries = locationQueries(destination);
    for (const query of queries) {
        const res = await callTool(invoker, suggestionTool, { query }, { pairKeys: PAIR_KEYS });
        if (!res.ok) return res;
        const key = keyFromSuggestions(res.value);
        if (key) return ok(key);
    }
    return err({ kind: "resolution", queries });
}
