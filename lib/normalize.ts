// lib/normalize.ts — pull a JSON-shaped value out of a tool-call result of unknown layout.
// Strategies run in a fixed order; the first one that yields something wins.

import type { JsonArray, JsonObject, JsonValue } from "./types";

export type Normalized =
    | { kind: "null" }
    | { kind: "object"; value: JsonObject }
    | { kind: "array"; value: JsonArray }
    | { kind: "raw"; text: string }
    | { kind: "pair"; keys: readonly [string, string]; values: readonly [number, number] };

/**
 * What a tool invocation hands back. Blocks carry their text as a plain string,
 * a `text` property, or behind a `toJSON()` dump.
 */
export type RawResult = {
    structuredContent?: unknown;
    content?: readonly unknown[] | null;
};

export type NormalizeOptions = {
    /** Key names to pick out of map-like debug text, e.g. `["ID", "NS"]`. */
    pairKeys?: readonly [string, string];
    /** Literal that precedes an embedded array; must end with `[`. */
    marker?: string;
};

export const RAW_TEXT_LIMIT = 500;
export const DEFAULT_ARRAY_MARKER = "output:[";

const NULL: Normalized = { kind: "null" };

export const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === "object" && v !== null && !Array.isArray(v);

// Same rules as JSON.stringify: undefined/functions drop out of objects, become null in arrays.
export function asJson(v: unknown): JsonValue | undefined {
    if (v === null || typeof v === "string" || typeof v === "boolean") return v;
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    if (Array.isArray(v)) return v.map((x) => asJson(x) ?? null);
    if (isRecord(v)) {
        const out: JsonObject = {};
        for (const [k, x] of Object.entries(v)) {
            const j = asJson(x);
            if (j !== undefined) out[k] = j;
        }
        return out;
    }
    return undefined;
}

function classify(v: JsonValue | undefined): Normalized | undefined {
    if (Array.isArray(v)) return { kind: "array", value: v };
    if (isRecord(v)) return { kind: "object", value: v };
    return undefined;
}

/** Objects and arrays only; scalars and `null` count as a failed parse. */
export function parseJson(text: string): Normalized | undefined {
    const t = text.trim();
    if (!t) return undefined;
    try {
        const parsed: unknown = JSON.parse(t);
        return classify(asJson(parsed));
    } catch {
        return undefined;
    }
}

export function blockText(block: unknown): string | undefined {
    try {
        if (typeof block === "string") return block || undefined;
        if (!isRecord(block)) return undefined;
        if (typeof block.text === "string") return block.text || undefined;
        const dump = block.toJSON;
        if (typeof dump === "function") {
            const dumped: unknown = dump.call(block);
            if (isRecord(dumped) && typeof dumped.text === "string") return dumped.text || undefined;
        }
        return undefined;
    } catch {
        return undefined;
    }
}

const escapeRx = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function firstIntAfter(text: string, key: string): number | undefined {
    const rx = new RegExp(`(?:^|[^A-Za-z0-9_])["']?${escapeRx(key)}["']?\\s*:\\s*(\\d+)`, "i");
    const m = rx.exec(text);
    return m ? Number(m[1]) : undefined;
}

export function extractPair(text: string, keys: readonly [string, string]): Normalized | undefined {
    const a = firstIntAfter(text, keys[0]);
    const b = firstIntAfter(text, keys[1]);
    if (a === undefined || b === undefined) return undefined;
    return { kind: "pair", keys, values: [a, b] };
}

// index of the `]` closing the `[` at `start`, skipping double-quoted strings; -1 if unbalanced
function matchingBracket(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
        const c = text[i];
        if (inString) {
            if (c === "\\") i++;
            else if (c === "\"") inString = false;
            continue;
        }
        if (c === "\"") inString = true;
        else if (c === "[") depth++;
        else if (c === "]" && --depth === 0) return i;
    }
    return -1;
}

/**
 * Finds the array after `marker` (e.g. `map[output:[...]]`) or, when the marker is
 * absent, the first `[` in the text, and parses exactly the bracket-balanced span.
 */
export function extractBracketedArray(text: string, marker = DEFAULT_ARRAY_MARKER): JsonArray | undefined {
    const at = text.indexOf(marker);
    const start = at !== -1 ? at + marker.length - 1 : text.indexOf("[");
    if (start === -1 || text[start] !== "[") return undefined;
    const end = matchingBracket(text, start);
    if (end === -1) return undefined;
    const parsed = parseJson(text.slice(start, end + 1));
    return parsed?.kind === "array" ? parsed.value : undefined;
}

function fromStructured(sc: unknown): Normalized | undefined {
    if (typeof sc === "string") {
        if (!sc.trim()) return undefined;
        return parseJson(sc) ?? { kind: "raw", text: sc };
    }
    return classify(asJson(sc));
}

function fromBlocks(texts: (string | undefined)[], options: NormalizeOptions): Normalized | undefined {
    const first = texts[0];
    let fallback: Normalized | undefined;
    if (first !== undefined) {
        const parsed = parseJson(first);
        if (parsed) return parsed;
        fallback = { kind: "raw", text: first.slice(0, RAW_TEXT_LIMIT) };
    }

    const parts = texts.filter((t): t is string => t !== undefined);
    if (!parts.length) return undefined;
    const joined = parts.join("\n");

    // block count, not text-block count
    if (texts.length > 1) {
        const whole = parseJson(joined);
        if (whole) return whole;
        for (const p of parts) {
            const each = parseJson(p);
            if (each) return each;
        }
    }

    if (options.pairKeys) {
        const pair = extractPair(joined, options.pairKeys);
        if (pair) return pair;
    }

    const marker = options.marker ?? DEFAULT_ARRAY_MARKER;
    let arr = extractBracketedArray(joined, marker);
    if (!arr && parts.length > 1) {
        for (const p of parts) {
            arr = extractBracketedArray(p, marker);
            if (arr) break;
        }
    }
    if (arr) return { kind: "array", value: arr };

    return fallback;
}

// A result container has `structuredContent`, or `content` as a list of blocks.
// Anything else is taken to be an already-extracted JSON value.
function isRawResult(v: Record<string, unknown>): boolean {
    return "structuredContent" in v || Array.isArray(v.content);
}

function normalizeUnsafe(raw: unknown, options: NormalizeOptions): Normalized {
    if (raw === null || raw === undefined) return NULL;
    if (typeof raw === "string") return fromBlocks([raw || undefined], options) ?? NULL;
    if (Array.isArray(raw)) return classify(asJson(raw)) ?? NULL;
    if (!isRecord(raw)) return NULL;
    if (!isRawResult(raw)) return classify(asJson(raw)) ?? NULL;

    if (raw.structuredContent !== undefined && raw.structuredContent !== null) {
        const s = fromStructured(raw.structuredContent);
        if (s) return s;
    }
    const content = Array.isArray(raw.content) ? raw.content : [];
    if (!content.length) return NULL;
    return fromBlocks(content.map(blockText), options) ?? NULL;
}

/** Never throws; degrades to `null` kind or a truncated raw-text fallback. */
export function normalize(raw: unknown, options: NormalizeOptions = {}): Normalized {
    try {
        return normalizeUnsafe(raw, options);
    } catch {
        return NULL;
    }
}

export function toJson(n: Normalized): JsonValue {
    switch (n.kind) {
        case "null":
            return null;
        case "object":
        case "array":
            return n.value;
        case "raw":
            return { raw: n.text };
        case "pair":
            return { [n.keys[0]]: n.values[0], [n.keys[1]]: n.values[1] };
    }
}

/** The list itself, or the first of `fields` on an object that holds a list. */
export function pickList(n: Normalized, fields: readonly string[]): JsonArray | undefined {
    if (n.kind === "array") return n.value;
    if (n.kind !== "object") return undefined;
    for (const f of fields) {
        const v = n.value[f];
        if (Array.isArray(v)) return v;
    }
    return undefined;
}
