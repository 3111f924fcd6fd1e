// lib/price.ts — comparable nightly price out of a provider's currency string

const count = (s: string, ch: string) => s.split(ch).length - 1;

/**
 * `"€77"` → 77, `"1.234,50"` → 1234.5, `"1,234"` → 1234.
 * Missing or unreadable prices become `Infinity` so they sort last.
 */
export function parsePrice(text?: string | null): number {
    if (!text) return Number.POSITIVE_INFINITY;
    const m = text.match(/\d[\d.,]*/);
    if (!m) return Number.POSITIVE_INFINITY;
    const run = m[0].replace(/[.,]+$/, "");

    const lastDot = run.lastIndexOf(".");
    const lastComma = run.lastIndexOf(",");
    let decimal: "." | "," | null = null;
    if (lastDot !== -1 && lastComma !== -1) {
        decimal = lastDot > lastComma ? "." : ",";
    } else if (lastDot !== -1 || lastComma !== -1) {
        const sep = lastDot !== -1 ? "." : ",";
        const digitsAfter = run.length - run.lastIndexOf(sep) - 1;
        // a lone separator with exactly three digits after it groups thousands
        decimal = count(run, sep) === 1 && digitsAfter !== 3 ? sep : null;
    }

    const at = decimal ? run.lastIndexOf(decimal) : -1;
    const digits = at === -1
        ? run.replace(/[.,]/g, "")
        : `${run.slice(0, at).replace(/[.,]/g, "")}.${run.slice(at + 1)}`;
    const value = Number.parseFloat(digits);
    return Number.isFinite(value) ? value : Number.POSITIVE_INFINITY;
}

/** Ascending, ties (including two missing prices) keep their order under a stable sort. */
export function comparePrices(a: number, b: number): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}
