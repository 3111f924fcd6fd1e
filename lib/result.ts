// lib/result.ts — explicit outcomes at each remote-call boundary

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Transport failure or timeout while talking to a remote tool. */
export type ProviderError = { kind: "provider"; tool: string; message: string };

/** None of the candidate queries produced a location key. */
export type ResolutionFailure = { kind: "resolution"; queries: string[] };

/** The tool answered, but nothing JSON-shaped could be extracted. */
export type NormalizationFailure = { kind: "normalization"; tool: string };

export type EnrichmentError = ProviderError | ResolutionFailure | NormalizationFailure;

export function describeError(e: EnrichmentError): string {
    switch (e.kind) {
        case "provider":
            return `${e.tool} failed: ${e.message}`;
        case "resolution":
            return `no location found for ${e.queries.map((q) => JSON.stringify(q)).join(", ")}`;
        case "normalization":
            return `${e.tool} returned nothing usable`;
    }
}

export const errorMessage = (e: unknown): string =>
    e instanceof Error ? e.message : String(e);
