import { describe, expect, it } from "vitest";
import { normalize } from "../lib/normalize";
import { keyFromSuggestions, locationQueries, resolveLocation, stripAirportCode } from "../pipeline/location";
import { FakeInvoker, jsonResult, textResult } from "./fakes";

describe("location queries", () => {
    it("strips a trailing airport code", () => {
        expect(stripAirportCode("Nador (NDR)")).toBe("Nador");
        expect(stripAirportCode("  Porto  ")).toBe("Porto");
        expect(stripAirportCode("Santiago (Chile) Centre")).toBe("Santiago (Chile) Centre");
    });

    it("adds the part before ' - ' as a second query", () => {
        expect(locationQueries("Milan - Bergamo (BGY)")).toEqual(["Milan - Bergamo", "Milan"]);
        expect(locationQueries("Berlin")).toEqual(["Berlin"]);
    });
});

describe("keyFromSuggestions", () => {
    it("reads output-wrapped and bare arrays with any key case", () => {
        expect(keyFromSuggestions(normalize(jsonResult({ output: [{ Name: "x" }, { ID: 3848, NS: 200 }] })))).toEqual({
            id: 3848,
            ns: 200,
        });
        expect(keyFromSuggestions(normalize(jsonResult([{ id: "12", ns: "3" }])))).toEqual({ id: 12, ns: 3 });
    });

    it("rejects records with a missing or non-numeric half", () => {
        expect(keyFromSuggestions(normalize(jsonResult([{ id: 1 }, { id: "x", ns: 2 }])))).toBeUndefined();
        expect(keyFromSuggestions({ kind: "raw", text: "nothing" })).toBeUndefined();
    });
});

describe("resolveLocation", () => {
    it("stops at the first query that resolves", async () => {
        const invoker = new FakeInvoker({
            suggest: ({ query }) => (query === "Milan - Bergamo" ? jsonResult({ output: [] }) : jsonResult([{ ID: 7, NS: 1 }])),
        });
        const res = await resolveLocation(invoker, "Milan - Bergamo (BGY)", "suggest");
        expect(res).toEqual({ ok: true, value: { id: 7, ns: 1 } });
        expect(invoker.calls.map((c) => c.args.query)).toEqual(["Milan - Bergamo", "Milan"]);
    });

    it("does not try later queries once one succeeds", async () => {
        const invoker = new FakeInvoker({ suggest: () => jsonResult([{ ID: 1, NS: 2 }]) });
        await resolveLocation(invoker, "Milan - Bergamo", "suggest");
        expect(invoker.calls).toHaveLength(1);
    });

    it("understands map-style debug text", async () => {
        const invoker = new FakeInvoker({ suggest: () => textResult("map[output:[map[ID:3848 NS:200 Name:Berlin]]]") });
        expect(await resolveLocation(invoker, "Berlin", "suggest")).toEqual({ ok: true, value: { id: 3848, ns: 200 } });
    });

    it("reports the queries it tried when nothing matches", async () => {
        const invoker = new FakeInvoker({ suggest: () => textResult("no matches") });
        expect(await resolveLocation(invoker, "Atlantis - North", "suggest")).toEqual({
            ok: false,
            error: { kind: "resolution", queries: ["Atlantis - North", "Atlantis"] },
        });
    });

    it("returns a provider error when the call itself fails", async () => {
        const invoker = new FakeInvoker({});
        expect(await resolveLocation(invoker, "Berlin", "suggest")).toEqual({
            ok: false,
            error: { kind: "provider", tool: "suggest", message: "no handler for suggest" },
        });
    });
});
