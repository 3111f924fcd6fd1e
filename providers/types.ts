// providers/types.ts — what the pipeline needs from the outside world
import type { Leg } from "../lib/types";
import type { RawResult } from "../lib/normalize";

/** `HH:mm` bounds on the outbound departure. */
export type TimeWindow = { from: string; to: string };
export type DateRange = { from: Date; to: Date };

export type FlightProvider = {
    readonly name: string;
    searchRoundTrips(
        originCode: string,
        outboundDate: Date,
        outboundTimeWindow: TimeWindow,
        returnDateRange: DateRange,
    ): Promise<[Leg, Leg][]>;
};

export type ToolArgs = Record<string, string | number | boolean>;

export type ToolInvoker = {
    invoke(toolName: string, args: ToolArgs): Promise<RawResult>;
};

export type ToolNames = {
    suggestions: string;
    accommodations: string;
    weather: string;
    attractions: string;
};
