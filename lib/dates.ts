// lib/dates.ts — calendar helpers shared by search, enrichment and the report
import { differenceInCalendarDays, format } from "date-fns";

export const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type WeekdayName = (typeof WEEKDAYS)[number];

export const isoDate = (d: Date) => format(d, "yyyy-MM-dd");
export const hhmm = (d: Date) => format(d, "HH:mm");
export const longDeparture = (d: Date) => format(d, "yyyy-MM-dd EEEE HH:mm");

/** Calendar nights between two departures, ignoring time of day. */
export const nightsBetween = (outbound: Date, inbound: Date) => differenceInCalendarDays(inbound, outbound);

/** 0 = Sunday … 6 = Saturday, same as `Date#getDay`. */
export function weekdayIndex(name: string): number | undefined {
    const i = WEEKDAYS.findIndex((w) => w === name.trim().slice(0, 3).toLowerCase());
    return i === -1 ? undefined : i;
}
