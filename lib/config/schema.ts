import { LocalDate, Period, ZoneRegion } from "@js-joda/core";
import { z } from "zod";

import '@js-joda/timezone'

export const DEFAULT_API_URL = "https://api.southglos.gov.uk/wastecomp/GetCollectionDetails";

export const DEFAULT_LABELS: Record<string, string> = {
    Refuse: "🗑️ Refuse (black bin) collection",
    Recycling: "♻️ Recycling collection",
    Food: "🍎 Food waste collection",
    Garden: "🌿 Garden waste collection",
};

export const configFileSchema = z.object({
    output: z.string().min(1).default("docs/bin_collections.ics"),
    // We use refine to provide our own error message
    // and Transform to parse it into a Period
    horizon: z.string().refine(p => {
        try {
            Period.parse(p);
            return true;
        }
        catch (e) { return false; }
    }, { message: "Must parse as valid ISO-8601 period. e.g. P26W" }).default("P26W").transform(p => Period.parse(p)),
    timezone: z.string().refine(tz => {
        try {
            ZoneRegion.of(tz);
            return true;
        }
        catch (e) { return false; }
    }, { message: "Must be an IANA timezone. e.g. Europe/London" }).default("Europe/London").transform(ZoneRegion.of),
    reminderHour: z.number().int().min(0).max(23).default(17),
    calendarName: z.string().default("Bin Collections"),
    productId: z.string().default("bin-calendar"),
    uidDomain: z.string().regex(/^[a-zA-Z0-9.-]+$/).default("bin-calendar"),
    apiUrl: z.string().url().default(DEFAULT_API_URL),
    requestTimeoutMs: z.number().int().positive().default(15000),
    labels: z.record(z.string()).default(DEFAULT_LABELS),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type BinCalendarConfig = ConfigFile & {
    uprn: string;
};

// One row as served by the council waste API. Fields we don't read are let through.
export const collectionRowSchema = z.object({
    hso_servicename: z.string(),
    hso_nextcollection: z.string().nullish(),
    hso_scheduledescription: z.string().nullish(),
    hso_round: z.string().nullish(),
}).passthrough();

export const collectionResponseSchema = z.union([
    z.array(collectionRowSchema),
    z.object({ value: z.array(collectionRowSchema) }).passthrough().transform(r => r.value),
]);

export type CollectionRow = z.infer<typeof collectionRowSchema>;

export type IntervalDays = 7 | 14;

export interface CollectionService {
    readonly name: string;
    readonly label: string;
    readonly nextDate: LocalDate;
    readonly intervalDays: number;
    readonly schedule: string;
    readonly round?: string;
}

export interface Occurrence {
    service: CollectionService;
    date: LocalDate;
}

export interface CalendarAlarm {
    hoursBefore: number;
    description: string;
}

export interface CalendarEvent {
    uid: string;
    summary: string;
    description: string;
    date: LocalDate;
    alarm: CalendarAlarm;
}

export type BinCalendarErrorType =
    | "MissingIdentifier"
    | "FetchError"
    | "NoCollectionsReturned"
    | "UnrecognizedFrequency"
    | "InvalidInterval"
    | "RenderError"
    | "WriteError"
    | "ConfigError";

export class BinCalendarError extends Error {
    public override readonly name = "BinCalendarError";
    public readonly service: string | undefined;

    constructor(
        public readonly type: BinCalendarErrorType,
        reason: string,
        options: { cause?: unknown; service?: string } = {},
    ) {
        super(reason, { cause: options.cause });
        this.service = options.service;
    }
}

export function isBinCalendarError(error: unknown, type?: BinCalendarErrorType): error is BinCalendarError {
    return error instanceof BinCalendarError && (type === undefined || error.type === type);
}
