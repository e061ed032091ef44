import { LocalDate } from "@js-joda/core";
import { slugify } from "../ics.js";
import { BinCalendarError, collectionResponseSchema } from "./schema.js";
import type { BinCalendarConfig, CollectionRow, CollectionService, IntervalDays } from "./schema.js";
import { proxyFetch, withTimeout } from "./proxy-fetch.js";
import type { FetchFn } from "./proxy-fetch.js";

// The council's own front end sends these; the API rejects some requests without them
const HEADERS: Record<string, string> = {
    "User-Agent": "Mozilla/5.0 (compatible; BinCalendarBot/1.0)",
    "Accept": "application/json",
    "Origin": "https://apps.southglos.gov.uk",
    "Referer": "https://apps.southglos.gov.uk/",
};

const FORTNIGHTLY = [
    "every other week",
    "fortnightly",
    "every fortnight",
    "every two weeks",
    "every 2 weeks",
    "biweekly",
    "bi-weekly",
];
const WEEKLY = ["every week", "weekly"];

// Whole words only, so "biweekly" is never read as "weekly"
function mentions(schedule: string, labels: string[]): boolean {
    return labels.some(label => new RegExp(`\\b${label}\\b`).test(schedule));
}

/**
 * Map the council's schedule description (e.g. "Monday every other week") to a
 * recurrence interval in days.
 */
export function intervalFromSchedule(service: string, schedule: string): IntervalDays {
    const normalized = schedule.toLowerCase().replace(/\s+/g, " ");
    if (mentions(normalized, FORTNIGHTLY)) {
        return 14;
    }
    if (mentions(normalized, WEEKLY)) {
        return 7;
    }
    throw new BinCalendarError(
        "UnrecognizedFrequency",
        `Unrecognized collection frequency "${schedule}" for service "${service}"`,
        { service },
    );
}

export function labelFor(service: string, labels: Record<string, string>): string {
    const key = Object.keys(labels).find(k => k.toLowerCase() === service.toLowerCase());
    return key !== undefined ? labels[key] : `🗑️ ${service} collection`;
}

/**
 * Dates arrive as either "2026-02-23" or "2026-02-23T00:00:00+00:00".
 * The calendar date is taken as written, regardless of offset.
 */
export function parseCollectionDate(raw: string): LocalDate | null {
    const match = raw.trim().match(/^(\d{4}-\d{2}-\d{2})(?:T.*)?$/);
    if (!match) {
        return null;
    }
    try {
        return LocalDate.parse(match[1]);
    } catch (e) {
        return null;
    }
}

function toService(row: CollectionRow, labels: Record<string, string>): CollectionService | null {
    const name = row.hso_servicename.trim();
    const rawDate = row.hso_nextcollection ?? "";
    if (!rawDate) {
        console.warn(`No next collection date for ${name}, skipping`);
        return null;
    }
    const nextDate = parseCollectionDate(rawDate);
    if (nextDate === null) {
        console.warn(`Couldn't parse date '${rawDate}' for ${name}, skipping`);
        return null;
    }
    const schedule = (row.hso_scheduledescription ?? "").trim();
    return {
        name,
        label: labelFor(name, labels),
        nextDate,
        intervalDays: intervalFromSchedule(name, schedule),
        schedule,
        round: row.hso_round?.trim() || undefined,
    };
}

/**
 * Normalize a decoded API body into one CollectionService per service.
 * The API lists each service twice (task and round-leg entries), so rows
 * are de-duplicated on next date and the slug that event identifiers are
 * built from. Names that differ only in case or punctuation collapse.
 */
export function parseCollections(body: unknown, labels: Record<string, string>): CollectionService[] {
    const result = collectionResponseSchema.safeParse(body);
    if (!result.success) {
        throw new BinCalendarError("FetchError", `Unexpected response shape: ${result.error.message}`, { cause: result.error });
    }

    const seen = new Map<string, string>();
    const services: CollectionService[] = [];
    for (const row of result.data) {
        const service = toService(row, labels);
        if (service === null) {
            continue;
        }
        const key = `${slugify(service.name)}|${service.nextDate.toString()}`;
        const kept = seen.get(key);
        if (kept !== undefined) {
            if (kept !== service.name) {
                console.warn(`Service ${service.name} shares identifiers with ${kept}, skipping`);
            }
            continue;
        }
        seen.set(key, service.name);
        services.push(service);
    }

    if (services.length === 0) {
        throw new BinCalendarError(
            "NoCollectionsReturned",
            `No collection dates returned. The API may have changed.\nRaw response: ${JSON.stringify(body).slice(0, 500)}`,
        );
    }

    return services.sort((a, b) => a.nextDate.compareTo(b.nextDate) || a.name.localeCompare(b.name));
}

export type FetchOptions = Pick<BinCalendarConfig, "uprn" | "apiUrl" | "requestTimeoutMs" | "labels">;

export async function fetchCollections(options: FetchOptions, fetchFn: FetchFn = proxyFetch): Promise<CollectionService[]> {
    const uprn = options.uprn.trim();
    if (!uprn) {
        throw new BinCalendarError("MissingIdentifier", "No UPRN supplied, refusing to query the council API");
    }

    const url = new URL(options.apiUrl);
    url.searchParams.set("uprn", uprn);

    let body: unknown;
    try {
        const res = await withTimeout(fetchFn, options.requestTimeoutMs)(url, { headers: HEADERS });
        if (!res.ok) {
            throw Error(`${res.status} ${res.statusText}`);
        }
        body = await res.json();
    } catch (error) {
        throw new BinCalendarError("FetchError", `Failed to fetch collection details: ${error}`, { cause: error });
    }

    return parseCollections(body, options.labels);
}
