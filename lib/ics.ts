import { DateTimeFormatter, LocalDate } from "@js-joda/core";
import * as ics from "ics";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { BinCalendarError } from "./config/schema.js";
import type { BinCalendarConfig, CalendarEvent, Occurrence } from "./config/schema.js";

const STAMP_FORMAT = DateTimeFormatter.ofPattern("yyyyMMdd");

export function slugify(name: string): string {
    return name.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "") || "service";
}

/** Identifier stays the same for a given service and date across runs, so clients update rather than duplicate. */
export function eventUid(serviceName: string, date: LocalDate, uidDomain: string): string {
    return `${slugify(serviceName)}-${date.toString()}@${uidDomain}`;
}

export function toCalendarEvents(
    occurrences: Occurrence[],
    config: Pick<BinCalendarConfig, "reminderHour" | "uidDomain">,
): CalendarEvent[] {
    const seen = new Set<string>();
    const events: CalendarEvent[] = [];

    for (const { service, date } of occurrences) {
        const uid = eventUid(service.name, date, config.uidDomain);
        if (seen.has(uid)) {
            continue;
        }
        seen.add(uid);

        const description = [`Schedule: ${service.schedule}`];
        if (service.round) {
            description.push(`Round: ${service.round}`);
        }

        events.push({
            uid,
            summary: service.label,
            description: description.join("\n"),
            date,
            alarm: {
                // All-day events start at midnight, so the reminder lands on the previous evening
                hoursBefore: 24 - config.reminderHour,
                description: `Tomorrow: ${service.label}`,
            },
        });
    }

    return events.sort((a, b) => a.date.compareTo(b.date) || a.uid.localeCompare(b.uid));
}

function toDateArray(date: LocalDate): ics.DateArray {
    return [date.year(), date.monthValue(), date.dayOfMonth()];
}

// Subscribed clients re-fetch at most this often; the file is rebuilt nightly
const REFRESH_INTERVAL = "P1D";
const MAX_LINE_OCTETS = 75;

/** Fold a content line at 75 octets of UTF-8, never splitting a code point. */
export function foldLine(line: string): string {
    const parts: string[] = [];
    let current = "";
    let size = 0;
    for (const ch of line) {
        const width = Buffer.byteLength(ch, "utf8");
        // Continuation lines spend one octet on the leading space
        const limit = parts.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
        if (size + width > limit) {
            parts.push(current);
            current = "";
            size = 0;
        }
        current += ch;
        size += width;
    }
    parts.push(current);
    return parts.join("\r\n ");
}

function calendarHeaders(config: Pick<BinCalendarConfig, "timezone">): string[] {
    return [
        `REFRESH-INTERVAL;VALUE=DURATION:${REFRESH_INTERVAL}`,
        `X-PUBLISHED-TTL:${REFRESH_INTERVAL}`,
        `X-WR-TIMEZONE:${config.timezone.id()}`,
    ];
}

export function toICS(
    events: CalendarEvent[],
    config: Pick<BinCalendarConfig, "calendarName" | "productId" | "timezone">,
    today: LocalDate,
): string {
    const mapped: ics.EventAttributes[] = events.map(e => {
        const m: ics.EventAttributes = {
            uid: e.uid,
            title: e.summary,
            description: e.description,
            start: toDateArray(e.date),
            end: toDateArray(e.date.plusDays(1)),
            transp: "TRANSPARENT",
            alarms: [{
                action: "display",
                description: e.alarm.description,
                trigger: { hours: e.alarm.hoursBefore, before: true },
            }],
        };
        return m;
    });

    const { error, value } = ics.createEvents(mapped, {
        productId: config.productId,
        method: "PUBLISH",
        calName: config.calendarName,
    });
    if (error) {
        throw new BinCalendarError("RenderError", `Failed to render calendar: ${error.message}`, { cause: error });
    }
    if (value === undefined) {
        throw new BinCalendarError("RenderError", "Failed to render calendar: ics produced no output");
    }

    // ics folds by character count; unfold here and fold again by octets below
    const lines = value.replace(/\r\n[ \t]/g, "").split("\r\n");

    // ics stamps events with the wall clock; pin DTSTAMP to the run date so identical inputs give identical files
    const stamp = `DTSTAMP:${today.format(STAMP_FORMAT)}T000000Z`;
    const body = lines
        .filter(line => !line.startsWith("X-PUBLISHED-TTL:") && !line.startsWith("REFRESH-INTERVAL"))
        .map(line => line.startsWith("DTSTAMP:") ? stamp : line);

    let headerEnd = body.findIndex(line => line === "BEGIN:VEVENT" || line === "END:VCALENDAR");
    if (headerEnd === -1) {
        headerEnd = body.length;
    }
    body.splice(headerEnd, 0, ...calendarHeaders(config));

    return body.map(foldLine).join("\r\n");
}

/**
 * Replace `path` with `content` without a reader ever seeing a partial file:
 * write a sibling temporary file, then rename it over the target.
 */
export async function writeCalendar(path: string, content: string): Promise<void> {
    const tmpPath = `${path}.tmp-${process.pid}`;
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tmpPath, content, "utf8");
        await rename(tmpPath, path);
    } catch (error) {
        await rm(tmpPath, { force: true }).catch(cleanupError => {
            console.error(`Could not remove ${tmpPath}:`, cleanupError);
        });
        throw new BinCalendarError("WriteError", `Failed to write ${path}: ${error}`, { cause: error });
    }
}
