import { DateTimeFormatter, LocalDate } from "@js-joda/core";
import { Locale } from "@js-joda/locale_en-us";
import { loadConfig } from "./config/loader.js";
import { fetchCollections } from "./config/council.js";
import { projectOccurrences } from "./config/recurring.js";
import { proxyFetch } from "./config/proxy-fetch.js";
import type { FetchFn } from "./config/proxy-fetch.js";
import type { BinCalendarConfig, CollectionService } from "./config/schema.js";
import { toCalendarEvents, toICS, writeCalendar } from "./ics.js";

import '@js-joda/timezone'

const SUMMARY_FORMAT = DateTimeFormatter.ofPattern("EEE dd MMM yyyy").withLocale(Locale.US);

export interface RunResult {
    services: CollectionService[];
    eventCount: number;
    outputPath: string;
}

export interface RunOptions {
    fetchFn?: FetchFn;
    today?: LocalDate;
}

const logUpcoming = (services: CollectionService[]) => {
    console.log("Upcoming collections:");
    for (const service of services) {
        const every = service.intervalDays === 7 ? "weekly" : `every ${service.intervalDays} days`;
        console.log(`  ${service.nextDate.format(SUMMARY_FORMAT)}  ${service.label} (${every})`);
    }
};

/**
 * Fetch, project and write the calendar once. Any failure propagates and the
 * previously published file is left as it was.
 */
export const generateCalendar = async (config: BinCalendarConfig, options: RunOptions = {}): Promise<RunResult> => {
    const today = options.today ?? LocalDate.now(config.timezone);

    console.log("Fetching collection dates ...");
    const services = await fetchCollections(config, options.fetchFn ?? proxyFetch);
    console.log(`Found ${services.length} service(s): ${services.map(s => s.name).join(", ")}`);
    logUpcoming(services);

    const occurrences = projectOccurrences(services, today, config.horizon);
    const events = toCalendarEvents(occurrences, config);
    const icsString = toICS(events, config, today);

    await writeCalendar(config.output, icsString);
    console.log(`${events.length} events written to ${config.output}`);

    return { services, eventCount: events.length, outputPath: config.output };
};

export const main = async (env: Record<string, string | undefined> = process.env, options: RunOptions = {}): Promise<RunResult> => {
    const config = await loadConfig(env);
    return generateCalendar(config, options);
};
