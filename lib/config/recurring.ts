import { LocalDate, Period } from "@js-joda/core";
import { BinCalendarError } from "./schema.js";
import type { CollectionService, Occurrence } from "./schema.js";

/**
 * Project each service forward from its next known collection, one step of
 * its interval at a time, up to and including `today + horizon`.
 *
 * A next date already in the past is still emitted; stale upstream data is
 * de-duplicated downstream by event identifier, never dropped here.
 */
export function projectOccurrences(services: CollectionService[], today: LocalDate, horizon: Period): Occurrence[] {
    const endDate = today.plus(horizon);
    return services.flatMap(service => projectService(service, endDate));
}

export function projectService(service: CollectionService, endDate: LocalDate): Occurrence[] {
    if (!Number.isInteger(service.intervalDays) || service.intervalDays <= 0) {
        throw new BinCalendarError(
            "InvalidInterval",
            `Invalid recurrence interval ${service.intervalDays} for service "${service.name}"`,
            { service: service.name },
        );
    }

    const occurrences: Occurrence[] = [];
    let currentDate = service.nextDate;
    while (currentDate.isBefore(endDate) || currentDate.isEqual(endDate)) {
        occurrences.push({ service, date: currentDate });
        currentDate = currentDate.plusDays(service.intervalDays);
    }
    return occurrences;
}
