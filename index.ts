#!/usr/bin/env node
import { main } from "./lib/bin_calendar.js";
import { isBinCalendarError } from "./lib/config/schema.js";

try {
  await main();
} catch (error) {
  if (isBinCalendarError(error)) {
    // Known failures get a readable message rather than a stack trace
    console.error(`Bin calendar generation failed (${error.type}): ${error.message}`);
    if (error.cause !== undefined) {
      console.error(`Caused by: ${error.cause}`);
    }
  } else {
    console.error("Fatal error during calendar generation:", error);
  }
  // The previously published calendar is left in place
  process.exitCode = 1;
}
