import { differenceInCalendarDays, format, isValid, parse } from "date-fns";
import { defineTool, type ToolSpec } from "./tool";

const ISO_DATE = "yyyy-MM-dd";
const ISO_DATE_RE = /\d{4}-\d{2}-\d{2}/g;

export const DATE_FORMAT_HINT = "Please provide dates in YYYY-MM-DD format";
export const DATETIME_USAGE =
  "Available operations: 'current' for current datetime, 'days between YYYY-MM-DD and YYYY-MM-DD' for date calculations";

function parseIsoDate(raw: string): Date {
  const date = parse(raw, ISO_DATE, new Date(0));
  if (!isValid(date)) throw new Error(`Invalid date: ${raw}`);
  return date;
}

/** Interpret a free-text date/time request against the given clock. */
export function answerDateQuery(query: string, now: Date): string {
  const q = query.trim().toLowerCase();
  if (q === "current" || q === "now") {
    return `Current date and time: ${format(now, "yyyy-MM-dd HH:mm:ss")}`;
  }

  const dates: string[] = q.match(ISO_DATE_RE) ?? [];
  if (dates.length >= 2) {
    const [a, b] = dates;
    const days = Math.abs(differenceInCalendarDays(parseIsoDate(b), parseIsoDate(a)));
    return `Days between ${a} and ${b}: ${days} days`;
  }
  if (q.includes("days between")) return DATE_FORMAT_HINT;
  return DATETIME_USAGE;
}

export function createDateTimeTool(now: () => Date = () => new Date()): ToolSpec {
  return defineTool(
    "datetime_tool",
    "Useful for getting current date/time, calculating date differences, or formatting dates. Input can be 'current' for current datetime, or date calculations like 'days between 2024-01-01 and 2024-12-31'",
    "Error with date/time operation",
    (input) => answerDateQuery(input, now()),
  );
}
