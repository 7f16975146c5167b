import { z } from "zod";
import { defineTool } from "./types.js";

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];
const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const pad = (value: number) => String(value).padStart(2, "0");

/** Local calendar date as YYYY-MM-DD. */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

const DateInfoShape = z.object({
  date: z.string(),
  day_of_week: z.string(),
  formatted: z.string(),
});

export function describeDate(date: Date): z.infer<typeof DateInfoShape> {
  return {
    date: isoDate(date),
    day_of_week: WEEKDAYS[date.getDay()] ?? "",
    formatted: `${MONTHS[date.getMonth()] ?? ""} ${pad(date.getDate())}, ${date.getFullYear()}`,
  };
}

export const getTodaysDate = defineTool({
  name: "get_todays_date",
  description: "Get today's date (YYYY-MM-DD) and day of the week. Useful when planning meals for specific dates.",
  input: z.object({}),
  output: DateInfoShape,
  async execute(_args, context) {
    return describeDate(context.now());
  },
});

export const getDateOffset = defineTool({
  name: "get_date_offset",
  description: "Get the date a number of days from today (negative for the past).",
  input: z.object({
    days_from_today: z.number().int().describe("Days from today; positive for future, negative for past."),
  }),
  output: DateInfoShape,
  async execute(args, context) {
    return describeDate(addDays(context.now(), args.days_from_today));
  },
});
