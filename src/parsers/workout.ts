import * as cheerio from "cheerio";
import type { TimeOfDay, Workout, WorkoutSegment } from "../types";
import { WorkoutSchema } from "../types";
import { PermanentError } from "../utils/errors";
import { zonedIsoString } from "../utils/format";

export interface ParseWorkoutOptions {
  wid: number;
  athleteId: string;
  timezone: string;
}

const DATE_PATTERN =
  /^(?<month>[A-Za-z]+)\s+(?<day>\d{1,2}),\s*(?<year>\d{4})\s*\((?<tod>Morning|Afternoon|Night)\)$/;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const START_HOURS: Record<TimeOfDay, number> = {
  morning: 8,
  afternoon: 14,
  night: 20,
};

const METERS_PER_MILE = 1609.34;
const KILOMETERS_PER_MILE = 1.60934;

function isTimeOfDay(value: string): value is TimeOfDay {
  return value in START_HOURS;
}

/**
 * "1:02:05" or "42:10" → seconds; anything else → 0
 */
export function parseClock(text: string): number {
  const parts = text.split(":");
  if (parts.length < 2 || parts.length > 3 || !parts.every((part) => /^\d+$/.test(part))) {
    return 0;
  }
  const [seconds = 0, minutes = 0, hours = 0] = parts.map(Number).reverse();
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * "5.2 miles", "10 km", "800 meters" → miles; unreadable → 0
 */
export function parseDistanceMiles(text: string): number {
  const [amount, unitText = ""] = text.trim().split(/\s+/);
  const value = Number.parseFloat(amount);
  if (!Number.isFinite(value)) return 0;

  const unit = unitText.toLowerCase();
  if (unit === "km" || unit === "kms" || unit.includes("kilometer")) {
    return value / KILOMETERS_PER_MILE;
  }
  if (unit.includes("meter")) {
    return value / METERS_PER_MILE;
  }
  return value;
}

/**
 * Date line of a workout page: "March 5, 2024 (Morning)"
 */
export function parseWorkoutDate(
  text: string,
): { date: string; timeOfDay: TimeOfDay } | undefined {
  const match = DATE_PATTERN.exec(text.replace(/\s+/g, " ").trim());
  if (!match?.groups) return undefined;

  const monthIndex = MONTHS.indexOf(match.groups.month.toLowerCase());
  const year = Number(match.groups.year);
  const day = Number(match.groups.day);
  const timeOfDay = match.groups.tod.toLowerCase();
  if (monthIndex < 0 || !isTimeOfDay(timeOfDay)) return undefined;

  // Reject impossible days such as February 30
  const candidate = new Date(Date.UTC(year, monthIndex, day));
  if (candidate.getUTCMonth() !== monthIndex || candidate.getUTCDate() !== day) return undefined;

  const date = `${year}-${String(monthIndex + 1).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
  return { date, timeOfDay };
}

function labelled(text: string, label: string): string | undefined {
  if (!text.startsWith(label)) return undefined;
  return text.slice(label.length).trim() || undefined;
}

/**
 * Parse a running-log workout page
 * Throws PermanentError when the page has no readable date line, and ZodError on an invalid result
 */
export function parseWorkout(html: string, options: ParseWorkoutOptions): Workout {
  const $ = cheerio.load(html);
  const { wid } = options;

  // Date: first <p> following the first <h3>
  const $heading = $("h3").first();
  const dateText = $heading.nextAll("p").first().text();
  const parsedDate = parseWorkoutDate(dateText);
  if (!parsedDate) {
    throw new PermanentError(
      dateText.trim()
        ? `Workout ${wid}: date "${dateText.trim()}" is not in the expected format`
        : `Workout ${wid}: date line not found`,
    );
  }

  const title =
    $("input#workout_title").attr("value")?.trim() || $heading.text().trim() || undefined;

  let exerciseType: string | undefined;
  let weather: string | undefined;
  let comments: string | undefined;
  $("p").each((_, element) => {
    const text = $(element).text().trim();
    exerciseType ??= labelled(text, "Exercise Type:");
    weather ??= labelled(text, "Weather:");
    comments ??= labelled(text, "Comments:");
  });

  const description = $("meta[name='description']").attr("content")?.trim() || undefined;

  // Segments: rows of the first table.content after its header row
  const segments: WorkoutSegment[] = [];
  $("table.content")
    .first()
    .find("tr")
    .slice(1)
    .each((_, row) => {
      const $row = $(row);
      if ($row.closest("tfoot").length > 0) return;

      const cols = $row
        .find("td")
        .map((_, cell) => $(cell).text().trim())
        .get();
      if (cols.length < 2) return;

      const distanceMiles = cols[0] ? parseDistanceMiles(cols[0]) : 0;
      const durationSeconds = cols[1] ? parseClock(cols[1]) : 0;
      if (distanceMiles === 0 && durationSeconds === 0) return;

      segments.push({
        index: segments.length + 1,
        distanceMiles,
        durationSeconds,
        intervalType: cols[3] || undefined,
        shoes: cols[4] || undefined,
      });
    });

  if (segments.length === 0) {
    // Notes-only entries still get exported as a zero-distance workout
    segments.push({ index: 1, distanceMiles: 0, durationSeconds: 0 });
  }

  return WorkoutSchema.parse({
    wid,
    athleteId: options.athleteId,
    title,
    date: parsedDate.date,
    timeOfDay: parsedDate.timeOfDay,
    startTime: zonedIsoString(parsedDate.date, START_HOURS[parsedDate.timeOfDay], options.timezone),
    exerciseType,
    weather,
    comments,
    description,
    totalDistanceMiles: segments.reduce((sum, segment) => sum + segment.distanceMiles, 0),
    totalDurationSeconds: segments.reduce((sum, segment) => sum + segment.durationSeconds, 0),
    segments,
    exportedFrom: "running-log",
  });
}
