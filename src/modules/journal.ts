/**
 * Journal Module
 * Renders every exported workout of an athlete into one Markdown journal
 */

import { readFile } from "fs/promises";
import glob from "fast-glob";
import { loadJournalTemplate } from "../templates";
import { describeError, fileExists, formatClock, formatPace, weekdayOf, writeAtomic } from "../utils";
import type { Logger } from "../utils";
import type { Workout } from "../types";
import { WorkoutSchema } from "../types";

export interface JournalOptions {
  workoutsDir: string;
  outputPath: string;
  templatePath: string | null;
  heading?: string;
  logger?: Logger;
}

export interface JournalResult {
  path: string;
  workouts: number;
  skipped: string[]; // Files that could not be read
}

interface JournalWorkout {
  title: string;
  weather?: string;
  comments?: string;
  table: string[] | null;
}

interface JournalDay {
  heading: string;
  workouts: JournalWorkout[];
}

/**
 * Markdown table lines for a workout, null when every segment is empty
 */
export function segmentTable(workout: Workout): string[] | null {
  const { segments } = workout;
  if (segments.every((s) => s.distanceMiles === 0 && s.durationSeconds === 0)) {
    return null;
  }

  const withInterval = segments.some((s) => s.intervalType?.trim());
  const withShoes = segments.some((s) => s.shoes?.trim());

  let header = "| Distance (mi) | Duration | Pace |";
  let separator = "|---|---|---|";
  if (withInterval) {
    header += " Interval Type |";
    separator += "---|";
  }
  if (withShoes) {
    header += " Shoes |";
    separator += "---|";
  }

  const rows = segments.map((s) => {
    let row = `| ${s.distanceMiles.toFixed(2)} | ${formatClock(s.durationSeconds)} | ${formatPace(s.distanceMiles, s.durationSeconds)} |`;
    if (withInterval) row += ` ${s.intervalType ?? ""} |`;
    if (withShoes) row += ` ${s.shoes ?? ""} |`;
    return row;
  });

  return [header, separator, ...rows];
}

/**
 * Group workouts into days, oldest first
 */
export function groupByDay(workouts: Workout[]): JournalDay[] {
  const sorted = [...workouts].sort(
    (a, b) => a.startTime.localeCompare(b.startTime) || a.wid - b.wid,
  );

  const days: JournalDay[] = [];
  for (const workout of sorted) {
    const heading = `${workout.date} (${weekdayOf(workout.date)})`;
    let day = days[days.length - 1];
    if (!day || day.heading !== heading) {
      day = { heading, workouts: [] };
      days.push(day);
    }
    day.workouts.push({
      title: workout.title || "Untitled",
      weather: workout.weather,
      comments: workout.comments,
      table: segmentTable(workout),
    });
  }
  return days;
}

async function readWorkouts(
  workoutsDir: string,
  logger?: Logger,
): Promise<{ workouts: Workout[]; skipped: string[] }> {
  const workouts: Workout[] = [];
  const skipped: string[] = [];

  if (!(await fileExists(workoutsDir))) {
    return { workouts, skipped };
  }

  const files = await glob("*.json", { cwd: workoutsDir, absolute: true, onlyFiles: true });
  for (const file of files.sort()) {
    try {
      const content = await readFile(file, "utf-8");
      workouts.push(WorkoutSchema.parse(JSON.parse(content)));
    } catch (error) {
      logger?.warn(`Skipping ${file}: ${describeError(error)}`);
      skipped.push(file);
    }
  }

  return { workouts, skipped };
}

/**
 * Render the journal and write it next to the athlete's state
 */
export async function buildJournal(options: JournalOptions): Promise<JournalResult> {
  const { workouts, skipped } = await readWorkouts(options.workoutsDir, options.logger);
  const template = await loadJournalTemplate(options.templatePath);

  const content = template({
    heading: options.heading ?? "Running Log Journal",
    days: groupByDay(workouts),
  });

  await writeAtomic(options.outputPath, content);
  options.logger?.debug(`Journal with ${workouts.length} workouts written to ${options.outputPath}`);

  return { path: options.outputPath, workouts: workouts.length, skipped };
}
