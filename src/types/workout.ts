/**
 * Workout record schemas
 * Shape of the JSON artifacts written per workout and read back by the journal
 */

import { z } from "zod";

export const TimeOfDaySchema = z.enum(["morning", "afternoon", "night"]);

export const WorkoutSegmentSchema = z.object({
  index: z.number().int().positive(),
  distanceMiles: z.number().nonnegative(),
  durationSeconds: z.number().int().nonnegative(),
  intervalType: z.string().optional(),
  shoes: z.string().optional(),
});

export const WorkoutSchema = z.object({
  wid: z.number().int().positive(),
  athleteId: z.string(),
  title: z.string().optional(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  timeOfDay: TimeOfDaySchema,
  startTime: z.string(), // ISO 8601 with offset
  exerciseType: z.string().optional(),
  weather: z.string().optional(),
  comments: z.string().optional(),
  description: z.string().optional(),
  totalDistanceMiles: z.number().nonnegative(),
  totalDurationSeconds: z.number().int().nonnegative(),
  segments: z.array(WorkoutSegmentSchema).min(1),
  exportedFrom: z.literal("running-log"),
});

export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;
export type WorkoutSegment = z.infer<typeof WorkoutSegmentSchema>;
export type Workout = z.infer<typeof WorkoutSchema>;
