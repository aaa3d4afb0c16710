import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { ZodError } from "zod";
import {
  parseClock,
  parseDistanceMiles,
  parseWorkout,
  parseWorkoutDate,
} from "./workout";
import { PermanentError } from "../utils/errors";

const fixture = (name: string) =>
  readFileSync(new URL(`./__fixtures__/${name}`, import.meta.url), "utf-8");

const options = { wid: 1001, athleteId: "4242", timezone: "America/New_York" };

describe("parseWorkoutDate", () => {
  it("maps the time of day", () => {
    expect(parseWorkoutDate("March 5, 2024 (Morning)")).toEqual({ date: "2024-03-05", timeOfDay: "morning" });
    expect(parseWorkoutDate("  July  14,2023   (Night) ")).toEqual({ date: "2023-07-14", timeOfDay: "night" });
  });

  it("rejects other formats and impossible dates", () => {
    expect(parseWorkoutDate("2024-03-05")).toBeUndefined();
    expect(parseWorkoutDate("March 5, 2024 (Evening)")).toBeUndefined();
    expect(parseWorkoutDate("Smarch 5, 2024 (Morning)")).toBeUndefined();
    expect(parseWorkoutDate("February 30, 2024 (Afternoon)")).toBeUndefined();
  });
});

describe("parseClock", () => {
  it("reads H:MM:SS and MM:SS", () => {
    expect(parseClock("1:02:05")).toBe(3725);
    expect(parseClock("42:10")).toBe(2530);
  });

  it("returns 0 for anything else", () => {
    expect(parseClock("")).toBe(0);
    expect(parseClock("90")).toBe(0);
    expect(parseClock("1:xx")).toBe(0);
  });
});

describe("parseDistanceMiles", () => {
  it("converts kilometers and meters to miles", () => {
    expect(parseDistanceMiles("5.2 miles")).toBe(5.2);
    expect(parseDistanceMiles("10 km")).toBeCloseTo(6.2137, 4);
    expect(parseDistanceMiles("10 kilometers")).toBeCloseTo(6.2137, 4);
    expect(parseDistanceMiles("1609.34 meters")).toBeCloseTo(1, 6);
  });

  it("returns 0 for unreadable distances", () => {
    expect(parseDistanceMiles("")).toBe(0);
    expect(parseDistanceMiles("Total")).toBe(0);
  });
});

describe("parseWorkout", () => {
  it("parses a full workout page", () => {
    const workout = parseWorkout(fixture("workout.html"), options);

    expect(workout).toMatchObject({
      wid: 1001,
      athleteId: "4242",
      title: "Hill Repeats",
      date: "2024-03-05",
      timeOfDay: "morning",
      startTime: "2024-03-05T08:00:00-05:00",
      exerciseType: "Run",
      weather: "Cold and windy",
      comments: "Felt strong on the last two.",
      description: "Hill repeats on Cedar Street",
      totalDurationSeconds: 1530,
      exportedFrom: "running-log",
    });
    expect(workout.totalDistanceMiles).toBeCloseTo(1.5 + 800 / 1609.34 + 2 / 1.60934, 6);
  });

  it("reads segments, skipping empty and footer rows", () => {
    const { segments } = parseWorkout(fixture("workout.html"), options);

    expect(segments).toHaveLength(3);
    expect(segments[0]).toEqual({
      index: 1,
      distanceMiles: 1.5,
      durationSeconds: 720,
      intervalType: "Warm-up",
      shoes: "Trainer A",
    });
    expect(segments[1]).toMatchObject({ index: 2, durationSeconds: 210, intervalType: "Hill" });
    expect(segments[2]).toMatchObject({ index: 3, durationSeconds: 600 });
    expect(segments[2].intervalType).toBeUndefined();
    expect(segments[2].shoes).toBeUndefined();
  });

  it("exports notes-only days as a single empty segment", () => {
    const workout = parseWorkout(fixture("workout-notes-only.html"), { ...options, wid: 990 });

    expect(workout).toMatchObject({
      title: "Rest day",
      date: "2023-12-31",
      timeOfDay: "night",
      startTime: "2023-12-31T20:00:00-05:00",
      comments: "Stretching only.",
      totalDistanceMiles: 0,
      totalDurationSeconds: 0,
      segments: [{ index: 1, distanceMiles: 0, durationSeconds: 0 }],
    });
    expect(workout.weather).toBeUndefined();
  });

  it("fails permanently without a date line", () => {
    expect(() => parseWorkout("<h3>Title</h3><div>no date</div>", options)).toThrow(PermanentError);
    expect(() => parseWorkout("<h3>Title</h3><p>Yesterday</p>", options)).toThrow(
      'Workout 1001: date "Yesterday" is not in the expected format',
    );
  });

  it("validates the parsed record", () => {
    const html = "<h3>Title</h3><p>March 5, 2024 (Morning)</p>";
    expect(() => parseWorkout(html, { ...options, wid: 0 })).toThrow(ZodError);
  });
});
