import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { buildJournal, groupByDay, segmentTable } from "./journal";
import type { Workout } from "../types";

function workout(overrides: Partial<Workout> = {}): Workout {
  return {
    wid: 1001,
    athleteId: "4242",
    title: "Hill Repeats",
    date: "2024-03-05",
    timeOfDay: "morning",
    startTime: "2024-03-05T08:00:00-05:00",
    totalDistanceMiles: 3,
    totalDurationSeconds: 1500,
    segments: [{ index: 1, distanceMiles: 3, durationSeconds: 1500 }],
    exportedFrom: "running-log",
    ...overrides,
  };
}

describe("segmentTable", () => {
  it("renders distance, duration and pace", () => {
    expect(segmentTable(workout())).toEqual([
      "| Distance (mi) | Duration | Pace |",
      "|---|---|---|",
      "| 3.00 | 00:25:00 | 8:20/mi |",
    ]);
  });

  it("adds interval and shoe columns when any segment has them", () => {
    const table = segmentTable(
      workout({
        segments: [
          { index: 1, distanceMiles: 1, durationSeconds: 480, intervalType: "Warm-up" },
          { index: 2, distanceMiles: 0.25, durationSeconds: 90, shoes: "Racer" },
        ],
      }),
    );

    expect(table).toEqual([
      "| Distance (mi) | Duration | Pace | Interval Type | Shoes |",
      "|---|---|---|---|---|",
      "| 1.00 | 00:08:00 | 8:00/mi | Warm-up |  |",
      "| 0.25 | 00:01:30 | 6:00/mi |  | Racer |",
    ]);
  });

  it("is omitted when every segment is empty", () => {
    expect(segmentTable(workout({ segments: [{ index: 1, distanceMiles: 0, durationSeconds: 0 }] }))).toBeNull();
  });
});

describe("groupByDay", () => {
  it("sorts by start time and heads each day once", () => {
    const days = groupByDay([
      workout({ wid: 3, date: "2024-03-06", startTime: "2024-03-06T08:00:00-05:00", title: undefined }),
      workout({ wid: 2, startTime: "2024-03-05T20:00:00-05:00", title: "Evening shakeout" }),
      workout({ wid: 1 }),
    ]);

    expect(days.map((d) => d.heading)).toEqual(["2024-03-05 (Tuesday)", "2024-03-06 (Wednesday)"]);
    expect(days[0].workouts.map((w) => w.title)).toEqual(["Hill Repeats", "Evening shakeout"]);
    expect(days[1].workouts[0].title).toBe("Untitled");
  });
});

describe("buildJournal", () => {
  let dir: string;
  let workoutsDir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "journal-"));
    workoutsDir = join(dir, "workouts");
    outputPath = join(dir, "journal.md");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("says so when there is nothing to journal", async () => {
    const result = await buildJournal({ workoutsDir, outputPath, templatePath: null });

    expect(result).toEqual({ path: outputPath, workouts: 0, skipped: [] });
    expect(await readFile(outputPath, "utf-8")).toBe(
      "# Running Log Journal\n\nNo workouts processed or found to journal.\n",
    );
  });

  it("renders exported workouts and skips unreadable files", async () => {
    await mkdir(workoutsDir, { recursive: true });
    await writeFile(
      join(workoutsDir, "2024-03-05_wid1001.json"),
      JSON.stringify(workout({ weather: "Cold & windy", comments: "Felt <strong>" })),
    );
    await writeFile(join(workoutsDir, "2024-03-06_wid1002.json"), JSON.stringify({ wid: "broken" }));

    const result = await buildJournal({ workoutsDir, outputPath, templatePath: null });
    const lines = (await readFile(outputPath, "utf-8")).split("\n");

    expect(result.workouts).toBe(1);
    expect(result.skipped).toEqual([join(workoutsDir, "2024-03-06_wid1002.json")]);
    expect(lines).toContain("## 2024-03-05 (Tuesday)");
    expect(lines).toContain("### Hill Repeats");
    expect(lines).toContain("**Weather:** Cold & windy");
    expect(lines).toContain("**Comments:** Felt <strong>");
    expect(lines).toContain("| 3.00 | 00:25:00 | 8:20/mi |");
  });

  it("renders a custom template", async () => {
    const templatePath = join(dir, "journal.hbs");
    await writeFile(templatePath, "{{#each days}}{{heading}}:{{workouts.length}}\n{{/each}}");
    await mkdir(workoutsDir, { recursive: true });
    await writeFile(join(workoutsDir, "2024-03-05_wid1001.json"), JSON.stringify(workout()));

    await buildJournal({ workoutsDir, outputPath, templatePath });

    expect(await readFile(outputPath, "utf-8")).toBe("2024-03-05 (Tuesday):1\n");
  });

  it("names a template that cannot be read", async () => {
    const templatePath = join(dir, "missing.hbs");

    await expect(buildJournal({ workoutsDir, outputPath, templatePath })).rejects.toThrow(
      `Could not read journal template ${templatePath}`,
    );
  });
});
