import { join, resolve } from "path";

export interface OwnerPaths {
  root: string;
  workouts: string;
  state: string;
  stats: string;
  journal: string;
}

/**
 * Files of one athlete under the export directory:
 * <directory>/athlete-<id>/{workouts/, state.json, stats.json, journal.md}
 */
export function ownerPaths(
  directory: string,
  athleteId: string,
  files: { stateFile?: string; journalFile?: string } = {},
): OwnerPaths {
  const root = resolve(directory, `athlete-${athleteId}`);
  return {
    root,
    workouts: join(root, "workouts"),
    state: join(root, files.stateFile ?? "state.json"),
    stats: join(root, "stats.json"),
    journal: join(root, files.journalFile ?? "journal.md"),
  };
}
