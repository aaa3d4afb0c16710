/**
 * running-log.com page parsers
 */

export { extractWorkoutIds, extractLastPage } from "./workout-list";
export {
  parseWorkout,
  parseWorkoutDate,
  parseClock,
  parseDistanceMiles,
} from "./workout";
export type { ParseWorkoutOptions } from "./workout";
