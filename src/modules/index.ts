/**
 * Pipeline modules export
 */

export { discover } from "./discover";
export { computePending } from "./pending";
export { execute } from "./execute";
export { finalize } from "./finalize";
export { report, refreshHint } from "./report";
export { buildJournal, groupByDay, segmentTable } from "./journal";
