/**
 * Persisted export state schemas
 *
 * Version 1 is the layout written by the earlier exporter: snake_case id
 * lists, with a version tag that may be missing or already read 2.
 * Version 2 is current.
 */

import { z } from "zod";

export const CURRENT_STATE_VERSION = 2;

const IdListSchema = z.array(z.number().int().positive());

// Recognised by its snake_case keys; the earlier exporter tagged it 1, 2 or not at all
export const StateV1Schema = z.object({
  version: z.number().int().optional(),
  done_wids: IdListSchema,
  discovered_wids: IdListSchema.optional(),
  processed_workout_list_pages: z.array(z.number().int()).optional(),
});

export const StateV2Schema = z.object({
  version: z.literal(CURRENT_STATE_VERSION),
  doneIds: IdListSchema,
  discoveredIds: IdListSchema,
  updatedAt: z.string().optional(),
});

export const PersistedStateSchema = z.union([StateV2Schema, StateV1Schema]);

export type StateV1 = z.infer<typeof StateV1Schema>;
export type StateV2 = z.infer<typeof StateV2Schema>;
export type PersistedState = z.infer<typeof PersistedStateSchema>;

/** In-memory view of one owner's completion record */
export interface ExportState {
  version: number;
  doneIds: Set<number>;
  discoveredIds: Set<number>;
}
