/**
 * State Store
 * Durable record of the workouts already exported for one athlete.
 *
 * Mutations are queued and applied one at a time: each builds the next state,
 * persists it with an atomic replace and only then swaps it in, so the
 * in-memory view never runs ahead of the file on disk.
 */

import { readFile } from "fs/promises";
import { ZodError } from "zod";
import type { ExportState, PersistedState, StateV2, WorkItemId } from "../types";
import { CURRENT_STATE_VERSION, PersistedStateSchema } from "../types";
import { CorruptStateError, describeError } from "./errors";
import type { Logger } from "./logger";
import { writeAtomic } from "./write-atomic";

export type StateFileWriter = (path: string, content: string) => Promise<void>;

export interface StateStoreOptions {
  writer?: StateFileWriter;
  logger?: Logger;
}

function emptyState(): ExportState {
  return { version: CURRENT_STATE_VERSION, doneIds: new Set(), discoveredIds: new Set() };
}

function sortDescending(ids: Iterable<number>): number[] {
  return [...ids].sort((a, b) => b - a);
}

function fromPersisted(data: PersistedState): ExportState {
  if ("doneIds" in data) {
    return {
      version: data.version,
      doneIds: new Set(data.doneIds),
      discoveredIds: new Set(data.discoveredIds),
    };
  }
  return {
    version: CURRENT_STATE_VERSION,
    doneIds: new Set(data.done_wids),
    discoveredIds: new Set(data.discovered_wids ?? []),
  };
}

export class StateStore {
  readonly path: string;
  private state?: ExportState;
  private queue: Promise<void> = Promise.resolve();
  private writer: StateFileWriter;
  private logger?: Logger;

  constructor(path: string, options: StateStoreOptions = {}) {
    this.path = path;
    this.writer = options.writer ?? writeAtomic;
    this.logger = options.logger;
  }

  /**
   * Read the state file, or start empty when there is none.
   * Older layouts are migrated and written back right away.
   * Throws CorruptStateError and leaves the file untouched when it cannot be read.
   */
  async load(): Promise<ExportState> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.logger?.debug(`No state file at ${this.path}, starting fresh`);
        this.state = emptyState();
        return this.snapshot();
      }
      throw error;
    }

    let data: PersistedState;
    try {
      data = PersistedStateSchema.parse(JSON.parse(content));
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof ZodError) {
        throw new CorruptStateError(this.path, describeError(error), { cause: error });
      }
      throw error;
    }

    const state = fromPersisted(data);
    if (!("doneIds" in data)) {
      this.logger?.info(`Migrating state file ${this.path} to version ${CURRENT_STATE_VERSION}`);
      await this.persist(state);
    }

    this.state = state;
    this.logger?.debug(`Loaded state with ${state.doneIds.size} done workouts`);
    return this.snapshot();
  }

  isDone(id: WorkItemId): boolean {
    return this.current().doneIds.has(id);
  }

  doneIds(): WorkItemId[] {
    return sortDescending(this.current().doneIds);
  }

  discoveredIds(): WorkItemId[] {
    return sortDescending(this.current().discoveredIds);
  }

  /**
   * Record one completed workout. Resolves once the change is on disk.
   * Call only after the workout's artifact has been written.
   */
  markDone(id: WorkItemId): Promise<void> {
    return this.mutate((next) => {
      next.doneIds.add(id);
    });
  }

  /** Forget the given ids so they are processed again */
  remove(ids: readonly WorkItemId[]): Promise<void> {
    return this.mutate((next) => {
      for (const id of ids) next.doneIds.delete(id);
    });
  }

  /** Forget every completed id */
  clear(): Promise<void> {
    return this.mutate((next) => {
      next.doneIds.clear();
    });
  }

  recordDiscovered(ids: readonly WorkItemId[]): Promise<void> {
    return this.mutate((next) => {
      next.discoveredIds = new Set(ids);
    });
  }

  /** Resolves once every queued mutation has been persisted */
  flush(): Promise<void> {
    return this.queue;
  }

  private current(): ExportState {
    if (!this.state) {
      throw new Error("State not loaded; call load() first");
    }
    return this.state;
  }

  private snapshot(): ExportState {
    const state = this.current();
    return {
      version: state.version,
      doneIds: new Set(state.doneIds),
      discoveredIds: new Set(state.discoveredIds),
    };
  }

  private mutate(apply: (next: ExportState) => void): Promise<void> {
    // Fail fast, outside the queue, when nothing was loaded
    this.current();

    const run = async (): Promise<void> => {
      const next = this.snapshot();
      apply(next);
      await this.persist(next);
      this.state = next;
    };

    const result = this.queue.then(run);
    // A failed mutation leaves the state as it was and does not block later ones
    this.queue = result.catch((error: unknown) => {
      this.logger?.debug(`State mutation failed: ${describeError(error)}`);
    });
    return result;
  }

  private async persist(state: ExportState): Promise<void> {
    const data: StateV2 = {
      version: CURRENT_STATE_VERSION,
      doneIds: sortDescending(state.doneIds),
      discoveredIds: sortDescending(state.discoveredIds),
      updatedAt: new Date().toISOString(),
    };
    await this.writer(this.path, JSON.stringify(data, null, 2) + "\n");
  }
}
