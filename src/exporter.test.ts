import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Exporter, startExport } from "./exporter";
import {
  CorruptStateError,
  DEFAULT_CONCURRENCY,
  DiscoveryError,
  Logger,
  PermanentError,
  fileExists,
  RateLimiter,
  RetryPolicy,
  StateStore,
  TransientError,
  WorkerPool,
} from "./utils";
import type {
  Artifact,
  ArtifactWriter,
  Discoverer,
  ExportOverrides,
  ExportPhase,
  RecordFetcher,
  WorkItemId,
} from "./types";

// ============================================================================
// In-memory collaborators
// ============================================================================

class FakeSource implements Discoverer, RecordFetcher {
  fetched: WorkItemId[] = [];
  failures = new Map<WorkItemId, () => Error>();
  onFetch?: (id: WorkItemId) => void;

  constructor(public ids: WorkItemId[]) {}

  async listAllIdentifiers(): Promise<WorkItemId[]> {
    return this.ids;
  }

  async fetchAndConvert(id: WorkItemId): Promise<Artifact> {
    this.fetched.push(id);
    this.onFetch?.(id);
    const failure = this.failures.get(id);
    if (failure) throw failure();
    return {
      fileName: `2024-03-05_wid${id}.json`,
      content: JSON.stringify({ wid: id }),
      metadata: { date: "2024-03-05" },
    };
  }
}

class MemoryWriter implements ArtifactWriter {
  files = new Map<WorkItemId, Artifact>();
  discarded: Array<readonly WorkItemId[] | undefined> = [];

  async write(id: WorkItemId, artifact: Artifact): Promise<string> {
    this.files.set(id, artifact);
    return artifact.fileName;
  }

  async discard(ids?: readonly WorkItemId[]): Promise<number> {
    this.discarded.push(ids);
    const targets = ids ?? [...this.files.keys()];
    let removed = 0;
    for (const id of targets) {
      if (this.files.delete(id)) removed++;
    }
    return removed;
  }
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe("Exporter", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "exporter-"));
    statePath = join(dir, "state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createPool(): WorkerPool {
    return new WorkerPool({
      limiter: new RateLimiter({ capacity: 1000, refillPerSecond: 1000 }),
      retryPolicy: new RetryPolicy({ maxAttempts: 3, randomFn: () => 0 }),
      sleep: async () => {},
    });
  }

  async function runExport(
    source: FakeSource,
    writer: MemoryWriter,
    options: { concurrency?: number; overrides?: ExportOverrides; signal?: AbortSignal } = {},
  ) {
    const store = new StateStore(statePath);
    const summary = await startExport(
      {
        discoverer: source,
        fetcher: source,
        writer,
        store,
        pool: createPool(),
        logger: new Logger("error"),
      },
      { owner: "4242", ...options },
    );
    return { summary, store };
  }

  async function seedDone(ids: WorkItemId[]): Promise<void> {
    await writeFile(statePath, JSON.stringify({ version: 2, doneIds: ids, discoveredIds: [] }));
  }

  it("exports the pending workouts and skips the done ones", async () => {
    await seedDone([1, 3]);
    const source = new FakeSource(range(1, 5));
    source.failures.set(4, () => new PermanentError("HTTP 404: Not Found", { status: 404 }));
    const writer = new MemoryWriter();

    const { summary, store } = await runExport(source, writer, { concurrency: 2 });

    expect(summary).toMatchObject({
      status: "completed",
      discovered: 5,
      pending: 3,
      succeeded: 2,
      failed: 1,
      skipped: 2,
      cancelled: 0,
      failures: [{ id: 4, kind: "permanent", reason: "HTTP 404: Not Found", attempts: 1 }],
    });
    expect(store.doneIds()).toEqual([5, 3, 2, 1]);
    expect([...writer.files.keys()].sort()).toEqual([2, 5]);
    expect([...source.fetched].sort()).toEqual([2, 4, 5]);
  });

  it("does no work on a second run without new workouts", async () => {
    const source = new FakeSource(range(1, 4));
    const writer = new MemoryWriter();

    await runExport(source, writer);
    source.fetched = [];
    const { summary } = await runExport(source, writer);

    expect(source.fetched).toEqual([]);
    expect(summary).toMatchObject({ status: "completed", pending: 0, succeeded: 0, skipped: 4 });
  });

  it("isolates a failing workout from the rest", async () => {
    const source = new FakeSource(range(1, 10));
    source.failures.set(5, () => new PermanentError("unparseable"));

    const { summary, store } = await runExport(source, new MemoryWriter());

    expect(summary).toMatchObject({ succeeded: 9, failed: 1 });
    expect(store.doneIds()).toEqual([10, 9, 8, 7, 6, 4, 3, 2, 1]);
  });

  it("retries transient failures before giving up", async () => {
    const source = new FakeSource([1, 2]);
    source.failures.set(2, () => new TransientError("connection reset"));

    const { summary, store } = await runExport(source, new MemoryWriter());

    expect(source.fetched.filter((id) => id === 2)).toHaveLength(3);
    expect(summary.failures).toEqual([{ id: 2, kind: "transient", reason: "connection reset", attempts: 3 }]);
    expect(store.isDone(2)).toBe(false);
  });

  it("only marks a workout done after its file was written", async () => {
    const source = new FakeSource([1, 2]);
    const writer = new MemoryWriter();
    const write = writer.write.bind(writer);
    vi.spyOn(writer, "write").mockImplementation(async (id, artifact) => {
      if (id === 2) throw new Error("EACCES: permission denied");
      return write(id, artifact);
    });

    const { summary, store } = await runExport(source, writer);

    expect(store.isDone(1)).toBe(true);
    expect(store.isDone(2)).toBe(false);
    expect(summary.failures).toMatchObject([{ id: 2, kind: "transient", attempts: 3 }]);
  });

  it("resumes exactly the remaining workouts after cancellation", async () => {
    const source = new FakeSource(range(1, 6));
    const writer = new MemoryWriter();
    const controller = new AbortController();
    source.onFetch = () => {
      if (source.fetched.length === 3) controller.abort();
    };

    const first = await runExport(source, writer, { concurrency: 1, signal: controller.signal });

    expect(first.summary).toMatchObject({ status: "cancelled", succeeded: 3, cancelled: 3 });
    expect(first.store.doneIds()).toEqual([6, 5, 4]);

    source.fetched = [];
    source.onFetch = undefined;
    const second = await runExport(source, writer);

    expect([...source.fetched].sort()).toEqual([1, 2, 3]);
    expect(second.summary).toMatchObject({ status: "completed", succeeded: 3, skipped: 3 });
  });

  it("re-exports everything with force-all", async () => {
    await seedDone(range(1, 5));
    const source = new FakeSource(range(1, 5));
    const writer = new MemoryWriter();

    const { summary } = await runExport(source, writer, { overrides: { kind: "force-all" } });

    expect(summary).toMatchObject({ pending: 5, succeeded: 5, skipped: 0 });
    expect(writer.discarded).toEqual([undefined]);
    expect([...source.fetched].sort()).toEqual(range(1, 5));
  });

  it("re-exports only the named workouts with force-subset", async () => {
    await seedDone([1, 2, 3]);
    const source = new FakeSource([1, 2, 3]);
    const writer = new MemoryWriter();

    const { summary, store } = await runExport(source, writer, {
      overrides: { kind: "force-subset", ids: [1, 2, 77] },
    });

    expect([...source.fetched].sort()).toEqual([1, 2]);
    expect(summary).toMatchObject({ pending: 2, succeeded: 2, skipped: 1 });
    expect(writer.discarded).toEqual([[1, 2]]);
    expect(store.doneIds()).toEqual([3, 2, 1]);
  });

  it("aborts without touching state when discovery fails", async () => {
    const source = new FakeSource([]);
    vi.spyOn(source, "listAllIdentifiers").mockRejectedValue(new Error("ECONNREFUSED"));

    const exporter = new Exporter(
      {
        discoverer: source,
        fetcher: source,
        writer: new MemoryWriter(),
        store: new StateStore(statePath),
        pool: createPool(),
        logger: new Logger("error"),
      },
      { owner: "4242" },
    );

    await expect(exporter.run()).rejects.toBeInstanceOf(DiscoveryError);
    expect(exporter.getPhase()).toBe("failed");
    expect(await fileExists(statePath)).toBe(false);
    expect(source.fetched).toEqual([]);
  });

  it("refuses to run on corrupt state", async () => {
    await writeFile(statePath, "{ truncated");
    const source = new FakeSource([1, 2]);

    await expect(runExport(source, new MemoryWriter())).rejects.toBeInstanceOf(CorruptStateError);
    expect(source.fetched).toEqual([]);
  });

  it("reports phases and progress to the observer", async () => {
    const source = new FakeSource([1, 2]);
    const phases: ExportPhase[] = [];
    const onItemOutcome = vi.fn(() => {
      throw new Error("observer broke");
    });

    const summary = await startExport(
      {
        discoverer: source,
        fetcher: source,
        writer: new MemoryWriter(),
        store: new StateStore(statePath),
        pool: createPool(),
        logger: new Logger("error"),
        observer: { onPhase: (phase) => phases.push(phase), onItemOutcome },
      },
      { owner: "4242" },
    );

    expect(summary.succeeded).toBe(2);
    expect(phases).toEqual(["discovering", "computing-pending", "executing", "finalizing", "completed"]);
    await vi.waitFor(() => expect(onItemOutcome).toHaveBeenCalledTimes(2));
  });

  it("completes straight away when nothing is pending", async () => {
    await seedDone([1]);
    const phases: ExportPhase[] = [];

    const summary = await startExport(
      {
        discoverer: new FakeSource([1]),
        fetcher: new FakeSource([1]),
        writer: new MemoryWriter(),
        store: new StateStore(statePath),
        pool: createPool(),
        logger: new Logger("error"),
        observer: { onPhase: (phase) => phases.push(phase), onItemOutcome: () => {} },
      },
      { owner: "4242" },
    );

    expect(summary).toMatchObject({ status: "completed", pending: 0, succeeded: 0, skipped: 1 });
    expect(phases).toEqual(["discovering", "computing-pending", "completed"]);
  });

  it("runs the pool at the default concurrency unless told otherwise", async () => {
    const pool = createPool();
    const run = vi.spyOn(pool, "run");

    await startExport(
      {
        discoverer: new FakeSource([1, 2]),
        fetcher: new FakeSource([1, 2]),
        writer: new MemoryWriter(),
        store: new StateStore(statePath),
        pool,
      },
      { owner: "4242" },
    );

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][2]).toMatchObject({ concurrency: DEFAULT_CONCURRENCY });
  });

  it("runs only once", async () => {
    const exporter = new Exporter(
      {
        discoverer: new FakeSource([]),
        fetcher: new FakeSource([]),
        writer: new MemoryWriter(),
        store: new StateStore(statePath),
        pool: createPool(),
      },
      { owner: "4242" },
    );

    await exporter.run();
    await expect(exporter.run()).rejects.toThrow("Exporter already ran");
  });
});
