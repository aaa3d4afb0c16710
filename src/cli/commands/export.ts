/**
 * Export command - Exports every pending workout of an athlete, then renders the journal
 */

import ora from "ora";
import { z } from "zod";
import { JsonArtifactWriter } from "../../artifact-writer";
import { startExport } from "../../exporter";
import * as modules from "../../modules";
import {
  CancelledError,
  CorruptStateError,
  DiscoveryError,
  ExportTracker,
  StateStore,
  describeError,
  parseIdList,
} from "../../utils";
import type { ExportOverrides, ExportPhase, ProgressObserver } from "../../types";
import { AthleteIdSchema, createSource, createWorkoutPool, setupCommand } from "../setup";

const ExportOptionsSchema = z.object({
  athlete: AthleteIdSchema,
  output: z.string().optional(),
  config: z.string().optional(),
  concurrency: z.coerce.number().int().min(1).max(50).optional(),
  timeout: z.coerce.number().int().positive().optional(),
  forceAll: z.boolean().optional(),
  refreshIds: z.string().optional(),
  timeLimit: z.coerce.number().positive().optional(),
  journal: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ExportOptionsSchema>;

const PHASE_TEXT: Record<ExportPhase, string> = {
  idle: "Initializing...",
  discovering: "Discovering workouts...",
  "computing-pending": "Loading export state...",
  executing: "Exporting workouts...",
  finalizing: "Saving state...",
  completed: "Done",
  cancelled: "Cancelled",
  failed: "Failed",
};

export function parseOverrides(forceAll?: boolean, refreshIds?: string): ExportOverrides {
  if (forceAll && refreshIds) {
    throw new Error("--force-all and --refresh-ids cannot be used together");
  }
  if (forceAll) {
    return { kind: "force-all" };
  }
  if (refreshIds) {
    return { kind: "force-subset", ids: parseIdList(refreshIds) };
  }
  return { kind: "none" };
}

export async function exportCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: PHASE_TEXT.idle, indent: 2 });
  const controller = new AbortController();
  let timeLimit: NodeJS.Timeout | undefined;

  const onInterrupt = () => {
    spinner.text = "Interrupted, letting in-flight workouts finish...";
    controller.abort(new CancelledError("Interrupted"));
  };
  process.once("SIGINT", onInterrupt);

  try {
    // Validate CLI options
    const options = ExportOptionsSchema.parse(opts);
    const overrides = parseOverrides(options.forceAll, options.refreshIds);

    const { config, configErrors, logger, paths } = await setupCommand(options);

    // Override with CLI options
    if (options.concurrency) {
      config.export.concurrency = options.concurrency;
    }
    if (options.timeout) {
      config.source.timeout = options.timeout;
    }

    const tracker = new ExportTracker(options.athlete);
    for (const err of configErrors) {
      tracker.trackConfigError(err.path, err.error);
    }

    if (options.timeLimit) {
      const seconds = options.timeLimit;
      timeLimit = setTimeout(() => {
        spinner.text = `Time limit of ${seconds}s reached, letting in-flight workouts finish...`;
        controller.abort(new CancelledError("Time limit reached"));
      }, seconds * 1000);
    }

    // Spinner and debug lines would interleave
    if (config.logging.showProgress && !options.verbose) {
      spinner.start();
    }

    let total = 0;
    let finished = 0;
    const observer: ProgressObserver = {
      onPhase(phase, progress) {
        total = progress.pending;
        spinner.text = PHASE_TEXT[phase];
      },
      onItemOutcome(_id, outcome) {
        if (outcome.status === "cancelled") return;
        finished++;
        spinner.text = `Exporting workouts ${finished}/${total}...`;
      },
    };

    const source = createSource(config, options.athlete, logger);
    const summary = await startExport(
      {
        discoverer: source,
        fetcher: source,
        writer: new JsonArtifactWriter(paths.workouts),
        store: new StateStore(paths.state, { logger }),
        pool: createWorkoutPool(config, logger),
        logger,
        observer,
        tracker,
      },
      {
        owner: options.athlete,
        concurrency: config.export.concurrency,
        overrides,
        signal: controller.signal,
      },
    );

    if (options.journal !== false && summary.status === "completed") {
      spinner.text = "Writing journal...";
      const journal = await modules.buildJournal({
        workoutsDir: paths.workouts,
        outputPath: paths.journal,
        templatePath: config.journal.template,
        logger,
      });
      logger.debug(`Journal written to ${journal.path}`);
    }

    // Clear and stop spinner before displaying the summary
    spinner.clear();
    spinner.stop();

    await modules.report(summary, tracker, { statsPath: paths.stats, verbose: options.verbose });

    if (summary.status === "cancelled") {
      process.exitCode = 130;
    } else if (summary.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof DiscoveryError || error instanceof CorruptStateError) {
      spinner.fail(error.message);
    } else if (error instanceof z.ZodError) {
      spinner.fail(`Invalid options: ${describeError(error)}`);
    } else {
      spinner.fail("Export failed");
      console.error(error);
    }
    process.exitCode = 1;
  } finally {
    clearTimeout(timeLimit);
    process.removeListener("SIGINT", onInterrupt);
  }
}
