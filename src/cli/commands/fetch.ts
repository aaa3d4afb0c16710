/**
 * Fetch command - Exports a single workout without touching the export state
 */

import ora from "ora";
import { z } from "zod";
import { JsonArtifactWriter } from "../../artifact-writer";
import { describeError, raceSignal } from "../../utils";
import { AthleteIdSchema, createSource, createWorkoutPool, setupCommand } from "../setup";

const FetchOptionsSchema = z.object({
  wid: z.coerce.number().int().positive(),
  athlete: AthleteIdSchema,
  output: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = Omit<z.input<typeof FetchOptionsSchema>, "wid">;

export async function fetchCommand(wid: string, opts: Options): Promise<void> {
  const spinner = ora({ text: `Fetching workout ${wid}...`, indent: 2 }).start();

  try {
    const options = FetchOptionsSchema.parse({ ...opts, wid });
    const { config, logger, paths } = await setupCommand(options);

    const source = createSource(config, options.athlete, logger);
    const writer = new JsonArtifactWriter(paths.workouts);
    const pool = createWorkoutPool(config, logger);

    const [{ outcome }] = await pool.run([options.wid], async (id, attempt) => {
      const artifact = await raceSignal(
        source.fetchAndConvert(id, { signal: attempt.signal }),
        attempt.signal,
      );
      return writer.write(id, artifact);
    });

    if (outcome.status === "done") {
      spinner.succeed(`Workout ${options.wid} saved to ${outcome.value}`);
    } else if (outcome.status === "failed") {
      spinner.fail(`Workout ${options.wid} failed (${outcome.kind}): ${outcome.reason}`);
      process.exitCode = 1;
    } else {
      spinner.warn(`Workout ${options.wid} was not fetched`);
      process.exitCode = 130;
    }
  } catch (error) {
    spinner.fail(`Fetch failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
