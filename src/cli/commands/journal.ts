/**
 * Journal command - Renders the Markdown journal from exported workouts
 */

import ora from "ora";
import { z } from "zod";
import * as modules from "../../modules";
import { describeError } from "../../utils";
import { AthleteIdSchema, setupCommand } from "../setup";

const JournalOptionsSchema = z.object({
  athlete: AthleteIdSchema,
  output: z.string().optional(),
  config: z.string().optional(),
  template: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof JournalOptionsSchema>;

export async function journalCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Writing journal...", indent: 2 }).start();

  try {
    const options = JournalOptionsSchema.parse(opts);
    const { config, logger, paths } = await setupCommand(options);

    const result = await modules.buildJournal({
      workoutsDir: paths.workouts,
      outputPath: paths.journal,
      templatePath: options.template ?? config.journal.template,
      logger,
    });

    const skipped = result.skipped.length > 0 ? ` (${result.skipped.length} unreadable files skipped)` : "";
    spinner.succeed(`Journal with ${result.workouts} workouts written to ${result.path}${skipped}`);
  } catch (error) {
    spinner.fail(`Journal failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
