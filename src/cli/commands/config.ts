/**
 * Config command - Shows where configuration is read from and the merged result
 */

import chalk from "chalk";
import { describeError, getUserConfigPath, loadConfig } from "../../utils";

export async function configCommand(opts: { config?: string }): Promise<void> {
  console.log(`${chalk.dim("User configuration file:")} ${getUserConfigPath()}`);
  if (opts.config) {
    console.log(`${chalk.dim("Custom configuration file:")} ${opts.config}`);
  }

  const { config, errors } = await loadConfig(opts.config);
  for (const err of errors) {
    console.warn(`${chalk.yellow("Ignored")} ${err.path}: ${describeError(err.error)}`);
  }

  console.log(chalk.dim("\nEffective configuration:"));
  console.log(JSON.stringify(config, null, 2));
}
