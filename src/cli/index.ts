#!/usr/bin/env tsx

/**
 * CLI entry point for the running-log.com workout exporter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { exportCommand } from "./commands/export";
import { fetchCommand } from "./commands/fetch";
import { journalCommand } from "./commands/journal";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("workout-export")
  .description("Export running-log.com workouts to JSON and a Markdown journal")
  .version("0.1.0");

// Main export command - resumable, rate limited
program
  .command("export")
  .description("Export every workout of an athlete that is not exported yet")
  .requiredOption("-a, --athlete <id>", "running-log.com athlete id")
  .option("-o, --output <path>", "Export directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--concurrency <n>", "Workouts fetched at the same time")
  .option("--timeout <ms>", "Timeout per request attempt in milliseconds")
  .option("--force-all", "Forget all exported workouts and export everything again")
  .option("--refresh-ids <ids>", "Re-export the given comma-separated workout ids")
  .option("--time-limit <seconds>", "Stop admitting new workouts after this many seconds")
  .option("--no-journal", "Skip writing the Markdown journal")
  .option("-v, --verbose", "Verbose output")
  .action(exportCommand);

// Fetch command - one workout, state untouched
program
  .command("fetch <wid>")
  .description("Export a single workout without touching the export state")
  .requiredOption("-a, --athlete <id>", "running-log.com athlete id")
  .option("-o, --output <path>", "Export directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(fetchCommand);

// Journal command - render Markdown from exported workouts
program
  .command("journal")
  .description("Render the Markdown journal from exported workouts")
  .requiredOption("-a, --athlete <id>", "running-log.com athlete id")
  .option("-o, --output <path>", "Export directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-t, --template <path>", "Custom Handlebars journal template")
  .option("-v, --verbose", "Verbose output")
  .action(journalCommand);

// Config command - show config locations and the merged result
program
  .command("config")
  .description("Show configuration file locations and the effective configuration")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
