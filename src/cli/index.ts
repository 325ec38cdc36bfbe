#!/usr/bin/env node
/**
 * Main CLI Entry Point
 *
 * Provides the command-line interface for logpane using Commander.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { readFileSync, realpathSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import { DEFAULT_PRINT_HEIGHT, DEFAULT_PRINT_WIDTH } from "../constants.js";
import { buildListOptions, getLogLevel } from "../settings/defaults.js";
import { createFileDestination, getLogger, initLogger, type LogLevel } from "../utils/logger.js";
import { createModel, readLogFile } from "../sources/file-source.js";
import { renderToLines } from "../widgets/log-list/frame.js";
import { validateDimension } from "./print.js";

// Resolve package.json path for version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, "..", "..", "package.json");
const packageJson = JSON.parse(readFileSync(packageJsonPath, "utf-8")) as { version: string };
const VERSION: string = packageJson.version;

/**
 * CLI options shared across commands.
 */
export interface GlobalOptions {
  debug?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
  silent?: boolean;
}

interface ViewOptions {
  find?: string;
}

interface PrintOptions {
  width: number;
  height: number;
  select?: number;
  find?: string;
  color: boolean;
}

function parseDimension(value: string): number {
  const error = validateDimension(value);
  if (error) {
    throw new InvalidArgumentError(error);
  }
  return parseInt(value, 10);
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Must be a non-negative number");
  }
  return parseInt(value, 10);
}

/**
 * Resolve the effective log level from global options.
 */
export function resolveLogLevel(opts: GlobalOptions): LogLevel {
  if (opts.silent) {
    return "silent";
  }
  if (opts.debug) {
    return "debug";
  }
  return opts.logLevel ?? getLogLevel();
}

async function loadLines(path: string): Promise<string[] | null> {
  try {
    return await readLogFile(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    getLogger().error({ path, err: message }, "Failed to read log file");
    process.stderr.write(`logpane: cannot read ${path}: ${message}\n`);
    process.exitCode = 1;
    return null;
  }
}

/**
 * Create and configure the Commander program.
 */
export function createProgram(): Command {
  const program = new Command();

  program.name("logpane").description("Browse and search log files in the terminal").version(VERSION);

  // Global options
  program
    .option("--debug", "enable debug logging")
    .addOption(new Option("--log-level <level>", "log level").choices(["silent", "error", "warn", "info", "debug", "trace"]))
    .option("--log-file <path>", "write logs to file")
    .option("--silent", "disable logging (sets the log level to silent)");

  // View command (default) - launches the interactive viewer
  program
    .command("view", { isDefault: true })
    .description("Open a log file in the interactive viewer")
    .argument("<file>", "log file to open")
    .option("-f, --find <text>", "initial search query")
    .action(async (file: string, options: ViewOptions) => {
      const opts = program.opts<GlobalOptions>();
      // Ink owns stdout while the viewer runs
      initLogger({
        level: resolveLogLevel(opts),
        tuiMode: true,
        tuiDestination: opts.logFile ? createFileDestination(opts.logFile) : undefined,
      });

      const lines = await loadLines(file);
      if (lines === null) return;

      const { startTUI } = await import("../tui/app.js");
      await startTUI(createModel(lines, options.find), file);
    });

  // Print command - render one frame to stdout
  program
    .command("print")
    .description("Print one frame of the log list")
    .argument("<file>", "log file to print")
    .option("-w, --width <number>", "frame width", parseDimension, DEFAULT_PRINT_WIDTH)
    .option("-H, --height <number>", "frame height", parseDimension, DEFAULT_PRINT_HEIGHT)
    .option("-s, --select <index>", "selected line (0-based)", parseIndex)
    .option("-f, --find <text>", "search query to highlight")
    .option("--no-color", "disable color output")
    .action(async (file: string, options: PrintOptions) => {
      const opts = program.opts<GlobalOptions>();
      initLogger({ level: resolveLogLevel(opts), tuiMode: false });

      const lines = await loadLines(file);
      if (lines === null) return;

      const model = createModel(lines, options.find);
      if (options.select !== undefined) {
        model.select(options.select);
      }

      const frame = renderToLines(model, {
        width: options.width,
        height: options.height,
        options: buildListOptions(),
        noColor: !options.color,
      });
      process.stdout.write(`${frame.join("\n")}\n`);
    });

  return program;
}

/**
 * Run the CLI.
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === __filename;
  } catch {
    return false;
  }
}

// Auto-execute when run directly (not when imported by tests)
if (isMainModule()) {
  run().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`logpane: ${message}\n`);
    process.exitCode = 1;
  });
}
