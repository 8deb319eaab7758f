/**
 * Command-line front end: reads a requirements CSV, plans the day, prints
 * the schedule to stdout and a metrics summary to stderr, and saves the
 * output under a descriptive file name.
 */

import { readFile } from "node:fs/promises";
import { Command, CommanderError, Option } from "commander";
import type pino from "pino";
import * as z from "zod";
import { InvalidConfigurationError } from "./errors.js";
import { parseRequirementsCsv } from "./input/csv.js";
import { createLogger } from "./logger.js";
import { formatPlan, OutputFormatSchema } from "./output/format.js";
import { formatMetrics } from "./output/metrics.js";
import { writeResultFile } from "./output/result-file.js";
import { planStaffing } from "./planner.js";
import { AllocationAlgorithmSchema, DEFAULT_DAY } from "./types.js";
import { NAME, VERSION } from "./version.js";

/**
 * Where the CLI writes and what it reads the clock and logger from.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  now(): Date;
  logger(verbose: boolean): pino.Logger;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  now: () => new Date(),
  logger: (verbose) => createLogger({ level: verbose ? "debug" : "warn" }),
};

const CliOptionsSchema = z.object({
  input: z.string().min(1),
  utilization: z.number(),
  format: OutputFormatSchema,
  capacity: z.number().optional(),
  algorithm: AllocationAlgorithmSchema,
  outputDir: z.string().min(1),
  verbose: z.boolean().optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

const toNumber = (value: string): number => Number(value);

async function run(options: CliOptions, io: CliIO): Promise<void> {
  const text = await readFile(options.input, "utf-8");
  const requirements = parseRequirementsCsv(text, DEFAULT_DAY);

  const result = planStaffing(
    requirements,
    {
      utilization: options.utilization,
      capacity: options.capacity,
      algorithm: options.algorithm,
    },
    { day: DEFAULT_DAY, logger: io.logger(options.verbose ?? false) },
  );

  const output = formatPlan(result, options.format);
  io.stdout(`${output}\n`);
  io.stderr(`\n${formatMetrics(result)}\n\n`);

  const filePath = await writeResultFile(output, options.outputDir, {
    inputPath: options.input,
    utilization: options.utilization,
    capacity: options.capacity,
    algorithm: options.algorithm,
    format: options.format,
    now: io.now(),
  });
  io.stderr(`Result written to: ${filePath}\n`);
}

export function createCLI(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description("Compute hourly agent staffing requirements from customer call demand")
    .requiredOption("-i, --input <path>", "Path to input CSV file")
    .option(
      "-u, --utilization <number>",
      "Agent utilization factor, greater than 0 (default: 1)",
      toNumber,
      1,
    )
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["text", "json", "csv"])
        .default("text"),
    )
    .option(
      "-c, --capacity <number>",
      "Maximum agents in any hour (enables priority-based allocation)",
      toNumber,
    )
    .addOption(
      new Option("-a, --algorithm <name>", "Capacity allocation algorithm")
        .choices(["greedy", "shift"])
        .default("greedy"),
    )
    .option("-o, --output-dir <dir>", "Directory for result files", "results")
    .option("-v, --verbose", "Log planning detail to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .action(async (_options: unknown, command: Command) => {
      const parsed = CliOptionsSchema.safeParse(command.opts());
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        throw new InvalidConfigurationError(`Invalid options: ${issues.join("; ")}`, issues);
      }
      await run(parsed.data, io);
    });

  return program;
}

/**
 * Parses `argv` (node-style, program name included) and runs the CLI.
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const cli = createCLI(io);

  try {
    await cli.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already written its own message.
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`Error: ${message}\n`);
    if (process.env.DEBUG && error instanceof Error && error.stack) {
      io.stderr(`${error.stack}\n`);
    }
    return 1;
  }
}

export async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}
