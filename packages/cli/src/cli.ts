import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { Command, InvalidArgumentError, Option } from "commander"
import { z } from "zod"
import type { OutputMode } from "strata"

export interface CliOptions {
  /**
   * Task id or alias given on the command line.
   */
  target?: string
  file: string
  verbose: boolean
  rm: boolean
  workers?: number
  timeout?: string
  dryRun: boolean
  continueOnFailure: boolean
  output: OutputMode
}

type RawOptions = {
  file: string
  verbose: boolean
  rm: boolean
  workers?: number
  timeout?: string
  dryRun: boolean
  continueOnFailure: boolean
  output: string
}

const OUTPUT_MODES: readonly OutputMode[] = ["stream", "group"]

const PackageJsonSchema = z.object({ version: z.string() })

function getVersion(): string {
  const packagePath = join(
    dirname(fileURLToPath(import.meta.url)),
    "..",
    "package.json"
  )
  try {
    const result = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(packagePath, "utf8"))
    )
    return result.success ? result.data.version : "unknown"
  } catch {
    return "unknown"
  }
}

function parseWorkers(value: string): number {
  const workers = Number(value)
  if (!Number.isInteger(workers) || workers < 1) {
    throw new InvalidArgumentError("Must be a positive integer.")
  }
  return workers
}

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some((mode) => mode === value)
}

export function createCLI(): Command {
  const program = new Command()

  program
    .name("strata")
    .version(getVersion())
    .description("Run tasks in dependency order, skipping the ones whose inputs have not changed")
    .argument("[task]", "Task id or alias to run (default: config default, else every task)")
    .option("-f, --file <path>", "Config file", "strata.toml")
    .option("-v, --verbose", "Explain run and skip decisions", false)
    .option("--rm", "Remove outputs after each successful task", false)
    .option("-w, --workers <n>", "Maximum number of commands running at once", parseWorkers)
    .option("-t, --timeout <duration>", "Default timeout for tasks without one, e.g. 30s or 5m")
    .option("--dry-run", "List what would run without running it", false)
    .option("--continue-on-failure", "Keep running later levels after a task fails", false)
    .addOption(
      new Option("-o, --output <mode>", "How task output is written")
        .choices(OUTPUT_MODES)
        .default("group")
    )

  return program
}

/**
 * Reads the parsed options off a program created by `createCLI()`.
 */
export function toCliOptions(program: Command): CliOptions {
  const raw = program.opts<RawOptions>()
  const target: string | undefined = program.args[0]

  return {
    target,
    file: raw.file,
    verbose: raw.verbose,
    rm: raw.rm,
    workers: raw.workers,
    timeout: raw.timeout,
    dryRun: raw.dryRun,
    continueOnFailure: raw.continueOnFailure,
    output: isOutputMode(raw.output) ? raw.output : "group",
  }
}

/**
 * Parses user arguments (without the node and script paths). Throws a
 * `CommanderError` instead of exiting on invalid input.
 */
export function parseArgs(argv: string[]): CliOptions {
  const program = createCLI().exitOverride()
  program.parse(argv, { from: "user" })
  return toCliOptions(program)
}
