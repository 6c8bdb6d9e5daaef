import { Command, Option } from "commander";
import { LOG_LEVELS, createStderrLogger, resolveLogLevelFromEnv, type LogLevel } from "@commitlens/core";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  formatAnalyzeOutput,
  shouldPrintReport,
  type AnalyzeOutputMode,
} from "./application/format-analyze-output.js";
import { parseNonNegativeInteger, readPackageVersion } from "./application/parse-options.js";
import { runAnalyzeCommand, type AnalyzeCommandOptions } from "./application/run-analyze-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const version = readPackageVersion(readFileSync(packageJsonPath, "utf8"));

const KINDS_HINT = "comma-separated validation names: short, reference, format, vague, wip, imperative";

program
  .name("commitlens")
  .description("Commit message quality analysis for git repositories")
  .version(version);

program
  .command("analyze")
  .argument("[path]", "path to the git repository to analyze")
  .option("--limit <count>", "analyze at most this many recent commits", parseNonNegativeInteger)
  .option("--threshold <chars>", "minimum subject length; 0 disables the short check", parseNonNegativeInteger, 30)
  .option("--quiet", "print nothing unless validation fails", false)
  .option("--strict", "treat warnings as failures", false)
  .option("--error <kinds>", `report these as errors (${KINDS_HINT})`)
  .option("--warn <kinds>", "report these as warnings")
  .option("--info <kinds>", "report these as info")
  .option("--ignore <kinds>", "never report these")
  .option("--disable <kinds>", "skip these checks entirely")
  .option("--only <kinds>", "keep only findings of these kinds")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(LOG_LEVELS)
      .default(resolveLogLevelFromEnv()),
  )
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (full report object)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action(
    (
      path: string | undefined,
      options: AnalyzeCommandOptions & {
        logLevel: LogLevel;
        output: AnalyzeOutputMode;
        json?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const { report, failure, exitCode } = runAnalyzeCommand(path, options, logger);
        const outputMode: AnalyzeOutputMode = options.json === true ? "json" : options.output;
        if (shouldPrintReport(report, options.quiet)) {
          process.stdout.write(`${formatAnalyzeOutput(report, outputMode)}\n`);
        }
        if (failure !== null) {
          process.stderr.write(`${failure.message}\n`);
        }
        process.exitCode = exitCode;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = 1;
      }
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
