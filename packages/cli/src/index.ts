import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { formatMineOutput, type MineOutputMode } from "./application/format-mine-output.js";
import { createStderrLogger, LOG_LEVELS, parseLogLevel, type LogLevel } from "./application/logger.js";
import {
  collectRepeatable,
  parseNonNegativeInteger,
  parsePositiveInteger,
} from "./application/parse-options.js";
import { renderContextOutput } from "./application/run-context-command.js";
import { runMineCommand } from "./application/run-mine-command.js";

type MiningCliOptions = {
  days: number;
  branch?: string;
  contributor: string[];
  logLevel: LogLevel;
};

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

const addMiningOptions = (command: Command): Command =>
  command
    .argument("[path]", "path to the repository to mine")
    .option("--days <count>", "days of history to include (0 for all time)", parseNonNegativeInteger, 30)
    .option("--branch <ref>", "branch or ref to mine instead of main/master")
    .option("--contributor <name>", "only include commits by this author (repeatable)", collectRepeatable, [])
    .addOption(
      new Option(
        "--log-level <level>",
        "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
      )
        .choices([...LOG_LEVELS])
        .default(parseLogLevel(process.env["COMMITSCOPE_LOG_LEVEL"])),
    );

const mine = (path: string | undefined, options: MiningCliOptions) => {
  const logger = createStderrLogger(options.logLevel);
  const summary = runMineCommand(
    path,
    {
      daysBack: options.days,
      ...(options.branch === undefined ? {} : { branch: options.branch }),
      contributors: options.contributor,
    },
    logger,
  );
  if (!summary.available) {
    process.exitCode = 1;
  }

  return { logger, summary };
};

program
  .name("commitscope")
  .description("Mine git history into per-commit and per-contributor change statistics")
  .version(version);

addMiningOptions(program.command("mine"))
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (interchange document)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action((path: string | undefined, options: MiningCliOptions & { output: MineOutputMode; json?: boolean }) => {
    const { summary } = mine(path, options);
    const outputMode: MineOutputMode = options.json === true ? "json" : options.output;
    process.stdout.write(`${formatMineOutput(summary, outputMode)}\n`);
  });

addMiningOptions(program.command("context"))
  .option("--contributor-summary <name>", "build the context for a single contributor")
  .option("--messages", "print role-tagged chat messages as JSON instead of plain context")
  .option("--max-commits <count>", "number of recent commits to include", parsePositiveInteger)
  .action(
    (
      path: string | undefined,
      options: MiningCliOptions & { contributorSummary?: string; messages?: boolean; maxCommits?: number },
    ) => {
      const { logger, summary } = mine(path, options);
      const result = renderContextOutput(summary, {
        messages: options.messages === true,
        ...(options.contributorSummary === undefined ? {} : { contributorSummary: options.contributorSummary }),
        ...(options.maxCommits === undefined ? {} : { maxCommits: options.maxCommits }),
      });

      switch (result.status) {
        case "ok":
          process.stdout.write(`${result.output}\n`);
          break;
        case "unknown_contributor":
          logger.error(`no commits by '${result.contributor}' in the mined history`);
          process.exitCode = 1;
          break;
        case "not_git_repository":
          break;
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

program.parse(argv);
