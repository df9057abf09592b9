import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { AuthorIdentityMode } from "@blameweight/git-blame";
import { DEFAULT_OWNERSHIP_CONFIG } from "@blameweight/ownership-engine";
import { createOwnershipRenderer, OUTPUT_FORMATS, type OutputFormat } from "@blameweight/reporter";
import { createStderrLogger, LOG_LEVELS, parseLogLevel, type LogLevel } from "./application/logger.js";
import {
  parseNonNegativeInteger,
  parseOwnerSelection,
  parsePositiveInteger,
} from "./application/parse-owner-options.js";
import { runOwnersCommand } from "./application/run-owners-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("blameweight")
  .description("Line-weighted code ownership from git blame, aggregated over directory trees")
  .version(version)
  .argument("[path]", "file or directory to attribute (defaults to the current directory)")
  .option("-n, --top <count>", "show at most this many owners per path")
  .option("-p, --percentage <fraction>", "show the fewest owners covering this share of lines (0-1 or 80%)")
  .addOption(
    new Option("--format <mode>", "output format: tree, csv, json")
      .choices([...OUTPUT_FORMATS])
      .default("tree"),
  )
  .option("--header", "prefix csv output with a path,owner,score header row")
  .option("--max-depth <depth>", "only report paths up to this depth below the target")
  .option(
    "--concurrency <count>",
    "number of git blame processes to run at once",
    String(DEFAULT_OWNERSHIP_CONFIG.concurrency),
  )
  .addOption(
    new Option("--author-identity <mode>", "attribute lines by author name or author email")
      .choices(["name", "email"])
      .default("name"),
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices([...LOG_LEVELS])
      .default(parseLogLevel(process.env["BLAMEWEIGHT_LOG_LEVEL"])),
  )
  .action(
    async (
      path: string | undefined,
      options: {
        top?: string;
        percentage?: string;
        format: OutputFormat;
        header?: boolean;
        maxDepth?: string;
        concurrency: string;
        authorIdentity: AuthorIdentityMode;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const report = await runOwnersCommand(
          path,
          {
            selection: parseOwnerSelection(options),
            ...(options.maxDepth === undefined
              ? {}
              : { maxDepth: parseNonNegativeInteger(options.maxDepth, "--max-depth") }),
            concurrency: parsePositiveInteger(options.concurrency, "--concurrency"),
            authorIdentity: options.authorIdentity,
          },
          logger,
        );
        createOwnershipRenderer(options.format, { header: options.header === true }).render(
          report,
          process.stdout,
        );
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

await program.parseAsync(argv);
