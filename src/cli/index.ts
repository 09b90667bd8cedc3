import path from "node:path";
import { AppConfig, loadConfig } from "../config";
import { runCrawlCommand, runResolve, runStatus } from "../core/commands";
import { ConfigError, toErrorMessage } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export type CommandName = "run" | "status" | "resolve";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  configPath?: string;
  jobsPath?: string;
  concurrency?: number;
  timeoutMinutes?: number;
  host?: string;
}

const HELP_TEXT = `
Usage:
  site-crawler <command> [options]

Commands:
  run              Search every job's site and download new attachments
  status           Show download index and ledger counts
  resolve <host>   Print the adapter rule used for a host

Options:
  --config <path>         Optional path to JSON config file
  --jobs <path>           Job sheet (CSV) to read instead of the configured one
  --dry-run               Stop after date filtering; no detail pages, no downloads
  --ignore-https-errors   Ignore TLS certificate errors (use only when required)
  --concurrency <n>       Jobs processed at the same time
  --timeout-minutes <n>   Stop starting new jobs after this many minutes
  -h, --help              Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "status" || raw === "resolve") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function readPositiveInt(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const host = command === "resolve" && argv[1] && !argv[1].startsWith("--") ? argv[1] : undefined;
  if (command === "resolve" && !host) {
    return "help";
  }

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    configPath: readOption(argv, "--config"),
    jobsPath: readOption(argv, "--jobs"),
    concurrency: readPositiveInt(argv, "--concurrency"),
    timeoutMinutes: readPositiveInt(argv, "--timeout-minutes"),
    host,
  };
}

/** CLI flags override the config file and environment. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    dryRun: parsed.dryRun || config.dryRun,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    jobsPath: parsed.jobsPath ? path.resolve(parsed.jobsPath) : config.jobsPath,
    jobConcurrency: parsed.concurrency ?? config.jobConcurrency,
    runTimeoutMs: parsed.timeoutMinutes !== undefined ? parsed.timeoutMinutes * 60_000 : config.runTimeoutMs,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  } catch (error) {
    if (error instanceof ConfigError) {
      new Logger({ component: "cli", runId }).error("config_invalid", { error: error.message });
      return 1;
    }
    throw error;
  }

  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId }, { minLevel: config.logLevel, filePath: config.logPath });
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("run_interrupted", { signal: "SIGINT" });
    controller.abort();
  };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: config.dryRun,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    jobConcurrency: config.jobConcurrency,
    runTimeoutMs: config.runTimeoutMs,
  });

  const context = { runId, config, logger, metrics };
  try {
    switch (parsed.command) {
      case "run": {
        process.once("SIGINT", onSigint);
        const summary = await runCrawlCommand({ ...context, logger: logger.child("pipeline") }, { signal: controller.signal });
        console.log(JSON.stringify(summary, null, 2));
        metrics.printSummary();
        break;
      }
      case "status": {
        const report = await runStatus({ ...context, logger: logger.child("status") });
        console.log(JSON.stringify(report, null, 2));
        break;
      }
      case "resolve": {
        const rule = runResolve({ ...context, logger: logger.child("resolve") }, parsed.host ?? "");
        console.log(JSON.stringify(rule, null, 2));
        break;
      }
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_invalid", { error: toErrorMessage(error) });
      return 1;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}
