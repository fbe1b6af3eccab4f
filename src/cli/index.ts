import { AppConfig, loadConfig, loadSourceRegistry, SourceDescriptor } from "../config";
import { formatRunSummary, runSources, runStatus, runVerify, writeRunSummary } from "../core/commands";
import { isFatalError } from "../core/errors";
import { PlaywrightRenderer } from "../crawl";
import { HttpFetcher } from "../download";
import { createRunId, errorMessage, Logger, MetricsRegistry } from "../observability";
import { createLedger } from "../store";

export type CommandName = "run" | "discover" | "status" | "verify" | "list-sources";

export interface ParsedCliArgs {
  command: CommandName;
  force: boolean;
  ignoreHttpsErrors: boolean;
  sources: string[];
  configPath?: string;
  sourcesPath?: string;
}

const HELP_TEXT = `
Usage:
  delta-harvester <command> [options]

Commands:
  run            Discover and fetch new artifacts for every enabled source
  discover       Discover and diff without fetching or writing the ledger
  status         Print ledger statistics
  verify         Re-hash recorded artifacts and report missing or changed files
  list-sources   Print the source registry

Options:
  --config <path>   Optional path to JSON config file
  --sources <path>  Source registry path (overrides SOURCES_PATH)
  --source <name>   Limit the run to a named source (repeatable)
  --force           Refetch artifacts even when already recorded
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help        Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "discover" || raw === "status" || raw === "verify" || raw === "list-sources") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index >= 0 && argv[index + 1] && !argv[index + 1].startsWith("--")) {
    return argv[index + 1];
  }
  return undefined;
}

function repeatedValues(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    const next = argv[index + 1];
    if (arg === flag && next && !next.startsWith("--")) {
      values.push(next);
    }
  });
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    sources: repeatedValues(argv, "--source"),
    configPath: optionValue(argv, "--config"),
    sourcesPath: optionValue(argv, "--sources"),
  };
}

function describeSource(source: SourceDescriptor): string {
  const target =
    source.strategy === "direct"
      ? source.url
      : source.strategy === "api"
        ? `${source.method} ${source.endpoint}`
        : source.strategy === "listing"
          ? source.pageUrl ?? source.pageUrls?.[0]
          : source.pageUrl;
  const flag = source.enabled ? "" : " (disabled)";
  return `${source.name}\t${source.strategy}\t${source.group}\t${target ?? ""}${flag}`;
}

function resolveConfig(parsed: ParsedCliArgs): AppConfig {
  const config = loadConfig(parsed.configPath);
  return {
    ...config,
    sourcesPath: parsed.sourcesPath ?? config.sourcesPath,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = resolveConfig(parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });

  logger.info("command_start", {
    command: parsed.command,
    force: parsed.force,
    sources: parsed.sources,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  if (parsed.command === "list-sources") {
    try {
      const registry = loadSourceRegistry(config.sourcesPath);
      for (const source of registry.sources) {
        console.log(describeSource(source));
      }
      return 0;
    } catch (error) {
      logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
      return 1;
    }
  }

  const ledger = createLedger(config);
  const renderer = new PlaywrightRenderer(config, logger.child("render"));

  try {
    switch (parsed.command) {
      case "run":
      case "discover": {
        const registry = loadSourceRegistry(config.sourcesPath);
        const fetcher = new HttpFetcher({ config, logger: logger.child("fetch"), metrics });
        const dryRun = parsed.command === "discover";
        const summary = await runSources(
          {
            runId,
            config,
            ledger,
            fetcher,
            discovery: { config, pages: fetcher, renderer, metrics },
            logger: logger.child(parsed.command),
            metrics,
          },
          registry,
          { only: parsed.sources, force: parsed.force, dryRun },
        );
        if (!dryRun) {
          const summaryPath = await writeRunSummary(summary, config.runSummaryDir);
          logger.info("run_summary_written", { path: summaryPath });
        }
        console.log(formatRunSummary(summary));
        break;
      }
      case "status": {
        const stats = await runStatus({ ledger, logger: logger.child("status") });
        console.log(JSON.stringify(stats, null, 2));
        break;
      }
      case "verify": {
        const report = await runVerify({ ledger, config, logger: logger.child("verify") });
        console.log(JSON.stringify(report, null, 2));
        if (report.missing.length > 0 || report.mismatched.length > 0) {
          return 1;
        }
        break;
      }
      default: {
        const unreachable: never = parsed.command;
        console.error(`Unsupported command: ${String(unreachable)}`);
        return 1;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error(isFatalError(error) ? "command_fatal" : "command_failed", {
      command: parsed.command,
      error: errorMessage(error),
    });
    return 1;
  } finally {
    await renderer.close();
    await ledger.close();
    metrics.report(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
