import { AppConfig, loadConfig } from "../config";
import {
  CommandContext,
  createInterruptHandle,
  runCheck,
  runDownload,
  runScrape,
  runStatus,
} from "../core/commands";
import { createRunId, Logger, LogWriter, StatsRegistry } from "../observability";
import { ExportFormat, isExportFormat } from "../sink";
import { createCheckpointStore } from "../store";

export type CommandName = "scrape" | "check" | "download" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  pages?: number;
  startPage?: number;
  format: ExportFormat;
  output?: string;
  input?: string;
  resume: boolean;
  fresh: boolean;
  download: boolean;
  debug: boolean;
  configPath?: string;
}

export type CliParseResult = ParsedCliArgs | "help" | { error: string };

/** Seams for tests; production callers pass nothing. */
export type CliOverrides = Partial<
  Pick<CommandContext, "fetchFn" | "browser" | "sleep" | "random" | "now" | "checkpoints">
> & {
  config?: AppConfig;
  writer?: LogWriter;
};

const HELP_TEXT = `
Usage:
  putusan-harvester <command> [options]

Commands:
  scrape     Walk the decision directory and export the records
  check      Fetch the first listing page and report what was extracted
  download   Download attachments for records in a JSON file (--input)
  status     Show the saved checkpoint, if any

Options:
  --pages <n>        Number of listing pages to fetch (default: until the listing runs out)
  --start-page <n>   First listing page (default: 1)
  --format <f>       Export format: json, csv, xlsx or sqlite (default: json)
  --output <name>    Export file name without extension
  --input <path>     Records file for the download command
  --resume           Continue from the saved checkpoint
  --fresh            Delete the saved checkpoint before starting
  --download         Download decision attachments after scraping
  --debug            Debug logging and saved page HTML
  --config <path>    Optional path to JSON config file
  -h, --help         Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "scrape" || raw === "check" || raw === "download" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("--") ? value : undefined;
}

function readPositiveInt(argv: string[], name: string): number | undefined | { error: string } {
  const raw = readOption(argv, name);
  if (raw === undefined) {
    return argv.includes(name) ? { error: `${name} needs a value` } : undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || parsed < 1) {
    return { error: `${name} must be a positive integer, got "${raw}"` };
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliParseResult {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const pages = readPositiveInt(argv, "--pages");
  if (typeof pages === "object") {
    return pages;
  }
  const startPage = readPositiveInt(argv, "--start-page");
  if (typeof startPage === "object") {
    return startPage;
  }

  const formatRaw = readOption(argv, "--format") ?? "json";
  if (!isExportFormat(formatRaw)) {
    return { error: `Unsupported format: ${formatRaw}` };
  }

  const input = readOption(argv, "--input");
  if (command === "download" && !input) {
    return { error: "download needs --input <path>" };
  }

  const resume = argv.includes("--resume");
  const fresh = argv.includes("--fresh");
  if (resume && fresh) {
    return { error: "--resume and --fresh cannot be combined" };
  }

  return {
    command,
    pages,
    startPage,
    format: formatRaw,
    output: readOption(argv, "--output"),
    input,
    resume,
    fresh,
    download: argv.includes("--download"),
    debug: argv.includes("--debug"),
    configPath: readOption(argv, "--config"),
  };
}

export async function runCli(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if ("error" in parsed) {
    console.error(parsed.error);
    console.log(HELP_TEXT.trim());
    return 1;
  }

  let config = overrides.config ?? loadConfig(parsed.configPath);
  if (parsed.debug) {
    config = { ...config, logLevel: "debug", saveDebugHtml: true };
  }

  const runId = createRunId(parsed.command);
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel }, overrides.writer);
  const stats = new StatsRegistry();
  const interrupt = createInterruptHandle(logger);
  const context: CommandContext = {
    runId,
    config,
    logger,
    stats,
    checkpoints: overrides.checkpoints ?? createCheckpointStore(config, logger.child("checkpoint")),
    signal: interrupt.signal,
    fetchFn: overrides.fetchFn,
    browser: overrides.browser,
    sleep: overrides.sleep,
    random: overrides.random,
    now: overrides.now,
  };

  logger.info("command_start", {
    command: parsed.command,
    pages: parsed.pages,
    startPage: parsed.startPage,
    format: parsed.format,
    resume: parsed.resume,
    download: parsed.download,
  });

  try {
    let exitCode: number;
    switch (parsed.command) {
      case "scrape":
        exitCode = await runScrape(
          { ...context, logger: logger.child("scrape") },
          {
            pages: parsed.pages,
            startPage: parsed.startPage,
            format: parsed.format,
            output: parsed.output,
            resume: parsed.resume,
            fresh: parsed.fresh,
            download: parsed.download,
          },
        );
        break;
      case "check":
        exitCode = await runCheck({ ...context, logger: logger.child("check") });
        break;
      case "download":
        exitCode = await runDownload(
          { ...context, logger: logger.child("download") },
          { input: parsed.input ?? "", format: parsed.format, output: parsed.output },
        );
        break;
      case "status":
        exitCode = await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    interrupt.dispose();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
