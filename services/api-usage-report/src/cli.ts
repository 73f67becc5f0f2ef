import { Command, InvalidArgumentError } from "commander";
import { loadConfig, type Config } from "./config";
import { promptForDays, type Ask } from "./prompt";
import { runReport, type RunDependencies } from "./run";
import { startServer } from "./server";
import { parseDays } from "./window";

export interface CliDependencies extends RunDependencies {
  env: Record<string, string | undefined>;
  ask: Ask;
  serve?: (config: Config) => void;
}

interface ReportOptions {
  days?: number;
  outputDir?: string;
  rawPaths?: boolean;
}

interface ServeOptions {
  port?: number;
}

function dayCount(value: string): number {
  const days = parseDays(value);
  if (days === null) {
    throw new InvalidArgumentError("Expected a whole number of days between 1 and 31.");
  }
  return days;
}

function portNumber(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return port;
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name("api-usage-report")
    .description("Report on an organization's Meraki Dashboard API usage")
    .version("0.1.0")
    .exitOverride();

  program
    .command("report", { isDefault: true })
    .description("Export API requests to CSV and print summary statistics")
    .option("-d, --days <days>", "time window in days, 1-31 (prompts when omitted)", dayCount)
    .option("-o, --output-dir <dir>", "directory for the CSV export (default: OUTPUT_DIR)")
    .option("--raw-paths", "count endpoints by their exact path instead of a template")
    .action(async (options: ReportOptions) => {
      const config = loadConfig(deps.env);
      const runConfig: Config = {
        ...config,
        OUTPUT_DIR: options.outputDir ?? config.OUTPUT_DIR,
        ENDPOINT_KEYS: options.rawPaths ? "raw" : config.ENDPOINT_KEYS,
      };
      const days = options.days ?? (await promptForDays(deps.ask, deps.print));
      await runReport(runConfig, days, deps);
    });

  program
    .command("serve")
    .description("Serve usage reports over HTTP")
    .option("-p, --port <port>", "port to listen on (default: PORT)", portNumber)
    .action((options: ServeOptions) => {
      const config = loadConfig(deps.env);
      const serve = deps.serve ?? startServer;
      serve({ ...config, PORT: options.port ?? config.PORT });
    });

  return program;
}
