import { parseArgs } from "node:util";
import { z } from "zod";
import {
  ConfigurationError,
  getEnv,
  type RunOverrides,
} from "./config/index.js";
import { exportWorkbook } from "./export/spreadsheet.js";
import { describeError, logger } from "./logger.js";
import { formatRunReport } from "./report/summary.js";
import { prepareRun, runScrape, type ScrapeRunHooks } from "./scraper.js";
import type { RunEvent } from "./types/scrape.js";

export const USAGE = `Usage:
  shelf-scraper [run] [options]   Scrape listing pages and export an xlsx workbook
  shelf-scraper serve [--port N]  Start the HTTP API

Run options:
  --pages N           Number of listing pages to fetch
  --concurrent N      Maximum requests in flight
  --output FILE       Workbook path (default: products.xlsx)
  --url-template URL  Listing URL containing {page}
  --profile FILE      Site profile JSON
  --rps N             Request starts per second (0 disables spacing)
  --max-attempts N    Attempts per page, including the first
  --timeout MS        Per-request timeout in milliseconds
  --no-timestamp      Do not add _YYYYMMDD_HHMMSS to the output name
  -h, --help          Show this message`;

export type CliCommand = "run" | "serve" | "help";

export interface CliArgs {
  command: CliCommand;
  overrides: RunOverrides;
  output?: string;
  profile?: string;
  timestamp: boolean;
  port?: number;
}

const integerFlag = z.coerce.number().int();
const numberFlag = z.coerce.number();

const readNumber = (
  flag: string,
  raw: string | undefined,
  schema: z.ZodNumber,
): number | undefined => {
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw.trim() === "" ? Number.NaN : raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for --${flag}: ${JSON.stringify(raw)} is not a number`,
      "invalid_option",
      flag,
    );
  }
  return parsed.data;
};

const readArgv = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        pages: { type: "string" },
        concurrent: { type: "string" },
        output: { type: "string" },
        "url-template": { type: "string" },
        profile: { type: "string" },
        rps: { type: "string" },
        "max-attempts": { type: "string" },
        timeout: { type: "string" },
        "no-timestamp": { type: "boolean", default: false },
        port: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ConfigurationError(describeError(error), "invalid_option");
  }
};

export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  const { values, positionals } = readArgv(argv);
  const [first, ...rest] = positionals;
  if (rest.length > 0) {
    throw new ConfigurationError(
      `Unexpected arguments: ${rest.join(" ")}`,
      "invalid_option",
    );
  }
  if (first !== undefined && first !== "run" && first !== "serve") {
    throw new ConfigurationError(`Unknown command: ${first}`, "invalid_option");
  }

  const command: CliCommand = values.help ? "help" : (first ?? "run");

  const pageCount = readNumber("pages", values.pages, integerFlag);
  const concurrency = readNumber("concurrent", values.concurrent, integerFlag);
  const requestsPerSecond = readNumber("rps", values.rps, numberFlag);
  const maxAttempts = readNumber("max-attempts", values["max-attempts"], integerFlag);
  const timeoutMs = readNumber("timeout", values.timeout, integerFlag);
  const urlTemplate = values["url-template"];

  return {
    command,
    overrides: {
      ...(pageCount !== undefined ? { pageCount } : {}),
      ...(concurrency !== undefined ? { concurrency } : {}),
      ...(requestsPerSecond !== undefined ? { requestsPerSecond } : {}),
      ...(maxAttempts !== undefined ? { maxAttempts } : {}),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(urlTemplate !== undefined ? { urlTemplate } : {}),
    },
    ...(values.output !== undefined ? { output: values.output } : {}),
    ...(values.profile !== undefined ? { profile: values.profile } : {}),
    timestamp: !values["no-timestamp"],
    ...(values.port !== undefined
      ? { port: readNumber("port", values.port, integerFlag) }
      : {}),
  };
};

export interface CliDependencies {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  hooks?: ScrapeRunHooks;
  now?: () => Date;
  startServer?: (port: number) => Promise<unknown>;
}

const describeProgress = (event: RunEvent): string | null => {
  switch (event.type) {
    case "page-success": {
      const { completed, remaining } = event.progress;
      return `[${completed}/${completed + remaining}] page ${event.pageNumber}: ${event.records} records`;
    }
    case "page-failure": {
      const { completed, remaining } = event.progress;
      return `[${completed}/${completed + remaining}] page ${event.pageNumber} failed: ${event.reason} (${event.message})`;
    }
    case "page-retry":
      return `page ${event.pageNumber}: attempt ${event.attempt} failed (${event.reason.kind}), retrying in ${event.delayMs}ms`;
    default:
      return null;
  }
};

const loadServer = async (port: number) => {
  const { startServer } = await import("./server.js");
  return startServer(port);
};

/**
 * Entry point shared by the bin script and tests. Resolves to the process exit
 * code; configuration problems print to stderr and yield 1.
 */
export const main = async (
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> => {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  try {
    const args = parseCliArgs(argv);

    if (args.command === "help") {
      stdout(USAGE);
      return 0;
    }

    if (args.command === "serve") {
      await (deps.startServer ?? loadServer)(args.port ?? getEnv().PORT);
      return 0;
    }

    const options = await prepareRun(args.overrides, args.profile);
    const summary = await runScrape(options, {
      ...deps.hooks,
      onEvent: (event) => {
        const line = describeProgress(event);
        if (line) stderr(line);
        deps.hooks?.onEvent?.(event);
      },
    });

    // The workbook is written before the report is formatted.
    const env = getEnv();
    const exported = await exportWorkbook(summary, {
      outputPath: args.output ?? env.SCRAPER_OUTPUT,
      timestamp: args.timestamp && env.SCRAPER_TIMESTAMP_OUTPUT,
      now: deps.now?.() ?? new Date(),
    });

    stdout(formatRunReport(summary));
    stdout(
      exported
        ? `Saved results to ${exported.filePath}`
        : "No records collected, nothing was saved",
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(`Configuration error: ${error.message}`);
      return 1;
    }
    logger.error("Scrape run aborted", { error: describeError(error) });
    stderr(`Error: ${describeError(error)}`);
    return 1;
  }
};
