import { errorMessage, type Logger } from "@proof-analyzer/ingestion";

import { createAnalysisPipeline, type PipelineOptions } from "./bootstrap";
import { type AnalyzerConfig, loadConfig } from "./config";
import type { RuntimeEnv } from "./env";
import { ConfigurationError } from "./errors";
import { createLogger, type LogSink } from "./logging";
import type { AnalysisPipeline } from "./pipeline";
import { formatSetupReport, runSetupChecks } from "./setup-check";

export const USAGE = `Usage: proof-analyzer [options]

Crawl a Drive folder of dealership mail proofs, extract offer details and append them to a sheet.

Options:
  --download-pdfs  attach each PDF to the extraction request (slower, more accurate)
  --all-files      process every file, not only PDFs
  --clear-sheet    clear the destination range before writing
  --check          verify the local setup and exit
  --help           show this message`;

export interface CliOptions {
  downloadPdfs: boolean;
  allFiles: boolean;
  clearSheet: boolean;
  check: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(readonly argument: string) {
    super(`Unknown option: ${argument}`);
    this.name = "CliUsageError";
  }
}

const FLAGS = new Map<string, keyof CliOptions>([
  ["--download-pdfs", "downloadPdfs"],
  ["--all-files", "allFiles"],
  ["--clear-sheet", "clearSheet"],
  ["--check", "check"],
  ["--help", "help"],
  ["-h", "help"],
]);

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { downloadPdfs: false, allFiles: false, clearSheet: false, check: false, help: false };

  for (const argument of argv) {
    const flag = FLAGS.get(argument);
    if (flag === undefined) {
      throw new CliUsageError(argument);
    }
    options[flag] = true;
  }

  return options;
}

export type PipelineFactory = (
  config: AnalyzerConfig,
  logger: Logger,
  options: PipelineOptions,
) => Pick<AnalysisPipeline, "run">;

export interface CliDeps {
  runtimeEnv?: RuntimeEnv;
  createPipeline?: PipelineFactory;
  print?: (line: string) => void;
  fileExists?: (path: string) => boolean;
  sink?: LogSink;
}

// eslint-disable-next-line no-console
const printLine = (line: string) => console.log(line);

/** Resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const { runtimeEnv = process.env, createPipeline = createAnalysisPipeline, print = printLine, sink } = deps;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    print(errorMessage(error));
    print(USAGE);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  if (options.check) {
    const results = runSetupChecks({ runtimeEnv, fileExists: deps.fileExists });
    formatSetupReport(results).forEach((line) => print(line));
    return results.every((result) => result.passed) ? 0 : 1;
  }

  let config: AnalyzerConfig;
  try {
    config = loadConfig(runtimeEnv);
  } catch (error) {
    const fields = error instanceof ConfigurationError ? error.fields : [];
    createLogger({ sink }).error("config.invalid", { fields, error: errorMessage(error) });
    return 1;
  }

  const logger = createLogger({ level: config.logLevel, environment: config.environment, sink });

  try {
    const pipeline = createPipeline(config, logger, { allFiles: options.allFiles });
    await pipeline.run({ fullContent: options.downloadPdfs, clearDestination: options.clearSheet });
    return 0;
  } catch (error) {
    logger.error("run.failed", { error: errorMessage(error) });
    return 1;
  }
}
