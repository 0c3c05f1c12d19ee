import { readFileSync } from "node:fs";

import { describe, expect, it, vi } from "vitest";

import { CliUsageError, parseCliArgs, type PipelineFactory, runCli, USAGE } from "./cli";
import type { LogLevel } from "./logging";
import type { RunOptions, RunSummary } from "./types";

const validEnv = {
  DRIVE_FOLDER_ID: "root-folder",
  SHEETS_SPREADSHEET_ID: "sheet-1",
  OPENAI_API_KEY: "test-secret",
};

const summary: RunSummary = {
  documentsFound: 1,
  documentsProcessed: 1,
  documentsFailed: 0,
  rowsWritten: 1,
  batchesWritten: 1,
};

function harness(run: (options?: RunOptions) => Promise<RunSummary> = async () => summary) {
  const printed: string[] = [];
  const logged: Array<{ level: LogLevel; message: unknown }> = [];
  const runMock = vi.fn(run);
  const createPipeline = vi.fn<PipelineFactory>(() => ({ run: runMock }));

  return {
    printed,
    logged,
    runMock,
    createPipeline,
    deps: {
      runtimeEnv: validEnv,
      createPipeline,
      print: (line: string) => printed.push(line),
      sink: (level: LogLevel, line: string) => {
        const payload: { message?: unknown } = JSON.parse(line);
        logged.push({ level, message: payload.message });
      },
    },
  };
}

describe("parseCliArgs", () => {
  it("maps flags to options", () => {
    expect(parseCliArgs(["--download-pdfs", "--clear-sheet"])).toEqual({
      downloadPdfs: true,
      allFiles: false,
      clearSheet: true,
      check: false,
      help: false,
    });
  });

  it("rejects unknown arguments", () => {
    expect(() => parseCliArgs(["--fast"])).toThrow(CliUsageError);
  });

  it("does not mistake inherited object keys for flags", () => {
    expect(() => parseCliArgs(["constructor"])).toThrow("Unknown option: constructor");
    expect(() => parseCliArgs(["toString"])).toThrow(CliUsageError);
  });
});

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const { deps, printed, createPipeline } = harness();

    await expect(runCli(["--help"], deps)).resolves.toBe(0);
    expect(printed).toEqual([USAGE]);
    expect(createPipeline).not.toHaveBeenCalled();
  });

  it("exits 1 with usage on an unknown flag", async () => {
    const { deps, printed } = harness();

    await expect(runCli(["--bogus"], deps)).resolves.toBe(1);
    expect(printed).toEqual(["Unknown option: --bogus", USAGE]);
  });

  it("exits 1 before any work when configuration is invalid", async () => {
    const { deps, logged, createPipeline } = harness();

    await expect(runCli([], { ...deps, runtimeEnv: {} })).resolves.toBe(1);
    expect(logged).toEqual([{ level: "error", message: "config.invalid" }]);
    expect(createPipeline).not.toHaveBeenCalled();
  });

  it("runs the pipeline with the selected modes", async () => {
    const { deps, createPipeline, runMock } = harness();

    await expect(runCli(["--download-pdfs", "--all-files"], deps)).resolves.toBe(0);
    expect(createPipeline.mock.calls[0]?.[2]).toEqual({ allFiles: true });
    expect(runMock).toHaveBeenCalledWith({ fullContent: true, clearDestination: false });
  });

  it("exits 1 when the run fails", async () => {
    const { deps, logged } = harness(async () => {
      throw new Error("sheet not found");
    });

    await expect(runCli(["--clear-sheet"], deps)).resolves.toBe(1);
    expect(logged.at(-1)).toEqual({ level: "error", message: "run.failed" });
  });

  it("prints the setup report for --check", async () => {
    const { deps, printed } = harness();

    await expect(runCli(["--check"], { ...deps, fileExists: () => false })).resolves.toBe(1);
    expect(printed.at(-2)).toBe("✗ Google credentials: credentials.json not found");
  });
});

describe("analyzer manifest", () => {
  it("launches the CLI through tsx rather than a linked bin", () => {
    const manifest: { bin?: unknown; scripts?: Record<string, string> } = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf8"),
    );

    expect(manifest.bin).toBeUndefined();
    expect(manifest.scripts?.start).toBe("tsx src/index.ts");
  });
});
