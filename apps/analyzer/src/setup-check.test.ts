import { describe, expect, it } from "vitest";

import { formatSetupReport, runSetupChecks } from "./setup-check";

describe("runSetupChecks", () => {
  it("passes with a supported runtime, valid environment and credentials file", () => {
    const results = runSetupChecks({
      runtimeEnv: {
        DRIVE_FOLDER_ID: "root-folder",
        SHEETS_SPREADSHEET_ID: "sheet-1",
        OPENAI_API_KEY: "test-secret",
        GOOGLE_CREDENTIALS_FILE: "keys/service-account.json",
      },
      nodeVersion: "20.11.1",
      fileExists: (path) => path === "keys/service-account.json",
    });

    expect(results).toEqual([
      { name: "Node.js version", passed: true, detail: "v20.11.1 (requires 20 or newer)" },
      { name: "Environment", passed: true, detail: "all required variables set" },
      { name: "Google credentials", passed: true, detail: "keys/service-account.json" },
    ]);
    expect(formatSetupReport(results).at(-1)).toBe("All checks passed.");
  });

  it("reports every failing check", () => {
    const results = runSetupChecks({ runtimeEnv: {}, nodeVersion: "18.19.0", fileExists: () => false });

    expect(results.map((result) => result.passed)).toEqual([false, false, false]);
    expect(formatSetupReport(results)).toEqual([
      "✗ Node.js version: v18.19.0 (requires 20 or newer)",
      `✗ Environment: ${results[1]?.detail}`,
      "✗ Google credentials: credentials.json not found",
      "3 check(s) failed.",
    ]);
    expect(results[1]?.detail).toContain("OPENAI_API_KEY");
  });
});
