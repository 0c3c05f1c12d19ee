import { existsSync } from "node:fs";

import { errorMessage } from "@proof-analyzer/ingestion";

import { loadConfig } from "./config";
import type { RuntimeEnv } from "./env";

const MINIMUM_NODE_MAJOR = 20;
const DEFAULT_CREDENTIALS_FILE = "credentials.json";

export interface SetupCheckResult {
  name: string;
  passed: boolean;
  detail: string;
}

export interface SetupCheckDeps {
  runtimeEnv?: RuntimeEnv;
  nodeVersion?: string;
  fileExists?: (path: string) => boolean;
}

export function runSetupChecks({
  runtimeEnv = process.env,
  nodeVersion = process.versions.node,
  fileExists = existsSync,
}: SetupCheckDeps = {}): SetupCheckResult[] {
  const major = Number.parseInt(nodeVersion.split(".")[0] ?? "", 10);
  const results: SetupCheckResult[] = [
    {
      name: "Node.js version",
      passed: major >= MINIMUM_NODE_MAJOR,
      detail: `v${nodeVersion} (requires ${MINIMUM_NODE_MAJOR} or newer)`,
    },
  ];

  let credentialsFile = runtimeEnv.GOOGLE_CREDENTIALS_FILE || DEFAULT_CREDENTIALS_FILE;
  try {
    const config = loadConfig(runtimeEnv);
    credentialsFile = config.drive.credentialsFile;
    results.push({ name: "Environment", passed: true, detail: "all required variables set" });
  } catch (error) {
    results.push({ name: "Environment", passed: false, detail: errorMessage(error) });
  }

  const found = fileExists(credentialsFile);
  results.push({
    name: "Google credentials",
    passed: found,
    detail: found ? credentialsFile : `${credentialsFile} not found`,
  });

  return results;
}

export function formatSetupReport(results: readonly SetupCheckResult[]): string[] {
  const lines = results.map(({ name, passed, detail }) => `${passed ? "✓" : "✗"} ${name}: ${detail}`);
  const failed = results.filter((result) => !result.passed).length;
  lines.push(failed === 0 ? "All checks passed." : `${failed} check(s) failed.`);
  return lines;
}
