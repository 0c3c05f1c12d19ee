import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "@proof-analyzer/ingestion";

import { type Env, loadEnv, type RuntimeEnv } from "./env";

export interface AnalyzerConfig {
  readonly environment: Env["NODE_ENV"];
  readonly logLevel: Env["LOG_LEVEL"];
  readonly drive: {
    readonly rootFolderId: string;
    readonly credentialsFile: string;
  };
  readonly sheets: {
    readonly spreadsheetId: string;
    readonly range: string;
  };
  readonly openai: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly model: string;
    readonly temperature: number;
    readonly maxOutputTokens: number;
    readonly timeoutMs: number;
  };
  readonly batchSize: number;
  readonly retry: RetryPolicy;
}

export function toConfig(env: Env): AnalyzerConfig {
  return Object.freeze({
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    drive: Object.freeze({
      rootFolderId: env.DRIVE_FOLDER_ID,
      credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
    }),
    sheets: Object.freeze({
      spreadsheetId: env.SHEETS_SPREADSHEET_ID,
      range: env.SHEETS_RANGE,
    }),
    openai: Object.freeze({
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      temperature: env.OPENAI_TEMPERATURE,
      maxOutputTokens: env.OPENAI_MAX_OUTPUT_TOKENS,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
    }),
    batchSize: env.BATCH_SIZE,
    retry: Object.freeze({ ...DEFAULT_RETRY_POLICY }),
  });
}

/** Validates the environment once; throws `ConfigurationError` naming every bad variable. */
export function loadConfig(runtimeEnv?: RuntimeEnv): AnalyzerConfig {
  return toConfig(loadEnv(runtimeEnv));
}
