import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

import { ConfigurationError } from "./errors";

export type RuntimeEnv = Record<string, string | undefined>;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export function loadEnv(runtimeEnv: RuntimeEnv = process.env) {
  return createEnv({
    server: {
      NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
      LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
      DRIVE_FOLDER_ID: z.string().min(1),
      GOOGLE_CREDENTIALS_FILE: z.string().min(1).default("credentials.json"),
      SHEETS_SPREADSHEET_ID: z.string().min(1),
      SHEETS_RANGE: z.string().min(1).default("Sheet1!A1"),
      OPENAI_API_KEY: z.string().min(1),
      OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
      OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
      OPENAI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
      OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
      OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
      BATCH_SIZE: z.coerce.number().int().positive().default(100),
    },
    runtimeEnv: {
      NODE_ENV: runtimeEnv.NODE_ENV,
      LOG_LEVEL: runtimeEnv.LOG_LEVEL,
      DRIVE_FOLDER_ID: runtimeEnv.DRIVE_FOLDER_ID,
      GOOGLE_CREDENTIALS_FILE: runtimeEnv.GOOGLE_CREDENTIALS_FILE,
      SHEETS_SPREADSHEET_ID: runtimeEnv.SHEETS_SPREADSHEET_ID,
      SHEETS_RANGE: runtimeEnv.SHEETS_RANGE,
      OPENAI_API_KEY: runtimeEnv.OPENAI_API_KEY,
      OPENAI_BASE_URL: runtimeEnv.OPENAI_BASE_URL,
      OPENAI_MODEL: runtimeEnv.OPENAI_MODEL,
      OPENAI_MAX_OUTPUT_TOKENS: runtimeEnv.OPENAI_MAX_OUTPUT_TOKENS,
      OPENAI_TEMPERATURE: runtimeEnv.OPENAI_TEMPERATURE,
      OPENAI_TIMEOUT_MS: runtimeEnv.OPENAI_TIMEOUT_MS,
      BATCH_SIZE: runtimeEnv.BATCH_SIZE,
    },
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      const fields = issues.map((issue) => {
        const [segment] = issue.path ?? [];
        const key = typeof segment === "object" ? segment.key : segment;
        return key === undefined ? issue.message : String(key);
      });
      throw new ConfigurationError([...new Set(fields)]);
    },
  });
}

export type Env = ReturnType<typeof loadEnv>;
