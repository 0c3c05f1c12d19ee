import { format, isValid, parse } from "date-fns";

import { type Logger, silentLogger } from "./types";

export const CANONICAL_DATE_FORMAT = "yyyy-MM-dd";

export const DATE_TEMPLATES = ["yyyy-MM-dd", "yyyy_MM_dd", "MM-dd-yyyy", "MM_dd_yyyy", "yyyyMMdd"] as const;

// Fixed reference so parsing never depends on the wall clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

export function normalizeDate(raw: string, logger: Logger = silentLogger): string | undefined {
  const token = raw.trim();

  for (const template of DATE_TEMPLATES) {
    const parsed = parse(token, template, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, CANONICAL_DATE_FORMAT);
    }
  }

  logger.warn("date.unparsed", { raw });
  return undefined;
}
