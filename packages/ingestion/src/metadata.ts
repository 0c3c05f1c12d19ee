import { normalizeDate } from "./dates";
import { FIELD_PATTERNS, MONTH_FOLDER_PATTERN, patternsFor, YEAR_FOLDER_PATTERN } from "./patterns";
import { type ExtractedMetadata, type Logger, type MetadataField, silentLogger } from "./types";
import { stripExtension } from "./utils";

type FieldValues = Partial<Record<MetadataField, string>>;

function firstCapture(patterns: readonly RegExp[], value: string): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(value);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Best-effort field recovery from a free-form file name. Every field is tried on its own,
 * so a missing value for one never hides another.
 */
export function extractMetadata(filename: string, logger: Logger = silentLogger): ExtractedMetadata {
  const stem = stripExtension(filename);
  const fields: FieldValues = {};

  for (const [field, patterns] of FIELD_PATTERNS) {
    const value = firstCapture(patterns, stem);
    if (value !== undefined) {
      fields[field] = value;
      logger.debug("metadata.field", { field, value, filename });
    }
  }

  const parsedDate = fields.date !== undefined ? normalizeDate(fields.date, logger) : undefined;

  return Object.freeze({
    filename,
    ...fields,
    ...(parsedDate !== undefined ? { parsedDate } : {}),
  });
}

/**
 * Folder names are passed apart from the file name because either may itself contain "/".
 * `fullPath` joins them for display only.
 */
export function extractMetadataFromPath(
  folders: readonly string[],
  filename: string,
  logger: Logger = silentLogger,
): ExtractedMetadata {
  const fromName = extractMetadata(filename, logger);

  let dealership = fromName.dealership;
  let yearFolder: string | undefined;
  let monthFolder: string | undefined;

  for (const segment of folders) {
    if (YEAR_FOLDER_PATTERN.test(segment)) {
      yearFolder = segment;
    }

    const month = MONTH_FOLDER_PATTERN.exec(segment);
    if (month?.[1] !== undefined) {
      monthFolder = month[1];
    }

    if (dealership === undefined) {
      dealership = firstCapture(patternsFor("dealership"), segment);
    }
  }

  return Object.freeze({
    ...fromName,
    ...(dealership !== undefined ? { dealership } : {}),
    fullPath: [...folders, filename].join("/"),
    pathDepth: folders.length + 1,
    ...(yearFolder !== undefined ? { yearFolder } : {}),
    ...(monthFolder !== undefined ? { monthFolder } : {}),
  });
}
