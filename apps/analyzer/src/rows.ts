import type { CellValue, EnrichmentResult } from "./types";

export const RESULT_COLUMNS = [
  "File ID",
  "Filename",
  "Created Time",
  "Modified Time",
  "Web View Link",
  "Date",
  "Dealership",
  "Version",
  "Campaign",
  "Region",
  "Model",
  "Coupon Info",
  "Processed Time",
] as const;

const FENCE = /^```[A-Za-z]*\s*\n?([\s\S]*?)\n?```$/;

/** Pretty-prints model output that is a JSON object or array; anything else is returned as sent. */
export function formatOfferText(raw: string): string {
  const trimmed = raw.trim();
  const body = FENCE.exec(trimmed)?.[1]?.trim() ?? trimmed;

  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed !== null && typeof parsed === "object") {
      return JSON.stringify(parsed, null, 2);
    }
  } catch {
    // not JSON
  }

  return raw;
}

export function toRow({ document, metadata, offerText, processedAt }: EnrichmentResult): CellValue[] {
  return [
    document.id,
    document.name,
    document.createdAt,
    document.modifiedAt,
    document.link ?? "",
    metadata.date ?? "",
    metadata.dealership ?? "",
    metadata.version ?? "",
    metadata.campaign ?? "",
    metadata.region ?? "",
    metadata.model ?? "",
    formatOfferText(offerText),
    processedAt,
  ];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}
