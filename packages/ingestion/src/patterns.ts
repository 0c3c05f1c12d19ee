import type { MetadataField } from "./types";

export type FieldPatterns = readonly [field: MetadataField, patterns: readonly RegExp[]];

const MODEL_NAMES = ["civic", "accord", "crv", "pilot", "forester", "outback", "camry", "corolla", "f150", "silverado"];

// Order matters twice: fields are independent, but within a field the first pattern that matches wins.
export const FIELD_PATTERNS: readonly FieldPatterns[] = [
  ["date", [/(\d{4}[-_]\d{2}[-_]\d{2})/i, /(\d{2}[-_]\d{2}[-_]\d{4})/i, /(\d{8})/i]],
  ["dealership", [/(?:dealer|client|customer)[-_]?([A-Za-z0-9]+)/i, /^([A-Za-z]+)[-_](?:proof|mailer|direct)/i]],
  ["version", [/(?:proof|version|v)[-_]?(\d+)/i, /_v(\d+)/i, /[-_]r(\d+)/i]],
  ["campaign", [/(?:campaign|offer|promo)[-_]?([A-Za-z0-9]+)/i, /([A-Za-z]+\d+)/i]],
  ["region", [/(?:state|region)[-_]?([A-Z]{2})/i, /[-_]([A-Z]{2})[-_]/i]],
  ["model", [/(?:model|vehicle)[-_]?([A-Za-z0-9]+)/i, new RegExp(`(${MODEL_NAMES.join("|")})`, "i")]],
];

export const YEAR_FOLDER_PATTERN = /^\d{4}$/;
export const MONTH_FOLDER_PATTERN = /^(\d{1,2})[-_]?([A-Za-z]+)?$/;

export function patternsFor(field: MetadataField): readonly RegExp[] {
  return FIELD_PATTERNS.find(([name]) => name === field)?.[1] ?? [];
}
