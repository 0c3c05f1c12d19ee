export const PDF_MIME_TYPE = "application/pdf";

export type EntryKind = "container" | "document";

export interface DocumentDescriptor {
  readonly id: string;
  readonly name: string;
  readonly parentIds: readonly string[];
  readonly mimeType: string;
  readonly createdAt: string;
  readonly modifiedAt: string;
  readonly size?: number;
  readonly link?: string;
  /** Folder names from below the crawl root down to the file's parent, outermost first. */
  readonly folders?: readonly string[];
}

export interface ListingEntry {
  id: string;
  name: string;
  kind: EntryKind;
  mimeType: string;
  parentIds: string[];
  createdAt: string;
  modifiedAt: string;
  size?: number;
  link?: string;
}

export interface ListingPage {
  entries: ListingEntry[];
  nextPageToken?: string;
}

export interface ListingCollaborator {
  listChildren(containerId: string, pageToken?: string): Promise<ListingPage>;
}

export type MetadataField = "date" | "dealership" | "version" | "campaign" | "region" | "model";

export interface ExtractedMetadata {
  readonly filename: string;
  readonly date?: string;
  readonly parsedDate?: string;
  readonly dealership?: string;
  readonly version?: string;
  readonly campaign?: string;
  readonly region?: string;
  readonly model?: string;
  readonly fullPath?: string;
  readonly pathDepth?: number;
  readonly yearFolder?: string;
  readonly monthFolder?: string;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
