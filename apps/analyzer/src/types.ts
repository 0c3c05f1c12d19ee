import type { DocumentDescriptor, ExtractedMetadata } from "@proof-analyzer/ingestion";

export type CellValue = string | number | boolean;

export interface EnrichmentResult {
  readonly document: DocumentDescriptor;
  readonly metadata: ExtractedMetadata;
  readonly offerText: string;
  /** ISO-8601 timestamp of when the document finished processing. */
  readonly processedAt: string;
}

export interface SheetDestination {
  spreadsheetId: string;
  range: string;
}

export interface ContentCollaborator {
  fetchBytes(documentId: string): Promise<Buffer>;
}

export interface PersistenceCollaborator {
  writeHeader(destination: SheetDestination, columns: readonly string[]): Promise<void>;
  appendRows(destination: SheetDestination, rows: CellValue[][]): Promise<void>;
  clearRange(destination: SheetDestination): Promise<void>;
}

export interface RunOptions {
  fullContent?: boolean;
  clearDestination?: boolean;
}

export interface RunSummary {
  documentsFound: number;
  documentsProcessed: number;
  documentsFailed: number;
  rowsWritten: number;
  batchesWritten: number;
}
