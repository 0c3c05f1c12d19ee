import { buildOfferPrompt, type EnrichmentCollaborator } from "@proof-analyzer/ai";
import {
  type CrawlResult,
  type DocumentDescriptor,
  errorMessage,
  extractMetadata,
  extractMetadataFromPath,
  type LeafPredicate,
  type ListingCollaborator,
  type Logger,
  type RetryOptions,
  TreeCrawler,
  withRetry,
} from "@proof-analyzer/ingestion";

import type { AnalyzerConfig } from "./config";
import { PersistenceError } from "./errors";
import { chunk, RESULT_COLUMNS, toRow } from "./rows";
import type {
  ContentCollaborator,
  EnrichmentResult,
  PersistenceCollaborator,
  RunOptions,
  RunSummary,
  SheetDestination,
} from "./types";

const PROGRESS_INTERVAL = 10;

export interface AnalysisPipelineDeps {
  config: AnalyzerConfig;
  lister: ListingCollaborator;
  content: ContentCollaborator;
  enrichment: EnrichmentCollaborator;
  persistence: PersistenceCollaborator;
  logger: Logger;
  isLeaf?: LeafPredicate;
  sleep?: RetryOptions["sleep"];
  now?: () => Date;
}

export interface WriteSummary {
  rowsWritten: number;
  batchesWritten: number;
}

export class AnalysisPipeline {
  private readonly crawler: TreeCrawler;
  private readonly destination: SheetDestination;
  private readonly now: () => Date;

  constructor(private readonly deps: AnalysisPipelineDeps) {
    this.crawler = new TreeCrawler({
      lister: deps.lister,
      isLeaf: deps.isLeaf,
      retry: deps.config.retry,
      sleep: deps.sleep,
      logger: deps.logger,
    });
    this.destination = {
      spreadsheetId: deps.config.sheets.spreadsheetId,
      range: deps.config.sheets.range,
    };
    this.now = deps.now ?? (() => new Date());
  }

  crawl(): Promise<CrawlResult> {
    return this.crawler.crawl(this.deps.config.drive.rootFolderId);
  }

  /** Documents that fail are logged and left out; the rest keep their input order. */
  async processDocuments(
    documents: readonly DocumentDescriptor[],
    { fullContent = false }: RunOptions = {},
  ): Promise<EnrichmentResult[]> {
    const { logger } = this.deps;
    const results: EnrichmentResult[] = [];

    logger.info("process.start", { documents: documents.length, fullContent });

    for (const [index, document] of documents.entries()) {
      try {
        results.push(await this.processDocument(document, fullContent));
      } catch (error) {
        logger.error("document.failed", { document: document.name, id: document.id, error: errorMessage(error) });
      }

      if ((index + 1) % PROGRESS_INTERVAL === 0) {
        logger.info("process.progress", { processed: index + 1, total: documents.length });
      }
    }

    logger.info("process.complete", { succeeded: results.length, failed: documents.length - results.length });
    return results;
  }

  async writeResults(
    results: readonly EnrichmentResult[],
    { clearDestination = false }: RunOptions = {},
  ): Promise<WriteSummary> {
    const { logger, persistence } = this.deps;

    if (results.length === 0) {
      logger.warn("write.skipped", { reason: "no results" });
      return { rowsWritten: 0, batchesWritten: 0 };
    }

    const rows = results.map(toRow);
    const batches = chunk(rows, this.deps.config.batchSize);
    let rowsWritten = 0;
    let batchesWritten = 0;

    logger.info("write.start", { rows: rows.length, batches: batches.length });

    try {
      if (clearDestination) {
        await this.retrying("clearRange", () => persistence.clearRange(this.destination));
      }
      await this.retrying("writeHeader", () => persistence.writeHeader(this.destination, RESULT_COLUMNS));

      for (const batch of batches) {
        await this.retrying("appendRows", () => persistence.appendRows(this.destination, batch));
        batchesWritten += 1;
        rowsWritten += batch.length;
        logger.info("write.batch", { batch: batchesWritten, rows: batch.length });
      }
    } catch (error) {
      const progress = { batchesWritten, rowsWritten, rowsPending: rows.length - rowsWritten };
      logger.error("write.failed", { ...progress, error: errorMessage(error) });
      throw new PersistenceError(progress, error);
    }

    logger.info("write.complete", { rowsWritten, batchesWritten });
    return { rowsWritten, batchesWritten };
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const { logger } = this.deps;
    const { documents } = await this.crawl();

    if (documents.length === 0) {
      logger.warn("run.empty", { rootFolderId: this.deps.config.drive.rootFolderId });
      return { documentsFound: 0, documentsProcessed: 0, documentsFailed: 0, rowsWritten: 0, batchesWritten: 0 };
    }

    const results = await this.processDocuments(documents, options);
    const written = await this.writeResults(results, options);

    const summary: RunSummary = {
      documentsFound: documents.length,
      documentsProcessed: results.length,
      documentsFailed: documents.length - results.length,
      ...written,
    };
    logger.info("run.complete", { ...summary });
    return summary;
  }

  private async processDocument(document: DocumentDescriptor, fullContent: boolean): Promise<EnrichmentResult> {
    const { config, logger } = this.deps;

    const folders = document.folders ?? [];
    const metadata =
      folders.length > 0
        ? extractMetadataFromPath(folders, document.name, logger)
        : extractMetadata(document.name, logger);

    let content: Buffer | undefined;
    if (fullContent) {
      try {
        content = await this.retrying("fetchBytes", () => this.deps.content.fetchBytes(document.id));
      } catch (error) {
        logger.warn("document.download_failed", { document: document.name, error: errorMessage(error) });
      }
    }

    const prompt = buildOfferPrompt(document.name, { ...metadata });
    const offerText = await this.retrying("infer", () =>
      this.deps.enrichment.infer(prompt, {
        content,
        filename: document.name,
        temperature: config.openai.temperature,
        maxTokens: config.openai.maxOutputTokens,
      }),
    );

    return Object.freeze({ document, metadata, offerText, processedAt: this.now().toISOString() });
  }

  private retrying<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return withRetry(call, this.deps.config.retry, {
      sleep: this.deps.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        this.deps.logger.warn("collaborator.retry", { operation, attempt, delayMs, error: errorMessage(error) }),
    });
  }
}
