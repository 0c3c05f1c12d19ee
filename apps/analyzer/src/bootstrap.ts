import { OfferExtractionClient, OpenAIChatClient } from "@proof-analyzer/ai";
import { isAnyDocument, isPdfDocument, type Logger } from "@proof-analyzer/ingestion";

import type { AnalyzerConfig } from "./config";
import { createGoogleAuth } from "./google/auth";
import { DriveClient } from "./google/drive";
import { SheetsWriter } from "./google/sheets";
import { AnalysisPipeline } from "./pipeline";

export interface PipelineOptions {
  allFiles?: boolean;
}

export function createAnalysisPipeline(
  config: AnalyzerConfig,
  logger: Logger,
  { allFiles = false }: PipelineOptions = {},
): AnalysisPipeline {
  const auth = createGoogleAuth(config.drive.credentialsFile);
  const drive = new DriveClient(auth);

  const chat = new OpenAIChatClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model,
    timeoutMs: config.openai.timeoutMs,
    logger,
  });

  return new AnalysisPipeline({
    config,
    lister: drive,
    content: drive,
    enrichment: new OfferExtractionClient(chat),
    persistence: new SheetsWriter(auth),
    logger,
    isLeaf: allFiles ? isAnyDocument : isPdfDocument,
  });
}
