import { DEFAULT_RETRY_POLICY, type RetryOptions, type RetryPolicy, withRetry } from "./retry";
import {
  type DocumentDescriptor,
  type ListingCollaborator,
  type ListingEntry,
  type Logger,
  PDF_MIME_TYPE,
  silentLogger,
} from "./types";
import { errorMessage } from "./utils";

export type LeafPredicate = (entry: ListingEntry) => boolean;

export const isPdfDocument: LeafPredicate = (entry) => entry.kind === "document" && entry.mimeType === PDF_MIME_TYPE;

export const isAnyDocument: LeafPredicate = (entry) => entry.kind === "document";

export interface TreeCrawlerOptions {
  lister: ListingCollaborator;
  isLeaf?: LeafPredicate;
  retry?: RetryPolicy;
  sleep?: RetryOptions["sleep"];
  logger?: Logger;
}

export interface CrawlResult {
  documents: DocumentDescriptor[];
  foldersVisited: number;
  failedFolders: string[];
}

interface QueuedFolder {
  id: string;
  folders: readonly string[];
}

/**
 * Breadth-first walk over a remote folder tree. A folder reachable from several parents is
 * listed once, the first time it is dequeued. A folder whose listing keeps failing is
 * abandoned; whatever it yielded before the failure stays in the result.
 */
export class TreeCrawler {
  private readonly isLeaf: LeafPredicate;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(private readonly options: TreeCrawlerOptions) {
    this.isLeaf = options.isLeaf ?? isPdfDocument;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? silentLogger;
  }

  async crawl(rootId: string): Promise<CrawlResult> {
    const documents: DocumentDescriptor[] = [];
    const failedFolders: string[] = [];
    const visited = new Set<string>();
    const queue: QueuedFolder[] = [{ id: rootId, folders: [] }];

    this.logger.info("crawl.start", { rootId });

    while (queue.length > 0) {
      const folder = queue.shift();
      if (!folder || visited.has(folder.id)) {
        continue;
      }

      visited.add(folder.id);
      this.logger.info("crawl.folder", { folderId: folder.id, foldersVisited: visited.size });

      let pageToken: string | undefined;
      do {
        try {
          const page = await this.listPage(folder.id, pageToken);
          for (const entry of page.entries) {
            if (entry.kind === "container") {
              queue.push({ id: entry.id, folders: [...folder.folders, entry.name] });
            } else if (this.isLeaf(entry)) {
              documents.push(toDescriptor(entry, folder.folders));
              this.logger.debug("crawl.document", { name: entry.name });
            }
          }
          pageToken = page.nextPageToken || undefined;
        } catch (error) {
          failedFolders.push(folder.id);
          this.logger.error("crawl.folder_failed", { folderId: folder.id, error: errorMessage(error) });
          pageToken = undefined;
        }
      } while (pageToken);
    }

    this.logger.info("crawl.complete", {
      documents: documents.length,
      foldersVisited: visited.size,
      failedFolders: failedFolders.length,
    });

    return { documents, foldersVisited: visited.size, failedFolders };
  }

  private listPage(folderId: string, pageToken?: string) {
    return withRetry(() => this.options.lister.listChildren(folderId, pageToken), this.retry, {
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        this.logger.warn("crawl.list_retry", { folderId, attempt, delayMs, error: errorMessage(error) }),
    });
  }
}

function toDescriptor(entry: ListingEntry, folders: readonly string[]): DocumentDescriptor {
  return Object.freeze({
    id: entry.id,
    name: entry.name,
    parentIds: Object.freeze([...entry.parentIds]),
    mimeType: entry.mimeType,
    createdAt: entry.createdAt,
    modifiedAt: entry.modifiedAt,
    ...(entry.size !== undefined ? { size: entry.size } : {}),
    ...(entry.link !== undefined ? { link: entry.link } : {}),
    folders: Object.freeze([...folders]),
  });
}
