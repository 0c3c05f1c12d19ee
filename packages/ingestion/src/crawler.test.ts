import { describe, expect, it, vi } from "vitest";

import { isAnyDocument, TreeCrawler } from "./crawler";
import { DEFAULT_RETRY_POLICY } from "./retry";
import type { ListingCollaborator, ListingEntry, ListingPage, Logger } from "./types";

const folder = (id: string, name = id): ListingEntry => ({
  id,
  name,
  kind: "container",
  mimeType: "application/vnd.google-apps.folder",
  parentIds: [],
  createdAt: "2024-01-01T00:00:00.000Z",
  modifiedAt: "2024-01-01T00:00:00.000Z",
});

const file = (id: string, name: string, mimeType = "application/pdf"): ListingEntry => ({
  id,
  name,
  kind: "document",
  mimeType,
  parentIds: [],
  createdAt: "2024-01-02T00:00:00.000Z",
  modifiedAt: "2024-01-03T00:00:00.000Z",
});

/** Pages keyed by "<folderId>" for the first page and "<folderId>:<token>" after that. */
class FakeLister implements ListingCollaborator {
  readonly calls: Array<[string, string | undefined]> = [];

  constructor(
    private readonly pages: Record<string, ListingPage>,
    private readonly failing: Set<string> = new Set(),
  ) {}

  async listChildren(containerId: string, pageToken?: string): Promise<ListingPage> {
    this.calls.push([containerId, pageToken]);
    const key = pageToken ? `${containerId}:${pageToken}` : containerId;
    if (this.failing.has(key)) {
      throw new Error(`listing ${key} failed`);
    }
    return this.pages[key] ?? { entries: [] };
  }
}

const fakeLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const noSleep = async () => undefined;

describe("TreeCrawler", () => {
  it("walks folders breadth first and keeps only PDFs by default", async () => {
    const lister = new FakeLister({
      root: { entries: [folder("a", "2024"), file("f1", "root.pdf"), folder("b", "Archive")] },
      a: { entries: [file("f2", "proof_v1.pdf"), file("f3", "notes.txt", "text/plain")] },
      b: { entries: [file("f4", "old.pdf")] },
    });

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(result.documents.map((doc) => doc.id)).toEqual(["f1", "f2", "f4"]);
    expect(result.documents.map((doc) => doc.folders)).toEqual([[], ["2024"], ["Archive"]]);
    expect(result.foldersVisited).toBe(3);
    expect(lister.calls.map(([id]) => id)).toEqual(["root", "a", "b"]);
  });

  it("lists a folder reachable from several parents only once", async () => {
    const lister = new FakeLister({
      root: { entries: [folder("a"), folder("b")] },
      a: { entries: [folder("shared"), folder("root")] },
      b: { entries: [folder("shared")] },
      shared: { entries: [file("f1", "proof.pdf")] },
    });

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(lister.calls.map(([id]) => id)).toEqual(["root", "a", "b", "shared"]);
    expect(result.foldersVisited).toBe(4);
    expect(result.documents.map((doc) => doc.id)).toEqual(["f1"]);
    expect(result.documents[0]?.folders).toEqual(["a", "shared"]);
  });

  it("keeps slashes inside folder and file names intact", async () => {
    const lister = new FakeLister({
      root: { entries: [folder("a", "Q1/Q2 Mailers")] },
      a: { entries: [file("f1", "proof 1/2 page.pdf")] },
    });

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(result.documents[0]?.name).toBe("proof 1/2 page.pdf");
    expect(result.documents[0]?.folders).toEqual(["Q1/Q2 Mailers"]);
  });

  it("does not deduplicate the same file listed in two folders", async () => {
    const lister = new FakeLister({
      root: { entries: [folder("a"), folder("b")] },
      a: { entries: [file("f1", "proof.pdf")] },
      b: { entries: [file("f1", "proof.pdf")] },
    });

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(result.documents.map((doc) => doc.id)).toEqual(["f1", "f1"]);
  });

  it("follows continuation tokens until a page has none", async () => {
    const lister = new FakeLister({
      root: { entries: [file("f1", "one.pdf")], nextPageToken: "p2" },
      "root:p2": { entries: [file("f2", "two.pdf")], nextPageToken: "p3" },
      "root:p3": { entries: [file("f3", "three.pdf")] },
    });

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(result.documents.map((doc) => doc.id)).toEqual(["f1", "f2", "f3"]);
    expect(lister.calls).toEqual([
      ["root", undefined],
      ["root", "p2"],
      ["root", "p3"],
    ]);
  });

  it("abandons a failing folder after retries and keeps crawling its siblings", async () => {
    const logger = fakeLogger();
    const lister = new FakeLister(
      {
        root: { entries: [folder("a"), folder("bad"), folder("c")] },
        a: { entries: [file("f1", "first.pdf")] },
        bad: { entries: [file("f2", "partial.pdf")], nextPageToken: "next" },
        c: { entries: [file("f3", "last.pdf")] },
      },
      new Set(["bad:next"]),
    );

    const result = await new TreeCrawler({ lister, logger, sleep: noSleep }).crawl("root");

    expect(result.documents.map((doc) => doc.id)).toEqual(["f1", "f2", "f3"]);
    expect(result.failedFolders).toEqual(["bad"]);
    expect(lister.calls.filter(([id, token]) => id === "bad" && token === "next")).toHaveLength(
      DEFAULT_RETRY_POLICY.maxAttempts,
    );
    expect(logger.error).toHaveBeenCalledWith("crawl.folder_failed", {
      folderId: "bad",
      error: "listing bad:next failed",
    });
  });

  it("returns an empty result when the root itself cannot be listed", async () => {
    const lister = new FakeLister({}, new Set(["root"]));

    const result = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(result.documents).toEqual([]);
    expect(result.failedFolders).toEqual(["root"]);
  });

  it("accepts a custom leaf predicate", async () => {
    const lister = new FakeLister({
      root: { entries: [file("f1", "a.pdf"), file("f2", "b.txt", "text/plain"), folder("x")] },
    });

    const result = await new TreeCrawler({ lister, isLeaf: isAnyDocument, sleep: noSleep }).crawl("root");

    expect(result.documents.map((doc) => doc.id)).toEqual(["f1", "f2"]);
  });

  it("produces frozen descriptors", async () => {
    const lister = new FakeLister({ root: { entries: [file("f1", "a.pdf")] } });

    const { documents } = await new TreeCrawler({ lister, sleep: noSleep }).crawl("root");

    expect(Object.isFrozen(documents[0])).toBe(true);
  });
});
