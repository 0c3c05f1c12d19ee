import type { ListingCollaborator, ListingEntry, ListingPage } from "@proof-analyzer/ingestion";
import { type Auth, type drive_v3, google } from "googleapis";

import type { ContentCollaborator } from "../types";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const PAGE_SIZE = 1000;
const FILE_FIELDS = "nextPageToken, files(id, name, mimeType, parents, createdTime, modifiedTime, size, webViewLink)";

export function toListingEntry(file: drive_v3.Schema$File): ListingEntry | undefined {
  if (!file.id) return undefined;

  const mimeType = file.mimeType ?? "";
  const size = file.size ? Number(file.size) : undefined;

  return {
    id: file.id,
    name: file.name ?? "",
    kind: mimeType === FOLDER_MIME_TYPE ? "container" : "document",
    mimeType,
    parentIds: file.parents ?? [],
    createdAt: file.createdTime ?? "",
    modifiedAt: file.modifiedTime ?? "",
    ...(size !== undefined && Number.isFinite(size) ? { size } : {}),
    ...(file.webViewLink ? { link: file.webViewLink } : {}),
  };
}

export class DriveClient implements ListingCollaborator, ContentCollaborator {
  private readonly drive: drive_v3.Drive;

  constructor(auth: Auth.GoogleAuth) {
    this.drive = google.drive({ version: "v3", auth });
  }

  async listChildren(containerId: string, pageToken?: string): Promise<ListingPage> {
    const response = await this.drive.files.list({
      q: `'${containerId}' in parents and trashed=false`,
      pageSize: PAGE_SIZE,
      fields: FILE_FIELDS,
      pageToken,
    });

    const entries: ListingEntry[] = [];
    for (const file of response.data.files ?? []) {
      const entry = toListingEntry(file);
      if (entry) entries.push(entry);
    }

    return { entries, nextPageToken: response.data.nextPageToken ?? undefined };
  }

  async fetchBytes(documentId: string): Promise<Buffer> {
    const response = await this.drive.files.get(
      { fileId: documentId, alt: "media" },
      { responseType: "arraybuffer" },
    );

    const data: unknown = response.data;
    if (!(data instanceof ArrayBuffer)) {
      throw new Error(`Unexpected download payload for file ${documentId}`);
    }
    return Buffer.from(data);
  }
}
