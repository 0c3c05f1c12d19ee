export type ChatRole = "system" | "user" | "assistant";

export interface TextContentPart {
  type: "text";
  text: string;
}

/** Inline document attachment, sent as a data URL. */
export interface FileContentPart {
  type: "file";
  file: {
    filename: string;
    file_data: string;
  };
}

export type ContentPart = TextContentPart | FileContentPart;

export interface ChatMessage {
  role: ChatRole;
  content: string | ContentPart[];
}

export const textPart = (text: string): TextContentPart => ({ type: "text", text });

export const pdfPart = (filename: string, content: Buffer): FileContentPart => ({
  type: "file",
  file: {
    filename,
    file_data: `data:application/pdf;base64,${content.toString("base64")}`,
  },
});
