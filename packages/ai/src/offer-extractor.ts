import { type ChatMessage, pdfPart, textPart } from "./messages";
import type { OpenAIChatClient } from "./openai-client";
import { OFFER_SYSTEM_PROMPT } from "./prompts";

export interface InferenceOptions {
  content?: Buffer;
  filename?: string;
  temperature: number;
  maxTokens: number;
}

export interface EnrichmentCollaborator {
  infer(prompt: string, options: InferenceOptions): Promise<string>;
}

/** Sends the offer prompt, with the PDF attached when its bytes are available. */
export class OfferExtractionClient implements EnrichmentCollaborator {
  constructor(private readonly client: OpenAIChatClient) {}

  async infer(prompt: string, options: InferenceOptions): Promise<string> {
    const messages: ChatMessage[] = [
      { role: "system", content: OFFER_SYSTEM_PROMPT },
      {
        role: "user",
        content: options.content
          ? [textPart(prompt), pdfPart(options.filename ?? "document.pdf", options.content)]
          : prompt,
      },
    ];

    const completion = await this.client.createChatCompletion({
      messages,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });

    return completion.content;
  }
}
