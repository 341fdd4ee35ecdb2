import OpenAI from "openai";
import type { GenerationRequest } from "../goalPolicy";
import { PERSONA_SYSTEM_PROMPT, type ReplyGenerator } from "./chain";

export type OpenAIGeneratorOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export class OpenAIReplyGenerator implements ReplyGenerator {
  readonly name = "openai";
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIGeneratorOptions) {}

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY not set");
    }
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey, timeout: this.options.timeoutMs, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const client = this.getClient();
    const response = await client.responses.create(
      {
        model: this.options.model,
        input: [
          { role: "system", content: PERSONA_SYSTEM_PROMPT },
          { role: "user", content: request.prompt }
        ],
        max_output_tokens: 80,
        temperature: 0.8
      },
      { signal }
    );
    return response.output_text?.trim() || "";
  }
}
