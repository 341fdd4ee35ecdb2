import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerationRequest } from "../goalPolicy";
import { PERSONA_SYSTEM_PROMPT, type ReplyGenerator } from "./chain";

/** The slice of the Gemini model API this generator uses. */
export type GeminiModel = {
  generateContent(prompt: string, options: { signal?: AbortSignal }): Promise<{ response: { text(): string } }>;
};

export type GeminiGeneratorOptions = {
  apiKey: string;
  model: string;
  /** Overrides model construction; defaults to the SDK client. */
  models?: (apiKey: string, model: string) => GeminiModel;
};

export class GeminiReplyGenerator implements ReplyGenerator {
  readonly name = "gemini";
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly options: GeminiGeneratorOptions) {}

  private getModel(): GeminiModel {
    if (!this.options.apiKey) {
      throw new Error("GEMINI_API_KEY not set");
    }
    if (this.options.models) {
      return this.options.models(this.options.apiKey, this.options.model);
    }
    if (!this.client) {
      this.client = new GoogleGenerativeAI(this.options.apiKey);
    }
    return this.client.getGenerativeModel({ model: this.options.model });
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const model = this.getModel();
    const result = await model.generateContent([PERSONA_SYSTEM_PROMPT, "", request.prompt].join("\n"), { signal });
    return result.response.text().trim();
  }
}
