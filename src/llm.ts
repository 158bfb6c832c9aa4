import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { GeneratorNotConfiguredError } from "./errors";
import type { TextGenerator } from "./types";

/**
 * Gemini-backed answer generation. The client is created lazily so the service
 * can start (and serve uploads/listing) without an API key.
 */
export class GeminiGenerator implements TextGenerator {
  private readonly apiKey?: string;
  private readonly modelName: string;
  private model: GenerativeModel | null = null;

  public constructor(apiKey: string | undefined, modelName = "gemini-1.5-flash") {
    this.apiKey = apiKey?.trim() || undefined;
    this.modelName = modelName;
  }

  public getModelName(): string {
    return this.modelName;
  }

  public isConfigured(): boolean {
    return !!this.apiKey;
  }

  /**
   * @throws {GeneratorNotConfiguredError} when no API key was supplied.
   */
  public async generate(prompt: string): Promise<string> {
    if (!this.model) {
      if (!this.apiKey) throw new GeneratorNotConfiguredError();
      this.model = new GoogleGenerativeAI(this.apiKey).getGenerativeModel({
        model: this.modelName,
      });
    }
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}
