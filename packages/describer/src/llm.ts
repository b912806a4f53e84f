/**
 * Description generator abstraction with Vertex AI (Gemini) and OpenAI implementations
 */

import OpenAI from "openai";
import { createVertex, type GoogleVertexProvider } from "@ai-sdk/google-vertex";
import { generateText, type ImagePart, type TextPart } from "ai";
import { buildRequestText } from "./prompts";

export type GeneratorConfig = {
  provider: "vertex" | "openai";
  model: string;
  maxOutputTokens: number;
  temperature: number;
  maxHtmlChars: number;
  project?: string;
  region?: string;
  credentialPath?: string;
  apiKey?: string;
};

export type DescriptionRequest = {
  /** PNG screenshots, one per page, in page order */
  images: Uint8Array[];
  /** Cleaned HTML, same order and length as images */
  htmlSnippets: string[];
  promptText: string;
  existingDescription: string;
};

export type DescriptionResponse = {
  descriptionText: string;
};

export interface DescriptionGenerator {
  generate(request: DescriptionRequest, signal?: AbortSignal): Promise<DescriptionResponse>;
}

const MAX_ATTEMPTS = 2;

/**
 * Vertex AI implementation using Gemini through the AI SDK
 */
export class VertexGeminiDescriber implements DescriptionGenerator {
  private vertex: GoogleVertexProvider;
  private config: GeneratorConfig;

  constructor(config: GeneratorConfig) {
    if (!config.project || !config.region) {
      throw new Error("Vertex AI provider requires a project and a region");
    }

    this.config = config;
    this.vertex = createVertex({
      project: config.project,
      location: config.region,
      googleAuthOptions: config.credentialPath ? { keyFilename: config.credentialPath } : undefined,
    });
  }

  async generate(request: DescriptionRequest, signal?: AbortSignal): Promise<DescriptionResponse> {
    assertAligned(request);
    const text = buildRequestText(
      request.promptText,
      request.existingDescription,
      request.htmlSnippets,
      this.config.maxHtmlChars
    );

    const content: Array<TextPart | ImagePart> = [
      { type: "text", text },
      ...request.images.map((image): ImagePart => ({ type: "image", image, mediaType: "image/png" })),
    ];

    const descriptionText = await withRetry(async () => {
      const result = await generateText({
        model: this.vertex(this.config.model),
        messages: [{ role: "user", content }],
        maxOutputTokens: this.config.maxOutputTokens,
        temperature: this.config.temperature,
        abortSignal: signal,
      });
      return result.text;
    }, signal);

    return { descriptionText };
  }
}

/**
 * OpenAI implementation using chat completions with image parts
 */
export class OpenAIDescriber implements DescriptionGenerator {
  private client: OpenAI;
  private config: GeneratorConfig;

  constructor(config: GeneratorConfig) {
    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY,
    });
  }

  async generate(request: DescriptionRequest, signal?: AbortSignal): Promise<DescriptionResponse> {
    assertAligned(request);
    const text = buildRequestText(
      request.promptText,
      request.existingDescription,
      request.htmlSnippets,
      this.config.maxHtmlChars
    );

    const content: OpenAI.Chat.Completions.ChatCompletionContentPart[] = [
      { type: "text", text },
      ...request.images.map((image): OpenAI.Chat.Completions.ChatCompletionContentPart => ({
        type: "image_url",
        image_url: { url: `data:image/png;base64,${Buffer.from(image).toString("base64")}` },
      })),
    ];

    const descriptionText = await withRetry(async () => {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: "user", content }],
          max_tokens: this.config.maxOutputTokens,
          temperature: this.config.temperature,
        },
        { signal }
      );
      return response.choices[0]?.message?.content ?? "";
    }, signal);

    return { descriptionText };
  }
}

function assertAligned(request: DescriptionRequest): void {
  if (request.images.length === 0) {
    throw new Error("At least one screenshot is required");
  }
  if (request.images.length !== request.htmlSnippets.length) {
    throw new Error(
      `Expected one HTML snippet per screenshot (got ${request.htmlSnippets.length} for ${request.images.length})`
    );
  }
}

async function withRetry(call: () => Promise<string>, signal?: AbortSignal): Promise<string> {
  let lastError: unknown;

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    try {
      const text = await call();
      if (!text.trim()) {
        throw new Error("Empty response from model");
      }
      return text;
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      lastError = error;
      if (attempt < MAX_ATTEMPTS - 1) {
        console.warn(`  Generation attempt ${attempt + 1} failed, retrying...`, errorMessage(error));
      }
    }
  }

  throw new Error(`Failed to get a description after ${MAX_ATTEMPTS} attempts: ${errorMessage(lastError)}`, {
    cause: lastError,
  });
}

// Mirrors errorMessage in @report-describer/core, which depends on this package.
function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Factory function to create the configured description generator
 */
export function createDescriptionGenerator(config: GeneratorConfig): DescriptionGenerator {
  switch (config.provider) {
    case "vertex":
      return new VertexGeminiDescriber(config);
    case "openai":
      return new OpenAIDescriber(config);
    default:
      throw new Error(`Unknown model provider: ${String(config.provider)}`);
  }
}
