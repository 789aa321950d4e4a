import { z } from "zod";
import { config, requireEnv, type EmbeddingProviderType } from "../core/config.js";

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number())
    })
  )
});

export interface OpenAIEmbeddingProviderOptions {
  url: string;
  model: string;
  apiKey: string;
}

/**
 * Client for any OpenAI-compatible `/v1/embeddings` endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private options: OpenAIEmbeddingProviderOptions;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.options = options;
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], options);
    return embedding ?? [];
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(this.options.url, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: this.options.model,
        input: texts
      }),
      signal: options?.signal
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Embeddings request failed: ${response.status} ${errorText}`);
    }

    const payload = EmbeddingResponseSchema.parse(await response.json());
    if (payload.data.length !== texts.length) {
      throw new Error(`Embeddings request returned ${payload.data.length} vectors for ${texts.length} inputs`);
    }
    // The API may return rows out of order; `index` is authoritative when present.
    return [...payload.data]
      .map((item, position) => ({ order: item.index ?? position, embedding: item.embedding }))
      .sort((a, b) => a.order - b.order)
      .map((item) => item.embedding);
  }
}

let globalEmbeddingProvider: EmbeddingProvider | null | undefined = undefined;

export function createEmbeddingProvider(type: EmbeddingProviderType): EmbeddingProvider | null {
  if (type === "none") return null;
  if (config.embeddingUrl.startsWith("https://api.openai.com")) {
    requireEnv("OPENAI_API_KEY", config.openaiApiKey);
  }
  return new OpenAIEmbeddingProvider({
    url: config.embeddingUrl,
    model: config.embeddingModel,
    apiKey: config.openaiApiKey
  });
}

export function getEmbeddingProvider(): EmbeddingProvider | null {
  if (globalEmbeddingProvider !== undefined) return globalEmbeddingProvider;
  globalEmbeddingProvider = createEmbeddingProvider(config.embeddingProvider);
  return globalEmbeddingProvider;
}

export function resetEmbeddingProvider(): void {
  globalEmbeddingProvider = undefined;
}
