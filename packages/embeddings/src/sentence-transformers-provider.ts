import { z } from "zod";
import { BackendError } from "@indexflow/errors";
import type { EmbeddingResult } from "@indexflow/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "sentence-transformers/multi-qa-mpnet-base-dot-v1";
const DEFAULT_DIMENSIONS = 768;
const BATCH_SIZE = 32;

const embedResponseSchema = z.array(z.array(z.number()));

export interface SentenceTransformersProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
}

/**
 * Sentence-transformers model served by a text-embeddings-inference server.
 * Vectors are requested unnormalized: the dot-product models this serves are
 * trained for unnormalized scores.
 */
export class SentenceTransformersEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "sentence-transformers";
  readonly model: string;
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: SentenceTransformersProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      embeddings.push(...(await this.requestBatch(batch)));
    }

    return {
      embeddings,
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async requestBatch(inputs: string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ inputs, normalize: false, truncate: true }),
    });

    if (!response.ok) {
      throw new BackendError(
        `Embedding request failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError("Embedding server returned an unexpected payload", this.name, {
        cause: parsed.error,
      });
    }

    const wrongSize = parsed.data.find((vector) => vector.length !== this.dimensions);
    if (wrongSize) {
      throw new BackendError(
        `Model ${this.model} returned ${String(wrongSize.length)}-dimension vectors, expected ${String(this.dimensions)}`,
        this.name,
      );
    }

    return parsed.data;
  }
}
