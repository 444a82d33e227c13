import type OpenAI from "openai";
import { UpstreamError, getErrorMessage } from "../utils/errors.js";
import type { OpenAICallPolicy } from "./openai_client.js";

export interface EmbeddingProvider {
  /** One vector per input, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly policy: OpenAICallPolicy,
    private readonly dimensions?: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.policy.run("OpenAI embeddings", () =>
        this.client.embeddings.create({ model: this.model, input: texts, encoding_format: "float" })
      );
    } catch (error) {
      throw new UpstreamError(`Embedding request failed: ${getErrorMessage(error)}`);
    }

    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((row) => row.embedding);

    if (vectors.length !== texts.length) {
      throw new UpstreamError(
        `Embedding count mismatch: got ${vectors.length}, expected ${texts.length}`
      );
    }
    if (this.dimensions !== undefined) {
      const wrong = vectors.find((vector) => vector.length !== this.dimensions);
      if (wrong) {
        throw new UpstreamError(
          `Embedding dimension mismatch: expected ${this.dimensions}, got ${wrong.length}`
        );
      }
    }

    return vectors;
  }
}

/** Embeds `texts` in consecutive batches of at most `batchSize`. */
export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: string[],
  batchSize: number
): Promise<number[][]> {
  const size = Math.max(1, Math.floor(batchSize));
  const vectors: number[][] = [];
  for (let i = 0; i < texts.length; i += size) {
    vectors.push(...(await provider.embed(texts.slice(i, i + size))));
  }
  return vectors;
}
