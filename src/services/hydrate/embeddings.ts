import OpenAI from "openai";

import { EmbeddingInputTooLargeError } from "../../errors.js";

/**
 * Text to vector. Implementations throw EmbeddingInputTooLargeError when
 * the input exceeds the model context; any other error is final.
 */
export interface Embedder {
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

const CONTEXT_LENGTH_PATTERN = /maximum context length|too many tokens/i;

/**
 * Whether an API error reports an input beyond the model context.
 */
export function isContextLengthError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    return (
      error.code === "context_length_exceeded" ||
      CONTEXT_LENGTH_PATTERN.test(error.message)
    );
  }
  return error instanceof Error && CONTEXT_LENGTH_PATTERN.test(error.message);
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    readonly model: string,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey, maxRetries: 2 });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: text },
        { signal }
      );
      const vector = response.data[0]?.embedding;
      if (vector === undefined) {
        throw new Error("Embedding response contained no vector");
      }
      return vector;
    } catch (error) {
      if (isContextLengthError(error)) {
        throw new EmbeddingInputTooLargeError(text.length, { cause: error });
      }
      throw error;
    }
  }
}
