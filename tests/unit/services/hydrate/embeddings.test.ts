import OpenAI from "openai";
import { describe, it, expect, vi } from "vitest";

import { EmbeddingInputTooLargeError } from "../../../../src/errors.js";
import {
  OpenAIEmbedder,
  isContextLengthError,
} from "../../../../src/services/hydrate/embeddings.js";

function contextLengthError(): InstanceType<typeof OpenAI.BadRequestError> {
  return new OpenAI.BadRequestError(
    400,
    {
      message: "This model's maximum context length is 8192 tokens",
      code: "context_length_exceeded",
    },
    "This model's maximum context length is 8192 tokens",
    undefined
  );
}

describe("isContextLengthError", () => {
  it("should recognise the API error code", () => {
    expect(isContextLengthError(contextLengthError())).toBe(true);
  });

  it("should recognise the message of a plain error", () => {
    expect(isContextLengthError(new Error("Too many tokens in input"))).toBe(
      true
    );
  });

  it("should reject unrelated failures", () => {
    expect(isContextLengthError(new Error("rate limited"))).toBe(false);
    expect(isContextLengthError("maximum context length")).toBe(false);
  });
});

describe("OpenAIEmbedder", () => {
  function createEmbedder() {
    const client = new OpenAI({ apiKey: "test-secret" });
    const create = vi.spyOn(client.embeddings, "create");
    return {
      embedder: new OpenAIEmbedder("test-secret", "test-embedding", client),
      create,
    };
  }

  it("should return the first vector of the response", async () => {
    const { embedder, create } = createEmbedder();
    create.mockResolvedValue({
      object: "list",
      model: "test-embedding",
      data: [{ object: "embedding", index: 0, embedding: [0.5, 0.25] }],
      usage: { prompt_tokens: 3, total_tokens: 3 },
    });

    await expect(embedder.embed("bill text")).resolves.toEqual([0.5, 0.25]);
    expect(create).toHaveBeenCalledWith(
      { model: "test-embedding", input: "bill text" },
      { signal: undefined }
    );
  });

  it("should report an oversized input", async () => {
    const { embedder, create } = createEmbedder();
    create.mockRejectedValue(contextLengthError());

    const result = embedder.embed("x".repeat(40));

    await expect(result).rejects.toBeInstanceOf(EmbeddingInputTooLargeError);
    await expect(result).rejects.toThrow(
      "Embedding input of 40 characters exceeds the model context"
    );
  });

  it("should pass other failures through", async () => {
    const { embedder, create } = createEmbedder();
    create.mockRejectedValue(new Error("rate limited"));

    await expect(embedder.embed("bill text")).rejects.toThrow("rate limited");
  });

  it("should fail on a response without vectors", async () => {
    const { embedder, create } = createEmbedder();
    create.mockResolvedValue({
      object: "list",
      model: "test-embedding",
      data: [],
      usage: { prompt_tokens: 0, total_tokens: 0 },
    });

    await expect(embedder.embed("bill text")).rejects.toThrow(
      "Embedding response contained no vector"
    );
  });
});
