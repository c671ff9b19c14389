import { vi, type Mock } from "vitest";
import type { EmbeddingModel, ModelMetadata } from "../src/embedding/types.js";
import type { ServiceLogger } from "../src/services/embedding-service.js";

export const TEST_MODEL = "test/mini-embedder";

/** Deterministic vector: slot j holds the char code of text[j] (0 past the end). */
export function fakeVector(text: string, dimension: number): number[] {
  return Array.from({ length: dimension }, (_, j) => text.charCodeAt(j) || 0);
}

export function createFakeModel(
  overrides: Partial<ModelMetadata> = {},
): EmbeddingModel & { encode: Mock<(sentences: string[]) => Promise<number[][]>> } {
  const metadata: ModelMetadata = {
    dimension: 8,
    maxSeqLength: 256,
    device: "cpu",
    ...overrides,
  };
  return {
    metadata,
    encode: vi.fn(async (sentences: string[]) =>
      sentences.map((s) => fakeVector(s, metadata.dimension)),
    ),
  };
}

export function createLogger(): ServiceLogger & {
  info: Mock;
  warn: Mock;
  error: Mock;
} {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
