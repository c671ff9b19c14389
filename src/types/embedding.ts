import { z } from "zod";

export const MAX_BATCH_SIZE = 100;

export const embeddingRequestSchema = z.object({
  sentences: z.array(z.string()),
  model: z.string().nullish(),
});

export type EmbeddingRequest = z.infer<typeof embeddingRequestSchema>;

export interface EmbeddingResponse {
  embeddings: number[][];
}

export interface ModelInfo {
  model_name: string;
  max_seq_length: number | "unknown";
  embedding_dimension: number;
  device: string;
}

export interface ServiceInfo {
  service: string;
  version: string;
  model: string;
  status: "running";
}

export type EmbeddingErrorKind =
  | "not_ready"
  | "empty_batch"
  | "batch_too_large"
  | "inference_failed";

export interface EmbeddingError {
  kind: EmbeddingErrorKind;
  message: string;
}

export type EmbeddingResult =
  | { ok: true; embeddings: number[][] }
  | { ok: false; error: EmbeddingError };
