import type { FastifyBaseLogger } from "fastify";
import type { EmbeddingModel, ModelLoader } from "../embedding/types.js";
import {
  MAX_BATCH_SIZE,
  type EmbeddingErrorKind,
  type EmbeddingRequest,
  type EmbeddingResult,
  type ModelInfo,
} from "../types/embedding.js";
import { errorMessage } from "../utils/errors.js";

export type ServiceLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;

export interface EmbeddingServiceOptions {
  modelName: string;
  loader: ModelLoader;
}

function failure(kind: EmbeddingErrorKind, message: string): EmbeddingResult {
  return { ok: false, error: { kind, message } };
}

function checkShape(rows: number[][], expectedRows: number, dimension: number): void {
  if (rows.length !== expectedRows) {
    throw new Error(`Model returned ${rows.length} embeddings for ${expectedRows} sentences`);
  }
  const bad = rows.findIndex((row) => row.length !== dimension);
  if (bad !== -1) {
    throw new Error(
      `Embedding ${bad} has length ${rows[bad].length}, expected ${dimension}`,
    );
  }
}

/**
 * Owns the single model handle for the lifetime of the process.
 *
 * The handle is written once by `load()` before the server starts listening
 * and only read afterwards.
 */
export class EmbeddingService {
  readonly modelName: string;
  private readonly loader: ModelLoader;
  private model: EmbeddingModel | null = null;
  private loading = false;

  constructor(options: EmbeddingServiceOptions) {
    this.modelName = options.modelName;
    this.loader = options.loader;
  }

  async load(log: ServiceLogger): Promise<void> {
    if (this.loading) {
      throw new Error(`Model ${this.modelName} is still loading`);
    }
    if (this.model) {
      throw new Error(`Model ${this.modelName} is already loaded`);
    }

    this.loading = true;
    log.info(`Loading model: ${this.modelName}`);
    try {
      this.model = await this.loader(this.modelName);
    } catch (err) {
      log.error(
        { err, model: this.modelName },
        `Failed to load model ${this.modelName}: ${errorMessage(err)}`,
      );
      throw err;
    } finally {
      this.loading = false;
    }
    log.info(`Model loaded successfully: ${this.modelName}`);
  }

  isReady(): boolean {
    return this.model !== null;
  }

  info(): ModelInfo | null {
    if (!this.model) return null;
    const { dimension, maxSeqLength, device } = this.model.metadata;
    return {
      model_name: this.modelName,
      max_seq_length: maxSeqLength ?? "unknown",
      embedding_dimension: dimension,
      device: device ?? "unknown",
    };
  }

  async embed(request: EmbeddingRequest, log: ServiceLogger): Promise<EmbeddingResult> {
    const { sentences } = request;
    const model = this.model;

    if (!model) {
      return failure("not_ready", "Model not loaded");
    }
    if (sentences.length === 0) {
      return failure("empty_batch", "No sentences provided");
    }
    if (sentences.length > MAX_BATCH_SIZE) {
      return failure("batch_too_large", `Too many sentences (max ${MAX_BATCH_SIZE})`);
    }

    // Only one model is ever loaded; the override is accepted for compatibility.
    if (request.model && request.model !== this.modelName) {
      log.warn(
        `Requested model ${request.model} ignored, serving with ${this.modelName}`,
      );
    }

    const { dimension } = model.metadata;
    log.info(`Generating embeddings for ${sentences.length} sentences`);

    let embeddings: number[][];
    try {
      embeddings = await model.encode(sentences);
      checkShape(embeddings, sentences.length, dimension);
    } catch (err) {
      const message = errorMessage(err);
      log.error({ err }, `Error generating embeddings: ${message}`);
      return failure("inference_failed", `Failed to generate embeddings: ${message}`);
    }

    log.info(`Generated embeddings with shape: [${embeddings.length}, ${dimension}]`);
    return { ok: true, embeddings };
  }

  async close(log: ServiceLogger): Promise<void> {
    log.info("Shutting down embedding service");
  }
}
