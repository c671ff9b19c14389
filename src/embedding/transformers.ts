import { pipeline, Tensor } from "@huggingface/transformers";
import type { EmbeddingModel, ModelMetadata } from "./types.js";

export interface TransformersLoadOptions {
  /** Load the 8-bit quantized ONNX weights instead of full precision. Defaults to true. */
  quantized?: boolean;
  cacheDir?: string;
}

// Tokenizers without a configured limit report a huge sentinel instead.
const MAX_SANE_SEQ_LENGTH = 1_000_000;

const ENCODE_OPTIONS = { pooling: "mean", normalize: true } as const;

function field(source: unknown, key: string): unknown {
  if (typeof source !== "object" || source === null) return undefined;
  return Reflect.get(source, key);
}

function positiveInt(value: unknown, max = Number.MAX_SAFE_INTEGER): number | undefined {
  if (typeof value !== "number" || !Number.isInteger(value)) return undefined;
  return value > 0 && value <= max ? value : undefined;
}

/**
 * Splits a `[rows, dimension]` feature tensor into plain number rows.
 */
export function tensorToRows(output: unknown, expectedRows: number): number[][] {
  if (!(output instanceof Tensor)) {
    throw new Error("Model returned no tensor");
  }
  const { dims, data } = output;
  if (dims.length !== 2 || dims[0] !== expectedRows) {
    throw new Error(
      `Expected output shape [${expectedRows}, d], got [${dims.join(", ")}]`,
    );
  }
  if (!(data instanceof Float32Array)) {
    throw new Error("Model returned non-float32 embeddings");
  }

  const width = dims[1];
  const rows: number[][] = [];
  for (let i = 0; i < expectedRows; i++) {
    rows.push(Array.from(data.subarray(i * width, (i + 1) * width)));
  }
  return rows;
}

export async function loadTransformersModel(
  name: string,
  options: TransformersLoadOptions = {},
): Promise<EmbeddingModel> {
  const extractor = await pipeline("feature-extraction", name, {
    dtype: (options.quantized ?? true) ? "q8" : "fp32",
    cache_dir: options.cacheDir,
  });

  const encode = async (sentences: string[]): Promise<number[][]> => {
    const output: unknown = await extractor(sentences, ENCODE_OPTIONS);
    return tensorToRows(output, sentences.length);
  };

  const config = field(extractor.model, "config");
  let dimension = positiveInt(field(config, "hidden_size"));
  if (dimension === undefined) {
    const [probe] = await encode([""]);
    dimension = probe.length;
  }

  const metadata: ModelMetadata = {
    dimension,
    maxSeqLength:
      positiveInt(field(extractor.tokenizer, "model_max_length"), MAX_SANE_SEQ_LENGTH) ??
      positiveInt(field(config, "max_position_embeddings"), MAX_SANE_SEQ_LENGTH),
    device: "cpu",
  };

  return { metadata, encode };
}
