import { describe, it, expect, vi, beforeEach } from "vitest";

const mocks = vi.hoisted(() => {
  class Tensor {
    constructor(
      public type: string,
      public data: Float32Array | Int32Array,
      public dims: number[],
    ) {}
  }

  return { Tensor, pipeline: vi.fn() };
});

vi.mock("@huggingface/transformers", () => ({
  Tensor: mocks.Tensor,
  pipeline: mocks.pipeline,
}));

import { loadTransformersModel, tensorToRows } from "../src/embedding/transformers.js";

interface FakeExtractorOptions {
  config?: Record<string, unknown>;
  modelMaxLength?: number;
  dimension?: number;
}

function fakeExtractor(options: FakeExtractorOptions = {}) {
  const dimension = options.dimension ?? 3;
  const extractor = vi.fn(async (texts: string[]) => {
    const data = new Float32Array(texts.length * dimension);
    texts.forEach((text, i) => {
      for (let j = 0; j < dimension; j++) data[i * dimension + j] = text.length + j;
    });
    return new mocks.Tensor("float32", data, [texts.length, dimension]);
  });
  return Object.assign(extractor, {
    model: { config: options.config ?? { hidden_size: dimension } },
    tokenizer: { model_max_length: options.modelMaxLength ?? 512 },
  });
}

beforeEach(() => {
  mocks.pipeline.mockReset();
});

describe("tensorToRows", () => {
  it("splits a 2-D tensor into rows", () => {
    const tensor = new mocks.Tensor("float32", new Float32Array([1, 2, 3, 4, 5, 6]), [2, 3]);
    expect(tensorToRows(tensor, 2)).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it("rejects a tensor with the wrong row count", () => {
    const tensor = new mocks.Tensor("float32", new Float32Array(6), [3, 2]);
    expect(() => tensorToRows(tensor, 2)).toThrow("Expected output shape [2, d], got [3, 2]");
  });

  it("rejects non-float data", () => {
    const tensor = new mocks.Tensor("int32", new Int32Array(2), [1, 2]);
    expect(() => tensorToRows(tensor, 1)).toThrow("Model returned non-float32 embeddings");
  });

  it("rejects values that are not tensors", () => {
    expect(() => tensorToRows([[1, 2]], 1)).toThrow("Model returned no tensor");
  });
});

describe("loadTransformersModel", () => {
  it("creates a feature-extraction pipeline with the load options", async () => {
    mocks.pipeline.mockResolvedValue(fakeExtractor());

    await loadTransformersModel("Xenova/all-MiniLM-L6-v2", {
      quantized: false,
      cacheDir: "/tmp/models",
    });

    expect(mocks.pipeline).toHaveBeenCalledWith("feature-extraction", "Xenova/all-MiniLM-L6-v2", {
      dtype: "fp32",
      cache_dir: "/tmp/models",
    });
  });

  it("loads 8-bit weights unless told otherwise", async () => {
    mocks.pipeline.mockResolvedValue(fakeExtractor());

    await loadTransformersModel("test/model");

    expect(mocks.pipeline).toHaveBeenCalledWith("feature-extraction", "test/model", {
      dtype: "q8",
      cache_dir: undefined,
    });
  });

  it("reads metadata from the model config and tokenizer", async () => {
    mocks.pipeline.mockResolvedValue(fakeExtractor({ dimension: 3, modelMaxLength: 256 }));

    const model = await loadTransformersModel("test/model");

    expect(model.metadata).toEqual({
      dimension: 3,
      maxSeqLength: 256,
      device: "cpu",
    });
  });

  it("encodes the batch in one pooled, normalized call", async () => {
    const extractor = fakeExtractor({ dimension: 2 });
    mocks.pipeline.mockResolvedValue(extractor);

    const model = await loadTransformersModel("test/model");
    const rows = await model.encode(["a", "abc"]);

    expect(extractor).toHaveBeenCalledTimes(1);
    expect(extractor).toHaveBeenCalledWith(["a", "abc"], { pooling: "mean", normalize: true });
    expect(rows).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("probes the dimension when the config does not report it", async () => {
    const extractor = fakeExtractor({ dimension: 5, config: {} });
    mocks.pipeline.mockResolvedValue(extractor);

    const model = await loadTransformersModel("test/model");

    expect(model.metadata.dimension).toBe(5);
    expect(extractor).toHaveBeenCalledWith([""], { pooling: "mean", normalize: true });
  });

  it("falls back to max_position_embeddings when the tokenizer has no real limit", async () => {
    mocks.pipeline.mockResolvedValue(
      fakeExtractor({
        config: { hidden_size: 3, max_position_embeddings: 512 },
        modelMaxLength: 1e30,
      }),
    );

    const model = await loadTransformersModel("test/model");

    expect(model.metadata.maxSeqLength).toBe(512);
  });

  it("leaves the sequence length unset when nothing reports one", async () => {
    mocks.pipeline.mockResolvedValue(
      fakeExtractor({ config: { hidden_size: 3 }, modelMaxLength: 1e30 }),
    );

    const model = await loadTransformersModel("test/model");

    expect(model.metadata.maxSeqLength).toBeUndefined();
  });

  it("propagates pipeline creation errors", async () => {
    mocks.pipeline.mockRejectedValue(new Error("Could not locate file"));
    await expect(loadTransformersModel("missing/model")).rejects.toThrow("Could not locate file");
  });
});
