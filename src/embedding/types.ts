export interface ModelMetadata {
  dimension: number;
  /** Longest input, in tokens, the model accepts. Absent when the model does not say. */
  maxSeqLength?: number;
  device?: string;
}

export interface EmbeddingModel {
  readonly metadata: ModelMetadata;
  /** Encodes the whole batch in one call; row i belongs to sentences[i]. */
  encode(sentences: string[]): Promise<number[][]>;
}

export type ModelLoader = (name: string) => Promise<EmbeddingModel>;
