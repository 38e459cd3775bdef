/**
 * Text → fixed-dimension vector.
 *
 * Implementations are deterministic for a fixed model: the same text always
 * encodes to the same vector.
 */
export interface EmbeddingProvider {
  /** Registry id of the underlying model. */
  readonly modelId: string;
  /** Length of every vector this provider returns. */
  readonly dimensions: number;

  /**
   * Encode one text. `isQuery` marks search queries for providers that embed
   * queries and documents differently.
   */
  encode(text: string, isQuery?: boolean): Promise<number[]>;

  /** Encode many texts, preserving input order. */
  encodeBatch(texts: string[], isQuery?: boolean): Promise<number[][]>;
}
