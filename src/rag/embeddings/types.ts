/**
 * Embedding encoder contract
 *
 * Texts and images are embedded into one shared vector space. Output order
 * matches input order, one vector per input.
 */

export interface EmbeddingEncoder {
  /** Encoder name for logs and stats */
  readonly name: string;

  encodeTexts(texts: string[]): Promise<number[][]>;

  /** Image file paths in, vectors out */
  encodeImages(imagePaths: string[]): Promise<number[][]>;

  /**
   * Vector width, discovered by encoding a probe input on first call and
   * constant afterwards.
   */
  getDimension(): Promise<number>;
}

export interface ClipHttpEncoderConfig {
  /** Base URL of the CLIP-as-service HTTP gateway, e.g. http://localhost:51000 */
  serverUrl: string;
  /** Inputs per request. Default: 32 */
  batchSize: number;
  /** Per-request timeout (ms). Default: 30000 */
  timeoutMs: number;
  /** Parallel image file reads. Default: 8 */
  readConcurrency: number;
}

export const DEFAULT_CLIP_ENCODER_CONFIG: Omit<ClipHttpEncoderConfig, "serverUrl"> = {
  batchSize: 32,
  timeoutMs: 30000,
  readConcurrency: 8,
};

/** Text encoded once to discover the embedding width */
export const DIMENSION_PROBE = "test";
