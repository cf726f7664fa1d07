/**
 * CLIP-as-service HTTP client
 *
 * Posts `{ data: [{ text } | { uri }], execEndpoint: "/" }` to `<server>/post`
 * and reads `data[i].embedding`. Images are sent inline as base64 data URIs.
 * No retries: callers decide what to do with a failed batch.
 */

import fs from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import { z } from "zod";
import { EmbeddingError, ErrorCode, FileSystemError, isErrnoException } from "../../utils/errors.js";
import { scopedLogger } from "../../utils/logger.js";
import {
  DEFAULT_CLIP_ENCODER_CONFIG,
  DIMENSION_PROBE,
  type ClipHttpEncoderConfig,
  type EmbeddingEncoder,
} from "./types.js";

const logger = scopedLogger("clip");

const ClipResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
    })
  ),
});

type ClipInput = { text: string } | { uri: string };

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
};

export async function imageToDataUri(imagePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(imagePath);
  } catch (error) {
    throw isErrnoException(error) ? FileSystemError.fromNodeError(error, imagePath, "read") : error;
  }
  const mime = IMAGE_MIME_TYPES[path.extname(imagePath).toLowerCase()] ?? "application/octet-stream";
  return `data:${mime};base64,${buffer.toString("base64")}`;
}

export class ClipHttpEncoder implements EmbeddingEncoder {
  readonly name = "clip-http";
  private readonly config: ClipHttpEncoderConfig;
  private dimension: number | null = null;

  constructor(config: Partial<ClipHttpEncoderConfig> & Pick<ClipHttpEncoderConfig, "serverUrl">) {
    this.config = { ...DEFAULT_CLIP_ENCODER_CONFIG, ...config };
  }

  get endpoint(): string {
    return `${this.config.serverUrl.replace(/\/+$/, "")}/post`;
  }

  async encodeTexts(texts: string[]): Promise<number[][]> {
    return this.encodeInputs(texts.map((text) => ({ text })));
  }

  async encodeImages(imagePaths: string[]): Promise<number[][]> {
    const limit = pLimit(this.config.readConcurrency);
    const uris = await Promise.all(imagePaths.map((imagePath) => limit(() => imageToDataUri(imagePath))));
    return this.encodeInputs(uris.map((uri) => ({ uri })));
  }

  async getDimension(): Promise<number> {
    if (this.dimension === null) {
      const [probe] = await this.postBatch([{ text: DIMENSION_PROBE }]);
      if (!probe || probe.length === 0) {
        throw new EmbeddingError(ErrorCode.EMBEDDING_INVALID_RESPONSE, "Probe returned an empty embedding");
      }
      this.dimension = probe.length;
      logger.debug(`Embedding dimension discovered: ${this.dimension}`);
    }
    return this.dimension;
  }

  private async encodeInputs(inputs: ClipInput[]): Promise<number[][]> {
    if (inputs.length === 0) return [];

    const dimension = await this.getDimension();
    const vectors: number[][] = [];

    for (let i = 0; i < inputs.length; i += this.config.batchSize) {
      const batch = inputs.slice(i, i + this.config.batchSize);
      const embeddings = await this.postBatch(batch);
      for (const embedding of embeddings) {
        if (embedding.length !== dimension) {
          throw new EmbeddingError(
            ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
            `Expected vectors of width ${dimension}, got ${embedding.length}`
          );
        }
        vectors.push(embedding);
      }
    }

    return vectors;
  }

  private async postBatch(batch: ClipInput[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ data: batch, execEndpoint: "/" }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw EmbeddingError.fromError(error);
    }

    if (!response.ok) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_SERVER_ERROR,
        `Encoder responded with HTTP ${response.status}`,
        { statusCode: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingError(ErrorCode.EMBEDDING_INVALID_RESPONSE, "Encoder response is not JSON", {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = ClipResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError(ErrorCode.EMBEDDING_INVALID_RESPONSE, `Malformed encoder response: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    if (parsed.data.data.length !== batch.length) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_INVALID_RESPONSE,
        `Sent ${batch.length} inputs but received ${parsed.data.data.length} embeddings`
      );
    }

    return parsed.data.data.map((item) => item.embedding);
  }
}
