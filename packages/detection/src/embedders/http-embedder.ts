/**
 * Image embedder backed by a remote model service.
 *
 * POSTs `{ image: <base64> }` and expects `{ embedding: number[] }` back.
 */

import axios from "axios";
import type { ImageEmbedder } from "../provider.js";

export interface HttpImageEmbedderOptions {
  /** Full URL of the embedding endpoint */
  url: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export class HttpImageEmbedder implements ImageEmbedder {
  readonly name = "HTTP Image Embedder";

  private readonly url: string;
  private readonly timeout: number;

  constructor(options: HttpImageEmbedderOptions) {
    this.url = options.url;
    this.timeout = options.timeout ?? 30000;
  }

  async embed(image: Buffer): Promise<number[]> {
    const res = await axios.post<unknown>(
      this.url,
      { image: image.toString("base64") },
      { timeout: this.timeout, headers: { "Content-Type": "application/json" } },
    );
    const embedding: unknown =
      res.data !== null && typeof res.data === "object" ? Reflect.get(res.data, "embedding") : undefined;
    if (!Array.isArray(embedding) || !embedding.every((v): v is number => typeof v === "number")) {
      throw new Error(`Embedder at ${this.url} returned no embedding`);
    }
    return embedding;
  }
}
