import { EmbeddingServiceError, InvalidInputError, errorMessage, isAbortError } from "../errors.js";
import type { EmbeddingConfig } from "./config.js";

export interface EmbedOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Maps texts to vectors one-to-one, preserving order. Queries go through the same
 * model as chunks so that both land in one vector space.
 */
export interface Embedder {
  readonly model: string;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
  embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

interface EmbeddingResponse {
  data?: Array<{ embedding?: unknown; index?: number }>;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

/** Client for any OpenAI-compatible `/embeddings` endpoint (OpenRouter, Ollama's /v1, vLLM). */
export class HttpEmbedder implements Embedder {
  readonly model: string;
  private readonly endpoint: string;

  constructor(private readonly config: EmbeddingConfig) {
    this.model = config.model;
    this.endpoint = `${config.baseUrl.replace(/\/$/, "")}/embeddings`;
  }

  private async embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.apiKey) {
      headers["Authorization"] = `Bearer ${this.config.apiKey}`;
    }

    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.model, input: batch }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw new EmbeddingServiceError(
        isAbortError(err) ? "Embedding request timed out or was aborted" : `Embedding service unreachable: ${errorMessage(err)}`,
        { endpoint: this.endpoint },
      );
    }

    if (!res.ok) {
      const text = await res.text();
      throw new EmbeddingServiceError(`Embedding API error (${res.status}): ${text}`, {
        endpoint: this.endpoint,
        status: res.status,
      });
    }

    let json: EmbeddingResponse;
    try {
      json = (await res.json()) as EmbeddingResponse;
    } catch (err) {
      throw new EmbeddingServiceError(`Malformed embedding response: ${errorMessage(err)}`);
    }

    const items = json.data ?? [];
    if (items.length !== batch.length) {
      throw new EmbeddingServiceError(
        `Embedding API returned ${items.length} vectors for ${batch.length} inputs`,
      );
    }

    // Some backends return items out of order; `index` is authoritative when present.
    const ordered = items.every((item) => typeof item.index === "number")
      ? [...items].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : items;

    return ordered.map((item, i) => {
      if (!isVector(item.embedding)) {
        throw new EmbeddingServiceError(`Embedding ${i} in response is not a numeric vector`);
      }
      return item.embedding;
    });
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      throw new InvalidInputError("Cannot embed an empty list of texts");
    }

    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      batches.push({
        texts: texts.slice(i, i + this.config.batchSize),
        startIdx: i,
      });
    }

    const results: number[][] = new Array<number[]>(texts.length);
    let completed = 0;

    // The first failed batch stops the others: in-flight requests are aborted, queued ones never start.
    const stop = new AbortController();
    const signal = options.signal ? AbortSignal.any([options.signal, stop.signal]) : stop.signal;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.config.concurrency, queue.length) },
      async () => {
        try {
          while (queue.length > 0 && !signal.aborted) {
            const batch = queue.shift();
            if (!batch) break;
            const embeddings = await this.embedBatch(batch.texts, signal);
            for (let j = 0; j < embeddings.length; j++) {
              results[batch.startIdx + j] = embeddings[j] ?? [];
            }
            completed += batch.texts.length;
            options.onProgress?.(Math.min(completed, texts.length), texts.length);
          }
        } catch (err) {
          stop.abort();
          throw err;
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  async embedQuery(query: string, options: EmbedOptions = {}): Promise<number[]> {
    const prefixed = this.config.queryPrefix + query;
    const [embedding] = await this.embed([prefixed], options);
    if (!embedding) {
      throw new EmbeddingServiceError("Embedding API returned no vector for the query");
    }
    return embedding;
  }
}
