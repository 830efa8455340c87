import fetch, { FetchError, Response } from "node-fetch";
import { Logger } from "../config/logger";
import { EmbeddingGatewayError } from "../shared/errors";

const MAX_INPUT_CHARS = 6000;

interface EmbeddingsResponse {
  data: Array<{
    embedding: number[];
  }>;
}

export interface EmbeddingGateway {
  /** Throws EmbeddingGatewayError classified by kind; only rate_limited and timeout are retryable. */
  embed(text: string, modelVersion: string): Promise<number[]>;
}

export interface EmbeddingsClientOptions {
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
}

export class EmbeddingsClient implements EmbeddingGateway {
  private readonly baseUrl: string;

  constructor(
    private readonly options: EmbeddingsClientOptions,
    private readonly logger: Logger,
  ) {
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  async embed(text: string, modelVersion: string): Promise<number[]> {
    if (!text.trim()) {
      throw new EmbeddingGatewayError("invalid_input", "Embedding input is empty");
    }

    const startedAt = Date.now();
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          model: modelVersion,
          input: text.slice(0, MAX_INPUT_CHARS),
        }),
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      throw classifyTransportError(error);
    }

    if (!response.ok) {
      const body = await response.text();
      this.logger.warn("embedding.call.failed", {
        status: response.status,
        model: modelVersion,
        latencyMs: Date.now() - startedAt,
      });
      throw classifyHttpError(response.status, body);
    }

    const body = (await response.json()) as EmbeddingsResponse;
    const vector = body.data?.[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingGatewayError("invalid_input", "Embeddings API returned empty vector.");
    }

    this.logger.debug("embedding.call.completed", {
      model: modelVersion,
      dimension: vector.length,
      latencyMs: Date.now() - startedAt,
    });
    return vector;
  }
}

export function classifyHttpError(status: number, body: string): EmbeddingGatewayError {
  const message = `Embeddings API error: HTTP ${status} - ${body.slice(0, 300)}`;
  if (status === 400 || status === 413 || status === 422) {
    return new EmbeddingGatewayError("invalid_input", message);
  }
  if (status === 401 || status === 403) {
    return new EmbeddingGatewayError("unauthorized", message);
  }
  if (status === 408 || status === 504) {
    return new EmbeddingGatewayError("timeout", message);
  }
  // 429 and other 5xx are treated as a throttled upstream.
  return new EmbeddingGatewayError("rate_limited", message);
}

function classifyTransportError(error: unknown): EmbeddingGatewayError {
  if (error instanceof FetchError && error.type === "request-timeout") {
    return new EmbeddingGatewayError("timeout", `Embeddings API timed out: ${error.message}`);
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return new EmbeddingGatewayError("timeout", `Embeddings API is unreachable: ${message}`);
}
