import fetch, { FetchError, Response } from "node-fetch";
import { errorMessage, Logger } from "../config/logger";

const EXECUTION_SYSTEM_PROMPT = [
  "You explain precomputed job and candidate match results.",
  "Use only the facts you are given.",
  "Keep wording concise and neutral.",
  "If output requires strict JSON, return JSON only and follow schema exactly.",
].join(" ");

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices: Array<{
    message: {
      content?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
  timeoutMs?: number;
}

export interface LlmClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export class LlmClient {
  private readonly baseUrl: string;

  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  async generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            authorization: `Bearer ${this.options.apiKey}`,
            "content-type": "application/json",
          },
          body: JSON.stringify(this.buildJsonRequestBody(prompt, maxTokens)),
          timeout: options?.timeoutMs ?? 0,
        });
      } catch (error) {
        if (error instanceof FetchError && error.type === "request-timeout") {
          throw new Error(`OpenAI request timed out after ${options?.timeoutMs ?? 0}ms`);
        }
        throw error;
      }

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body.slice(0, 300)}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        latencyMs: Date.now() - startedAt,
        maxTokens,
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.options.model,
      temperature: 0.2,
      messages: [
        {
          role: "system",
          content: EXECUTION_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.options.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5");
}
