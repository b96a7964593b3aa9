import Anthropic from "@anthropic-ai/sdk";
import { ModelInvocationError, errorMessage, isAbortError } from "../errors.js";

export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * A language model reduced to what the pipeline needs: prompt in, plain text out.
 * Adapters normalise each backend's response shape before returning.
 */
export interface LanguageModel {
  readonly provider: string;
  readonly model: string;
  invoke(prompt: string, options?: InvokeOptions): Promise<string>;
}

export interface GenerationSettings {
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

function withDeadline(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

async function postJson(
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (isAbortError(err)) {
      throw new ModelInvocationError(provider, "request timed out or was aborted", { reason: "timeout" });
    }
    throw new ModelInvocationError(provider, errorMessage(err), { reason: "transport" });
  }

  if (!res.ok) {
    const text = await res.text();
    throw new ModelInvocationError(provider, `API error (${res.status}): ${text}`, {
      reason: "status",
      status: res.status,
    });
  }

  try {
    return (await res.json()) as unknown;
  } catch (err) {
    throw new ModelInvocationError(provider, `malformed response body: ${errorMessage(err)}`, {
      reason: "malformed",
    });
  }
}

// ── Ollama (local) ──────────────────────────────────────────────────────────

interface OllamaGenerateResponse {
  response?: unknown;
}

export class OllamaModel implements LanguageModel {
  readonly provider = "ollama";
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    readonly model: string,
    private readonly settings: GenerationSettings,
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
    const data = (await postJson(
      this.provider,
      `${this.baseUrl}/api/generate`,
      {},
      {
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: this.settings.temperature,
          num_predict: this.settings.maxTokens,
        },
      },
      withDeadline(this.settings.timeoutMs, options.signal),
    )) as OllamaGenerateResponse;

    if (typeof data.response !== "string") {
      throw new ModelInvocationError(this.provider, "response has no text", { reason: "malformed" });
    }
    return data.response;
  }

  async isAvailable(timeoutMs = 2000): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, { signal: AbortSignal.timeout(timeoutMs) });
      return res.ok;
    } catch {
      return false;
    }
  }
}

// ── OpenAI-compatible chat completions (OpenRouter, Together, SambaNova, HF router) ──

type MessageContent = string | Array<{ type?: string; text?: string }>;

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: MessageContent | null } }>;
  error?: { message?: string };
}

function contentToText(content: MessageContent | null | undefined): string | null {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part) => (typeof part.text === "string" ? part.text : ""))
      .join("");
  }
  return null;
}

export class ChatCompletionsModel implements LanguageModel {
  private readonly endpoint: string;

  constructor(
    readonly provider: string,
    baseUrl: string,
    private readonly apiKey: string,
    readonly model: string,
    private readonly settings: GenerationSettings,
  ) {
    this.endpoint = `${baseUrl.replace(/\/$/, "")}/chat/completions`;
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
    const data = (await postJson(
      this.provider,
      this.endpoint,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      },
      withDeadline(this.settings.timeoutMs, options.signal),
    )) as ChatCompletionResponse;

    if (data.error?.message) {
      throw new ModelInvocationError(this.provider, data.error.message, { reason: "status" });
    }
    const text = contentToText(data.choices?.[0]?.message?.content);
    if (text === null) {
      throw new ModelInvocationError(this.provider, "response has no message content", {
        reason: "malformed",
      });
    }
    return text;
  }
}

// ── Anthropic ───────────────────────────────────────────────────────────────

export class AnthropicModel implements LanguageModel {
  readonly provider = "anthropic";
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly settings: GenerationSettings,
  ) {
    this.client = new Anthropic({ apiKey, timeout: settings.timeoutMs, maxRetries: 0 });
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
    try {
      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          messages: [{ role: "user", content: prompt }],
        },
        { signal: options.signal },
      );
      return message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    } catch (err) {
      if (err instanceof Anthropic.APIConnectionTimeoutError) {
        throw new ModelInvocationError(this.provider, "request timed out", { reason: "timeout" });
      }
      if (err instanceof Anthropic.APIError) {
        throw new ModelInvocationError(this.provider, err.message, { reason: "status", status: err.status });
      }
      throw new ModelInvocationError(this.provider, errorMessage(err), { reason: "transport" });
    }
  }
}
