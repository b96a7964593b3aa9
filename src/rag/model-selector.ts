import { ModelUnavailableError } from "../errors.js";
import type { LanguageModelConfig } from "./config.js";
import {
  AnthropicModel,
  ChatCompletionsModel,
  OllamaModel,
  type GenerationSettings,
  type LanguageModel,
} from "./language-model.js";

export interface ModelProbe {
  name: string;
  isAvailable(): Promise<boolean>;
  create(): LanguageModel;
}

export const PROVIDER_PRIORITY = [
  "ollama",
  "huggingface",
  "together",
  "anthropic",
  "sambanova",
  "openrouter",
] as const;

export type ProviderName = (typeof PROVIDER_PRIORITY)[number];

function hostedProbe(name: string, create: () => LanguageModel): ModelProbe {
  // A hosted provider counts as available once its credentials are configured.
  return { name, isAvailable: async () => true, create };
}

/**
 * Turns configuration into the ordered list of providers worth trying:
 * local Ollama first (it is free), then each hosted provider that has a key.
 * Nothing here touches the network; probing happens in selectLanguageModel.
 */
export function resolveModelProbes(config: LanguageModelConfig): ModelProbe[] {
  const settings: GenerationSettings = {
    timeoutMs: config.timeoutMs,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  };
  const probes: ModelProbe[] = [];

  for (const name of PROVIDER_PRIORITY) {
    const provider = config[name];

    if (name === "ollama") {
      const baseUrl = provider.baseUrl;
      if (!baseUrl) continue;
      const model = new OllamaModel(baseUrl, provider.model, settings);
      probes.push({ name, isAvailable: () => model.isAvailable(), create: () => model });
      continue;
    }

    const apiKey = provider.apiKey;
    if (!apiKey) continue;

    if (name === "anthropic") {
      probes.push(hostedProbe(name, () => new AnthropicModel(apiKey, provider.model, settings)));
      continue;
    }

    const baseUrl = provider.baseUrl;
    if (!baseUrl) continue;
    probes.push(
      hostedProbe(name, () => new ChatCompletionsModel(name, baseUrl, apiKey, provider.model, settings)),
    );
  }

  return probes;
}

/** First probe that reports itself available wins. */
export async function selectLanguageModel(probes: readonly ModelProbe[]): Promise<LanguageModel> {
  for (const probe of probes) {
    if (await probe.isAvailable()) {
      return probe.create();
    }
  }

  throw new ModelUnavailableError(
    "No LLM available. Either run Ollama locally or set one of HUGGINGFACEHUB_API_TOKEN, " +
      "TOGETHER_API_KEY, ANTHROPIC_API_KEY, SAMBANOVA_API_KEY, OPENROUTER_API_KEY.",
    { tried: probes.map((p) => p.name) },
  );
}

export type ModelResolver = () => Promise<LanguageModel>;

export function createModelResolver(config: LanguageModelConfig): ModelResolver {
  const probes = resolveModelProbes(config);
  return () => selectLanguageModel(probes);
}
