import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { DEFAULT_SUGGESTION_MODEL, SUGGESTION_MAX_TOKENS } from '../planner/constants';

/**
 * LLM Provider configuration
 */
export type LLMProvider = 'openrouter' | 'openai';

export type LLMClientConfig = {
  provider: LLMProvider;
  apiKey: string;
  model?: string;
};

/**
 * The slice of the OpenAI SDK the client calls. An `OpenAI` instance satisfies it.
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
}

/**
 * Request/response capability the suggestion worker depends on.
 * Any rejection or blank text counts as "no usable suggestion".
 */
export interface SuggestionService {
  suggest(model: string, prompt: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Default models for each provider
 */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openrouter: `openai/${DEFAULT_SUGGESTION_MODEL}`,
  openai: DEFAULT_SUGGESTION_MODEL,
};

/**
 * Map a model ID to an OpenRouter ID. A bare ID is taken to be an OpenAI model.
 */
export function mapToOpenRouterModel(modelId: string): string {
  return modelId.includes('/') ? modelId : `openai/${modelId}`;
}

/**
 * Map an OpenRouter model ID to the OpenAI native ID.
 * Plain OpenAI IDs pass through; other vendors' models fall back to the default.
 */
export function mapToOpenAIModel(modelId: string): string {
  if (modelId.startsWith('openai/')) {
    return modelId.slice('openai/'.length);
  }
  if (!modelId.includes('/')) {
    return modelId;
  }
  return DEFAULT_MODELS.openai;
}

/**
 * LLM Client that supports both OpenRouter and OpenAI APIs
 *
 * OpenRouter uses the same API format as OpenAI, just with a different base URL
 * and optional HTTP-Referer/X-Title headers for attribution.
 */
export class LLMClient implements SuggestionService {
  private client: ChatCompletionsApi;
  private provider: LLMProvider;
  private model: string;

  constructor(config: LLMClientConfig, client?: ChatCompletionsApi) {
    this.provider = config.provider;
    this.model = this.resolveModel(config.model ?? DEFAULT_MODELS[config.provider]);

    if (client) {
      this.client = client;
    } else if (config.provider === 'openrouter') {
      this.client = new OpenAI({
        baseURL: 'https://openrouter.ai/api/v1',
        apiKey: config.apiKey,
        defaultHeaders: {
          'HTTP-Referer': 'https://localhost/sortbox',
          'X-Title': 'Sortbox',
        },
      });
    } else {
      this.client = new OpenAI({
        apiKey: config.apiKey,
      });
    }
  }

  getProvider(): LLMProvider {
    return this.provider;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Create a chat completion and return its trimmed text.
   */
  async chatCompletion(
    messages: ChatCompletionMessageParam[],
    options?: {
      model?: string;
      signal?: AbortSignal;
    }
  ): Promise<string> {
    const modelToUse = options?.model ?? this.model;

    try {
      console.log(`[LLMClient] Making API call - Provider: ${this.provider}, Model: ${modelToUse}`);

      const response = await this.client.chat.completions.create(
        {
          model: modelToUse,
          messages,
          max_completion_tokens: SUGGESTION_MAX_TOKENS,
        },
        { signal: options?.signal }
      );

      if (!Array.isArray(response.choices) || response.choices.length === 0) {
        throw new Error('API response has no choices');
      }

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        console.warn(
          `[LLMClient] Empty content in response. Finish reason: ${response.choices[0]?.finish_reason}, ` +
            `Model: ${modelToUse}, Provider: ${this.provider}`
        );
      }

      return content;
    } catch (error) {
      console.error(`[LLMClient] Error in chatCompletion:`, error);
      throw error;
    }
  }

  async suggest(model: string, prompt: string, signal?: AbortSignal): Promise<string> {
    return this.chatCompletion([{ role: 'user', content: prompt }], {
      model: this.resolveModel(model),
      signal,
    });
  }

  private resolveModel(model: string): string {
    return this.provider === 'openai' ? mapToOpenAIModel(model) : mapToOpenRouterModel(model);
  }
}

/**
 * Pick a provider from explicit settings or the environment.
 *
 * Priority:
 * 1. Explicit apiKey (provider defaults to OpenAI)
 * 2. OPENROUTER_API_KEY
 * 3. OPENAI_API_KEY
 */
export function detectLLMProvider(
  settings: { provider?: LLMProvider; apiKey?: string; model?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): LLMClientConfig | null {
  const model = settings.model ?? env.LLM_MODEL?.trim();
  const explicitKey = settings.apiKey?.trim();

  if (explicitKey) {
    return { provider: settings.provider ?? 'openai', apiKey: explicitKey, model };
  }

  const openrouterKey = env.OPENROUTER_API_KEY?.trim();
  const openaiKey = env.OPENAI_API_KEY?.trim();

  if (openrouterKey && settings.provider !== 'openai') {
    return { provider: 'openrouter', apiKey: openrouterKey, model };
  }

  if (openaiKey && settings.provider !== 'openrouter') {
    return { provider: 'openai', apiKey: openaiKey, model };
  }

  return null;
}

/**
 * Create an LLM client, or null if no API key is available
 */
export function createLLMClient(
  settings: { provider?: LLMProvider; apiKey?: string; model?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): LLMClient | null {
  const config = detectLLMProvider(settings, env);
  if (!config) {
    return null;
  }
  return new LLMClient(config);
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openrouter':
      return 'OpenRouter';
    case 'openai':
      return 'OpenAI';
  }
}
