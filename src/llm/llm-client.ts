/**
 * LLM Client - chat completions against OpenAI or Anthropic
 *
 * - API key from environment variables only
 * - fail-closed on missing API key
 * - `fetch` is injectable so tests never reach the network
 */

import { ErrorCode } from '../errors/error-codes';
import { QualityGateError } from '../errors/gate-error';

export type LLMProvider = 'openai' | 'anthropic';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic'];

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface LLMClientConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  /** 0-2, defaults to 0.3 */
  temperature?: number;
  maxTokens?: number;
  baseUrl?: string;
  fetchImpl?: FetchFn;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * Anything that can answer a chat; LLMClient and test fakes implement it
 */
export interface ChatModel {
  chat(messages: ChatMessage[]): Promise<LLMResponse>;
}

/**
 * Error thrown when API key is missing (fail-closed)
 */
export class APIKeyMissingError extends QualityGateError {
  public readonly provider: LLMProvider;

  constructor(provider: LLMProvider) {
    super(ErrorCode.E401_API_KEY_MISSING, `set ${getEnvVarName(provider)} for provider ${provider}`);
    this.name = 'APIKeyMissingError';
    this.provider = provider;
  }
}

/**
 * Error thrown when the provider answers with a non-2xx status
 */
export class LLMAPIError extends QualityGateError {
  public readonly provider: LLMProvider;
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(provider: LLMProvider, statusCode: number, responseBody: string) {
    super(ErrorCode.E402_PROVIDER_REQUEST_FAILED, `${provider} ${statusCode} - ${responseBody.slice(0, 200)}`);
    this.name = 'LLMAPIError';
    this.provider = provider;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

function getEnvVarName(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'OPENAI_API_KEY';
    case 'anthropic':
      return 'ANTHROPIC_API_KEY';
  }
}

/**
 * @throws APIKeyMissingError if key is not set
 */
export function getAPIKeyFromEnv(provider: LLMProvider, env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env[getEnvVarName(provider)];

  if (!apiKey || apiKey.trim() === '') {
    throw new APIKeyMissingError(provider);
  }

  return apiKey.trim();
}

export function isLLMProvider(value: unknown): value is LLMProvider {
  return typeof value === 'string' && (LLM_PROVIDERS as readonly string[]).includes(value);
}

const DEFAULT_CONFIGS: Record<LLMProvider, { baseUrl: string; defaultModel: string }> = {
  openai: {
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o-mini',
  },
  anthropic: {
    baseUrl: 'https://api.anthropic.com/v1',
    defaultModel: 'claude-3-haiku-20240307',
  },
};

interface OpenAIChatResponse {
  choices: Array<{ message: { content: string | null } }>;
  model: string;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

interface AnthropicMessageResponse {
  content: Array<{ type: string; text?: string }>;
  model: string;
  usage?: { input_tokens: number; output_tokens: number };
}

export class LLMClient implements ChatModel {
  private readonly config: Required<Omit<LLMClientConfig, 'fetchImpl'>>;
  private readonly fetchImpl: FetchFn;

  constructor(config: LLMClientConfig) {
    const temperature = config.temperature ?? 0.3;
    if (temperature < 0 || temperature > 2) {
      throw new RangeError('temperature must be between 0 and 2');
    }

    this.config = {
      provider: config.provider,
      model: config.model,
      apiKey: config.apiKey,
      temperature,
      maxTokens: config.maxTokens ?? 4096,
      baseUrl: config.baseUrl ?? DEFAULT_CONFIGS[config.provider].baseUrl,
    };
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Create LLM client from environment variables
   * @throws APIKeyMissingError if API key is not set
   */
  static fromEnv(
    provider: LLMProvider = 'openai',
    model?: string,
    options: { temperature?: number; maxTokens?: number; fetchImpl?: FetchFn } = {}
  ): LLMClient {
    return new LLMClient({
      provider,
      model: model ?? DEFAULT_CONFIGS[provider].defaultModel,
      apiKey: getAPIKeyFromEnv(provider),
      ...options,
    });
  }

  async chat(messages: ChatMessage[]): Promise<LLMResponse> {
    switch (this.config.provider) {
      case 'openai':
        return this.chatOpenAI(messages);
      case 'anthropic':
        return this.chatAnthropic(messages);
    }
  }

  private async chatOpenAI(messages: ChatMessage[]): Promise<LLMResponse> {
    const response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      }),
    });

    if (!response.ok) {
      throw new LLMAPIError('openai', response.status, await response.text());
    }

    const data = await response.json() as OpenAIChatResponse;

    return {
      content: data.choices[0]?.message?.content ?? '',
      model: data.model,
      usage: data.usage,
    };
  }

  private async chatAnthropic(messages: ChatMessage[]): Promise<LLMResponse> {
    const systemMessage = messages.find(m => m.role === 'system');
    const conversationMessages = messages.filter(m => m.role !== 'system');

    const response = await this.fetchImpl(`${this.config.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: systemMessage?.content,
        messages: conversationMessages.map(m => ({
          role: m.role,
          content: m.content,
        })),
      }),
    });

    if (!response.ok) {
      throw new LLMAPIError('anthropic', response.status, await response.text());
    }

    const data = await response.json() as AnthropicMessageResponse;
    const text = data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');

    return {
      content: text,
      model: data.model,
      usage: data.usage ? {
        prompt_tokens: data.usage.input_tokens,
        completion_tokens: data.usage.output_tokens,
        total_tokens: data.usage.input_tokens + data.usage.output_tokens,
      } : undefined,
    };
  }

  getModel(): string {
    return this.config.model;
  }

  getProvider(): LLMProvider {
    return this.config.provider;
  }
}
