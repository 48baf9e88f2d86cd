import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import type { ReasoningEffort } from '../../src/types';
import { CaptionerError } from '../errors';
import { toDataUri } from '../imageEncoder';
import type { CaptionBackend, CaptionRequest } from './types';

export const XAI_BASE_URL = 'https://api.x.ai/v1';
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export const XAI_MODELS = ['grok-4', 'grok-4-fast', 'grok-4.1', 'grok-4.1-fast', 'grok-3'];

export const OPENROUTER_MODELS = [
  'qwen/qwen-2.5-vl-72b-instruct',
  'x-ai/grok-4',
  'mistralai/pixtral-large-latest',
  'google/gemini-2.5-flash',
  'openai/gpt-4o',
  'meta-llama/llama-4-scout'
];

type ChatParams = ChatCompletionCreateParamsNonStreaming & {
  reasoning?: { effort: ReasoningEffort; exclude: boolean };
};

interface ProviderProfile {
  id: 'xai' | 'openrouter';
  label: string;
  baseURL: string;
}

export const XAI_PROFILE: ProviderProfile = {
  id: 'xai',
  label: 'xAI Grok',
  baseURL: XAI_BASE_URL
};

export const OPENROUTER_PROFILE: ProviderProfile = {
  id: 'openrouter',
  label: 'OpenRouter',
  baseURL: OPENROUTER_BASE_URL
};

export interface OpenAICompatibleOptions {
  apiKey: string;
  model: string;
  fetch?: typeof fetch;
  maxRetries?: number;
}

export class OpenAICompatibleBackend implements CaptionBackend {
  readonly id: 'xai' | 'openrouter';
  readonly label: string;
  private client: OpenAI | null = null;

  constructor(
    private readonly profile: ProviderProfile,
    private readonly options: OpenAICompatibleOptions
  ) {
    this.id = profile.id;
    this.label = profile.label;
  }

  checkReady(): string | null {
    if (!this.options.apiKey) {
      return `Please enter your ${this.profile.label} API key.`;
    }

    if (!this.options.model) {
      return `Please select or enter an ${this.profile.label} model.`;
    }

    return null;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.profile.baseURL,
        ...(this.options.fetch ? { fetch: this.options.fetch } : {}),
        ...(this.options.maxRetries !== undefined ? { maxRetries: this.options.maxRetries } : {})
      });
    }

    return this.client;
  }

  buildParams(request: CaptionRequest): ChatParams {
    const messages: ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    messages.push({
      role: 'user',
      content: [
        { type: 'image_url', image_url: { url: toDataUri(request.image) } },
        { type: 'text', text: request.userPrompt }
      ]
    });

    const params: ChatParams = {
      model: this.options.model,
      messages,
      temperature: request.params.temperature,
      top_p: request.params.topP,
      max_tokens: request.params.maxTokens
    };

    const effort = request.params.reasoningEffort;
    // Reasoning stays server-side; only the answer comes back.
    return effort === 'auto' ? params : { ...params, reasoning: { effort, exclude: true } };
  }

  async generate(request: CaptionRequest, signal?: AbortSignal): Promise<string> {
    const reason = this.checkReady();
    if (reason) {
      throw new CaptionerError('validation', reason);
    }

    const response = await this.getClient().chat.completions.create(this.buildParams(request), { signal });
    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new CaptionerError('backend', `${this.profile.label} (${this.options.model}) returned an empty response.`);
    }

    return content;
  }
}
