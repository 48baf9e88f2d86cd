import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters, ThinkingConfig } from '@google/genai';
import type { ReasoningEffort } from '../../src/types';
import { CaptionerError } from '../errors';
import { toBase64 } from '../imageEncoder';
import type { CaptionBackend, CaptionRequest } from './types';

export const GEMINI_MODELS = ['gemini-2.5-flash', 'gemini-2.5-pro', 'gemini-2.0-flash'];

const THINKING_BUDGETS: Record<Exclude<ReasoningEffort, 'auto' | 'none'>, number> = {
  minimal: 512,
  low: 1024,
  medium: 8192,
  high: 24576
};

export interface GeminiModelsClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export type GeminiClientFactory = (apiKey: string) => GeminiModelsClient;

const defaultClientFactory: GeminiClientFactory = (apiKey) => new GoogleGenAI({ apiKey }).models;

export function buildThinkingConfig(model: string, effort: ReasoningEffort): ThinkingConfig | undefined {
  if (effort === 'auto') {
    return undefined;
  }

  if (effort === 'none') {
    // Pro models reject a zero budget; 128 is the smallest they accept.
    return { thinkingBudget: model.includes('pro') ? 128 : 0 };
  }

  return { thinkingBudget: THINKING_BUDGETS[effort] };
}

export class GeminiBackend implements CaptionBackend {
  readonly id = 'gemini';
  readonly label = 'Gemini API';
  private client: GeminiModelsClient | null = null;

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly clientFactory: GeminiClientFactory = defaultClientFactory
  ) {}

  checkReady(): string | null {
    if (!this.apiKey) {
      return 'Please enter your Gemini API key.';
    }

    if (!this.model) {
      return 'Please select a Gemini model.';
    }

    return null;
  }

  private getClient(): GeminiModelsClient {
    if (!this.client) {
      this.client = this.clientFactory(this.apiKey);
    }

    return this.client;
  }

  buildRequest(request: CaptionRequest, signal?: AbortSignal): GenerateContentParameters {
    const { params } = request;

    return {
      model: this.model,
      contents: [
        {
          role: 'user',
          parts: [
            { inlineData: { mimeType: request.image.mimeType, data: toBase64(request.image) } },
            { text: request.userPrompt }
          ]
        }
      ],
      config: {
        systemInstruction: request.systemPrompt || undefined,
        temperature: params.temperature,
        topK: params.topK,
        topP: params.topP,
        maxOutputTokens: params.maxTokens,
        thinkingConfig: buildThinkingConfig(this.model, params.reasoningEffort),
        abortSignal: signal
      }
    };
  }

  async generate(request: CaptionRequest, signal?: AbortSignal): Promise<string> {
    const reason = this.checkReady();
    if (reason) {
      throw new CaptionerError('validation', reason);
    }

    const response = await this.getClient().generateContent(this.buildRequest(request, signal));
    const text = response.text?.trim();
    if (!text) {
      throw new CaptionerError('backend', `Gemini (${this.model}) returned an empty response.`);
    }

    return text;
  }
}
